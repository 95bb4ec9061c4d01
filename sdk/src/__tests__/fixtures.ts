import { PublicKey } from '@solana/web3.js';
import { InstanceContext, MarketContext } from '../types/perp';

/**
 * Market context with fresh keys for every account
 * @param pagesPerInstance Page count of each instance, in instance order
 */
export function createMarketContext(pagesPerInstance: number[] = [2]): MarketContext {
  const instances: InstanceContext[] = pagesPerInstance.map((pageCount) => ({
    instanceAccount: PublicKey.unique(),
    memoryPages: Array.from({ length: pageCount }, () => PublicKey.unique()),
  }));

  return {
    programId: PublicKey.unique(),
    signerNonce: 254,
    marketSignerAccount: PublicKey.unique(),
    oracleAccount: PublicKey.unique(),
    marketAccount: PublicKey.unique(),
    adminAccount: PublicKey.unique(),
    marketVault: PublicKey.unique(),
    feeSink: PublicKey.unique(),
    instances,
  };
}

/**
 * Account list as [base58, isSigner, isWritable] rows
 */
export function accountRows(
  keys: { pubkey: PublicKey; isSigner: boolean; isWritable: boolean }[]
): [string, boolean, boolean][] {
  return keys.map((key) => [key.pubkey.toBase58(), key.isSigner, key.isWritable]);
}

export function row(
  pubkey: PublicKey,
  isSigner: boolean,
  isWritable: boolean
): [string, boolean, boolean] {
  return [pubkey.toBase58(), isSigner, isWritable];
}
