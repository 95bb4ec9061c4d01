import { PublicKey } from '@solana/web3.js';
import BN from 'bn.js';

/**
 * Label accounts
 * Fixed identities the perp program uses to tag trade, liquidation and funding
 * records. They are never supplied by callers and must match the program's
 * constants byte for byte.
 */
export type LabelName = 'trade' | 'liquidation' | 'funding' | 'fundingExtraction';

export type LabelAccounts = Readonly<Record<LabelName, PublicKey>>;

export const LABEL_ADDRESSES: Readonly<Record<LabelName, string>> = {
  trade: 'TradeRecord11111111111111111111111111111111',
  liquidation: 'LiquidationRecord11111111111111111111111111',
  funding: 'FundingRecord111111111111111111111111111111',
  fundingExtraction: 'FundingExtraction11111111111111111111111111',
};

/**
 * Label accounts resolved once at load time
 */
export const LABEL_ACCOUNTS: LabelAccounts = Object.freeze({
  trade: new PublicKey(LABEL_ADDRESSES.trade),
  liquidation: new PublicKey(LABEL_ADDRESSES.liquidation),
  funding: new PublicKey(LABEL_ADDRESSES.funding),
  fundingExtraction: new PublicKey(LABEL_ADDRESSES.fundingExtraction),
});

/**
 * Wire limits
 */
export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffffffff;
export const U64_MAX = new BN('ffffffffffffffff', 16);

/**
 * Instances are addressed by a u8 index
 */
export const MAX_INSTANCES = U8_MAX + 1;

/**
 * Fractional bits of the program's fixed-point prices and leverage
 */
export const FP32_SHIFT = 32;

/**
 * Derive the market signer from its nonce
 * Seeds: [market, nonce]
 * @param programId Perp program ID
 * @param market Market account
 * @param signerNonce Nonce stored in the market
 * @returns Market signer address
 */
export function deriveMarketSignerAddress(
  programId: PublicKey,
  market: PublicKey,
  signerNonce: number
): PublicKey {
  return PublicKey.createProgramAddressSync(
    [market.toBuffer(), Buffer.from([signerNonce])],
    programId
  );
}

/**
 * Find the market signer and the nonce to store at market creation
 * @returns [address, nonce]
 */
export function findMarketSignerAddress(
  programId: PublicKey,
  market: PublicKey
): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([market.toBuffer()], programId);
}
