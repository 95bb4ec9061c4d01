import BN from 'bn.js';
import { AccountMeta, TransactionInstruction } from '@solana/web3.js';
import { PerpInstruction } from '../types/perp';
import { decodePerpInstruction } from '../instructions/layout';
import { EncodingError } from './errors';
import { FP32_SHIFT } from '../constants';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Format amount with decimals (e.g., 1000000 with 6 decimals -> "1.000000")
 */
export function formatAmount(amount: BN, decimals: number): string {
  if (decimals === 0) {
    return amount.toString();
  }
  const str = amount.toString().padStart(decimals + 1, '0');
  const integerPart = str.slice(0, -decimals);
  const decimalPart = str.slice(-decimals);
  return `${integerPart}.${decimalPart}`;
}

/**
 * Parse amount with decimals (e.g., "1.5" with 6 decimals -> 1500000)
 * Extra fractional digits are truncated.
 */
export function parseAmount(amountStr: string, decimals: number): BN {
  const match = DECIMAL_PATTERN.exec(amountStr.trim());
  if (!match) {
    throw new EncodingError(`"${amountStr}" is not a non-negative decimal`, 'amount');
  }
  const [, integerPart, decimalPart = ''] = match;
  const paddedDecimal = decimalPart.padEnd(decimals, '0').slice(0, decimals);
  return new BN(integerPart + paddedDecimal);
}

/**
 * Convert a decimal string to 32-bit fractional fixed-point
 * (e.g., "1.5" -> 6442450944). Fractions round down.
 */
export function parseFp32(valueStr: string): BN {
  const match = DECIMAL_PATTERN.exec(valueStr.trim());
  if (!match) {
    throw new EncodingError(`"${valueStr}" is not a non-negative decimal`, 'fp32');
  }
  const [, integerPart, decimalPart = ''] = match;

  const integer = new BN(integerPart).shln(FP32_SHIFT);
  if (decimalPart.length === 0) {
    return integer;
  }
  const scale = new BN(10).pow(new BN(decimalPart.length));
  const fraction = new BN(decimalPart).shln(FP32_SHIFT).div(scale);
  return integer.add(fraction);
}

/**
 * Format a 32-bit fractional fixed-point value (e.g., 6442450944 -> "1.500000")
 * Digits past `decimals` are truncated.
 */
export function formatFp32(value: BN, decimals: number = 6): string {
  const integerPart = value.shrn(FP32_SHIFT).toString();
  if (decimals === 0) {
    return integerPart;
  }
  const fraction = value
    .maskn(FP32_SHIFT)
    .mul(new BN(10).pow(new BN(decimals)))
    .shrn(FP32_SHIFT);
  return `${integerPart}.${fraction.toString().padStart(decimals, '0')}`;
}

/**
 * Format one account of an instruction (e.g., "3. ws <address>")
 */
export function formatAccountMeta(meta: AccountMeta, index: number): string {
  const writable = meta.isWritable ? 'w' : '-';
  const signer = meta.isSigner ? 's' : '-';
  return `${index}. ${writable}${signer} ${meta.pubkey.toBase58()}`;
}

/**
 * Describe a perp instruction for logs: program, decoded kind, payload and accounts
 */
export function describeInstruction(ix: TransactionInstruction): string {
  const decoded = decodePerpInstruction(ix.data);
  return [
    `program: ${ix.programId.toBase58()}`,
    `instruction: ${PerpInstruction[decoded.kind]}`,
    `data: ${ix.data.toString('hex')}`,
    ...ix.keys.map((meta, index) => formatAccountMeta(meta, index)),
  ].join('\n');
}
