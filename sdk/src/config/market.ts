import fs from 'fs';
import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';
import { MarketContext } from '../types/perp';
import { MarketConfigError } from '../utils/errors';
import { MAX_INSTANCES, U8_MAX, deriveMarketSignerAddress } from '../constants';

/**
 * Base58 address, parsed into a PublicKey
 */
const publicKeySchema = z.string().transform((value, ctx) => {
  try {
    return new PublicKey(value);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid public key "${value}"`,
    });
    return z.NEVER;
  }
});

export const InstanceConfigSchema = z.object({
  instanceAccount: publicKeySchema,
  memoryPages: z.array(publicKeySchema).default([]),
});

/**
 * Market description as published by the market directory (base58 strings)
 */
export const MarketConfigSchema = z.object({
  programId: publicKeySchema,
  signerNonce: z.number().int().min(0).max(U8_MAX),
  marketAccount: publicKeySchema,
  marketSignerAccount: publicKeySchema.optional(),
  oracleAccount: publicKeySchema,
  adminAccount: publicKeySchema,
  marketVault: publicKeySchema,
  feeSink: publicKeySchema,
  instances: z.array(InstanceConfigSchema).max(MAX_INSTANCES).default([]),
});

export type MarketConfig = z.input<typeof MarketConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Turn a market configuration into a MarketContext
 * When `marketSignerAccount` is omitted it is derived from the signer nonce.
 * @throws MarketConfigError listing every invalid field
 */
export function loadMarketContext(input: unknown): MarketContext {
  const result = MarketConfigSchema.safeParse(input);
  if (!result.success) {
    throw new MarketConfigError('Invalid market configuration', formatIssues(result.error));
  }

  const config = result.data;
  let marketSignerAccount = config.marketSignerAccount;
  if (!marketSignerAccount) {
    try {
      marketSignerAccount = deriveMarketSignerAddress(
        config.programId,
        config.marketAccount,
        config.signerNonce
      );
    } catch (err) {
      throw new MarketConfigError(
        `Signer nonce ${config.signerNonce} does not derive a market signer: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
    }
  }

  return {
    programId: config.programId,
    signerNonce: config.signerNonce,
    marketSignerAccount,
    oracleAccount: config.oracleAccount,
    marketAccount: config.marketAccount,
    adminAccount: config.adminAccount,
    marketVault: config.marketVault,
    feeSink: config.feeSink,
    instances: config.instances.map((instance) => ({
      instanceAccount: instance.instanceAccount,
      memoryPages: [...instance.memoryPages],
    })),
  };
}

/**
 * Read a market configuration JSON file
 * @param filePath Path to the JSON file
 * @throws MarketConfigError if the file cannot be read, parsed or validated
 */
export function readMarketContextFile(filePath: string): MarketContext {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new MarketConfigError(
      `Cannot read market configuration ${filePath}: ${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MarketConfigError(
      `Market configuration ${filePath} is not valid JSON: ${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }

  return loadMarketContext(parsed);
}
