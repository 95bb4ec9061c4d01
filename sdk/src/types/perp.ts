import { PublicKey } from '@solana/web3.js';
import BN from 'bn.js';

/**
 * Perp program instruction discriminators
 * IMPORTANT: These are the declaration order of the on-chain instruction enum
 * and are written as the first byte of every instruction payload. Never reorder.
 */
export enum PerpInstruction {
  CreateMarket = 0,
  AddInstance = 1,
  UpdateOracleAccount = 2,
  OpenPosition = 3,
  AddBudget = 4,
  WithdrawBudget = 5,
  IncreasePosition = 6,
  ClosePosition = 7,
  CollectGarbage = 8,
  CrankLiquidation = 9,
  CrankFunding = 10,
  FundingExtraction = 11,
  ChangeK = 12,
  CloseAccount = 13,
  AddPage = 14,
  Rebalance = 15,
  TransferUserAccount = 16,
  TransferPosition = 17,
}

/**
 * Position side (1 byte on the wire)
 */
export enum PositionType {
  Short = 0,
  Long = 1,
}

/**
 * u64 arguments accept a BN or a non-negative safe integer
 */
export type U64Input = BN | number;

// ============================================================================
// Instruction arguments (wire order)
// ============================================================================

export interface CreateMarketArgs {
  signerNonce: number;        // u8
  marketSymbol: string;       // u32 length + utf-8 bytes
  initialVPcAmount: BN;       // u64
  coinDecimals: number;       // u8
  quoteDecimals: number;      // u8
}

export interface OpenPositionArgs {
  side: PositionType;         // u8
  collateral: BN;             // u64
  instanceIndex: number;      // u8
  leverage: BN;               // u64 (FP32)
  predictedEntryPrice: BN;    // u64 (FP32)
  maximumSlippageMargin: BN;  // u64 (FP32)
}

export interface BudgetArgs {
  amount: BN;                 // u64
}

export interface IncreasePositionArgs {
  addCollateral: BN;          // u64
  instanceIndex: number;      // u8
  leverage: BN;               // u64 (FP32)
  positionIndex: number;      // u16
  predictedEntryPrice: BN;    // u64 (FP32)
  maximumSlippageMargin: BN;  // u64 (FP32)
}

export interface ClosePositionArgs {
  positionIndex: number;      // u16
  closingCollateral: BN;      // u64
  closingVCoin: BN;           // u64
  predictedEntryPrice: BN;    // u64 (FP32)
  maximumSlippageMargin: BN;  // u64 (FP32)
}

export interface CollectGarbageArgs {
  instanceIndex: number;      // u8
  maxIterations: BN;          // u64
}

export interface InstanceIndexArgs {
  instanceIndex: number;      // u8
}

export interface ChangeKArgs {
  factor: BN;                 // u64
}

export interface RebalanceArgs {
  collateral: BN;             // u64
  instanceIndex: number;      // u8
}

export interface TransferPositionArgs {
  positionIndex: number;      // u16
}

/**
 * Argument tuple carried by each instruction kind
 */
export interface PerpInstructionArgs {
  [PerpInstruction.CreateMarket]: CreateMarketArgs;
  [PerpInstruction.AddInstance]: {};
  [PerpInstruction.UpdateOracleAccount]: {};
  [PerpInstruction.OpenPosition]: OpenPositionArgs;
  [PerpInstruction.AddBudget]: BudgetArgs;
  [PerpInstruction.WithdrawBudget]: BudgetArgs;
  [PerpInstruction.IncreasePosition]: IncreasePositionArgs;
  [PerpInstruction.ClosePosition]: ClosePositionArgs;
  [PerpInstruction.CollectGarbage]: CollectGarbageArgs;
  [PerpInstruction.CrankLiquidation]: InstanceIndexArgs;
  [PerpInstruction.CrankFunding]: {};
  [PerpInstruction.FundingExtraction]: InstanceIndexArgs;
  [PerpInstruction.ChangeK]: ChangeKArgs;
  [PerpInstruction.CloseAccount]: {};
  [PerpInstruction.AddPage]: InstanceIndexArgs;
  [PerpInstruction.Rebalance]: RebalanceArgs;
  [PerpInstruction.TransferUserAccount]: {};
  [PerpInstruction.TransferPosition]: TransferPositionArgs;
}

/**
 * Decoded instruction payload, discriminated on `kind`
 */
export type PerpInstructionData = {
  [K in PerpInstruction]: { kind: K } & PerpInstructionArgs[K];
}[PerpInstruction];

// ============================================================================
// Market description
// ============================================================================

/**
 * One trading instance and its positions book pages
 */
export interface InstanceContext {
  instanceAccount: PublicKey;
  memoryPages: PublicKey[];
}

/**
 * Accounts shared by every instruction of a market
 */
export interface MarketContext {
  programId: PublicKey;
  signerNonce: number;
  marketSignerAccount: PublicKey;
  oracleAccount: PublicKey;
  marketAccount: PublicKey;
  adminAccount: PublicKey;
  marketVault: PublicKey;
  feeSink: PublicKey;         // buy-and-burn fee account
  instances: InstanceContext[];
}

/**
 * Fee tier discount account and its signing owner
 */
export interface DiscountAccount {
  owner: PublicKey;
  address: PublicKey;
}

/**
 * User account holding a position
 */
export interface PositionInfo {
  userAccount: PublicKey;
  userAccountOwner: PublicKey;
  instanceIndex: number;
  side: PositionType;
}

// ============================================================================
// Builder parameters
// ============================================================================

export interface CreateMarketParams {
  marketSymbol: string;
  initialVPcAmount: U64Input;
  coinDecimals: number;
  quoteDecimals: number;
}

export interface AddInstanceParams {
  instanceAccount: PublicKey;
  memoryPages: PublicKey[];
}

export interface UpdateOracleAccountParams {
  oracleMappingAccount: PublicKey;
  oracleProductAccount: PublicKey;
  oraclePriceAccount: PublicKey;
}

/**
 * Optional fee accounts shared by the trading instructions
 */
export interface FeeAccounts {
  discountAccount?: DiscountAccount;
  referrerAccount?: PublicKey;  // referrer quote token account
}

export interface OpenPositionParams extends FeeAccounts {
  position: PositionInfo;
  collateral: U64Input;
  leverage: U64Input;
  predictedEntryPrice: U64Input;
  maximumSlippageMargin: U64Input;
}

export interface AddBudgetParams {
  amount: U64Input;
  sourceOwner: PublicKey;
  sourceTokenAccount: PublicKey;
  userAccount: PublicKey;
}

export interface WithdrawBudgetParams {
  amount: U64Input;
  targetTokenAccount: PublicKey;
  userAccountOwner: PublicKey;
  userAccount: PublicKey;
}

export interface IncreasePositionParams extends FeeAccounts {
  addCollateral: U64Input;
  leverage: U64Input;
  instanceIndex: number;
  positionIndex: number;
  userAccountOwner: PublicKey;
  userAccount: PublicKey;
  predictedEntryPrice: U64Input;
  maximumSlippageMargin: U64Input;
}

export interface ClosePositionParams extends FeeAccounts {
  position: PositionInfo;
  closingCollateral: U64Input;
  closingVCoin: U64Input;
  positionIndex: number;
  predictedEntryPrice: U64Input;
  maximumSlippageMargin: U64Input;
}

export interface CollectGarbageParams {
  instanceIndex: number;
  maxIterations: U64Input;
  targetTokenAccount: PublicKey;
}

export interface CrankLiquidationParams {
  instanceIndex: number;
  targetTokenAccount: PublicKey;
}

export interface FundingExtractionParams {
  instanceIndex: number;
  userAccount: PublicKey;
}

export interface CloseAccountParams {
  userAccount: PublicKey;
  userAccountOwner: PublicKey;
  lamportsTarget: PublicKey;
}

export interface AddPageParams {
  instanceIndex: number;
  newMemoryPage: PublicKey;
}

export interface RebalanceParams {
  userAccount: PublicKey;
  userAccountOwner: PublicKey;
  instanceIndex: number;
  collateral: U64Input;
}

export interface TransferUserAccountParams {
  userAccount: PublicKey;
  userAccountOwner: PublicKey;
  newUserAccountOwner: PublicKey;
}

export interface TransferPositionParams {
  positionIndex: number;
  sourceUserAccount: PublicKey;
  sourceUserAccountOwner: PublicKey;
  destinationUserAccount: PublicKey;
  destinationUserAccountOwner: PublicKey;
}
