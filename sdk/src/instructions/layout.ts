import BN from 'bn.js';
import { PerpInstruction, PerpInstructionData, PositionType } from '../types/perp';
import { EncodingError } from '../utils/errors';
import {
  createInstructionData,
  serializeSide,
  serializeString,
  serializeU16,
  serializeU64,
  serializeU8,
  deserializeSide,
  deserializeString,
  deserializeU16,
  deserializeU64,
  deserializeU8,
} from '../utils/serialization';

/**
 * Encode an instruction payload
 *
 * Layout: discriminator (u8) followed by the variant's fields in declaration
 * order. Integers are fixed-width little-endian, strings are a u32 byte length
 * followed by UTF-8 bytes, and the position side is a single byte.
 *
 * @throws EncodingError if a field cannot be represented
 */
export function encodePerpInstruction(instruction: PerpInstructionData): Buffer {
  switch (instruction.kind) {
    case PerpInstruction.CreateMarket:
      return createInstructionData(
        instruction.kind,
        serializeU8(instruction.signerNonce, 'signerNonce'),
        serializeString(instruction.marketSymbol, 'marketSymbol'),
        serializeU64(instruction.initialVPcAmount, 'initialVPcAmount'),
        serializeU8(instruction.coinDecimals, 'coinDecimals'),
        serializeU8(instruction.quoteDecimals, 'quoteDecimals')
      );

    case PerpInstruction.OpenPosition:
      return createInstructionData(
        instruction.kind,
        serializeSide(instruction.side),
        serializeU64(instruction.collateral, 'collateral'),
        serializeU8(instruction.instanceIndex, 'instanceIndex'),
        serializeU64(instruction.leverage, 'leverage'),
        serializeU64(instruction.predictedEntryPrice, 'predictedEntryPrice'),
        serializeU64(instruction.maximumSlippageMargin, 'maximumSlippageMargin')
      );

    case PerpInstruction.AddBudget:
    case PerpInstruction.WithdrawBudget:
      return createInstructionData(
        instruction.kind,
        serializeU64(instruction.amount, 'amount')
      );

    case PerpInstruction.IncreasePosition:
      return createInstructionData(
        instruction.kind,
        serializeU64(instruction.addCollateral, 'addCollateral'),
        serializeU8(instruction.instanceIndex, 'instanceIndex'),
        serializeU64(instruction.leverage, 'leverage'),
        serializeU16(instruction.positionIndex, 'positionIndex'),
        serializeU64(instruction.predictedEntryPrice, 'predictedEntryPrice'),
        serializeU64(instruction.maximumSlippageMargin, 'maximumSlippageMargin')
      );

    case PerpInstruction.ClosePosition:
      return createInstructionData(
        instruction.kind,
        serializeU16(instruction.positionIndex, 'positionIndex'),
        serializeU64(instruction.closingCollateral, 'closingCollateral'),
        serializeU64(instruction.closingVCoin, 'closingVCoin'),
        serializeU64(instruction.predictedEntryPrice, 'predictedEntryPrice'),
        serializeU64(instruction.maximumSlippageMargin, 'maximumSlippageMargin')
      );

    case PerpInstruction.CollectGarbage:
      return createInstructionData(
        instruction.kind,
        serializeU8(instruction.instanceIndex, 'instanceIndex'),
        serializeU64(instruction.maxIterations, 'maxIterations')
      );

    case PerpInstruction.CrankLiquidation:
    case PerpInstruction.FundingExtraction:
    case PerpInstruction.AddPage:
      return createInstructionData(
        instruction.kind,
        serializeU8(instruction.instanceIndex, 'instanceIndex')
      );

    case PerpInstruction.ChangeK:
      return createInstructionData(
        instruction.kind,
        serializeU64(instruction.factor, 'factor')
      );

    case PerpInstruction.Rebalance:
      return createInstructionData(
        instruction.kind,
        serializeU64(instruction.collateral, 'collateral'),
        serializeU8(instruction.instanceIndex, 'instanceIndex')
      );

    case PerpInstruction.TransferPosition:
      return createInstructionData(
        instruction.kind,
        serializeU16(instruction.positionIndex, 'positionIndex')
      );

    case PerpInstruction.AddInstance:
    case PerpInstruction.UpdateOracleAccount:
    case PerpInstruction.CrankFunding:
    case PerpInstruction.CloseAccount:
    case PerpInstruction.TransferUserAccount:
      return createInstructionData(instruction.kind);

    default: {
      const unknown: never = instruction;
      throw new EncodingError(`unknown instruction ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Sequential reader over an instruction payload
 */
class InstructionDataReader {
  private offset = 0;

  constructor(private readonly data: Buffer) {}

  u8(field: string): number {
    const value = deserializeU8(this.data, this.offset, field);
    this.offset += 1;
    return value;
  }

  u16(field: string): number {
    const value = deserializeU16(this.data, this.offset, field);
    this.offset += 2;
    return value;
  }

  u64(field: string): BN {
    const value = deserializeU64(this.data, this.offset, field);
    this.offset += 8;
    return value;
  }

  string(field: string): string {
    const [value, consumed] = deserializeString(this.data, this.offset, field);
    this.offset += consumed;
    return value;
  }

  side(field: string): PositionType {
    const value = deserializeSide(this.data, this.offset, field);
    this.offset += 1;
    return value;
  }

  finish(): void {
    if (this.offset !== this.data.length) {
      throw new EncodingError(
        `${this.data.length - this.offset} trailing byte(s) after offset ${this.offset}`
      );
    }
  }
}

/**
 * Decode an instruction payload produced by encodePerpInstruction
 * @throws EncodingError on an unknown discriminator, truncated data or trailing bytes
 */
export function decodePerpInstruction(data: Buffer): PerpInstructionData {
  const reader = new InstructionDataReader(data);
  const discriminator = reader.u8('discriminator');
  let decoded: PerpInstructionData;

  switch (discriminator) {
    case PerpInstruction.CreateMarket:
      decoded = {
        kind: PerpInstruction.CreateMarket,
        signerNonce: reader.u8('signerNonce'),
        marketSymbol: reader.string('marketSymbol'),
        initialVPcAmount: reader.u64('initialVPcAmount'),
        coinDecimals: reader.u8('coinDecimals'),
        quoteDecimals: reader.u8('quoteDecimals'),
      };
      break;
    case PerpInstruction.AddInstance:
      decoded = { kind: PerpInstruction.AddInstance };
      break;
    case PerpInstruction.UpdateOracleAccount:
      decoded = { kind: PerpInstruction.UpdateOracleAccount };
      break;
    case PerpInstruction.OpenPosition:
      decoded = {
        kind: PerpInstruction.OpenPosition,
        side: reader.side('side'),
        collateral: reader.u64('collateral'),
        instanceIndex: reader.u8('instanceIndex'),
        leverage: reader.u64('leverage'),
        predictedEntryPrice: reader.u64('predictedEntryPrice'),
        maximumSlippageMargin: reader.u64('maximumSlippageMargin'),
      };
      break;
    case PerpInstruction.AddBudget:
      decoded = { kind: PerpInstruction.AddBudget, amount: reader.u64('amount') };
      break;
    case PerpInstruction.WithdrawBudget:
      decoded = { kind: PerpInstruction.WithdrawBudget, amount: reader.u64('amount') };
      break;
    case PerpInstruction.IncreasePosition:
      decoded = {
        kind: PerpInstruction.IncreasePosition,
        addCollateral: reader.u64('addCollateral'),
        instanceIndex: reader.u8('instanceIndex'),
        leverage: reader.u64('leverage'),
        positionIndex: reader.u16('positionIndex'),
        predictedEntryPrice: reader.u64('predictedEntryPrice'),
        maximumSlippageMargin: reader.u64('maximumSlippageMargin'),
      };
      break;
    case PerpInstruction.ClosePosition:
      decoded = {
        kind: PerpInstruction.ClosePosition,
        positionIndex: reader.u16('positionIndex'),
        closingCollateral: reader.u64('closingCollateral'),
        closingVCoin: reader.u64('closingVCoin'),
        predictedEntryPrice: reader.u64('predictedEntryPrice'),
        maximumSlippageMargin: reader.u64('maximumSlippageMargin'),
      };
      break;
    case PerpInstruction.CollectGarbage:
      decoded = {
        kind: PerpInstruction.CollectGarbage,
        instanceIndex: reader.u8('instanceIndex'),
        maxIterations: reader.u64('maxIterations'),
      };
      break;
    case PerpInstruction.CrankLiquidation:
      decoded = {
        kind: PerpInstruction.CrankLiquidation,
        instanceIndex: reader.u8('instanceIndex'),
      };
      break;
    case PerpInstruction.CrankFunding:
      decoded = { kind: PerpInstruction.CrankFunding };
      break;
    case PerpInstruction.FundingExtraction:
      decoded = {
        kind: PerpInstruction.FundingExtraction,
        instanceIndex: reader.u8('instanceIndex'),
      };
      break;
    case PerpInstruction.ChangeK:
      decoded = { kind: PerpInstruction.ChangeK, factor: reader.u64('factor') };
      break;
    case PerpInstruction.CloseAccount:
      decoded = { kind: PerpInstruction.CloseAccount };
      break;
    case PerpInstruction.AddPage:
      decoded = {
        kind: PerpInstruction.AddPage,
        instanceIndex: reader.u8('instanceIndex'),
      };
      break;
    case PerpInstruction.Rebalance:
      decoded = {
        kind: PerpInstruction.Rebalance,
        collateral: reader.u64('collateral'),
        instanceIndex: reader.u8('instanceIndex'),
      };
      break;
    case PerpInstruction.TransferUserAccount:
      decoded = { kind: PerpInstruction.TransferUserAccount };
      break;
    case PerpInstruction.TransferPosition:
      decoded = {
        kind: PerpInstruction.TransferPosition,
        positionIndex: reader.u16('positionIndex'),
      };
      break;
    default:
      throw new EncodingError(`unknown instruction discriminator ${discriminator}`);
  }

  reader.finish();
  return decoded;
}
