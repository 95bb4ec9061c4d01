import BN from 'bn.js';
import { PositionType } from '../types/perp';
import { EncodingError } from './errors';
import { U8_MAX, U16_MAX, U32_MAX, U64_MAX } from '../constants';

function assertUnsigned(value: number, max: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new EncodingError(
      `expected an integer between 0 and ${max}, got ${value}`,
      field
    );
  }
}

/**
 * Normalize a u64 input to BN, rejecting values outside [0, 2^64)
 */
export function toU64(value: BN | number, field: string = 'u64'): BN {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new EncodingError(
        `expected a non-negative safe integer, got ${value}`,
        field
      );
    }
    return new BN(value);
  }

  if (value.isNeg() || value.gt(U64_MAX)) {
    throw new EncodingError(`${value.toString()} does not fit in a u64`, field);
  }
  return value;
}

/**
 * Serialize a u8 (1 byte)
 */
export function serializeU8(value: number, field: string = 'u8'): Buffer {
  assertUnsigned(value, U8_MAX, field);
  return Buffer.from([value]);
}

/**
 * Serialize a u16 (2 bytes, little-endian)
 */
export function serializeU16(value: number, field: string = 'u16'): Buffer {
  assertUnsigned(value, U16_MAX, field);
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16LE(value, 0);
  return buffer;
}

/**
 * Serialize a u32 (4 bytes, little-endian)
 */
export function serializeU32(value: number, field: string = 'u32'): Buffer {
  assertUnsigned(value, U32_MAX, field);
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value, 0);
  return buffer;
}

/**
 * Serialize a u64 (8 bytes, little-endian)
 */
export function serializeU64(value: BN | number, field: string = 'u64'): Buffer {
  return toU64(value, field).toArrayLike(Buffer, 'le', 8);
}

/**
 * Serialize a string as a u32 byte length followed by its UTF-8 bytes
 * @param maxLength Largest accepted byte length (defaults to the u32 limit)
 */
export function serializeString(
  value: string,
  field: string = 'string',
  maxLength: number = U32_MAX
): Buffer {
  const bytes = Buffer.from(value, 'utf8');

  // Lone surrogates are replaced during encoding and would not decode back
  if (bytes.toString('utf8') !== value) {
    throw new EncodingError('string is not valid UTF-8', field);
  }
  if (bytes.length > Math.min(maxLength, U32_MAX)) {
    throw new EncodingError(
      `string is ${bytes.length} bytes, maximum is ${Math.min(maxLength, U32_MAX)}`,
      field
    );
  }

  return Buffer.concat([serializeU32(bytes.length, field), bytes]);
}

/**
 * Serialize a position side (1 byte)
 */
export function serializeSide(side: PositionType, field: string = 'side'): Buffer {
  if (side !== PositionType.Short && side !== PositionType.Long) {
    throw new EncodingError(`unknown position side ${side}`, field);
  }
  return Buffer.from([side]);
}

function assertReadable(buffer: Buffer, offset: number, size: number, field: string): void {
  if (!Number.isInteger(offset) || offset < 0 || offset + size > buffer.length) {
    throw new EncodingError(
      `need ${size} byte(s) at offset ${offset}, buffer has ${buffer.length}`,
      field
    );
  }
}

/**
 * Deserialize a u8 (1 byte)
 */
export function deserializeU8(buffer: Buffer, offset: number = 0, field: string = 'u8'): number {
  assertReadable(buffer, offset, 1, field);
  return buffer.readUInt8(offset);
}

/**
 * Deserialize a u16 (2 bytes, little-endian)
 */
export function deserializeU16(buffer: Buffer, offset: number = 0, field: string = 'u16'): number {
  assertReadable(buffer, offset, 2, field);
  return buffer.readUInt16LE(offset);
}

/**
 * Deserialize a u32 (4 bytes, little-endian)
 */
export function deserializeU32(buffer: Buffer, offset: number = 0, field: string = 'u32'): number {
  assertReadable(buffer, offset, 4, field);
  return buffer.readUInt32LE(offset);
}

/**
 * Deserialize a u64 (8 bytes, little-endian)
 */
export function deserializeU64(buffer: Buffer, offset: number = 0, field: string = 'u64'): BN {
  assertReadable(buffer, offset, 8, field);
  return new BN(buffer.subarray(offset, offset + 8), 'le');
}

/**
 * Deserialize a length-prefixed UTF-8 string
 * @returns [value, bytes consumed]
 */
export function deserializeString(
  buffer: Buffer,
  offset: number = 0,
  field: string = 'string'
): [string, number] {
  const length = deserializeU32(buffer, offset, field);
  assertReadable(buffer, offset + 4, length, field);
  const value = buffer.toString('utf8', offset + 4, offset + 4 + length);
  return [value, 4 + length];
}

/**
 * Deserialize a position side (1 byte)
 */
export function deserializeSide(buffer: Buffer, offset: number = 0, field: string = 'side'): PositionType {
  const raw = deserializeU8(buffer, offset, field);
  switch (raw) {
    case PositionType.Short:
      return PositionType.Short;
    case PositionType.Long:
      return PositionType.Long;
    default:
      throw new EncodingError(`unknown position side ${raw}`, field);
  }
}

/**
 * Create instruction data buffer with discriminator
 */
export function createInstructionData(discriminator: number, ...parts: Buffer[]): Buffer {
  return Buffer.concat([serializeU8(discriminator, 'discriminator'), ...parts]);
}
