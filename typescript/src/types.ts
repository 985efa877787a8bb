import { InvalidFieldNumberError, InvalidTagError, InvalidWireTypeError } from "./errors";

/**
 * Wire types of the protobuf binary encoding.
 *
 * Codes 3 and 4 (groups) are deprecated and not supported; decoding them is an error.
 */
export enum WireType {
  /** Variable-length unsigned integer (base-128) */
  Varint = 0,
  /** Fixed 64-bit value (little-endian) */
  Fixed64 = 1,
  /** Varint length followed by that many bytes (string, bytes, messages, packed arrays) */
  LengthDelimited = 2,
  /** Fixed 32-bit value (little-endian) */
  Fixed32 = 5,
}

/**
 * Protobuf field number.
 */
export type FieldNumber = number;

/**
 * Field tag combining field number and wire type.
 */
export interface FieldTag {
  readonly fieldNumber: FieldNumber;
  readonly wireType: WireType;
}

/**
 * Valid field number range.
 */
export const MinFieldNumber = 1;
export const MaxFieldNumber = 0x1fffffff; // 2^29 - 1

/**
 * Maximum values for varint encoding.
 */
export const MaxVarint32 = 0xffffffff;
export const MaxVarint64 = BigInt("0xffffffffffffffff");

/**
 * Signed integer bounds.
 */
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * A uint64 needs ceil(64 / 7) = 10 groups.
 */
export const MaxVarintBytes = 10;

const TAG_WIRE_TYPE_BITS = 3;
const TAG_WIRE_TYPE_MASK = 0x07;

/**
 * Type guard for the wire type codes this runtime understands.
 */
export function isWireType(value: number): value is WireType {
  return (
    value === WireType.Varint ||
    value === WireType.Fixed64 ||
    value === WireType.LengthDelimited ||
    value === WireType.Fixed32
  );
}

/**
 * Checks that a field number lies within the protobuf range.
 * @throws InvalidFieldNumberError otherwise
 */
export function checkFieldNumber(fieldNumber: number): void {
  if (!Number.isInteger(fieldNumber) || fieldNumber < MinFieldNumber || fieldNumber > MaxFieldNumber) {
    throw new InvalidFieldNumberError(fieldNumber);
  }
}

/**
 * Packs a field number and wire type into the unsigned 32-bit tag value.
 */
export function encodeTag(fieldNumber: FieldNumber, wireType: WireType): number {
  checkFieldNumber(fieldNumber);
  return ((fieldNumber << TAG_WIRE_TYPE_BITS) | wireType) >>> 0;
}

/**
 * Unpacks a tag value.
 * @throws InvalidWireTypeError if the low 3 bits are not a defined wire type
 * @throws InvalidTagError if the field number is 0
 */
export function decodeTag(tag: number): FieldTag {
  const wireType = tag & TAG_WIRE_TYPE_MASK;
  if (!isWireType(wireType)) {
    throw new InvalidWireTypeError(wireType);
  }
  const fieldNumber = tag >>> TAG_WIRE_TYPE_BITS;
  if (fieldNumber < MinFieldNumber) {
    throw new InvalidTagError(tag);
  }
  return { fieldNumber, wireType };
}

/**
 * Encode a signed integer using ZigZag encoding.
 * The result is an unsigned 32-bit value.
 */
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return (n << 1n) ^ (n >> 63n);
}

/**
 * Decode a ZigZag encoded integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}
