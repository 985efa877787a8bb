/**
 * Base-128 varint codec.
 *
 * Each byte carries 7 bits of the value, least significant group first; the high
 * bit is set on every byte except the last. Values are unsigned 64-bit.
 */

import { EncodeError } from "./errors";
import { Reader } from "./reader";
import { Writer } from "./writer";
import { MaxVarint64, MaxVarintBytes } from "./types";

function toUint64(value: bigint | number): bigint {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new EncodeError(`Varint value ${value} is not a safe integer`);
    }
    return BigInt(value);
  }
  return value;
}

/**
 * Encodes an unsigned integer as a varint.
 * @throws EncodeError for negative values or values above 2^64 - 1
 */
export function encodeVarint(value: bigint | number): Uint8Array {
  const writer = new Writer(MaxVarintBytes);
  writer.writeVarint64(toUint64(value));
  return writer.bytes().slice();
}

/**
 * Decodes one varint from a reader (advancing it) or from the start of a byte array.
 * @throws TruncatedInputError if the input ends before the terminating byte
 * @throws VarintOverflowError if the varint is longer than 10 bytes or exceeds 64 bits
 */
export function decodeVarint(source: Reader | Uint8Array): bigint {
  const reader = source instanceof Reader ? source : new Reader(source);
  return reader.readVarint64();
}

/**
 * Number of bytes the varint encoding of `value` occupies.
 */
export function varintSize(value: bigint | number): number {
  let v = toUint64(value);
  if (v < 0n || v > MaxVarint64) {
    throw new EncodeError(`Varint value ${v} is not an unsigned 64-bit integer`);
  }
  let size = 1;
  while (v > 0x7fn) {
    v >>= 7n;
    size++;
  }
  return size;
}
