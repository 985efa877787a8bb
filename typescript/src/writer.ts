import { EncodeError } from "./errors";
import { WireType, FieldNumber, MaxVarint32, MaxVarint64, encodeTag } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Shared by all instances
const textEncoder = new TextEncoder();

/**
 * Writer encodes protobuf wire data into a growable binary buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   *
   * The result is a view on the writer's buffer and is invalidated by `reset`.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a field tag.
   * @throws InvalidFieldNumberError if the field number is out of range
   */
  writeTag(fieldNumber: FieldNumber, wireType: WireType): void {
    this.writeVarint(encodeTag(fieldNumber, wireType));
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes an unsigned 32-bit varint.
   */
  writeVarint(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MaxVarint32) {
      throw new EncodeError(`Varint value ${value} is not an unsigned 32-bit integer`);
    }
    this.ensureCapacity(5); // Max 5 bytes for 32-bit
    while (value > 0x7f) {
      this.buffer[this.pos++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    this.buffer[this.pos++] = value;
  }

  /**
   * Writes an unsigned 64-bit varint.
   */
  writeVarint64(value: bigint): void {
    if (value < 0n || value > MaxVarint64) {
      throw new EncodeError(`Varint value ${value} is not an unsigned 64-bit integer`);
    }
    this.ensureCapacity(10); // Max 10 bytes for 64-bit
    while (value > 0x7fn) {
      this.buffer[this.pos++] = Number(value & 0x7fn) | 0x80;
      value >>= 7n;
    }
    this.buffer[this.pos++] = Number(value);
  }

  /**
   * Writes a boolean as a one-byte varint.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, true); // Little-endian
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }

  /**
   * Writes a fixed 32-bit value.
   */
  writeFixed32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, true); // Little-endian
    this.pos += 4;
  }

  /**
   * Writes a fixed 64-bit value.
   */
  writeFixed64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }

  /**
   * Writes a length-prefixed UTF-8 string.
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeVarint(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeVarint(data.length);
    this.writeBytes(data);
  }
}
