import { TruncatedInputError, VarintOverflowError } from "./errors";
import { FieldTag, MaxVarintBytes, decodeTag } from "./types";

// Shared by all instances
const textDecoder = new TextDecoder();

/**
 * Reader decodes protobuf wire data from a binary buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Moves to an absolute position within the buffer.
   * @throws RangeError if the position is outside the buffer
   */
  seek(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this.end) {
      throw new RangeError(`Position ${position} is outside [0, ${this.end}]`);
    }
    this.pos = position;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new TruncatedInputError(needed, this.remaining);
    }
  }

  /**
   * Reads raw bytes. The result is a view on the underlying buffer.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads an unsigned 32-bit varint, as used by tags and length prefixes.
   */
  readVarint(): number {
    let result = 0;
    let shift = 0;

    for (let i = 0; i < MaxVarintBytes; i++) {
      this.checkAvailable(1);
      const b = this.buffer[this.pos++];

      // At the 5th byte (index 4), we've consumed 28 bits.
      // The 5th byte can only contribute 4 more bits for a 32-bit value.
      if (i === 4 && (b & 0xf0) !== 0) {
        throw new VarintOverflowError("Varint overflow: value exceeds 32 bits");
      }

      result |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return result >>> 0; // Ensure unsigned
      }
      shift += 7;
    }

    throw new VarintOverflowError(`Varint overflow: exceeded ${MaxVarintBytes} bytes`);
  }

  /**
   * Reads an unsigned 64-bit varint.
   * Uses a maximum of 10 bytes.
   */
  readVarint64(): bigint {
    let result = 0n;
    let shift = 0n;

    for (let i = 0; i < MaxVarintBytes; i++) {
      this.checkAvailable(1);
      const b = this.buffer[this.pos++];

      // At the 10th byte (index 9), we've consumed 63 bits.
      // The 10th byte can only contribute 1 more bit (bit 63 of uint64).
      if (i === 9) {
        if (b >= 0x80) {
          throw new VarintOverflowError(`Varint64 overflow: exceeded ${MaxVarintBytes} bytes`);
        }
        if (b > 1) {
          throw new VarintOverflowError("Varint64 overflow: 10th byte must be 0 or 1");
        }
      }

      result |= BigInt(b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return result;
      }
      shift += 7n;
    }

    throw new VarintOverflowError(`Varint64 overflow: exceeded ${MaxVarintBytes} bytes`);
  }

  /**
   * Reads one varint and returns its encoded bytes as a copy.
   */
  readVarintBytes(): Uint8Array {
    const start = this.pos;
    this.readVarint64();
    return this.buffer.slice(start, this.pos);
  }

  /**
   * Reads a field tag.
   */
  readTag(): FieldTag {
    return decodeTag(this.readVarint());
  }

  /**
   * Reads a varint boolean. Any non-zero value is true.
   */
  readBool(): boolean {
    return this.readVarint64() !== 0n;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, true); // Little-endian
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }

  /**
   * Reads a fixed 32-bit value.
   */
  readFixed32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, true); // Little-endian
    this.pos += 4;
    return value;
  }

  /**
   * Reads a fixed 64-bit value.
   */
  readFixed64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }

  /**
   * Reads a length-prefixed string.
   */
  readString(): string {
    const length = this.readVarint();
    const bytes = this.readBytes(length);
    return textDecoder.decode(bytes);
  }

  /**
   * Reads length-prefixed bytes.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const length = this.readVarint();
    return this.readBytes(length);
  }

  /**
   * Reads a length-prefixed block and returns it as a copy, prefix included.
   */
  readLengthDelimitedBytes(): Uint8Array {
    const start = this.pos;
    const length = this.readVarint();
    this.checkAvailable(length);
    this.pos += length;
    return this.buffer.slice(start, this.pos);
  }
}
