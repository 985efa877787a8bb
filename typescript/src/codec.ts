import { EncodeError, InvalidWireTypeError } from "./errors";
import { EncodedField } from "./field";
import { Reader } from "./reader";
import { Writer } from "./writer";
import {
  FieldNumber,
  MaxInt32,
  MaxInt64,
  MaxVarint32,
  MaxVarint64,
  MinInt32,
  MinInt64,
  WireType,
  zigzagDecode,
  zigzagDecode64,
  zigzagEncode,
  zigzagEncode64,
} from "./types";

/**
 * Converts between wire bytes and the values of one protobuf scalar type.
 *
 * Codecs are stateless; every scalar type has a single shared instance in
 * {@link ScalarCodecs}.
 */
export interface FieldCodec<T> {
  /** Protobuf type name, e.g. "uint32". */
  readonly name: string;
  /** Wire type of a single unpacked value. */
  readonly wireType: WireType;
  /** Whether repeated fields of this type use packed encoding. */
  readonly packable: boolean;

  defaultValue(): T;
  isDefault(value: T): boolean;

  /** Writes a bare value, without tag. */
  writeValue(writer: Writer, value: T): void;
  /** Reads a bare value, without tag. */
  readValue(reader: Reader): T;

  /** Writes tag and value. */
  encodeField(writer: Writer, fieldNumber: FieldNumber, value: T): void;

  /**
   * Writes a repeated field. Packable types produce one length-delimited run;
   * other types one tag and value per element. Empty lists produce nothing.
   */
  encodeRepeatedField(writer: Writer, fieldNumber: FieldNumber, values: readonly T[]): void;

  /**
   * Decodes a singular field from all of its occurrences; the last one wins.
   * Returns the default value when there are none.
   */
  decodeField(occurrences: readonly EncodedField[]): T;

  /**
   * Appends the values of every occurrence to `dest`, accepting both packed
   * and unpacked occurrences.
   */
  decodeRepeatedField(occurrences: readonly EncodedField[], dest: T[]): void;
}

/**
 * Framing shared by all scalar codecs. Subclasses supply the bare value format.
 */
export abstract class ScalarCodec<T> implements FieldCodec<T> {
  abstract readonly name: string;
  abstract readonly wireType: WireType;

  get packable(): boolean {
    return this.wireType !== WireType.LengthDelimited;
  }

  abstract defaultValue(): T;
  abstract writeValue(writer: Writer, value: T): void;
  abstract readValue(reader: Reader): T;

  isDefault(value: T): boolean {
    return Object.is(value, this.defaultValue());
  }

  encodeField(writer: Writer, fieldNumber: FieldNumber, value: T): void {
    writer.writeTag(fieldNumber, this.wireType);
    this.writeValue(writer, value);
  }

  encodeRepeatedField(writer: Writer, fieldNumber: FieldNumber, values: readonly T[]): void {
    if (values.length === 0) {
      return;
    }

    if (!this.packable) {
      for (const value of values) {
        this.encodeField(writer, fieldNumber, value);
      }
      return;
    }

    // The run length is only known once the values are encoded.
    const packed = new Writer();
    for (const value of values) {
      this.writeValue(packed, value);
    }
    writer.writeTag(fieldNumber, WireType.LengthDelimited);
    writer.writeLengthPrefixedBytes(packed.bytes());
  }

  decodeField(occurrences: readonly EncodedField[]): T {
    let value = this.defaultValue();
    for (const field of occurrences) {
      value = this.decodeOccurrence(field);
    }
    return value;
  }

  decodeRepeatedField(occurrences: readonly EncodedField[], dest: T[]): void {
    for (const field of occurrences) {
      if (field.wireType === this.wireType) {
        dest.push(this.decodeOccurrence(field));
      } else if (this.packable && field.wireType === WireType.LengthDelimited) {
        const reader = new Reader(field.contents());
        while (reader.hasMore) {
          dest.push(this.readValue(reader));
        }
      } else {
        throw new InvalidWireTypeError(field.wireType, this.wireType);
      }
    }
  }

  private decodeOccurrence(field: EncodedField): T {
    if (field.wireType !== this.wireType) {
      throw new InvalidWireTypeError(field.wireType, this.wireType);
    }
    return this.readValue(field.reader());
  }
}

function checkInteger(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new EncodeError(`Value ${value} is out of range for ${name}`);
  }
}

function checkBigInt(name: string, value: bigint, min: bigint, max: bigint): void {
  if (value < min || value > max) {
    throw new EncodeError(`Value ${value} is out of range for ${name}`);
  }
}

/**
 * Writes a signed 32-bit value as protobuf int32: negatives are sign-extended
 * to 64 bits and take 10 bytes.
 */
function writeSignedVarint32(writer: Writer, value: number): void {
  if (value >= 0) {
    writer.writeVarint(value);
  } else {
    writer.writeVarint64(BigInt.asUintN(64, BigInt(value)));
  }
}

/**
 * Varint decoders for 32-bit types keep the low 32 bits of wider input.
 *
 * A value outside the range of the type (after sign extension, when
 * `signed`) was written by a wider type and loses its high bits; this is
 * logged as a warning.
 */
function readLow32(reader: Reader, name: string, signed: boolean): number {
  const wide = reader.readVarint64();
  const value = signed ? BigInt.asIntN(64, wide) : wide;
  const min = signed ? BigInt(MinInt32) : 0n;
  const max = BigInt(signed ? MaxInt32 : MaxVarint32);
  if (value < min || value > max) {
    console.warn(
      `protobuf: varint value ${value} exceeds the ${name} range, ` +
      `keeping its low 32 bits. Use a 64-bit type for full precision.`
    );
  }
  return Number(BigInt.asUintN(32, wide));
}

export class DoubleCodec extends ScalarCodec<number> {
  readonly name = "double";
  readonly wireType = WireType.Fixed64;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    writer.writeFloat64(value);
  }

  readValue(reader: Reader): number {
    return reader.readFloat64();
  }
}

export class FloatCodec extends ScalarCodec<number> {
  readonly name = "float";
  readonly wireType = WireType.Fixed32;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    writer.writeFloat32(value);
  }

  readValue(reader: Reader): number {
    return reader.readFloat32();
  }
}

export class Int32Codec extends ScalarCodec<number> {
  readonly name: string = "int32";
  readonly wireType = WireType.Varint;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    checkInteger(this.name, value, MinInt32, MaxInt32);
    writeSignedVarint32(writer, value);
  }

  readValue(reader: Reader): number {
    return readLow32(reader, this.name, true) | 0;
  }
}

/**
 * Enum values travel as int32. Unrecognized numbers are kept as they are.
 */
export class EnumCodec extends Int32Codec {
  readonly name: string = "enum";
}

export class Int64Codec extends ScalarCodec<bigint> {
  readonly name = "int64";
  readonly wireType = WireType.Varint;

  defaultValue(): bigint {
    return 0n;
  }

  writeValue(writer: Writer, value: bigint): void {
    checkBigInt(this.name, value, MinInt64, MaxInt64);
    writer.writeVarint64(BigInt.asUintN(64, value));
  }

  readValue(reader: Reader): bigint {
    return BigInt.asIntN(64, reader.readVarint64());
  }
}

export class Uint32Codec extends ScalarCodec<number> {
  readonly name = "uint32";
  readonly wireType = WireType.Varint;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    checkInteger(this.name, value, 0, MaxVarint32);
    writer.writeVarint(value);
  }

  readValue(reader: Reader): number {
    return readLow32(reader, this.name, false);
  }
}

export class Uint64Codec extends ScalarCodec<bigint> {
  readonly name = "uint64";
  readonly wireType = WireType.Varint;

  defaultValue(): bigint {
    return 0n;
  }

  writeValue(writer: Writer, value: bigint): void {
    checkBigInt(this.name, value, 0n, MaxVarint64);
    writer.writeVarint64(value);
  }

  readValue(reader: Reader): bigint {
    return reader.readVarint64();
  }
}

export class Sint32Codec extends ScalarCodec<number> {
  readonly name = "sint32";
  readonly wireType = WireType.Varint;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    checkInteger(this.name, value, MinInt32, MaxInt32);
    writer.writeVarint(zigzagEncode(value));
  }

  readValue(reader: Reader): number {
    return zigzagDecode(readLow32(reader, this.name, false));
  }
}

export class Sint64Codec extends ScalarCodec<bigint> {
  readonly name = "sint64";
  readonly wireType = WireType.Varint;

  defaultValue(): bigint {
    return 0n;
  }

  writeValue(writer: Writer, value: bigint): void {
    checkBigInt(this.name, value, MinInt64, MaxInt64);
    writer.writeVarint64(zigzagEncode64(value));
  }

  readValue(reader: Reader): bigint {
    return zigzagDecode64(reader.readVarint64());
  }
}

export class Fixed32Codec extends ScalarCodec<number> {
  readonly name = "fixed32";
  readonly wireType = WireType.Fixed32;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    checkInteger(this.name, value, 0, MaxVarint32);
    writer.writeFixed32(value);
  }

  readValue(reader: Reader): number {
    return reader.readFixed32();
  }
}

export class Fixed64Codec extends ScalarCodec<bigint> {
  readonly name = "fixed64";
  readonly wireType = WireType.Fixed64;

  defaultValue(): bigint {
    return 0n;
  }

  writeValue(writer: Writer, value: bigint): void {
    checkBigInt(this.name, value, 0n, MaxVarint64);
    writer.writeFixed64(value);
  }

  readValue(reader: Reader): bigint {
    return reader.readFixed64();
  }
}

export class Sfixed32Codec extends ScalarCodec<number> {
  readonly name = "sfixed32";
  readonly wireType = WireType.Fixed32;

  defaultValue(): number {
    return 0;
  }

  writeValue(writer: Writer, value: number): void {
    checkInteger(this.name, value, MinInt32, MaxInt32);
    writer.writeFixed32(value >>> 0);
  }

  readValue(reader: Reader): number {
    return reader.readFixed32() | 0;
  }
}

export class Sfixed64Codec extends ScalarCodec<bigint> {
  readonly name = "sfixed64";
  readonly wireType = WireType.Fixed64;

  defaultValue(): bigint {
    return 0n;
  }

  writeValue(writer: Writer, value: bigint): void {
    checkBigInt(this.name, value, MinInt64, MaxInt64);
    writer.writeFixed64(BigInt.asUintN(64, value));
  }

  readValue(reader: Reader): bigint {
    return BigInt.asIntN(64, reader.readFixed64());
  }
}

export class BoolCodec extends ScalarCodec<boolean> {
  readonly name = "bool";
  readonly wireType = WireType.Varint;

  defaultValue(): boolean {
    return false;
  }

  writeValue(writer: Writer, value: boolean): void {
    writer.writeBool(value);
  }

  readValue(reader: Reader): boolean {
    return reader.readBool();
  }
}

export class StringCodec extends ScalarCodec<string> {
  readonly name = "string";
  readonly wireType = WireType.LengthDelimited;

  defaultValue(): string {
    return "";
  }

  writeValue(writer: Writer, value: string): void {
    writer.writeString(value);
  }

  readValue(reader: Reader): string {
    return reader.readString();
  }
}

export class BytesCodec extends ScalarCodec<Uint8Array> {
  readonly name = "bytes";
  readonly wireType = WireType.LengthDelimited;

  defaultValue(): Uint8Array {
    return new Uint8Array(0);
  }

  isDefault(value: Uint8Array): boolean {
    return value.length === 0;
  }

  writeValue(writer: Writer, value: Uint8Array): void {
    writer.writeLengthPrefixedBytes(value);
  }

  readValue(reader: Reader): Uint8Array {
    return reader.readLengthPrefixedBytes().slice();
  }
}

/**
 * Shared codec instances, keyed by protobuf type name.
 */
export const ScalarCodecs = {
  double: new DoubleCodec(),
  float: new FloatCodec(),
  int32: new Int32Codec(),
  int64: new Int64Codec(),
  uint32: new Uint32Codec(),
  uint64: new Uint64Codec(),
  sint32: new Sint32Codec(),
  sint64: new Sint64Codec(),
  fixed32: new Fixed32Codec(),
  fixed64: new Fixed64Codec(),
  sfixed32: new Sfixed32Codec(),
  sfixed64: new Sfixed64Codec(),
  bool: new BoolCodec(),
  enum: new EnumCodec(),
  string: new StringCodec(),
  bytes: new BytesCodec(),
} as const;

/**
 * Protobuf scalar type names.
 */
export type ScalarType = keyof typeof ScalarCodecs;
