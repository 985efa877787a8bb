import { InvalidWireTypeError } from "./errors";
import { Reader } from "./reader";
import { Writer } from "./writer";
import { FieldNumber, FieldTag, WireType } from "./types";

/**
 * One occurrence of a field exactly as it appeared on the wire, before any type
 * interpretation.
 *
 * The payload holds the bytes following the tag. For length-delimited fields it
 * includes the varint length prefix, so readers such as `Reader.readString` can
 * consume it directly. The tag is kept as read too, so a tag written with a
 * non-minimal varint is written back unchanged.
 */
export class EncodedField {
  readonly tag: FieldTag;
  readonly payload: Uint8Array;
  readonly tagBytes: Uint8Array;

  /**
   * @param tagBytes - the tag as it appeared on the wire; defaults to its
   *                   minimal encoding
   */
  constructor(tag: FieldTag, payload: Uint8Array, tagBytes?: Uint8Array) {
    this.tag = tag;
    this.payload = payload;
    this.tagBytes = tagBytes ?? minimalTag(tag);
  }

  get fieldNumber(): FieldNumber {
    return this.tag.fieldNumber;
  }

  get wireType(): WireType {
    return this.tag.wireType;
  }

  /**
   * Reads one tag and the payload its wire type announces.
   * The payload is copied out of the reader's buffer.
   */
  static decode(reader: Reader): EncodedField {
    const tagBytes = reader.readVarintBytes();
    const tag = new Reader(tagBytes).readTag();
    let payload: Uint8Array;

    switch (tag.wireType) {
      case WireType.Varint:
        payload = reader.readVarintBytes();
        break;
      case WireType.Fixed64:
        payload = reader.readBytes(8).slice();
        break;
      case WireType.LengthDelimited:
        payload = reader.readLengthDelimitedBytes();
        break;
      case WireType.Fixed32:
        payload = reader.readBytes(4).slice();
        break;
      default:
        throw new InvalidWireTypeError(tag.wireType);
    }

    return new EncodedField(tag, payload, tagBytes);
  }

  /**
   * Writes the tag and payload verbatim.
   */
  encode(writer: Writer): void {
    writer.writeBytes(this.tagBytes);
    writer.writeBytes(this.payload);
  }

  /**
   * Returns a reader positioned at the start of the payload.
   */
  reader(): Reader {
    return new Reader(this.payload);
  }

  /**
   * Returns the content of a length-delimited field without its length prefix.
   * @throws InvalidWireTypeError for other wire types
   */
  contents(): Uint8Array {
    if (this.tag.wireType !== WireType.LengthDelimited) {
      throw new InvalidWireTypeError(this.tag.wireType, WireType.LengthDelimited);
    }
    return this.reader().readLengthPrefixedBytes();
  }

  /**
   * Returns a deep copy.
   */
  clone(): EncodedField {
    return new EncodedField({ ...this.tag }, this.payload.slice(), this.tagBytes.slice());
  }
}

function minimalTag(tag: FieldTag): Uint8Array {
  const writer = new Writer(5);
  writer.writeTag(tag.fieldNumber, tag.wireType);
  return writer.bytes().slice();
}
