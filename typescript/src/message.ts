import { Reader } from "./reader";
import { Writer } from "./writer";
import { FieldNumber, WireType } from "./types";
import { UnknownFieldSet, decodeEmbedded } from "./unknown";

/**
 * Constructor of a concrete message type.
 */
export type MessageType<T extends Message> = new () => T;

/**
 * Common ancestor of all generated message classes.
 *
 * A message holds its declared fields as typed properties and everything else
 * in {@link Message.unknownFields}. The base class owns the order of every
 * operation; a generated class only implements the four field hooks, handling
 * its declared fields in ascending field-number order:
 *
 * - `encodeFields` writes each field with a codec, `Message.encodeAsField` or
 *   `RepeatedField.encodeAsRepeatedField`.
 * - `decodeFields` claims each field from the unknown-field store with
 *   `claimScalar`, `claimMessage` or `claimRepeated`.
 * - `clearFields` resets each field to its default.
 * - `mergeFields` merges each field of the source: present scalars replace,
 *   embedded messages merge recursively, repeated fields append. Embedded
 *   messages taken over from the source must be copies.
 *
 * A message exclusively owns its embedded messages and repeated fields; no two
 * messages may share one.
 *
 * @example
 * ```typescript
 * class Point extends Message {
 *   x = 0;
 *
 *   protected encodeFields(writer: Writer): void {
 *     if (this.x !== 0) ScalarCodecs.int32.encodeField(writer, 1, this.x);
 *   }
 *   protected decodeFields(fields: UnknownFieldSet): void {
 *     this.x = fields.claimScalar(1, ScalarCodecs.int32);
 *   }
 *   protected clearFields(): void {
 *     this.x = 0;
 *   }
 *   protected mergeFields(source: Point): void {
 *     if (source.x !== 0) this.x = source.x;
 *   }
 * }
 * ```
 */
export abstract class Message {
  /**
   * Fields read from the wire that no typed accessor has claimed.
   */
  readonly unknownFields: UnknownFieldSet = new UnknownFieldSet();

  protected abstract encodeFields(writer: Writer): void;
  protected abstract decodeFields(fields: UnknownFieldSet): void;
  protected abstract clearFields(): void;
  protected abstract mergeFields(source: this): void;

  /**
   * Decodes a new message of the calling type from bytes.
   */
  static fromBinary<T extends Message>(this: MessageType<T>, data: Uint8Array): T {
    const message = new this();
    message.decode(new Reader(data));
    return message;
  }

  /**
   * Renders all fields absent, as on a newly constructed message.
   */
  clear(): void {
    this.clearFields();
    this.unknownFields.clear();
  }

  /**
   * Writes the message: declared fields first, then unknown fields.
   *
   * The encoding carries no length, so a reader cannot find its end in a
   * stream; use {@link Message.encodeDelimited} for that.
   */
  encode(writer: Writer): void {
    this.encodeFields(writer);
    this.unknownFields.encode(writer);
  }

  /**
   * Replaces the content of the message with a message read from `reader`
   * until it is exhausted. Fields missing from the input become absent.
   */
  decode(reader: Reader): void {
    this.clearFields();
    this.unknownFields.decode(reader);
    this.decodeFields(this.unknownFields);
  }

  /**
   * Writes the message prefixed with its varint byte length.
   */
  encodeDelimited(writer: Writer): void {
    writer.writeLengthPrefixedBytes(this.encodeBody());
  }

  /**
   * Reads a message written by {@link Message.encodeDelimited}, leaving
   * `reader` positioned after it.
   *
   * @throws TruncatedInputError if the input is shorter than the length prefix announces
   * @throws SchemaMismatchError if the framed bytes end inside a field
   */
  decodeDelimited(reader: Reader): void {
    const length = reader.readVarint();
    const frame = reader.readBytes(length);
    decodeEmbedded(this, frame, `Delimited message of ${length} bytes`);
  }

  /**
   * Merges `source` into this message. Present scalar fields of the source
   * replace those here, embedded messages merge recursively, repeated fields
   * and unknown fields are appended. Nothing owned by this message is dropped.
   */
  mergeFrom(source: this): void {
    this.mergeFields(source);
    this.unknownFields.mergeFrom(source.unknownFields);
  }

  /**
   * Makes this message a deep copy of `source`.
   */
  assign(source: this): void {
    if (source === this) {
      return;
    }
    this.clear();
    this.mergeFrom(source);
  }

  /**
   * Writes this message as an embedded message field of a containing message.
   */
  encodeAsField(writer: Writer, fieldNumber: FieldNumber): void {
    writer.writeTag(fieldNumber, WireType.LengthDelimited);
    writer.writeLengthPrefixedBytes(this.encodeBody());
  }

  /**
   * Returns true if an occurrence of the field is still unclaimed.
   */
  hasUnknownField(fieldNumber: FieldNumber): boolean {
    return this.unknownFields.has(fieldNumber);
  }

  /**
   * Returns the encoded message.
   */
  toBinary(): Uint8Array {
    return this.encodeBody().slice();
  }

  private encodeBody(): Uint8Array {
    const writer = new Writer();
    this.encode(writer);
    return writer.bytes();
  }
}

/**
 * Message of unknown type: every field stays in the unknown-field store and
 * round-trips unchanged.
 */
export class UntypedMessage extends Message {
  protected encodeFields(): void {}

  protected decodeFields(): void {}

  protected clearFields(): void {}

  protected mergeFields(): void {}
}
