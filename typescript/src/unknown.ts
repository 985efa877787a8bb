import { InvalidWireTypeError, SchemaMismatchError, TruncatedInputError } from "./errors";
import { EncodedField } from "./field";
import { Reader } from "./reader";
import { Writer } from "./writer";
import { FieldNumber, WireType } from "./types";
import type { FieldCodec } from "./codec";
import type { Message, MessageType } from "./message";
import type { RepeatedField } from "./repeated";

/**
 * Decodes `data` into `message`, reporting a payload that ends inside one of
 * its fields as a schema mismatch for the field that carried it.
 */
export function decodeEmbedded(message: Message, data: Uint8Array, context: string): void {
  reportTruncation(context, () => message.decode(new Reader(data)));
}

function reportTruncation(context: string, decode: () => void): void {
  try {
    decode();
  } catch (e) {
    if (e instanceof TruncatedInputError) {
      throw new SchemaMismatchError(`${context} does not hold a complete message`, { cause: e });
    }
    throw e;
  }
}

/**
 * Fields of a message that have been read from the wire but not yet claimed by
 * a typed accessor, indexed by field number.
 *
 * Every occurrence is kept, in wire order, so repeated fields and repeated
 * occurrences of singular fields survive until they are claimed. Whatever is
 * never claimed is written back unchanged by {@link UnknownFieldSet.encode}.
 */
export class UnknownFieldSet implements Iterable<EncodedField> {
  private fields: Map<FieldNumber, EncodedField[]> = new Map();

  /**
   * Number of distinct field numbers held.
   */
  get size(): number {
    return this.fields.size;
  }

  get isEmpty(): boolean {
    return this.fields.size === 0;
  }

  /**
   * Returns true if at least one occurrence of the field is held.
   */
  has(fieldNumber: FieldNumber): boolean {
    return this.fields.has(fieldNumber);
  }

  /**
   * Returns the occurrences of a field in wire order, without removing them.
   */
  get(fieldNumber: FieldNumber): readonly EncodedField[] {
    return this.fields.get(fieldNumber) ?? [];
  }

  /**
   * Removes every occurrence of a field. Returns false if there was none.
   */
  delete(fieldNumber: FieldNumber): boolean {
    return this.fields.delete(fieldNumber);
  }

  /**
   * Appends one occurrence. Ownership of the field passes to this set.
   */
  add(field: EncodedField): void {
    const occurrences = this.fields.get(field.fieldNumber);
    if (occurrences === undefined) {
      this.fields.set(field.fieldNumber, [field]);
    } else {
      occurrences.push(field);
    }
  }

  /**
   * Field numbers held, ascending.
   */
  fieldNumbers(): FieldNumber[] {
    return [...this.fields.keys()].sort((a, b) => a - b);
  }

  clear(): void {
    this.fields.clear();
  }

  /**
   * Replaces the content with every field read from `reader` until it is exhausted.
   */
  decode(reader: Reader): void {
    this.fields.clear();
    while (reader.hasMore) {
      this.add(EncodedField.decode(reader));
    }
  }

  /**
   * Writes all held occurrences, by ascending field number and then in wire order.
   */
  encode(writer: Writer): void {
    for (const field of this) {
      field.encode(writer);
    }
  }

  /**
   * Appends copies of every occurrence held by `source`.
   */
  mergeFrom(source: UnknownFieldSet): void {
    const copies = [...source].map((field) => field.clone());
    for (const field of copies) {
      this.add(field);
    }
  }

  *[Symbol.iterator](): IterableIterator<EncodedField> {
    for (const fieldNumber of this.fieldNumbers()) {
      yield* this.get(fieldNumber);
    }
  }

  /**
   * Claims a singular scalar field: decodes it with `codec` (the last occurrence
   * wins) and removes it. An absent field yields the codec's default value.
   * A field that fails to decode stays in the set.
   *
   * Consuming: a second call for the same field returns the default.
   */
  claimScalar<T>(fieldNumber: FieldNumber, codec: FieldCodec<T>): T {
    const value = codec.decodeField(this.get(fieldNumber));
    this.fields.delete(fieldNumber);
    return value;
  }

  /**
   * Claims a singular embedded message field and removes it. All occurrences
   * are decoded as one message, as if their contents were concatenated, so
   * scalars set by a later occurrence win even when set to their default.
   * An absent field yields `undefined`. A field that fails to decode stays in
   * the set.
   *
   * @throws InvalidWireTypeError if an occurrence is not length-delimited
   * @throws SchemaMismatchError if an occurrence does not hold a complete message
   */
  claimMessage<T extends Message>(fieldNumber: FieldNumber, type: MessageType<T>): T | undefined {
    const occurrences = this.get(fieldNumber);
    if (occurrences.length === 0) {
      return undefined;
    }

    const context = `Field ${fieldNumber}`;
    const parts = occurrences.map((field) => {
      if (field.wireType !== WireType.LengthDelimited) {
        throw new InvalidWireTypeError(field.wireType, WireType.LengthDelimited);
      }
      return field.contents();
    });

    let data: Uint8Array = parts[0];
    if (parts.length > 1) {
      // Each occurrence must be complete on its own; the next one must not
      // finish a field the previous one cut short.
      const joined = new Writer();
      for (const part of parts) {
        reportTruncation(context, () => new UnknownFieldSet().decode(new Reader(part)));
        joined.writeBytes(part);
      }
      data = joined.bytes();
    }

    const message = new type();
    decodeEmbedded(message, data, context);
    this.fields.delete(fieldNumber);
    return message;
  }

  /**
   * Claims a repeated field into `dest`, replacing its previous content, and
   * removes it.
   */
  claimRepeated<T>(fieldNumber: FieldNumber, dest: RepeatedField<T>): void {
    dest.decodeAsUnknownRepeatedField(this, fieldNumber);
  }
}
