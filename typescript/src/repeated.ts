import { InvalidWireTypeError } from "./errors";
import { Writer } from "./writer";
import { FieldNumber, WireType } from "./types";
import { UnknownFieldSet, decodeEmbedded } from "./unknown";
import type { FieldCodec } from "./codec";
import type { Message, MessageType } from "./message";

/**
 * Ordered values of a repeated field. Order is insertion order, which after
 * decoding is wire order.
 */
export abstract class RepeatedField<T> implements Iterable<T> {
  protected readonly items: T[] = [];

  get length(): number {
    return this.items.length;
  }

  /**
   * @throws RangeError if index is out of bounds
   */
  get(index: number): T {
    this.checkIndex(index);
    return this.items[index];
  }

  /**
   * @throws RangeError if index is out of bounds
   */
  set(index: number, value: T): void {
    this.checkIndex(index);
    this.items[index] = value;
  }

  add(...values: T[]): void {
    this.append(values);
  }

  /**
   * Removes and returns the value at `index`.
   * @throws RangeError if index is out of bounds
   */
  removeAt(index: number): T {
    this.checkIndex(index);
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  clear(): void {
    this.items.length = 0;
  }

  /**
   * Returns the values as a new array.
   */
  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Pushes one value at a time: spreading a large array into `push` exceeds
   * the call stack.
   */
  protected append(values: Iterable<T>): void {
    for (const value of values) {
      this.items.push(value);
    }
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new RangeError(`Index ${index} out of bounds for length ${this.items.length}`);
    }
  }

  /**
   * Appends the values of `source`.
   */
  abstract mergeFrom(source: RepeatedField<T>): void;

  /**
   * Writes the values as repeated field `fieldNumber`. An empty field writes nothing.
   */
  abstract encodeAsRepeatedField(writer: Writer, fieldNumber: FieldNumber): void;

  /**
   * Replaces the values with those of repeated field `fieldNumber` in `fields`,
   * and removes the field from `fields`. On a decode error both are left
   * unchanged.
   */
  abstract decodeAsUnknownRepeatedField(fields: UnknownFieldSet, fieldNumber: FieldNumber): void;
}

/**
 * Repeated field of a scalar type. Packable types are written packed; both
 * packed and unpacked input is read.
 */
export class RepeatedScalarField<T> extends RepeatedField<T> {
  readonly codec: FieldCodec<T>;

  constructor(codec: FieldCodec<T>, values: Iterable<T> = []) {
    super();
    this.codec = codec;
    this.append(values);
  }

  mergeFrom(source: RepeatedField<T>): void {
    // Snapshot first: `source` may be this field.
    this.append(source.toArray());
  }

  encodeAsRepeatedField(writer: Writer, fieldNumber: FieldNumber): void {
    this.codec.encodeRepeatedField(writer, fieldNumber, this.items);
  }

  decodeAsUnknownRepeatedField(fields: UnknownFieldSet, fieldNumber: FieldNumber): void {
    const values: T[] = [];
    this.codec.decodeRepeatedField(fields.get(fieldNumber), values);
    fields.delete(fieldNumber);
    this.clear();
    this.append(values);
  }
}

/**
 * Repeated field of an embedded message type. Elements are owned by the field:
 * an added message must not be held elsewhere, and merging copies elements.
 */
export class RepeatedMessageField<T extends Message> extends RepeatedField<T> {
  readonly type: MessageType<T>;

  constructor(type: MessageType<T>) {
    super();
    this.type = type;
  }

  mergeFrom(source: RepeatedField<T>): void {
    // Snapshot first: `source` may be this field.
    for (const element of source.toArray()) {
      const copy = new this.type();
      copy.mergeFrom(element);
      this.items.push(copy);
    }
  }

  /**
   * Messages are never packed: each element is written as its own
   * length-delimited occurrence.
   */
  encodeAsRepeatedField(writer: Writer, fieldNumber: FieldNumber): void {
    for (const element of this.items) {
      element.encodeAsField(writer, fieldNumber);
    }
  }

  decodeAsUnknownRepeatedField(fields: UnknownFieldSet, fieldNumber: FieldNumber): void {
    const elements: T[] = [];
    for (const field of fields.get(fieldNumber)) {
      if (field.wireType !== WireType.LengthDelimited) {
        throw new InvalidWireTypeError(field.wireType, WireType.LengthDelimited);
      }
      const element = new this.type();
      decodeEmbedded(element, field.contents(), `Field ${fieldNumber}[${elements.length}]`);
      elements.push(element);
    }
    fields.delete(fieldNumber);
    this.clear();
    this.append(elements);
  }
}
