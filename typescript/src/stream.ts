/**
 * Streaming support for length-delimited messages.
 *
 * Bare protobuf encodings carry no terminator, so several messages on one
 * stream are framed the way `Message.encodeDelimited` writes them.
 *
 * Wire format: [length: varint][message_data: bytes]
 */

import { Writer } from "./writer";
import { Reader } from "./reader";
import type { Message, MessageType } from "./message";
import { decodeEmbedded } from "./unknown";
import {
  EndOfStreamError,
  MessageSizeExceededError,
  StreamClosedError,
  TruncatedInputError,
} from "./errors";

/** Default initial buffer capacity for stream writer. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/** Default maximum message size (64 MB). */
const DEFAULT_MAX_MESSAGE_SIZE = 64 * 1024 * 1024;

/**
 * Options for StreamWriter configuration.
 */
export interface StreamWriterOptions {
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

/**
 * Options for StreamReader configuration.
 */
export interface StreamReaderOptions {
  /** Maximum allowed message size in bytes. Default: 64 MB */
  maxMessageSize?: number;
}

/**
 * StreamWriter writes length-delimited messages to a buffer.
 *
 * @example
 * ```typescript
 * const stream = new StreamWriter();
 * stream.writeMessage(first);
 * stream.writeMessage(second);
 * const data = stream.bytes();
 * ```
 */
export class StreamWriter {
  private writer: Writer;
  private closed: boolean;

  constructor(options: StreamWriterOptions = {}) {
    this.writer = new Writer(options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY);
    this.closed = false;
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.writer.position;
  }

  /**
   * Returns true if the writer is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
  }

  /**
   * Writes a message with its length prefix.
   *
   * @throws StreamClosedError if the writer is closed
   */
  writeMessage(message: Message): void {
    this.checkOpen();
    message.encodeDelimited(this.writer);
  }

  /**
   * Writes already encoded message bytes with a length prefix.
   *
   * @throws StreamClosedError if the writer is closed
   */
  writeFrame(data: Uint8Array): void {
    this.checkOpen();
    this.writer.writeLengthPrefixedBytes(data);
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.writer.reset();
    this.closed = false;
  }

  /**
   * Closes the writer. No more messages can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}

/**
 * StreamReader reads length-delimited messages from a buffer.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(data);
 * for (const person of reader.messages(Person)) {
 *   // ...
 * }
 * ```
 */
export class StreamReader {
  private reader: Reader;
  private maxMessageSize: number;

  constructor(data: Uint8Array, options: StreamReaderOptions = {}) {
    this.reader = new Reader(data);
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.reader.remaining;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Sets the maximum allowed message size.
   */
  setMaxMessageSize(size: number): void {
    this.maxMessageSize = size;
  }

  /**
   * Reads the next frame's length prefix and checks it against the limits.
   * The position is left unchanged when the prefix is incomplete.
   */
  private readLength(): number {
    if (!this.reader.hasMore) {
      throw new EndOfStreamError("No more messages");
    }

    const start = this.reader.position;
    let length: number;
    try {
      length = this.reader.readVarint();
    } catch (e) {
      if (e instanceof TruncatedInputError) {
        this.reader.seek(start);
        throw new EndOfStreamError("Incomplete varint at end of stream");
      }
      throw e;
    }

    if (length > this.maxMessageSize) {
      throw new MessageSizeExceededError(length, this.maxMessageSize);
    }

    if (length > this.reader.remaining) {
      throw new EndOfStreamError(
        `Message claims ${length} bytes but only ${this.reader.remaining} available`
      );
    }

    return length;
  }

  /**
   * Reads the bytes of the next message.
   *
   * @throws EndOfStreamError if stream ends unexpectedly
   * @throws MessageSizeExceededError if message exceeds max size
   */
  readFrame(): Uint8Array {
    const length = this.readLength();
    return this.reader.readBytes(length);
  }

  /**
   * Reads and decodes the next message.
   *
   * @throws EndOfStreamError if stream ends unexpectedly
   * @throws MessageSizeExceededError if message exceeds max size
   * @throws SchemaMismatchError if the frame does not hold a complete message
   */
  readMessage<T extends Message>(type: MessageType<T>): T {
    const frame = this.readFrame();
    const message = new type();
    decodeEmbedded(message, frame, `Delimited message of ${frame.length} bytes`);
    return message;
  }

  /**
   * Attempts to read a message, returning null if at end of stream.
   *
   * @throws EndOfStreamError if stream ends mid-message
   * @throws MessageSizeExceededError if message exceeds max size
   */
  tryReadMessage<T extends Message>(type: MessageType<T>): T | null {
    if (!this.hasMore) {
      return null;
    }
    return this.readMessage(type);
  }

  /**
   * Skips the next message without decoding it.
   *
   * @returns The number of bytes skipped (including length prefix)
   * @throws EndOfStreamError if no message to skip
   */
  skipMessage(): number {
    const startPos = this.reader.position;
    const length = this.readLength();
    this.reader.readBytes(length);
    return this.reader.position - startPos;
  }

  /**
   * Resets the reader to the beginning of the buffer.
   */
  reset(): void {
    this.reader.seek(0);
  }

  /**
   * Returns an iterator over all remaining messages.
   */
  *messages<T extends Message>(type: MessageType<T>): IterableIterator<T> {
    while (this.hasMore) {
      yield this.readMessage(type);
    }
  }
}

/**
 * MessageIterator iterates over the messages of a delimited stream, stopping
 * at the first error and keeping it in {@link MessageIterator.error}.
 *
 * @example
 * ```typescript
 * const iterator = new MessageIterator(data, Person);
 * const people = iterator.toArray();
 * if (iterator.error) {
 *   // the stream was cut short
 * }
 * ```
 */
export class MessageIterator<T extends Message> implements Iterable<T> {
  private reader: StreamReader;
  private type: MessageType<T>;
  private _error: Error | null = null;

  constructor(data: Uint8Array, type: MessageType<T>, options: StreamReaderOptions = {}) {
    this.reader = new StreamReader(data, options);
    this.type = type;
  }

  /**
   * Returns any error that occurred during iteration.
   */
  get error(): Error | null {
    return this._error;
  }

  /**
   * Returns true if there are more messages to read.
   */
  get hasMore(): boolean {
    return this.reader.hasMore && this._error === null;
  }

  /**
   * Reads and decodes the next message.
   *
   * @returns The decoded message, or null at end of stream or on error
   */
  next(): T | null {
    if (this._error !== null) {
      return null;
    }
    try {
      return this.reader.tryReadMessage(this.type);
    } catch (e) {
      this._error = e instanceof Error ? e : new Error(String(e));
      return null;
    }
  }

  /**
   * Returns a synchronous iterator.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    while (this.hasMore) {
      const value = this.next();
      if (value === null) {
        break;
      }
      yield value;
    }
  }

  /**
   * Collects all messages into an array.
   */
  toArray(): T[] {
    return [...this];
  }

  /**
   * Resets the iterator to the beginning.
   */
  reset(): void {
    this.reader.reset();
    this._error = null;
  }
}
