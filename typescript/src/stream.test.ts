import { describe, it, expect } from "vitest";
import {
  StreamWriter,
  StreamReader,
  MessageIterator,
} from "./stream";
import { Message } from "./message";
import { ScalarCodecs } from "./codec";
import { UnknownFieldSet } from "./unknown";
import { Writer } from "./writer";
import {
  EndOfStreamError,
  MessageSizeExceededError,
  SchemaMismatchError,
  StreamClosedError,
} from "./errors";

class Counter extends Message {
  value = 0;

  static of(value: number): Counter {
    const counter = new Counter();
    counter.value = value;
    return counter;
  }

  protected encodeFields(writer: Writer): void {
    if (this.value !== 0) ScalarCodecs.uint32.encodeField(writer, 1, this.value);
  }

  protected decodeFields(fields: UnknownFieldSet): void {
    this.value = fields.claimScalar(1, ScalarCodecs.uint32);
  }

  protected clearFields(): void {
    this.value = 0;
  }

  protected mergeFields(source: Counter): void {
    if (source.value !== 0) this.value = source.value;
  }
}

describe("StreamWriter", () => {
  describe("basic operations", () => {
    it("writes a single message", () => {
      const stream = new StreamWriter();
      stream.writeMessage(Counter.of(3));

      // Length prefix (2) + tag (0x08) + value (3)
      expect(stream.bytes()).toEqual(new Uint8Array([2, 0x08, 3]));
    });

    it("writes multiple messages", () => {
      const stream = new StreamWriter();
      stream.writeMessage(Counter.of(1));
      stream.writeMessage(Counter.of(300));

      expect(stream.bytes()).toEqual(new Uint8Array([2, 0x08, 1, 3, 0x08, 0xac, 0x02]));
    });

    it("writes an empty message as a zero length", () => {
      const stream = new StreamWriter();
      stream.writeMessage(new Counter());

      expect(stream.bytes()).toEqual(new Uint8Array([0]));
    });

    it("writes pre-encoded frames", () => {
      const stream = new StreamWriter();
      stream.writeFrame(new Uint8Array([1, 2, 3]));

      expect(stream.bytes()).toEqual(new Uint8Array([3, 1, 2, 3]));
    });

    it("handles large frames requiring multi-byte varint", () => {
      const stream = new StreamWriter();
      stream.writeFrame(new Uint8Array(300).fill(0xab));
      const data = stream.bytes();

      // 300 = 0xAC 0x02 in varint encoding
      expect(data[0]).toBe(0xac);
      expect(data[1]).toBe(0x02);
      expect(data.length).toBe(302);
    });

    it("tracks position correctly", () => {
      const stream = new StreamWriter();
      expect(stream.position).toBe(0);

      stream.writeFrame(new Uint8Array([1, 2, 3]));
      expect(stream.position).toBe(4); // 1 byte length + 3 bytes data

      stream.writeMessage(Counter.of(5));
      expect(stream.position).toBe(7);
    });
  });

  describe("lifecycle", () => {
    it("throws when writing to closed writer", () => {
      const stream = new StreamWriter();
      stream.close();

      expect(() => stream.writeMessage(Counter.of(1))).toThrow(StreamClosedError);
      expect(() => stream.writeFrame(new Uint8Array([1]))).toThrow("Stream is closed");
    });

    it("reports closed state", () => {
      const stream = new StreamWriter();
      expect(stream.isClosed).toBe(false);

      stream.close();
      expect(stream.isClosed).toBe(true);
    });

    it("reset allows reuse", () => {
      const stream = new StreamWriter();
      stream.writeFrame(new Uint8Array([1, 2, 3]));
      stream.close();
      stream.reset();

      expect(stream.isClosed).toBe(false);
      stream.writeFrame(new Uint8Array([4, 5]));
      expect(stream.bytes()).toEqual(new Uint8Array([2, 4, 5]));
    });
  });

  describe("buffer growth", () => {
    it("handles many small messages", () => {
      const stream = new StreamWriter({ initialCapacity: 16 });

      for (let i = 1; i <= 100; i++) {
        stream.writeMessage(Counter.of(i));
      }

      const reader = new StreamReader(stream.bytes());
      const values = [...reader.messages(Counter)].map((counter) => counter.value);
      expect(values.length).toBe(100);
      expect(values[0]).toBe(1);
      expect(values[99]).toBe(100);
    });
  });
});

describe("StreamReader", () => {
  describe("basic operations", () => {
    it("reads a single message", () => {
      const reader = new StreamReader(new Uint8Array([2, 0x08, 7]));

      expect(reader.readMessage(Counter).value).toBe(7);
      expect(reader.hasMore).toBe(false);
    });

    it("reads raw frames", () => {
      const reader = new StreamReader(new Uint8Array([2, 1, 2, 3, 3, 4, 5]));

      expect(reader.readFrame()).toEqual(new Uint8Array([1, 2]));
      expect(reader.readFrame()).toEqual(new Uint8Array([3, 4, 5]));
      expect(reader.hasMore).toBe(false);
    });

    it("reads an empty message", () => {
      const reader = new StreamReader(new Uint8Array([0]));

      expect(reader.readMessage(Counter).value).toBe(0);
    });

    it("keeps unknown fields of framed messages", () => {
      const reader = new StreamReader(new Uint8Array([4, 0x08, 1, 0x10, 2]));
      const counter = reader.readMessage(Counter);

      expect(counter.value).toBe(1);
      expect(counter.hasUnknownField(2)).toBe(true);
    });

    it("tracks position and remaining", () => {
      const reader = new StreamReader(new Uint8Array([3, 1, 2, 3, 2, 4, 5]));

      expect(reader.position).toBe(0);
      expect(reader.remaining).toBe(7);

      reader.readFrame();
      expect(reader.position).toBe(4);
      expect(reader.remaining).toBe(3);
    });
  });

  describe("tryReadMessage", () => {
    it("returns null at end of stream", () => {
      const reader = new StreamReader(new Uint8Array([2, 0x08, 1]));

      expect(reader.tryReadMessage(Counter)?.value).toBe(1);
      expect(reader.tryReadMessage(Counter)).toBeNull();
    });

    it("returns null for empty buffer", () => {
      const reader = new StreamReader(new Uint8Array([]));
      expect(reader.tryReadMessage(Counter)).toBeNull();
    });
  });

  describe("error handling", () => {
    it("throws on incomplete varint and keeps the position", () => {
      const reader = new StreamReader(new Uint8Array([0x80]));

      expect(() => reader.readFrame()).toThrow("Incomplete varint at end of stream");
      expect(reader.position).toBe(0);
    });

    it("throws when message data is incomplete", () => {
      const reader = new StreamReader(new Uint8Array([10, 1, 2, 3])); // Claims 10 bytes, has 3

      expect(() => reader.readFrame()).toThrow(EndOfStreamError);
      reader.reset();
      expect(() => reader.readFrame()).toThrow("Message claims 10 bytes but only 3 available");
    });

    it("throws when message exceeds max size", () => {
      const stream = new StreamWriter();
      stream.writeFrame(new Uint8Array(1000));

      const reader = new StreamReader(stream.bytes(), { maxMessageSize: 100 });
      expect(() => reader.readFrame()).toThrow(MessageSizeExceededError);
      reader.reset();
      expect(() => reader.readFrame()).toThrow("Message size 1000 exceeds maximum of 100 bytes");
    });

    it("throws on readMessage when no more data", () => {
      const reader = new StreamReader(new Uint8Array([]));
      expect(() => reader.readMessage(Counter)).toThrow("No more messages");
    });

    it("allows setting max message size", () => {
      const stream = new StreamWriter();
      stream.writeFrame(new Uint8Array(500));

      const reader = new StreamReader(stream.bytes());
      reader.setMaxMessageSize(100);
      expect(() => reader.readFrame()).toThrow(MessageSizeExceededError);
    });

    it("reports a frame ending inside a field as a schema mismatch", () => {
      const reader = new StreamReader(new Uint8Array([2, 0x08, 0x80]));
      expect(() => reader.readMessage(Counter)).toThrow(SchemaMismatchError);
    });
  });

  describe("skipMessage", () => {
    it("skips a message", () => {
      const reader = new StreamReader(new Uint8Array([3, 1, 2, 3, 2, 0x08, 5]));

      expect(reader.skipMessage()).toBe(4); // 1 byte length + 3 bytes data
      expect(reader.readMessage(Counter).value).toBe(5);
    });

    it("throws when no message to skip", () => {
      const reader = new StreamReader(new Uint8Array([]));
      expect(() => reader.skipMessage()).toThrow(EndOfStreamError);
    });

    it("throws when message to skip is incomplete", () => {
      const reader = new StreamReader(new Uint8Array([10, 1, 2])); // Claims 10 bytes
      expect(() => reader.skipMessage()).toThrow(EndOfStreamError);
    });
  });

  describe("reset", () => {
    it("resets to beginning", () => {
      const reader = new StreamReader(new Uint8Array([2, 0x08, 9]));

      reader.readMessage(Counter);
      expect(reader.hasMore).toBe(false);

      reader.reset();
      expect(reader.position).toBe(0);
      expect(reader.hasMore).toBe(true);
      expect(reader.readMessage(Counter).value).toBe(9);
    });
  });

  describe("iteration", () => {
    it("iterates with for-of using messages()", () => {
      const stream = new StreamWriter();
      stream.writeMessage(Counter.of(1));
      stream.writeMessage(Counter.of(2));
      stream.writeMessage(Counter.of(3));

      const reader = new StreamReader(stream.bytes());
      const values: number[] = [];

      for (const counter of reader.messages(Counter)) {
        values.push(counter.value);
      }

      expect(values).toEqual([1, 2, 3]);
    });

    it("handles empty stream in iteration", () => {
      const reader = new StreamReader(new Uint8Array([]));
      expect([...reader.messages(Counter)]).toEqual([]);
    });
  });
});

describe("MessageIterator", () => {
  function streamOf(...values: number[]): Uint8Array {
    const stream = new StreamWriter();
    for (const value of values) {
      stream.writeMessage(Counter.of(value));
    }
    return stream.bytes();
  }

  it("iterates over decoded messages", () => {
    const iterator = new MessageIterator(streamOf(10, 20, 30), Counter);
    const values = iterator.toArray().map((counter) => counter.value);

    expect(values).toEqual([10, 20, 30]);
    expect(iterator.error).toBeNull();
  });

  it("supports for-of iteration", () => {
    const iterator = new MessageIterator(streamOf(42), Counter);
    let count = 0;

    for (const counter of iterator) {
      expect(counter.value).toBe(42);
      count++;
    }

    expect(count).toBe(1);
  });

  it("stops at a broken frame and keeps the error", () => {
    const data = new Uint8Array([...streamOf(1), 0x05, 0x08]);
    const iterator = new MessageIterator(data, Counter);

    const values = iterator.toArray().map((counter) => counter.value);

    expect(values).toEqual([1]);
    expect(iterator.error).toBeInstanceOf(EndOfStreamError);
    expect(iterator.error?.message).toBe("Message claims 5 bytes but only 1 available");
    expect(iterator.hasMore).toBe(false);
    expect(iterator.next()).toBeNull();
  });

  it("applies the size limit", () => {
    const iterator = new MessageIterator(streamOf(300), Counter, { maxMessageSize: 2 });

    expect(iterator.next()).toBeNull();
    expect(iterator.error).toBeInstanceOf(MessageSizeExceededError);
  });

  it("reports hasMore correctly", () => {
    const iterator = new MessageIterator(streamOf(1, 2), Counter);
    expect(iterator.hasMore).toBe(true);

    iterator.next();
    expect(iterator.hasMore).toBe(true);

    iterator.next();
    expect(iterator.hasMore).toBe(false);
  });

  it("reset allows re-iteration", () => {
    const iterator = new MessageIterator(streamOf(42), Counter);

    // First iteration
    expect(iterator.toArray().length).toBe(1);
    expect(iterator.hasMore).toBe(false);

    // Reset and iterate again
    iterator.reset();
    expect(iterator.hasMore).toBe(true);
    expect(iterator.toArray().length).toBe(1);
  });

  it("handles empty stream", () => {
    const iterator = new MessageIterator(new Uint8Array([]), Counter);
    expect(iterator.hasMore).toBe(false);
    expect(iterator.next()).toBeNull();
    expect(iterator.toArray()).toEqual([]);
  });
});
