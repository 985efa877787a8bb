import { describe, it, expect } from 'vitest';
import { Writer } from './writer';
import { Reader } from './reader';
import { WireType, MaxVarint64 } from './types';
import { EncodeError, InvalidFieldNumberError } from './errors';

describe('Writer', () => {
  describe('varint', () => {
    it('encodes 0', () => {
      const writer = new Writer();
      writer.writeVarint(0);
      expect(writer.bytes()).toEqual(new Uint8Array([0]));
    });

    it('encodes 127', () => {
      const writer = new Writer();
      writer.writeVarint(127);
      expect(writer.bytes()).toEqual(new Uint8Array([127]));
    });

    it('encodes 128', () => {
      const writer = new Writer();
      writer.writeVarint(128);
      expect(writer.bytes()).toEqual(new Uint8Array([0x80, 0x01]));
    });

    it('encodes 300', () => {
      const writer = new Writer();
      writer.writeVarint(300);
      expect(writer.bytes()).toEqual(new Uint8Array([0xac, 0x02]));
    });

    it('encodes 2^32 - 1 in five bytes', () => {
      const writer = new Writer();
      writer.writeVarint(0xffffffff);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x0f]));
    });

    it('rejects values that are not unsigned 32-bit integers', () => {
      const writer = new Writer();
      expect(() => writer.writeVarint(-1)).toThrow(EncodeError);
      expect(() => writer.writeVarint(0x100000000)).toThrow(EncodeError);
      expect(() => writer.writeVarint(1.5)).toThrow(EncodeError);
      expect(writer.position).toBe(0);
    });
  });

  describe('varint64', () => {
    it('encodes 2^64 - 1 in ten bytes', () => {
      const writer = new Writer();
      writer.writeVarint64(MaxVarint64);
      expect(writer.bytes()).toEqual(
        new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01])
      );
    });

    it('rejects negative and oversized values', () => {
      const writer = new Writer();
      expect(() => writer.writeVarint64(-1n)).toThrow(EncodeError);
      expect(() => writer.writeVarint64(MaxVarint64 + 1n)).toThrow(/not an unsigned 64-bit integer/);
    });
  });

  describe('string', () => {
    it('encodes "hello"', () => {
      const writer = new Writer();
      writer.writeString('hello');
      expect(writer.bytes()).toEqual(new Uint8Array([5, 104, 101, 108, 108, 111]));
    });

    it('encodes empty string', () => {
      const writer = new Writer();
      writer.writeString('');
      expect(writer.bytes()).toEqual(new Uint8Array([0]));
    });

    it('encodes multi-byte UTF-8 by byte length', () => {
      const writer = new Writer();
      writer.writeString('é');
      expect(writer.bytes()).toEqual(new Uint8Array([2, 0xc3, 0xa9]));
    });
  });

  describe('tags', () => {
    it('writes the tag varint', () => {
      const writer = new Writer();
      writer.writeTag(1, WireType.Varint);
      writer.writeTag(16, WireType.LengthDelimited);
      // 16 << 3 | 2 = 130 = 0x82 0x01
      expect(writer.bytes()).toEqual(new Uint8Array([0x08, 0x82, 0x01]));
    });

    it('rejects field number 0', () => {
      const writer = new Writer();
      expect(() => writer.writeTag(0, WireType.Varint)).toThrow(InvalidFieldNumberError);
    });
  });

  describe('fixed width', () => {
    it('writes fixed32 little-endian', () => {
      const writer = new Writer();
      writer.writeFixed32(0x01020304);
      expect(writer.bytes()).toEqual(new Uint8Array([0x04, 0x03, 0x02, 0x01]));
    });

    it('writes fixed64 little-endian', () => {
      const writer = new Writer();
      writer.writeFixed64(0x0102030405060708n);
      expect(writer.bytes()).toEqual(
        new Uint8Array([0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01])
      );
    });

    it('writes float64 1.0', () => {
      const writer = new Writer();
      writer.writeFloat64(1.0);
      expect(writer.bytes()).toEqual(
        new Uint8Array([0, 0, 0, 0, 0, 0, 0xf0, 0x3f])
      );
    });

    it('writes float32 1.0', () => {
      const writer = new Writer();
      writer.writeFloat32(1.0);
      expect(writer.bytes()).toEqual(new Uint8Array([0, 0, 0x80, 0x3f]));
    });
  });

  describe('buffer management', () => {
    it('grows beyond its initial capacity', () => {
      const writer = new Writer(1);
      const data = new Uint8Array(1000).fill(7);
      writer.writeBytes(data);
      writer.writeByte(9);
      expect(writer.position).toBe(1001);
      expect(writer.bytes()[999]).toBe(7);
      expect(writer.bytes()[1000]).toBe(9);
    });

    it('resets for reuse', () => {
      const writer = new Writer();
      writer.writeVarint(300);
      writer.reset();
      writer.writeBool(true);
      expect(writer.bytes()).toEqual(new Uint8Array([1]));
    });

    it('accepts a zero initial capacity', () => {
      const writer = new Writer(0);
      writer.writeLengthPrefixedBytes(new Uint8Array([1, 2]));
      expect(writer.bytes()).toEqual(new Uint8Array([2, 1, 2]));
    });
  });

  describe('roundtrip', () => {
    it('reads back what it wrote', () => {
      const writer = new Writer();
      writer.writeTag(3, WireType.Fixed64);
      writer.writeFloat64(3.14159);
      writer.writeBool(false);
      writer.writeString('wire');

      const reader = new Reader(writer.bytes());
      expect(reader.readTag()).toEqual({ fieldNumber: 3, wireType: WireType.Fixed64 });
      expect(reader.readFloat64()).toBe(3.14159);
      expect(reader.readBool()).toBe(false);
      expect(reader.readString()).toBe('wire');
      expect(reader.hasMore).toBe(false);
    });
  });
});
