/**
 * @pbwire/runtime - protobuf binary wire format runtime for TypeScript
 *
 * Encodes and decodes protobuf messages, keeps unknown fields for lossless
 * round trips and implements protobuf merge semantics. Generated message
 * classes extend {@link Message}.
 *
 * @example
 * ```typescript
 * import { Writer, Reader, ScalarCodecs, UntypedMessage } from '@pbwire/runtime';
 *
 * // Encoding
 * const writer = new Writer();
 * ScalarCodecs.uint32.encodeField(writer, 1, 300);
 * const data = writer.bytes(); // 08 ac 02
 *
 * // Decoding
 * const message = UntypedMessage.fromBinary(data);
 * const id = message.unknownFields.claimScalar(1, ScalarCodecs.uint32); // 300
 * ```
 */

// Core types
export type { FieldNumber, FieldTag } from "./types";
export {
  WireType,
  MinFieldNumber,
  MaxFieldNumber,
  MaxVarint32,
  MaxVarint64,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
  MaxVarintBytes,
  isWireType,
  checkFieldNumber,
  encodeTag,
  decodeTag,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";

// Errors
export {
  ProtobufError,
  EncodeError,
  DecodeError,
  InvalidFieldNumberError,
  TruncatedInputError,
  VarintOverflowError,
  InvalidTagError,
  InvalidWireTypeError,
  SchemaMismatchError,
  EndOfStreamError,
  MessageSizeExceededError,
  StreamClosedError,
} from "./errors";

// Varint codec
export { encodeVarint, decodeVarint, varintSize } from "./varint";

// Fields and codecs
export { EncodedField } from "./field";
export type { FieldCodec, ScalarType } from "./codec";
export {
  ScalarCodec,
  ScalarCodecs,
  DoubleCodec,
  FloatCodec,
  Int32Codec,
  Int64Codec,
  Uint32Codec,
  Uint64Codec,
  Sint32Codec,
  Sint64Codec,
  Fixed32Codec,
  Fixed64Codec,
  Sfixed32Codec,
  Sfixed64Codec,
  BoolCodec,
  EnumCodec,
  StringCodec,
  BytesCodec,
} from "./codec";

// Messages
export { UnknownFieldSet } from "./unknown";
export type { MessageType } from "./message";
export { Message, UntypedMessage } from "./message";
export { RepeatedField, RepeatedScalarField, RepeatedMessageField } from "./repeated";

// Streaming support
export type { StreamWriterOptions, StreamReaderOptions } from "./stream";
export { StreamWriter, StreamReader, MessageIterator } from "./stream";

// Writer
import { Writer } from "./writer";
export { Writer };

// Reader
import { Reader } from "./reader";
export { Reader };

import type { Message, MessageType } from "./message";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Marshal encodes a message to bytes.
 */
export function marshal(message: Message): Uint8Array {
  const writer = new Writer();
  message.encode(writer);
  return writer.bytes();
}

/**
 * Unmarshal decodes bytes into a new message of the given type.
 */
export function unmarshal<T extends Message>(type: MessageType<T>, data: Uint8Array): T {
  const message = new type();
  message.decode(new Reader(data));
  return message;
}
