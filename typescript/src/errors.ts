/**
 * Base error class for protobuf runtime errors.
 */
export class ProtobufError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProtobufError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends ProtobufError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends ProtobufError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a field number outside [1, 2^29 - 1] is encoded.
 */
export class InvalidFieldNumberError extends EncodeError {
  constructor(fieldNumber: number) {
    super(`Invalid field number: ${fieldNumber}`);
    this.name = "InvalidFieldNumberError";
  }
}

/**
 * Error thrown when the input ends in the middle of a varint or payload.
 */
export class TruncatedInputError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Truncated input: needed ${needed} bytes, only ${available} available`);
    this.name = "TruncatedInputError";
  }
}

/**
 * Error thrown when a varint runs past 10 bytes or exceeds 64 bits.
 */
export class VarintOverflowError extends DecodeError {
  constructor(message: string) {
    super(message);
    this.name = "VarintOverflowError";
  }
}

/**
 * Error thrown when a decoded tag carries field number 0.
 */
export class InvalidTagError extends DecodeError {
  constructor(tag: number) {
    super(`Invalid tag ${tag}: field number 0 is reserved`);
    this.name = "InvalidTagError";
  }
}

/**
 * Error thrown when an invalid wire type is encountered.
 *
 * Without `expected` the code is not a wire type at all; with it, the wire type
 * does not fit the field being decoded.
 */
export class InvalidWireTypeError extends DecodeError {
  readonly actual: number;
  readonly expected: number | undefined;

  constructor(actual: number, expected?: number) {
    super(
      expected === undefined
        ? `Invalid wire type: ${actual}`
        : `Invalid wire type: expected ${expected}, got ${actual}`
    );
    this.name = "InvalidWireTypeError";
    this.actual = actual;
    this.expected = expected;
  }
}

/**
 * Error thrown when bytes do not fit the message type they are decoded into,
 * e.g. a length-delimited frame that ends inside one of its fields.
 */
export class SchemaMismatchError extends DecodeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SchemaMismatchError";
  }
}

/**
 * Error thrown when a stream ends before a complete message could be read.
 */
export class EndOfStreamError extends DecodeError {
  constructor(message: string = "Unexpected end of stream") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

/**
 * Error thrown when a delimited message is larger than the configured limit.
 */
export class MessageSizeExceededError extends DecodeError {
  constructor(size: number, limit: number) {
    super(`Message size ${size} exceeds maximum of ${limit} bytes`);
    this.name = "MessageSizeExceededError";
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends ProtobufError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}
