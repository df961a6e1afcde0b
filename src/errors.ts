export type ErrorCode = 'INVALID_INPUT' | 'UNSUPPORTED_FORMAT' | 'DECODE_FAILED' | 'INVALID_ENCODING';

export class ScCompressionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ScCompressionError';
  }
}

export class InvalidInputError extends ScCompressionError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/** Raised for SCLZ containers, whose payload is LZHAM rather than LZMA. */
export class UnsupportedFormatError extends ScCompressionError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_FORMAT');
    this.name = 'UnsupportedFormatError';
  }
}

export class DecodeError extends ScCompressionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DECODE_FAILED', cause);
    this.name = 'DecodeError';
  }
}

export class EncodingError extends ScCompressionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_ENCODING', cause);
    this.name = 'EncodingError';
  }
}
