/**
 * Error types raised by the codec and its configuration layer.
 *
 * Every error carries a `kind` discriminant so callers holding a
 * {@link CodecResult} can branch without `instanceof` checks.
 */

export type CodecErrorKind =
  | "undefined-symbol"
  | "segmentation"
  | "unknown-symbol"
  | "invalid-encoding"
  | "config";

/**
 * Base class for all lexicode errors.
 */
export class CodecError extends Error {
  readonly kind: CodecErrorKind;

  constructor(kind: CodecErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodecError";
    this.kind = kind;
  }
}

/**
 * Thrown by encode when a computed index has no token in the table.
 */
export class UndefinedSymbolError extends CodecError {
  readonly index: number;
  readonly bitWidth: number;

  constructor(index: number, bitWidth: number) {
    super(
      "undefined-symbol",
      `No symbol is defined for index ${index} (bit width ${bitWidth})`
    );
    this.name = "UndefinedSymbolError";
    this.index = index;
    this.bitWidth = bitWidth;
  }
}

/**
 * Thrown by decode when no known token matches at some position of the input.
 */
export class SegmentationError extends CodecError {
  /**
   * Offset of the first unmatched character, counted in code points, so a
   * character outside the BMP counts once.
   */
  readonly position: number;

  constructor(position: number) {
    super("segmentation", `Unrecognized symbol sequence starting at position ${position}`);
    this.name = "SegmentationError";
    this.position = position;
  }
}

/**
 * Thrown by decode when a token has no reverse mapping.
 */
export class UnknownSymbolError extends CodecError {
  readonly token: string;

  constructor(token: string) {
    super("unknown-symbol", `Input contains an unmapped symbol "${token}"`);
    this.name = "UnknownSymbolError";
    this.token = token;
  }
}

/**
 * Thrown when text has no UTF-8 form (encode) or bytes are not valid
 * UTF-8 (decode).
 */
export class InvalidEncodingError extends CodecError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid-encoding", message, options);
    this.name = "InvalidEncodingError";
  }
}

/**
 * Thrown when a symbol table, table file or bit width is rejected.
 */
export class ConfigError extends CodecError {
  readonly field?: string;

  constructor(message: string, field?: string, options?: { cause?: unknown }) {
    super("config", field === undefined ? message : `${field}: ${message}`, options);
    this.name = "ConfigError";
    this.field = field;
  }
}
