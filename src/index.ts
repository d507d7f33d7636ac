/**
 * lexicode - A reversible codec that writes text as a string of words
 */

export { attempt, type Codec, type CodecResult } from "./codec.js";
export { WordCodec, type WordCodecOptions } from "./word-codec.js";
export { EnvelopeCodec, type Envelope } from "./envelope-codec.js";
export {
  DEFAULT_BIT_WIDTH,
  SymbolTable,
  type PadSymbol,
  type SymbolTableConfig,
} from "./symbol-table.js";
export { codePointOffset, segment } from "./tokenizer.js";
export { assertBitWidth, bitLength, packBits, unpackBits, MAX_BIT_WIDTH, MIN_BIT_WIDTH } from "./bits.js";
export {
  DEFAULT_TABLE_PATH,
  createCodec,
  loadTableConfig,
  parseTableConfig,
  tableConfigSchema,
  type CreateCodecOptions,
  type TableConfig,
} from "./config.js";
export {
  CodecError,
  ConfigError,
  InvalidEncodingError,
  SegmentationError,
  UndefinedSymbolError,
  UnknownSymbolError,
  type CodecErrorKind,
} from "./errors.js";
