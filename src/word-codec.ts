import { assertBitWidth, packBits, unpackBits } from "./bits.js";
import { attempt, type Codec, type CodecResult } from "./codec.js";
import { InvalidEncodingError } from "./errors.js";
import type { SymbolTable } from "./symbol-table.js";
import { codePointOffset, segment } from "./tokenizer.js";

/**
 * Options for {@link WordCodec}.
 */
export interface WordCodecOptions {
  /**
   * Bits carried by each token when a call does not pass its own width.
   * Defaults to the table's bit width.
   */
  bitWidth?: number;
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const LONE_SURROGATE = /\p{Cs}/u;

/**
 * A codec that writes UTF-8 text as a run of words from a {@link SymbolTable}.
 *
 * The text's bytes are cut into fixed-width chunks and each chunk becomes the
 * token for its value. Two lossy rules are part of the format:
 *
 * - Every all-zero chunk, data or trailing padding alike, is written as the
 *   pad token. The token for index 0 is never emitted.
 * - On decode every all-zero byte is dropped, so U+0000 does not survive a
 *   round trip.
 *
 * Instances hold no mutable state and can be shared freely.
 *
 * @example
 * ```typescript
 * const codec = new WordCodec(SymbolTable.fromConfig(loadTableConfig()));
 * codec.encode("A");
 * // => '香蕉香蕉'
 * codec.decode("香蕉香蕉");
 * // => 'A'
 * ```
 */
export class WordCodec implements Codec {
  readonly table: SymbolTable;
  readonly bitWidth: number;

  constructor(table: SymbolTable, options: WordCodecOptions = {}) {
    const bitWidth = options.bitWidth ?? table.bitWidth;
    assertBitWidth(bitWidth);
    this.table = table;
    this.bitWidth = bitWidth;
  }

  /**
   * Encode text as concatenated tokens.
   * @param text - The string to encode
   * @param bitWidth - Bits per token
   * @returns The token string
   * @throws {InvalidEncodingError} when the text has an unpaired surrogate
   * @throws {UndefinedSymbolError} when a chunk value has no token
   */
  encode(text: string, bitWidth: number = this.bitWidth): string {
    const surrogate = LONE_SURROGATE.exec(text);
    if (surrogate !== null) {
      throw new InvalidEncodingError(
        `Text has an unpaired surrogate at position ${codePointOffset(text, surrogate.index)} and cannot be encoded as UTF-8`
      );
    }
    return this.encodeBytes(utf8Encoder.encode(text), bitWidth);
  }

  /**
   * Decode concatenated tokens back to text.
   * @param text - The token string to decode
   * @param bitWidth - Bits per token
   * @returns The decoded string
   * @throws {SegmentationError} when the input cannot be split into tokens
   * @throws {UnknownSymbolError} when a token has no index
   * @throws {InvalidEncodingError} when the bytes are not valid UTF-8
   */
  decode(text: string, bitWidth: number = this.bitWidth): string {
    const bytes = this.decodeBytes(text, bitWidth);
    try {
      return utf8Decoder.decode(bytes);
    } catch (error) {
      throw new InvalidEncodingError("Decoded bytes are not valid UTF-8", { cause: error });
    }
  }

  tryEncode(text: string, bitWidth: number = this.bitWidth): CodecResult<string> {
    return attempt(() => this.encode(text, bitWidth));
  }

  tryDecode(text: string, bitWidth: number = this.bitWidth): CodecResult<string> {
    return attempt(() => this.decode(text, bitWidth));
  }

  /**
   * Encode raw bytes as concatenated tokens.
   */
  encodeBytes(bytes: Uint8Array, bitWidth: number = this.bitWidth): string {
    const { table } = this;
    return packBits(bytes, bitWidth)
      .map((value) => table.tokenFor(value === 0 ? table.padIndex : value, bitWidth))
      .join("");
  }

  /**
   * Decode concatenated tokens to raw bytes, with zero bytes removed.
   */
  decodeBytes(text: string, bitWidth: number = this.bitWidth): Uint8Array {
    assertBitWidth(bitWidth);
    const { table } = this;

    // An index wider than bitWidth keeps all of its bits
    const values = segment(text, table.candidates).map((token) => {
      const index = table.indexOf(token);
      return index === table.padIndex ? 0 : index;
    });

    return unpackBits(values, bitWidth).filter((byte) => byte !== 0);
  }
}
