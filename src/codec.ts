import { CodecError } from "./errors.js";

/**
 * Outcome of a codec call that reports failure as a value.
 */
export type CodecResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CodecError };

/**
 * Base codec interface for encoding and decoding strings.
 */
export interface Codec {
  /**
   * Encode a string.
   * @param text - The string to encode
   * @returns The encoded string
   * @throws {CodecError} when the text cannot be encoded
   */
  encode(text: string): string;

  /**
   * Decode a string.
   * @param text - The string to decode
   * @returns The decoded string
   * @throws {CodecError} when the text is not a valid encoding
   */
  decode(text: string): string;

  /**
   * Encode a string, returning failures instead of throwing them.
   */
  tryEncode(text: string): CodecResult<string>;

  /**
   * Decode a string, returning failures instead of throwing them.
   */
  tryDecode(text: string): CodecResult<string>;
}

/**
 * Run `fn` and capture a thrown {@link CodecError} as an error result.
 * Anything else is rethrown.
 */
export function attempt<T>(fn: () => T): CodecResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof CodecError) {
      return { ok: false, error };
    }
    throw error;
  }
}
