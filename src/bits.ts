/**
 * Fixed-width bit packing between byte sequences and small integers.
 *
 * Bits are read and written most-significant first.
 */

import { ConfigError } from "./errors.js";

export const MIN_BIT_WIDTH = 1;
export const MAX_BIT_WIDTH = 16;

/**
 * Reject bit widths the packer cannot handle.
 *
 * @throws {ConfigError} unless `width` is an integer in [1, 16]
 */
export function assertBitWidth(width: number): void {
  if (!Number.isInteger(width) || width < MIN_BIT_WIDTH || width > MAX_BIT_WIDTH) {
    throw new ConfigError(
      `must be an integer between ${MIN_BIT_WIDTH} and ${MAX_BIT_WIDTH}, got ${width}`,
      "bitWidth"
    );
  }
}

/**
 * Split a byte sequence into `width`-bit values.
 *
 * A final chunk shorter than `width` is padded on the right with zero bits.
 *
 * @example
 * ```typescript
 * packBits(new Uint8Array([0x41]), 6);
 * // => [16, 16]   (010000 | 01 + 0000)
 * ```
 */
export function packBits(bytes: Uint8Array, width: number): number[] {
  assertBitWidth(width);
  const values: number[] = [];
  const mask = (1 << width) - 1;
  let acc = 0;
  let accBits = 0;

  for (const byte of bytes) {
    acc = (acc << 8) | byte;
    accBits += 8;
    while (accBits >= width) {
      accBits -= width;
      values.push((acc >> accBits) & mask);
    }
    acc &= (1 << accBits) - 1;
  }

  if (accBits > 0) {
    values.push((acc << (width - accBits)) & mask);
  }

  return values;
}

/**
 * Number of bits needed to write `value` in binary; 0 for 0.
 */
export function bitLength(value: number): number {
  return 32 - Math.clz32(value);
}

/**
 * Join `width`-bit values back into bytes.
 *
 * A value wider than `width` is written at its own bit length, never
 * truncated. Trailing bits that do not fill a whole byte are discarded.
 *
 * @example
 * ```typescript
 * unpackBits([8, 32], 5);
 * // => Uint8Array [0x44]   (01000 | 100000, the trailing 000 is dropped)
 * ```
 */
export function unpackBits(values: readonly number[], width: number): Uint8Array {
  assertBitWidth(width);
  const fieldWidths = values.map((value) => Math.max(width, bitLength(value)));
  const totalBits = fieldWidths.reduce((sum, fieldWidth) => sum + fieldWidth, 0);
  const bytes = new Uint8Array(Math.floor(totalBits / 8));
  let length = 0;
  let acc = 0;
  let accBits = 0;

  for (const [i, value] of values.entries()) {
    const fieldWidth = fieldWidths[i];
    acc = (acc << fieldWidth) | value;
    accBits += fieldWidth;
    while (accBits >= 8) {
      accBits -= 8;
      bytes[length++] = (acc >> accBits) & 0xff;
    }
    acc &= (1 << accBits) - 1;
  }

  return bytes;
}
