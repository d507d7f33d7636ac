import { SegmentationError } from "./errors.js";

/**
 * Split a string of concatenated tokens using greedy longest-match.
 *
 * At each position the candidates are tried in the order given and the first
 * literal prefix match is consumed. Callers pass candidates longest first, so
 * when one token is a prefix of another the longer one wins. Empty candidates
 * never match.
 *
 * @param input - Concatenated tokens with no separators
 * @param candidates - Known tokens, longest first
 * @returns The tokens in input order
 * @throws {SegmentationError} when no candidate matches at some position,
 *         reported as a code-point offset
 *
 * @example
 * ```typescript
 * segment("xabx", ["ab", "a", "x"]);
 * // => ['x', 'ab', 'x']
 * ```
 */
export function segment(input: string, candidates: readonly string[]): string[] {
  const tokens: string[] = [];
  let position = 0;

  while (position < input.length) {
    const match = candidates.find(
      (token) => token.length > 0 && input.startsWith(token, position)
    );
    if (match === undefined) {
      throw new SegmentationError(codePointOffset(input, position));
    }
    tokens.push(match);
    position += match.length;
  }

  return tokens;
}

/**
 * Count the code points in `text` before the UTF-16 index `index`.
 */
export function codePointOffset(text: string, index: number): number {
  return Array.from(text.slice(0, index)).length;
}
