/**
 * Bidirectional index/token table.
 *
 * A table maps every data index in [0, 2^bitWidth - 1] to a token and keeps
 * one extra pad index, outside that range, for all-zero chunks. The default
 * table uses indices 0..63 for data and 65 for the pad; 64 is never assigned.
 */

import { assertBitWidth } from "./bits.js";
import { ConfigError, UndefinedSymbolError, UnknownSymbolError } from "./errors.js";

export const DEFAULT_BIT_WIDTH = 6;

/**
 * The reserved pad entry of a table.
 */
export interface PadSymbol {
  index: number;
  token: string;
}

/**
 * Input accepted by {@link SymbolTable.fromConfig}.
 */
export interface SymbolTableConfig {
  /**
   * Native bit width of the table. Data indices must cover
   * [0, 2^bitWidth - 1] exactly. Default is 6.
   */
  bitWidth?: number;

  /**
   * Data symbols keyed by decimal index, e.g. `{ "0": "apple" }`.
   */
  symbols: Readonly<Record<string, string>>;

  /**
   * The pad symbol. Its index must be at least 2^bitWidth.
   */
  pad: PadSymbol;
}

const DECIMAL_INDEX = /^\d+$/;

export class SymbolTable {
  readonly bitWidth: number;
  readonly padIndex: number;
  readonly padToken: string;

  /** Every token, pad included, longest first. */
  readonly candidates: readonly string[];

  private readonly tokens: ReadonlyMap<number, string>;
  private readonly indices: ReadonlyMap<string, number>;

  private constructor(
    bitWidth: number,
    pad: PadSymbol,
    tokens: Map<number, string>,
    indices: Map<string, number>
  ) {
    this.bitWidth = bitWidth;
    this.padIndex = pad.index;
    this.padToken = pad.token;
    this.tokens = tokens;
    this.indices = indices;
    // Array#sort is stable, so equal-length tokens keep ascending index order
    this.candidates = Object.freeze(
      [...indices.keys()].sort((a, b) => b.length - a.length)
    );
  }

  /**
   * Validate a table configuration and build the table.
   *
   * @throws {ConfigError} on malformed keys, duplicate indices or tokens,
   *         empty tokens, a pad inside the data range, or missing coverage
   */
  static fromConfig(config: SymbolTableConfig): SymbolTable {
    const bitWidth = config.bitWidth ?? DEFAULT_BIT_WIDTH;
    assertBitWidth(bitWidth);
    const dataSize = 2 ** bitWidth;

    const entries: Array<[number, string]> = [];
    for (const [key, token] of Object.entries(config.symbols)) {
      if (!DECIMAL_INDEX.test(key)) {
        throw new ConfigError(`index "${key}" is not a decimal integer`, "symbols");
      }
      entries.push([Number.parseInt(key, 10), token]);
    }
    entries.sort((a, b) => a[0] - b[0]);

    const tokens = new Map<number, string>();
    const indices = new Map<string, number>();

    for (const [index, token] of entries) {
      if (tokens.has(index)) {
        throw new ConfigError(`index ${index} is defined more than once`, "symbols");
      }
      if (index >= dataSize) {
        throw new ConfigError(
          `index ${index} is outside the data range 0..${dataSize - 1}`,
          "symbols"
        );
      }
      addToken(index, token, "symbols", tokens, indices);
    }

    if (tokens.size < dataSize) {
      const missing = firstMissing(tokens, dataSize);
      throw new ConfigError(
        `no token for index ${missing}; ${dataSize} data symbols are required for bit width ${bitWidth}`,
        "symbols"
      );
    }

    const { pad } = config;
    if (!Number.isInteger(pad.index) || pad.index < dataSize) {
      throw new ConfigError(
        `index ${pad.index} must be an integer outside the data range 0..${dataSize - 1}`,
        "pad"
      );
    }
    addToken(pad.index, pad.token, "pad", tokens, indices);

    return new SymbolTable(bitWidth, pad, tokens, indices);
  }

  /** Number of entries, pad included. */
  get size(): number {
    return this.tokens.size;
  }

  /**
   * @throws {UndefinedSymbolError} when the index has no token
   */
  tokenFor(index: number, bitWidth: number = this.bitWidth): string {
    const token = this.tokens.get(index);
    if (token === undefined) {
      throw new UndefinedSymbolError(index, bitWidth);
    }
    return token;
  }

  /**
   * @throws {UnknownSymbolError} when the token is not in the table
   */
  indexOf(token: string): number {
    const index = this.indices.get(token);
    if (index === undefined) {
      throw new UnknownSymbolError(token);
    }
    return index;
  }
}

function addToken(
  index: number,
  token: string,
  field: string,
  tokens: Map<number, string>,
  indices: Map<string, number>
): void {
  if (token.length === 0) {
    throw new ConfigError(`token for index ${index} is empty`, field);
  }
  const existing = indices.get(token);
  if (existing !== undefined) {
    throw new ConfigError(
      `token "${token}" is used by both index ${existing} and index ${index}`,
      field
    );
  }
  tokens.set(index, token);
  indices.set(token, index);
}

function firstMissing(tokens: ReadonlyMap<number, string>, dataSize: number): number {
  let index = 0;
  while (index < dataSize && tokens.has(index)) {
    index++;
  }
  return index;
}
