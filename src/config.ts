/**
 * Table configuration files.
 *
 * A table file is JSON shaped like `tables/default.json`:
 *
 * ```json
 * {
 *   "bitWidth": 6,
 *   "symbols": { "0": "香香", "1": "软软", ... },
 *   "pad": { "index": 65, "token": "的" },
 *   "envelope": { "prefix": "...", "suffix": "..." }
 * }
 * ```
 *
 * The zod schema checks the shape; {@link SymbolTable.fromConfig} checks the
 * table itself.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { MAX_BIT_WIDTH, MIN_BIT_WIDTH } from "./bits.js";
import type { Codec } from "./codec.js";
import { EnvelopeCodec } from "./envelope-codec.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_BIT_WIDTH, SymbolTable } from "./symbol-table.js";
import { WordCodec } from "./word-codec.js";

export const DEFAULT_TABLE_PATH = new URL("../tables/default.json", import.meta.url);

export const tableConfigSchema = z.object({
  bitWidth: z.number().int().min(MIN_BIT_WIDTH).max(MAX_BIT_WIDTH).default(DEFAULT_BIT_WIDTH),
  symbols: z.record(z.string(), z.string().min(1)),
  pad: z.object({
    index: z.number().int().nonnegative(),
    token: z.string().min(1),
  }),
  envelope: z
    .object({
      prefix: z.string(),
      suffix: z.string(),
    })
    .optional(),
});

export type TableConfig = z.infer<typeof tableConfigSchema>;

/**
 * Validate the shape of a parsed table file.
 *
 * @throws {ConfigError} listing every schema violation
 */
export function parseTableConfig(raw: unknown): TableConfig {
  const parsed = tableConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid table config: ${details}`, undefined, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Read and validate a table file. Reads the bundled default table when no
 * path is given.
 *
 * @throws {ConfigError} when the file is unreadable, not JSON, or invalid
 */
export function loadTableConfig(path: string | URL = DEFAULT_TABLE_PATH): TableConfig {
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`cannot read table file ${String(path)}`, undefined, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`table file ${String(path)} is not valid JSON`, undefined, {
      cause: error,
    });
  }

  return parseTableConfig(raw);
}

export interface CreateCodecOptions {
  /** Overrides the table's bit width for every call. */
  bitWidth?: number;
  /** Wrap output in the table's envelope, when it has one. Default is true. */
  envelope?: boolean;
}

/**
 * Build the codec described by a table config.
 */
export function createCodec(config: TableConfig, options: CreateCodecOptions = {}): Codec {
  const { bitWidth, envelope = true } = options;
  const codec = new WordCodec(SymbolTable.fromConfig(config), { bitWidth });
  if (envelope && config.envelope !== undefined) {
    return new EnvelopeCodec(codec, config.envelope);
  }
  return codec;
}
