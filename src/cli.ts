/**
 * lexicode command line.
 *
 * Commands:
 *   lexicode encode <text...>   Print the encoded form of the text
 *   lexicode decode <text...>   Print the text behind an encoded string
 *
 * Options (both commands):
 *   -t, --table <path>      Table file (default: $LEXICODE_TABLE or the bundled table)
 *   -w, --bit-width <n>     Bits per token (default: $LEXICODE_BIT_WIDTH or the table's)
 *   --no-envelope           Do not add or strip the table's envelope
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import { attempt, type CodecResult } from "./codec.js";
import { createCodec, loadTableConfig } from "./config.js";
import { loadEnv, type EnvVars } from "./env.js";
import { createLogger } from "./logger.js";

/**
 * Where the CLI writes. Chunks already carry their trailing newline.
 */
export interface CliIO {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
}

export const processIO: CliIO = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
};

interface CodecCommandOptions {
  table?: string;
  bitWidth?: number;
  envelope: boolean;
}

type Direction = "encode" | "decode";

const DECIMAL = /^\d+$/;

function parseBitWidth(value: string): number {
  if (!DECIMAL.test(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

/**
 * Run the CLI against `argv` (arguments after the executable and script).
 *
 * @returns The process exit status
 */
export async function run(
  argv: string[],
  io: CliIO = processIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const loaded = attempt(() => loadEnv(env));
  if (!loaded.ok) {
    io.stderr(`Error: ${loaded.error.message}\n`);
    return 1;
  }
  const settings = loaded.value;
  const logger = createLogger(settings.LEXICODE_LOG_LEVEL);

  let status = 0;
  const execute = (direction: Direction, words: string[], options: CodecCommandOptions) => {
    const result = transform(direction, words.join(" "), options, settings, logger);
    if (result.ok) {
      io.stdout(`${result.value}\n`);
    } else {
      logger.debug({ kind: result.error.kind, direction }, "codec call failed");
      io.stderr(`Error: ${result.error.message}\n`);
      status = 1;
    }
  };

  const program = new Command();
  program
    .name("lexicode")
    .description("Encode text as words and decode it back")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (chunk) => io.stdout(chunk),
      writeErr: (chunk) => io.stderr(chunk),
    });

  for (const direction of ["encode", "decode"] as const) {
    program
      .command(direction)
      .description(
        direction === "encode"
          ? "Encode text as a string of words"
          : "Decode a string of words back to text"
      )
      .argument("<text...>", direction === "encode" ? "Text to encode" : "Encoded string")
      .option("-t, --table <path>", "Table file")
      .option("-w, --bit-width <n>", "Bits per token", parseBitWidth)
      .option("--no-envelope", "Do not add or strip the table's envelope")
      .action((words: string[], options: CodecCommandOptions) => {
        execute(direction, words, options);
      });
  }

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return status;
}

function transform(
  direction: Direction,
  text: string,
  options: CodecCommandOptions,
  settings: EnvVars,
  logger: Logger
): CodecResult<string> {
  const tablePath = options.table ?? settings.LEXICODE_TABLE;
  return attempt(() => {
    const config = tablePath === undefined ? loadTableConfig() : loadTableConfig(tablePath);
    const codec = createCodec(config, {
      bitWidth: options.bitWidth ?? settings.LEXICODE_BIT_WIDTH,
      envelope: options.envelope,
    });
    logger.debug(
      { table: tablePath ?? "default", bitWidth: config.bitWidth },
      "symbol table loaded"
    );
    return direction === "encode" ? codec.encode(text) : codec.decode(text);
  });
}
