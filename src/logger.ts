import { destination, pino, type LevelWithSilent, type Logger } from "pino";

export type LogLevel = LevelWithSilent;

/**
 * Create the shell's logger. Output goes to stderr so it never mixes with
 * encoded or decoded text on stdout.
 */
export function createLogger(level: LogLevel = "warn"): Logger {
  return pino({ name: "lexicode", level }, destination({ dest: 2, sync: true }));
}
