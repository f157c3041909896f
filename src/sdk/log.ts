/**
 * Leveled diagnostic logger.
 *
 * Lines go to a sink (stderr by default) as `[wsbridge] LEVEL message`.
 * Colour is applied only when the sink is a TTY.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Options for constructing a logger. */
export interface LoggerOptions {
  /** Minimum level written. Default: `warn`. */
  level?: LogLevel;
  /** Receives each formatted line, newline included. Default: stderr. */
  write?: (line: string) => void;
  /** Colourise the level tag. Default: whether stderr is a TTY. */
  color?: boolean;
}

const PAINT: Record<Exclude<LogLevel, "silent">, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(opts.level ?? "warn");
  const write = opts.write ?? ((line: string) => void process.stderr.write(line));
  const color = opts.color ?? (opts.write === undefined && process.stderr.isTTY === true);

  const emit = (level: Exclude<LogLevel, "silent">, message: string) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const tag = level.toUpperCase();
    write(`[wsbridge] ${color ? PAINT[level](tag) : tag} ${message}\n`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });
