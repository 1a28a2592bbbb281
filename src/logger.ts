/**
 * Structured logging using Winston.
 * @module logger
 */

import winston from "winston";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel } from "./config.js";

export type Logger = winston.Logger;

/**
 * Logger options.
 */
export interface LoggerOptions {
  /** Minimum level to emit (default: info) */
  level?: LogLevel;
  /** Drop every message, for tests */
  silent?: boolean;
}

const lineFormat = winston.format.printf(
  ({ level, message, timestamp, module, stack, ...data }) => {
    const moduleString = typeof module === "string" ? ` [${module}]` : "";
    const dataString =
      Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    const line = `[${String(timestamp)}] [${level}]${moduleString} ${String(message)}${dataString}`;
    return typeof stack === "string" ? `${line}\n${stack}` : line;
  },
);

/**
 * Create the process logger. All levels go to stderr so stdout stays
 * free for command output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "debug" });
 * const log = logger.child({ module: "http" });
 * log.info("listening", { port: 3000 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? DEFAULT_LOG_LEVEL,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      lineFormat,
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
    exitOnError: false,
  });
}
