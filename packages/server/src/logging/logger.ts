import pino, { type Logger } from "pino";
import { type LogLevel, parseLogLevel } from "../config.js";

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

let logger: Logger | null = null;

/**
 * Create the process-wide logger. Called once at startup; later calls
 * replace the instance for subsequent getLogger() callers.
 */
export function initLogger(options: LoggerOptions): Logger {
  logger = options.pretty
    ? pino({
        level: options.level,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
          },
        },
      })
    : pino({ level: options.level });
  return logger;
}

/**
 * Get the process-wide logger, creating a plain JSON logger if
 * initLogger() has not run (tests, library use).
 */
export function getLogger(): Logger {
  if (!logger) {
    // Tests stay quiet unless LOG_LEVEL asks otherwise
    logger = pino({
      level: parseLogLevel(
        process.env.LOG_LEVEL,
        process.env.NODE_ENV === "test" ? "silent" : "info",
      ),
    });
  }
  return logger;
}
