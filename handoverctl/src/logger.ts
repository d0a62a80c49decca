/**
 * Logger factory backed by Winston.
 *
 * Components take a Logger by injection so tests can pass a `vi.fn()` double.
 */

import winston from "winston";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}

export interface LoggerOptions {
  /** Prefix for all log lines. Default: "handover". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

export function createLogger(opts?: LoggerOptions): Logger {
  const prefix = opts?.prefix ?? "handover";

  const winstonLogger = winston.createLogger({
    level: opts?.level ?? "info",
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
      ),
    ),
    // CLI output goes to stdout; keep log lines on stderr.
    transports: [
      new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
