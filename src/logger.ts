/**
 * Prefixed console logging: "[SIU] Parsed 3 messages".
 *
 * Everything goes to stderr so stdout stays reserved for JSON records.
 * Level comes from SIU_LOG_LEVEL (debug | info | warn | error | silent),
 * read on every call; default is warn.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LEVEL: LogLevel = "warn";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function currentLogLevel(): LogLevel {
  const configured = process.env.SIU_LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : DEFAULT_LEVEL;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
}

export function createLogger(prefix: string): Logger {
  const write = (level: LogLevel, message: string, error?: unknown): void => {
    if (!enabled(level)) return;
    if (error === undefined) {
      console.error(`[${prefix}] ${message}`);
    } else {
      console.error(`[${prefix}] ${message}`, error);
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) => write("error", message, error),
  };
}
