export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export type LogTarget = Pick<Console, LogLevel>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level?: LogLevel;
  target?: LogTarget;
}

/**
 * Scoped logger writing `[scope] message` lines to the console (or any
 * console-shaped target). Messages below `level` are dropped.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const target = options.target ?? console;
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  function write(level: LogLevel, message: string, details?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `[${scope}] ${message}`;
    if (details) {
      target[level](line, details);
    } else {
      target[level](line);
    }
  }

  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
