import type { LogLevel } from "./config";

export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
};

/**
 * Console backed logger that drops messages below `level`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const prefix = options.prefix ?? "[assetweave]";

  const write =
    (level: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (SEVERITY[level] < threshold) return;
      console[level](`${prefix} ${message}`, ...details);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
