/**
 * Logger
 *
 * Lightweight leveled logger. Silent by default: library callers opt into
 * output by passing a logger built with a non-silent level.
 */

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const noop = (): void => {};

/** A logger that does nothing (default for all library entry points). */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Create a logger instance.
 *
 * @param options.level - Most verbose level that is printed (default "silent").
 * @param options.prefix - Prepended to every message (e.g. "[sway]").
 * @param options.sink - Console-like target, mainly for tests.
 */
export function createLogger(options?: {
  level?: LogLevel;
  prefix?: string;
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}): Logger {
  const { level = "silent", prefix, sink = console } = options ?? {};

  if (level === "silent") {
    return silentLogger;
  }

  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel): boolean => LOG_LEVELS.indexOf(l) <= threshold;

  const formatArgs = (args: unknown[]): unknown[] => {
    if (prefix && args.length > 0 && typeof args[0] === "string") {
      return [`${prefix} ${args[0]}`, ...args.slice(1)];
    }
    if (prefix) {
      return [prefix, ...args];
    }
    return args;
  };

  return {
    debug: enabled("debug") ? (...args) => sink.debug(...formatArgs(args)) : noop,
    info: enabled("info") ? (...args) => sink.info(...formatArgs(args)) : noop,
    warn: enabled("warn") ? (...args) => sink.warn(...formatArgs(args)) : noop,
    error: enabled("error") ? (...args) => sink.error(...formatArgs(args)) : noop,
  };
}

/** Derive a logger whose messages carry an extra prefix. */
export function childLogger(parent: Logger, prefix: string): Logger {
  const tag = (args: unknown[]): unknown[] =>
    args.length > 0 && typeof args[0] === "string"
      ? [`${prefix} ${args[0]}`, ...args.slice(1)]
      : [prefix, ...args];
  if (parent === silentLogger) return silentLogger;
  return {
    debug: (...args) => parent.debug(...tag(args)),
    info: (...args) => parent.info(...tag(args)),
    warn: (...args) => parent.warn(...tag(args)),
    error: (...args) => parent.error(...tag(args)),
  };
}
