import type { LogLevel } from "../core/types";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(context: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);

const defaultLevel = (): LogLevel => {
  const fromEnv = process.env.WORKFLOW_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Replaces the console; receives the already serialized line. */
  write?: (level: LogLevel, line: string) => void;
  now?: () => Date;
}

const consoleWrite = (level: LogLevel, line: string): void => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else if (level === "debug") {
    console.debug(line);
  } else {
    console.log(line);
  }
};

/**
 * Structured logger: one JSON object per line, prefixed with a context
 * identifier (`engine`, `scheduler`, `actions`, …).
 */
export function createLogger(
  context: string,
  options: LoggerOptions = {},
): Logger {
  const threshold = LEVEL_ORDER[options.level ?? defaultLevel()];
  const write = options.write ?? consoleWrite;
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    write(
      level,
      JSON.stringify({
        level,
        context,
        message,
        ...fields,
        timestamp: now().toISOString(),
      }),
    );
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (childContext) =>
      createLogger(`${context}.${childContext}`, options),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
