/**
 * Structured logging for the composition pipeline.
 *
 * The core emits named events with flat field records and never depends on the
 * logger for correctness. Callers inject a logger through `GenerationOptions`;
 * the default discards everything.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFieldValue = string | number | boolean | null | undefined | readonly string[];
export type LogFields = Record<string, LogFieldValue>;

export interface CompositionLogger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

export type LogSink = Pick<Console, "log" | "warn" | "error">;

export interface ConsoleLoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  /** Fields merged into every event, such as a request id */
  context?: LogFields;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const noop = (): void => undefined;

export const silentLogger: CompositionLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};

/**
 * Console-backed logger writing one JSON object per line.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): CompositionLogger {
  const threshold = LEVEL_ORDER[options.minLevel ?? "info"];
  const sink = options.sink ?? console;
  const context = options.context ?? {};

  const emit = (level: LogLevel, event: string, fields: LogFields = {}): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = JSON.stringify({ level, event, ...context, ...fields });
    if (level === "error") {
      sink.error(line);
    } else if (level === "warn") {
      sink.warn(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
}
