export type TrailLogLevel = "debug" | "info" | "warn" | "error";

export const TRAIL_LOG_LEVELS: ReadonlyArray<TrailLogLevel> = ["debug", "info", "warn", "error"];

export interface TrailLogEntry {
  readonly timestamp: string;
  readonly level: TrailLogLevel;
  readonly message: string;
  readonly [field: string]: unknown;
}

/** Receives every entry at or above the logger's level. Defaults to one JSON line on the console. */
export type TrailLogSink = (entry: TrailLogEntry) => void;

export interface TrailLoggerOptions {
  readonly name?: string;
  readonly level?: TrailLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly sink?: TrailLogSink;
}

export interface TrailLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): TrailLogger;
}

const LOG_LEVEL_PRIORITY: Record<TrailLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isTrailLogLevel = (value: unknown): value is TrailLogLevel =>
  typeof value === "string" && Object.hasOwn(LOG_LEVEL_PRIORITY, value);

export const consoleSink: TrailLogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createTrailLogger = (options: TrailLoggerOptions = {}): TrailLogger => {
  const name = options.name ?? "actiontrail";
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const createInstance = (contextFields: Record<string, unknown>): TrailLogger => {
    const write = (level: TrailLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[level] < threshold) {
        return;
      }

      sink({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...contextFields,
        ...context,
      });
    };

    return {
      debug(message, context) {
        write("debug", message, context);
      },
      info(message, context) {
        write("info", message, context);
      },
      warn(message, context) {
        write("warn", message, context);
      },
      error(message, context) {
        write("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies TrailLogger;
  };

  return createInstance(baseFields);
};

/** Logger that records entries in memory; used by tests and embedders that forward logs elsewhere. */
export const createRecordingLogger = (
  options: Omit<TrailLoggerOptions, "sink"> = {},
): { readonly logger: TrailLogger; readonly entries: TrailLogEntry[] } => {
  const entries: TrailLogEntry[] = [];
  const logger = createTrailLogger({ level: "debug", ...options, sink: (entry) => entries.push(entry) });
  return { logger, entries };
};
