/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > INFO > DEBUG > LOG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  log(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  /**
   * Logger that merges `context` into the fields of every record
   */
  child(context: Record<string, unknown>): Logger;
}

// Define log level priority (lower number = higher priority)
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const getTimestamp = () => {
  return new Date().toISOString();
};

export const isLogLevel = (value: string): value is LogLevel => {
  return Object.values<string>(LogLevel).includes(value);
};

let levelOverride: LogLevel | null = null;

const getCurrentLogLevel = (): LogLevel => {
  if (levelOverride) return levelOverride;

  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  // Default is INFO
  return LogLevel.INFO;
};

// Check if a log at the specified level should be output
const shouldLog = (level: LogLevel): boolean => {
  const currentLevel = getCurrentLogLevel();
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLevel];
};

const colorize = (message: string, level: LogLevel): string => {
  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
    [LogLevel.LOG]: null, // No color (standard)
  };

  const reset = "\x1b[0m";
  const color = colors[level];

  if (color === null) {
    return message; // No color for LOG
  }

  return `${color}${message}${reset}`;
};

const formatHeader = (level: LogLevel): string => {
  const timestamp = `[${getTimestamp()}]`;
  const levelTag = `[${level}]`;
  return colorize(`${timestamp} ${levelTag}`, level);
};

let sink: LogSink | null = null;

/**
 * JSON.stringify that renders bigint amounts as decimal strings
 */
export function stringify(value: unknown): string {
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v)) ?? String(value);
}

const isFieldsObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);
};

function toFields(args: unknown[], context: Record<string, unknown>): Record<string, string> | undefined {
  // Common case in this codebase: logger.info("msg", { ...fields })
  const maybeFields = args[1];
  const merged = isFieldsObject(maybeFields) ? { ...context, ...maybeFields } : context;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(merged)) {
    out[k] = typeof v === "string" ? v : stringify(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;

  const head =
    typeof first === "string" ? first
    : first instanceof Error ? first.message
    : stringify(first);

  if (rest.length === 0) return head;

  // Avoid duplicating the common fields object in the message; store it in `fields`.
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;

  if (tail.length === 0) return head;

  return `${head} ${tail
    .map(a =>
      typeof a === "string" ? a
      : a instanceof Error ? a.message
      : stringify(a),
    )
    .join(" ")}`.trim();
}

function emit(
  level: LogLevel,
  args: unknown[],
  context: Record<string, unknown>,
  consoleFn: (...a: unknown[]) => void,
): void {
  if (!shouldLog(level)) return;

  const fields = toFields(args, context);
  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    message: toMessage(args),
    fields,
  };

  if (sink) {
    sink.write(record);
    return;
  }

  const header = formatHeader(level);
  if (fields) {
    consoleFn(header, record.message, fields);
  } else {
    consoleFn(header, record.message);
  }
}

function createLogger(context: Record<string, unknown>): Logger {
  return {
    log: (...args: unknown[]) => {
      emit(LogLevel.LOG, args, context, console.log);
    },
    info: (...args: unknown[]) => {
      emit(LogLevel.INFO, args, context, console.info);
    },
    debug: (...args: unknown[]) => {
      emit(LogLevel.DEBUG, args, context, console.log);
    },
    warn: (...args: unknown[]) => {
      emit(LogLevel.WARN, args, context, console.warn);
    },
    error: (...args: unknown[]) => {
      emit(LogLevel.ERROR, args, context, console.error);
    },
    child: (extra: Record<string, unknown>) => createLogger({ ...context, ...extra }),
  };
}

export const logger = {
  ...createLogger({}),
  /**
   * Get the currently set log level
   */
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  /**
   * Get list of available log levels
   */
  getLevels: () => Object.values(LogLevel),
  /**
   * Pin the level regardless of `LOG_LEVEL` (null restores the env lookup)
   */
  setLevel: (level: LogLevel | null) => {
    levelOverride = level;
  },
  /**
   * Route logs to a custom sink instead of the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};
