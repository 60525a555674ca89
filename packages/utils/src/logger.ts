/**
 * Levelled logger.
 *
 * The level comes from `logger.setLevel()` when the app has loaded its config,
 * otherwise from the `LOG_LEVEL` environment variable.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
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

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVEL_COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.DEBUG]: "\x1b[32m",
  [LogLevel.LOG]: null,
};

const RESET = "\x1b[0m";

let levelOverride: LogLevel | null = null;
let sink: LogSink | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return (Object.values(LogLevel) as string[]).includes(value);
}

const getCurrentLogLevel = (): LogLevel => {
  if (levelOverride) return levelOverride;

  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  return LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const colorize = (text: string, level: LogLevel): string => {
  const color = LEVEL_COLORS[level];
  return color === null ? text : `${color}${text}${RESET}`;
};

function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value === undefined) return "undefined";
  return JSON.stringify(value);
}

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);
}

function toFields(args: unknown[]): Record<string, string> | undefined {
  // Common case: logger.info("msg", { ...fields })
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = stringifyValue(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringifyValue(first);

  // The fields object is carried in `fields`, not repeated in the message.
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringifyValue).join(" ")}`.trim();
}

/**
 * Render a record as a single line: `[ts] [LEVEL] message key=value ...`
 */
export function formatLogRecord(record: LogRecord, options: { color: boolean }): string {
  const header = `[${new Date(record.tsMs).toISOString()}] [${record.level}]`;
  const fields =
    record.fields ?
      Object.entries(record.fields)
        .map(([k, v]) => `${k}=${v}`)
        .join(" ")
    : "";
  const body = fields ? `${record.message} ${fields}` : record.message;
  return `${options.color ? colorize(header, record.level) : header} ${body}`;
}

function emit(level: LogLevel, args: unknown[], consoleFn: (...a: unknown[]) => void): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    message: toMessage(args),
    fields: toFields(args),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  consoleFn(formatLogRecord(record, { color: process.env.NO_COLOR === undefined }));
}

export const logger = {
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, args, console.log);
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, args, console.info);
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, args, console.log);
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, args, console.warn);
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, args, console.error);
  },
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Pin the level (e.g. from validated config). `null` falls back to `LOG_LEVEL`.
   */
  setLevel: (level: LogLevel | null) => {
    levelOverride = level;
  },
  /**
   * Route every record to a custom sink instead of the console.
   * The console app uses this so log lines share its output serialization.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  clearSink: () => {
    sink = null;
  },
};
