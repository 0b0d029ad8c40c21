export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly runId?: string;
  readonly symbol?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that stamps `bindings` onto every entry. */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  /** Minimum level written; defaults to `LOG_LEVEL` or `info`. */
  readonly level?: LogLevel;
  readonly bindings?: LogMeta;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const resolveLevel = (level?: LogLevel): LogLevel => {
  if (level) {
    return level;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta: LogMeta) => {
  const { runId, symbol, ...rest } = meta;

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...(typeof symbol === "string" ? { symbol } : {}),
    ...rest,
  };
};

const serialize = (entry: Record<string, unknown>): string =>
  JSON.stringify(entry, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  });

/**
 * Creates a JSON-lines logger for a module. `error` goes to stderr, every
 * other level to stdout.
 */
export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const level = resolveLevel(options.level);
  const bindings = options.bindings ?? {};

  const log = (entryLevel: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) {
      return;
    }
    const entry = buildEntry(moduleName, entryLevel, msg, { ...bindings, ...meta });
    writeLine(entryLevel, serialize(entry));
  };

  return {
    module: moduleName,
    level,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => createLogger(moduleName, { level, bindings: { ...bindings, ...extra } }),
  };
};

/** Logger that drops everything; handy as a default dependency. */
export const silentLogger: Logger = {
  module: "silent",
  level: "error",
  log: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
