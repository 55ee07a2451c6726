export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(context: LogContext, message: string): void;
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\u001b[36m",
  info: "\u001b[32m",
  warn: "\u001b[33m",
  error: "\u001b[31m"
};

const COLOR_RESET = "\u001b[0m";
const CIRCULAR_REFERENCE = "[Circular]";
const UNSERIALIZABLE_ARRAY = "[Unserializable Array]";
const UNSERIALIZABLE_OBJECT = "[Unserializable Object]";

export const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  return undefined;
};

// LOG_LEVEL is read on every call so tests can flip it per case.
const resolveMinimumLevel = (): LogLevel | null => {
  const explicitLevel = parseLogLevel(process.env.LOG_LEVEL);
  if (explicitLevel) {
    return explicitLevel;
  }

  if (process.env.NODE_ENV === "test") {
    return null;
  }

  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

const shouldLog = (level: LogLevel): boolean => {
  const minimumLevel = resolveMinimumLevel();
  if (!minimumLevel) {
    return false;
  }

  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minimumLevel];
};

const serializeValue = (
  value: unknown,
  visited: WeakSet<object> = new WeakSet()
): unknown => {
  if (typeof value === "bigint") {
    return value.toString();
  }

  if (value instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    if ("code" in value && typeof value.code === "string") {
      serialized.code = value.code;
    }
    return serialized;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (Array.isArray(value)) {
    if (visited.has(value)) {
      return CIRCULAR_REFERENCE;
    }

    visited.add(value);
    try {
      return value.map((item) => serializeValue(item, visited));
    } catch {
      return UNSERIALIZABLE_ARRAY;
    } finally {
      visited.delete(value);
    }
  }

  if (value && typeof value === "object") {
    if (visited.has(value)) {
      return CIRCULAR_REFERENCE;
    }

    visited.add(value);
    try {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, serializeValue(item, visited)])
      );
    } catch {
      return UNSERIALIZABLE_OBJECT;
    } finally {
      visited.delete(value);
    }
  }

  return value;
};

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
} & LogContext;

const buildEntry = (level: LogLevel, context: LogContext, message: string): LogEntry => {
  const serializedContext = Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, serializeValue(value)])
  );

  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...serializedContext
  };
};

const renderPretty = (entry: LogEntry): string => {
  const { timestamp, level, message, ...context } = entry;
  const scope = typeof context.scope === "string" ? `[${context.scope}] ` : "";
  const { scope: _scope, ...rest } = context;
  const contextSuffix = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  return `${timestamp} ${LEVEL_COLORS[level]}${level.toUpperCase()}${COLOR_RESET} ${scope}${message}${contextSuffix}`;
};

const write = (entry: LogEntry): void => {
  const rendered =
    process.env.NODE_ENV === "production" ? JSON.stringify(entry) : renderPretty(entry);

  switch (entry.level) {
    case "error":
      console.error(rendered);
      return;
    case "warn":
      console.warn(rendered);
      return;
    default:
      console.log(rendered);
  }
};

const log = (level: LogLevel, context: LogContext, message: string): void => {
  if (!shouldLog(level)) {
    return;
  }

  write(buildEntry(level, context, message));
};

const bindContext = (bound: LogContext): Logger => ({
  debug(context, message) {
    log("debug", { ...bound, ...context }, message);
  },
  info(context, message) {
    log("info", { ...bound, ...context }, message);
  },
  warn(context, message) {
    log("warn", { ...bound, ...context }, message);
  },
  error(context, message) {
    log("error", { ...bound, ...context }, message);
  }
});

export const logger: Logger = bindContext({});

/**
 * Logger that stamps every entry with `scope`, e.g. `analytics.cache`.
 * Per-call context wins over the bound fields.
 */
export const createScopedLogger = (scope: string, context: LogContext = {}): Logger =>
  bindContext({ scope, ...context });
