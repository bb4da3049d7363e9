import { config } from "../config.js";

type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: unknown): void;
  info(message: string, fields?: unknown): void;
  warn(message: string, fields?: unknown): void;
  error(message: string, fields?: unknown): void;
  child(bindings: LogFields): Logger;
}

const LEVEL_WEIGHT: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const REDACT_KEY_PATTERN = /(password|token|secret|authorization|api[-_]?key|cookie)/i;
const MAX_DEPTH = 6;

const isRecord = (value: unknown): value is LogFields =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const serialize = (value: unknown, depth = 0): unknown => {
  if (depth >= MAX_DEPTH) return "[MAX_DEPTH]";
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((entry) => serialize(entry, depth + 1));
  if (isRecord(value)) {
    const output: LogFields = {};
    for (const [key, entry] of Object.entries(value)) {
      output[key] = REDACT_KEY_PATTERN.test(key) ? "[REDACTED]" : serialize(entry, depth + 1);
    }
    return output;
  }
  return value;
};

// Errors and scalars passed as the second argument land under "detail".
const toFields = (fields: unknown): LogFields => {
  if (fields === undefined) return {};
  const serialized = serialize(fields);
  if (isRecord(serialized) && !(fields instanceof Error)) {
    return serialized;
  }
  return { detail: serialized };
};

const createLogger = (bindings: LogFields): Logger => {
  const write = (level: LogLevel, message: string, fields?: unknown): void => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[config.LOG_LEVEL]) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...bindings,
      ...toFields(fields),
    });

    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (extra) => createLogger({ ...bindings, ...toFields(extra) }),
  };
};

export const logger = createLogger({ service: "application-intake" });
