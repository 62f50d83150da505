import type { LogLevel } from "./config.js";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SENSITIVE_KEY_PARTS = ["authorization", "token", "key", "secret", "password", "credential"];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lowerKey.includes(part));
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    return redactSensitive(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

// Redact sensitive values from logs
export function redactSensitive(obj: LogMeta): LogMeta {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isSensitiveKey(key) ? "[REDACTED]" : redactValue(value);
  }
  return result;
}

export function createLogger(level: LogLevel = "info", sink: LogSink = console): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (msgLevel: Exclude<LogLevel, "silent">, write: (...args: unknown[]) => void) => {
    return (msg: string, meta?: LogMeta) => {
      if (LEVEL_ORDER[msgLevel] < threshold) return;
      const safeMeta = meta ? redactSensitive(meta) : undefined;
      write(`[${msgLevel.toUpperCase()}] ${msg}`, safeMeta ? JSON.stringify(safeMeta) : "");
    };
  };

  return {
    debug: emit("debug", (...args) => sink.log(...args)),
    info: emit("info", (...args) => sink.log(...args)),
    warn: emit("warn", (...args) => sink.warn(...args)),
    error: emit("error", (...args) => sink.error(...args)),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
