// Tagged console logger: "[tag] message". Level is process-wide and set once from config.

import type { LogLevel } from "../config/schema";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(msg: string, ...meta: unknown[]): void;
  info(msg: string, ...meta: unknown[]): void;
  warn(msg: string, ...meta: unknown[]): void;
  error(msg: string, ...meta: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const enabled = (level: LogLevel) => ORDER[level] >= ORDER[threshold];
  return {
    debug: (msg, ...meta) => { if (enabled("debug")) console.debug(prefix, msg, ...meta); },
    info: (msg, ...meta) => { if (enabled("info")) console.log(prefix, msg, ...meta); },
    warn: (msg, ...meta) => { if (enabled("warn")) console.warn(prefix, msg, ...meta); },
    error: (msg, ...meta) => { if (enabled("error")) console.error(prefix, msg, ...meta); },
  };
}
