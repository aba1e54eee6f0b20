import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import winston from "winston";

export type Logger = winston.Logger;

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  /** Append-only log file. Omit to log nowhere (tests). */
  file?: string;
  level?: LogLevel;
  silent?: boolean;
}

// 2024-05-01 09:30:00,123 - INFO - message
const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss,SSS" }),
  winston.format.printf(
    ({ timestamp, level, message }) =>
      `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}`,
  ),
);

const createFileTransport = (file: string) => {
  const filename = resolve(file);
  mkdirSync(dirname(filename), { recursive: true });
  return new winston.transports.File({
    filename,
    options: { flags: "a" },
  });
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const transports = options.file ? [createFileTransport(options.file)] : [];
  return winston.createLogger({
    level: options.level ?? "info",
    format: lineFormat,
    silent: options.silent ?? transports.length === 0,
    transports,
  });
};
