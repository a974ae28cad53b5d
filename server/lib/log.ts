import { errorMessage } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function log(message: string, source = "express", level: LogLevel = "info") {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  const line = `${formattedTime} [${source}] ${message}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

function withCause(message: string, error?: unknown): string {
  return error === undefined ? message : `${message}: ${errorMessage(error)}`;
}

export function createLogger(source: string): Logger {
  return {
    debug: (message) => log(message, source, "debug"),
    info: (message) => log(message, source, "info"),
    warn: (message, error) => log(withCause(message, error), source, "warn"),
    error: (message, error) => log(withCause(message, error), source, "error"),
  };
}
