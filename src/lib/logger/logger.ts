import { loadConfig } from "../config";

import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Line sink; stderr by default so stdout only carries the check result. */
  write?: (line: string) => void;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

export const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

const writeToStderr = (line: string): void => {
  console.error(line);
};

export const createLogger = (loggerConfig: LoggerConfig = loadConfig().logging): Logger => {
  const write = loggerConfig.write ?? writeToStderr;

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error) => {
    if (shouldLog(level, loggerConfig.level)) {
      write(formatLog(createLogEntry(level, message, context, error), loggerConfig.format));
    }
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, error, context) => log("error", message, context, error),
  };
};

/** Logger that drops everything; for callers that do not care about diagnostics. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
