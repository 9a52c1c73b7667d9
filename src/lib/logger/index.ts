export { createLogger, formatLog, silentLogger, type Logger, type LoggerConfig } from "./logger";

export type { LogFormat, LogLevel } from "./schema";
export { logFormatSchema, logLevelSchema } from "./schema";
