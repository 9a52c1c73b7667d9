import { getEnv } from "./env/env";
import type { LogFormat, LogLevel } from "./logger/schema";

export interface AppConfig {
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

/**
 * Build application config from the validated environment.
 * Development defaults to debug-level pretty logs, everything else to warn-level JSON.
 */
export const loadConfig = (): AppConfig => {
  const env = getEnv();
  const development = env.NODE_ENV === "development";

  return {
    logging: {
      level: env.LOG_LEVEL ?? (development ? "debug" : "warn"),
      format: env.LOG_FORMAT ?? (development ? "pretty" : "json"),
    },
  };
};
