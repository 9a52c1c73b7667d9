import { parseConfig } from "../errors";
import { type Env, envSchema } from "./schema";

/**
 * Validate `source` (process.env by default) against the environment schema.
 * Throws ConfigError listing every invalid variable.
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env =>
  parseConfig(envSchema, source, "Invalid environment");

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export const resetEnvCache = (): void => {
  cachedEnv = undefined;
};

export type { Env } from "./schema";
