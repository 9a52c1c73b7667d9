import * as v from "valibot";

import { logFormatSchema, logLevelSchema } from "../logger/schema";

export const envSchema = v.object({
  // Runtime
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "production"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),
  LOG_FORMAT: v.optional(v.pipe(v.string(), logFormatSchema)),
});

export type Env = v.InferOutput<typeof envSchema>;
