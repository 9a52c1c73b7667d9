/**
 * Configuration error raised when CLI options or environment variables fail
 * validation. Each issue is kept so the status line can list them.
 */

import * as v from "valibot";

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  public override readonly name = "ConfigError";

  constructor(
    message: string,
    public readonly issues: readonly ConfigIssue[] = [],
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

const formatIssuePath = (issue: v.BaseIssue<unknown>): string =>
  issue.path?.map((item) => String(item.key)).join(".") ?? "(root)";

/**
 * Parse `input` with `schema`, converting a ValiError into a ConfigError.
 */
export const parseConfig = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
  context: string,
): v.InferOutput<TSchema> => {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const issues = result.issues.map((issue) => ({
    path: formatIssuePath(issue),
    message: issue.message,
  }));
  const details = issues.map((issue) => `${issue.path}: ${issue.message}`).join(", ");
  throw new ConfigError(`${context}: ${details}`, issues);
};
