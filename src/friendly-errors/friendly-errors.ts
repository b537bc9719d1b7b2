/**
 * Friendly Errors
 *
 * Parse YAML or JSON and validate it against a Zod schema, returning
 * human-readable errors instead of throwing.
 *
 * Used for the air-fetch.yaml config file and for registry responses.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, ConfigFileSchema, "air-fetch.yaml");
 * if (!result.success) {
 *   formatFriendlyError(result.error).forEach((line) => console.error(line));
 *   process.exit(1);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "json" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type FriendlyResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only; the rest is a code frame
  return error.message.split("\n")[0] ?? error.message;
}

function validate<Output, Input>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  message: string
): FriendlyResult<Output> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: { type: "validation", message, details: formatZodIssues(result.error) },
    };
  }
  return { success: true, data: result.data };
}

/**
 * Parse YAML content and validate against a Zod schema.
 * An empty document validates as an empty object.
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): FriendlyResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (err) {
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Invalid YAML syntax${fileContext}`,
        details: [err instanceof YAMLParseError ? formatYamlError(err) : String(err)],
      },
    };
  }

  return validate(raw, schema, `Invalid configuration${fileContext}`);
}

/**
 * Parse a JSON body and validate against a Zod schema.
 */
export function safeParseJson<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  context: string
): FriendlyResult<Output> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "json",
        message: `Invalid JSON in ${context}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return validate(raw, schema, `Unexpected ${context} shape`);
}

/**
 * Flatten a FriendlyError into printable lines
 */
export function formatFriendlyError(error: FriendlyError): string[] {
  return [error.message, ...(error.details ?? []).map((detail) => `  ${detail}`)];
}
