/**
 * Friendly Errors
 *
 * Parse YAML or JSON and validate with Zod, returning human-readable errors
 * instead of throwing. Used for registry-sync.yaml, MLmodel manifests and
 * webhook payloads.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, SyncConfigSchema, "registry-sync.yaml");
 * if (!result.success) {
 *   logger.error(result.error.message, { details: result.error.details });
 *   return;
 * }
 * const config = result.data;
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

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only; the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

function validate<Output, Input>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  label: string,
  fileContext: string
): ParseResult<Output> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid ${label}${fileContext}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return validate(raw, schema, "configuration", fileContext);
}

/**
 * Parse a JSON document (e.g. a webhook body) and validate against a Zod schema.
 */
export function safeParseJson<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  label = "payload"
): ParseResult<Output> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "json",
        message: `Invalid JSON ${label}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return validate(raw, schema, label, "");
}
