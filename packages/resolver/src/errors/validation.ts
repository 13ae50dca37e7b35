/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that convert failures into resolver errors
 * carrying the argument (or option) that failed.
 *
 * @example
 * ```typescript
 * const window = validateArgument(pageSchema, argument.value, "page");
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import {
  ArgumentError,
  ConfigurationError,
  type ValidationIssue,
} from "./index";

// ============================================================
// Validation Functions
// ============================================================

/**
 * Converts Zod issues to ValidationIssue format.
 */
function zodIssuesToValidationIssues(
  error: ZodError,
  keyNames?: ReadonlyMap<string, string>,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path
      .map((segment, index) => {
        const name = String(segment);
        return index === 0 ? (keyNames?.get(name) ?? name) : name;
      })
      .join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates the value of a reserved request argument.
 *
 * `keyNames` maps schema keys to the sub-key names the caller used, when
 * the value was re-keyed before validation.
 *
 * @throws ArgumentError naming the first invalid sub-key, if any
 */
export function validateArgument<T>(
  schema: ZodType<T>,
  value: unknown,
  argument: string,
  keyNames?: ReadonlyMap<string, string>,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error, keyNames);
  const firstKey = result.error.issues[0]?.path[0];
  const key =
    firstKey === undefined ? undefined : (
      (keyNames?.get(String(firstKey)) ?? String(firstKey))
    );
  const location = key === undefined ? argument : `${argument}.${key}`;

  throw new ArgumentError(
    `Invalid argument "${location}": ${issues[0]?.message ?? "invalid value"}`,
    {
      argument,
      ...(key !== undefined && { key }),
      issues,
    },
    { cause: result.error },
  );
}

/**
 * Validates resolver or backend options.
 *
 * @throws ConfigurationError listing every issue
 */
export function validateOptions<T>(
  schema: ZodType<T>,
  value: unknown,
  subject: string,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);

  throw new ConfigurationError(
    `Invalid ${subject}: ${issues
      .map((issue) =>
        issue.path === "" ? issue.message : `${issue.path}: ${issue.message}`,
      )
      .join("; ")}`,
    { issues },
    { cause: result.error },
  );
}
