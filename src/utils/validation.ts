import { z } from "zod";

/**
 * Flatten zod issues into "path: message" lines
 *
 * @example
 * ```typescript
 * const result = schema.safeParse(body);
 * if (!result.success) {
 *   return failure(ConfigError.validationFailed(formatZodIssues(result.error)));
 * }
 * ```
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}
