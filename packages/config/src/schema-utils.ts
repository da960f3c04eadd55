/**
 * Zod Schema Utilities
 *
 * Shared validation helpers for consistent error formatting across packages.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Format zod issues as `path: message` lines
 *
 * @example
 * ```typescript
 * formatZodIssues(error); // ['github.timeoutMs: Expected number, received string']
 * ```
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Create a type-safe validator function from a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @returns Safe validation function with success/error union type
 *
 * @example
 * ```typescript
 * const result = safeValidateServerConfig(data);
 * if (result.success) {
 *   console.log(result.data.github.apiBase);
 * } else {
 *   console.error(result.errors.join('\n'));
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown):
    | { success: true; data: z.infer<T> }
    | { success: false; errors: string[] } {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    return { success: false, errors: formatZodIssues(result.error) };
  };
}

/**
 * Create a strict validator function from a Zod schema
 *
 * Throws the ZodError on validation failure.
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.infer<T> {
    return schema.parse(data);
  };
}
