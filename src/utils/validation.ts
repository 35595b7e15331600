/**
 * Zod validation helpers
 *
 * @module utils/validation
 */

import { z } from 'zod';

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Render zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => {
    const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
    return `${path}${e.message}`;
  });
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError with every issue joined by `; `
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(issues.join('; '), issues);
  }
  return result.data;
}

/**
 * Positive integer parsed from a CLI option value
 * @throws ValidationError if the value is not a whole number >= 1
 */
export function parsePositiveInt(name: string, value: string): number {
  return validateInput(
    z.coerce.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be an integer`).min(1, `${name} must be >= 1`),
    value
  );
}
