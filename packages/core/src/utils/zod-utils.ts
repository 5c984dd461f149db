import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { ValidationError } from '../errors/index.js';

/**
 * One line per issue, prefixed with the path of the offending value.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 *
 * @param subject Name of what is validated, used in the error message (e.g. 'ledger')
 * @returns An Ok(T) with the parsed data if successful, otherwise an Err(ValidationError).
 */
export function validateWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  subject: string
): Result<T, ValidationError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issues = formatZodIssues(parsed.error);
  return err(new ValidationError(`Invalid ${subject}: ${issues.join('; ')}`, issues));
}
