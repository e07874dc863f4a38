import { ZodError, ZodTypeAny, z } from 'zod';
import { DecodeError } from '../errors';

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse `value` against `schema`, raising a {@link DecodeError} naming `subject` on mismatch.
 */
export function decodeWith<Schema extends ZodTypeAny>(schema: Schema, value: unknown, subject: string): z.output<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodeError(subject, formatIssues(result.error));
  }
  return result.data;
}
