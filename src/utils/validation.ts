import { z, ZodError, type ZodTypeAny } from 'zod';
import { AppError } from './AppError';

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Flattens zod issues into field/message pairs, e.g. `items.0.amount`
 */
export const toFieldIssues = (error: ZodError): FieldIssue[] =>
  error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Parses input against a schema, throwing a ValidationError that lists
 * every failing field.
 */
export function validateInput<T extends ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    throw AppError.validation(
      `Validation failed: ${JSON.stringify(toFieldIssues(parsed.error))}`
    );
  }

  return parsed.data;
}
