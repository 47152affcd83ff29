// src/models/validation.ts
import { z, ZodError } from 'zod';
import { ValidationError } from '../lib/errors';

export interface FieldIssue {
  loc: (string | number)[];
  msg: string;
}

export type ValidationFailure =
  // Body is not the expected shape (missing field, wrong type) -> 422
  | { kind: 'invalid-shape'; issues: FieldIssue[] }
  // Body is well-formed but a required field is blank -> 400
  | { kind: 'blank-field'; error: ValidationError };

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; failure: ValidationFailure };

export const formatIssues = (error: ZodError): FieldIssue[] =>
  error.issues.map((issue) => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
  }));

export const parseShape = <T extends z.ZodTypeAny>(schema: T, body: unknown): ValidationResult<z.infer<T>> => {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, failure: { kind: 'invalid-shape', issues: formatIssues(parsed.error) } };
  }
  return { ok: true, value: parsed.data };
};

export const blankField = (message: string): ValidationResult<never> => ({
  ok: false,
  failure: { kind: 'blank-field', error: new ValidationError(message) },
});
