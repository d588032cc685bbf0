import { z } from 'zod';
import { ValidationError, type ValidationIssue } from './errors.js';

export type RequestSource = 'query' | 'params' | 'body';

export const emailQuerySchema = z.object({
  email: z
    .string({ required_error: 'Field required', invalid_type_error: 'Expected a single string' })
    .min(1, 'Field required')
});

/**
 * Parses one part of a request against a schema.
 * Throws a ValidationError (422) listing every issue, located by request part and field.
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown, source: RequestSource): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const issues: ValidationIssue[] = parsed.error.issues.map(issue => ({
    loc: [source, ...issue.path],
    msg: issue.message,
    type: issue.code
  }));
  throw new ValidationError(issues);
}
