import type { z } from 'zod';
import { PushApiError } from './errors';

export function parseBody<T extends z.ZodTypeAny>(
  operation: string,
  body: string,
  schema: T
): z.output<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new PushApiError(operation, 'malformed response body', { cause: error, body });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PushApiError(operation, `unexpected response shape: ${issues}`, {
      cause: parsed.error,
      body
    });
  }
  return parsed.data;
}
