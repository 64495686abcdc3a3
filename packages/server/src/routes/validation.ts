import type { z } from 'zod';
import { InvalidRequestError } from '../errors.js';

/** Validate request params or query with `schema`, or throw `InvalidRequestError`. */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidRequestError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }
  return result.data;
}
