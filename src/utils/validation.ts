import { ZodType, ZodTypeDef, z } from 'zod';
import { ApiError } from './ApiError';

export const isoDate = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must be formatted YYYY-MM-DD');

export const reportFormat = z.enum(['json', 'csv']).default('json');

/**
 * Parses one part of a request (body, query or params) and returns the typed
 * result, or throws a 400 listing every issue.
 */
export const parseRequest = <T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const errorMessage =
      result.error.issues
        .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join(', ') || 'Validation failed';
    throw ApiError.badRequest(errorMessage);
  }
  return result.data;
};
