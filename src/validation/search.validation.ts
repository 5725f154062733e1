import { z } from 'zod';
import type { SearchRequest } from '@/types/core';
import { ValidationError } from '@/core/errors';

export const MAX_QUERY_LENGTH = 500;
export const DEFAULT_MAX_RESULTS = 8;

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform((v) => v === true || v === 'true');

/** Body of POST /api/search; wire names are snake_case. */
export const searchRequestSchema = z.object({
  query: z
    .string({ required_error: 'Query is required' })
    .trim()
    .min(1, 'Query cannot be empty')
    .max(MAX_QUERY_LENGTH, `Query must be at most ${MAX_QUERY_LENGTH} characters`),
  max_results: z.coerce
    .number()
    .int('max_results must be an integer')
    .min(1, 'max_results must be at least 1')
    .max(20, 'max_results must be at most 20')
    .default(DEFAULT_MAX_RESULTS),
  include_sources: booleanish.default(true),
});

export type ValidationIssue = { path: string; message: string };

export function validateSearchRequest(data: unknown):
  | { success: true; data: SearchRequest }
  | { success: false; error: ValidationIssue[] } {
  const result = searchRequestSchema.safeParse(data ?? {});

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return {
    success: true,
    data: {
      query: result.data.query,
      maxResults: result.data.max_results,
      includeSources: result.data.include_sources,
    },
  };
}

/** Throwing variant for programmatic callers. */
export function parseSearchRequest(data: unknown): SearchRequest {
  const result = validateSearchRequest(data);
  if (!result.success) {
    throw new ValidationError(result.error.map((e) => `${e.path}: ${e.message}`).join('; '), result.error);
  }
  return result.data;
}
