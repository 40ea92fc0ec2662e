/**
 * API Schemas with Zod validation
 *
 * Request/response shapes for the HTTP surface. Constraint values are
 * validated separately by parseConstraints so the vocabulary rules live in
 * one place.
 */

import { z } from 'zod';
import type { ApiError } from '@travel-search/types';

export interface SearchLimits {
  defaultLimit: number;
  maxLimit: number;
  defaultThreshold: number;
}

export function createSearchRequestSchema(limits: SearchLimits) {
  return z.object({
    query: z.string().trim().min(1, 'Query cannot be empty').max(1000, 'Query too long'),
    constraints: z.record(z.unknown()).optional().default({}),
    limit: z.coerce.number().int().min(1).max(limits.maxLimit).optional().default(limits.defaultLimit),
    threshold: z.coerce.number().min(0).max(1).optional().default(limits.defaultThreshold),
  });
}

export const SourceParamsSchema = z.object({
  source: z.string().trim().min(1, 'Source is required'),
});

export const SearchResultSchema = z.object({
  id: z.string(),
  body: z.string(),
  attributes: z.record(z.unknown()),
  score: z.number().min(0).max(1),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  hard_filter: z.object({ field: z.string(), value: z.string() }).nullable(),
  results: z.array(SearchResultSchema),
  total_results: z.number().int().min(0),
  processing_time: z.number().min(0),
});

export function createErrorResponse(
  error: string,
  message: string,
  statusCode: number = 400,
  details?: Record<string, unknown>
): ApiError {
  return {
    error,
    message,
    statusCode,
    timestamp: new Date().toISOString(),
    ...(details && { details }),
  };
}

export function formatZodError(error: z.ZodError): Record<string, unknown> {
  return { issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) };
}
