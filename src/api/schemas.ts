/**
 * Request schemas for the REST API
 */

import { z } from 'zod';
import { PAGINATION } from '../core/constants.js';
import { ValidationError } from '../errors/index.js';

const limitParam = (max: number, fallback: number) => z.coerce.number().int().min(1).max(max).default(fallback);

export const resultsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: limitParam(PAGINATION.MAX_LIMIT, PAGINATION.RESULTS_DEFAULT_LIMIT)
});

export const predictionsQuerySchema = z.object({
  limit: limitParam(PAGINATION.MAX_LIMIT, PAGINATION.PREDICTIONS_DEFAULT_LIMIT)
});

export const accuracyQuerySchema = z.object({
  limit: limitParam(PAGINATION.ACCURACY_MAX_LIMIT, PAGINATION.ACCURACY_DEFAULT_LIMIT)
});

/** Body of POST /api/scrape and POST /api/accuracy/auto-calculate */
export const optionalGameBodySchema = z.object({
  gameId: z.string().optional()
});

export const calculateAccuracyBodySchema = z.object({
  resultId: z.string().uuid(),
  gameId: z.string()
});

/**
 * Validates request input, converting the first zod issue into a ValidationError
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'body';
    throw new ValidationError(`Invalid ${field}: ${issue?.message ?? 'malformed input'}`, field);
  }
  return parsed.data;
}
