import { z } from 'zod';
import cron from 'node-cron';
import type { Request, Response } from 'express';
import { logger } from './logger';

export const marketSchema = z.enum(['KOSPI', 'KOSDAQ', 'NASDAQ', 'NYSE', 'AMEX']);

export const entitySchema = z.enum(['prices', 'snapshots', 'statements']);
export const reportTypeSchema = z.enum(['annual', 'Q1', 'Q2', 'Q3']);

export const cronExpressionSchema = z
  .string()
  .trim()
  .min(9)
  .refine((expr) => cron.validate(expr), { message: 'Invalid cron expression' });

export const scopeParamSchema = z.object({
  scope: z.string().min(1).max(32).regex(/^[a-z0-9_-]+$/i, 'Scope must be alphanumeric'),
});

export const startSchedulerSchema = z.object({
  cron: cronExpressionSchema.optional(),
});

export const recalculateRatiosSchema = z.object({
  market: marketSchema.optional(),
  limit: z.coerce.number().int().min(1).max(10000).optional(),
});

export const qualityQuerySchema = z.object({
  market: marketSchema.optional(),
  lookbackDays: z.coerce.number().int().min(5).max(3650).default(90),
});

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform((v) => v === true || v === 'true');

export const runBatchOptionsSchema = z.object({
  scope: z.string().min(1),
  incremental: booleanFlag.default(true),
  maxTickers: z.coerce.number().int().min(1).optional(),
  entities: z.array(entitySchema).min(1).optional(),
  reportTypes: z.array(reportTypeSchema).min(1).optional(),
});

export interface FieldIssue {
  field: string;
  message: string;
}

export function describeIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse one part of a request. Sends the 400 response itself and returns
 * null when the input does not match.
 */
export function parseRequest<Out, In>(
  schema: z.ZodType<Out, z.ZodTypeDef, In>,
  source: 'body' | 'query' | 'params',
  req: Request,
  res: Response
): Out | null {
  const input: unknown = source === 'body' ? req.body ?? {} : source === 'query' ? req.query : req.params;
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const errors = describeIssues(result.error);
  logger.warn('Validation', `Request ${source} validation failed`, {
    path: req.path,
    errors,
  });

  res.status(400).json({
    error: 'Validation failed',
    code: 'VALIDATION_ERROR',
    details: errors,
  });
  return null;
}

// Type helpers
export type StartSchedulerBody = z.infer<typeof startSchedulerSchema>;
export type RecalculateRatiosBody = z.infer<typeof recalculateRatiosSchema>;
export type QualityQuery = z.infer<typeof qualityQuerySchema>;
export type RunBatchOptionsInput = z.infer<typeof runBatchOptionsSchema>;
