import type { ZodIssue } from 'zod';
import { createError } from './base.js';

export const BatchErrors = {
  TOO_LARGE: (requested: number, ceiling: number) =>
    createError(
      'BATCH_TOO_LARGE',
      `Batch of ${requested} items exceeds the ceiling of ${ceiling}`,
      413,
      { requested, ceiling }
    ),
  INVALID: (issues: Pick<ZodIssue, 'path' | 'message'>[]) =>
    createError('BATCH_INVALID', 'Batch parameters are invalid', 400, {
      errors: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    }),
} as const;

export type BatchError =
  | ReturnType<typeof BatchErrors.TOO_LARGE>
  | ReturnType<typeof BatchErrors.INVALID>;
