import type { ZodIssue } from 'zod';
import { createError } from './base.js';

type ValidationIssue = Pick<ZodIssue, 'path' | 'message'>;

export const ValidationErrors = {
  /** Request failed schema validation; `identity` names the environment when known. */
  VALIDATION_ERROR: (issues: ValidationIssue[], identity?: string) =>
    createError('VALIDATION_ERROR', 'Validation failed', 400, {
      identity,
      errors: issues.map(({ path, message }) => ({ path: path.join('.'), message })),
    }),
} as const;

export type ValidationError = ReturnType<typeof ValidationErrors.VALIDATION_ERROR>;
