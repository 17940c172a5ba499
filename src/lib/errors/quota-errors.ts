import { createError } from './base.js';

export type QuotaViolation = {
  dimension: string;
  requested: number;
  ceiling: number;
};

export const QuotaErrors = {
  EXCEEDS_CEILING: (violations: QuotaViolation[]) =>
    createError(
      'QUOTA_EXCEEDS_CEILING',
      `Requested quota exceeds the global ceiling for: ${violations
        .map((violation) => violation.dimension)
        .join(', ')}`,
      422,
      { violations }
    ),
  INVALID_VALUE: (dimension: string, value: number) =>
    createError('QUOTA_INVALID_VALUE', `Quota value for ${dimension} must be positive`, 400, {
      dimension,
      value,
    }),
} as const;

export type QuotaError =
  | ReturnType<typeof QuotaErrors.EXCEEDS_CEILING>
  | ReturnType<typeof QuotaErrors.INVALID_VALUE>;
