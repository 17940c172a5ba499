export interface AppError {
  code: string;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

export const createError = (
  code: string,
  message: string,
  status: number,
  details?: Record<string, unknown>
): AppError => ({
  code,
  message,
  status,
  details,
});

export const isAppError = (value: unknown): value is AppError =>
  typeof value === 'object' &&
  value !== null &&
  'code' in value &&
  typeof value.code === 'string' &&
  'message' in value &&
  typeof value.message === 'string' &&
  'status' in value &&
  typeof value.status === 'number';

/**
 * Returns a copy of the error with extra detail fields merged in.
 * Existing keys are kept unless overwritten by `extra`.
 */
export const withDetails = <E extends AppError>(error: E, extra: Record<string, unknown>): E => ({
  ...error,
  details: { ...error.details, ...extra },
});

/**
 * Converts anything thrown into an AppError so it can travel through a Result.
 */
export const toAppError = (value: unknown, code = 'INTERNAL_ERROR'): AppError => {
  if (isAppError(value)) {
    return value;
  }
  const message = value instanceof Error ? value.message : String(value);
  return createError(code, message, 500);
};
