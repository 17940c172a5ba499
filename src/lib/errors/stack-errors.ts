import { createError } from './base.js';

export const StackErrors = {
  UNSUPPORTED_STACK: (
    dimension: 'language' | 'version' | 'framework' | 'package' | 'env',
    value: string,
    supported: string[]
  ) =>
    createError('UNSUPPORTED_STACK', `Unsupported ${dimension}: ${value}`, 422, {
      dimension,
      value,
      supported,
    }),
  RECIPE_REJECTED: (reason: string) =>
    createError('RECIPE_REJECTED', `Build recipe rejected: ${reason}`, 422, { reason }),
  IMAGE_BUILD_FAILED: (imageTag: string, reason: string) =>
    createError('IMAGE_BUILD_FAILED', `Failed to build image ${imageTag}: ${reason}`, 502, {
      imageTag,
      reason,
    }),
  MATRIX_INVALID: (reason: string) =>
    createError('STACK_MATRIX_INVALID', `Supported stack matrix is invalid: ${reason}`, 500, {
      reason,
    }),
} as const;

export type StackError =
  | ReturnType<typeof StackErrors.UNSUPPORTED_STACK>
  | ReturnType<typeof StackErrors.RECIPE_REJECTED>
  | ReturnType<typeof StackErrors.IMAGE_BUILD_FAILED>;
