import type { AppError } from './base.js';
import { createError } from './base.js';

export type AdapterError = AppError;

type ResourceTarget = {
  kind: string;
  namespace: string;
  name: string;
};

const describeTarget = (target: ResourceTarget) =>
  target.kind === 'namespace'
    ? `namespace "${target.name}"`
    : `${target.kind} "${target.namespace}/${target.name}"`;

export const ADAPTER_ERROR_CODES = {
  TRANSIENT: 'ADAPTER_TRANSIENT',
  CONFLICT: 'ADAPTER_CONFLICT',
  NOT_FOUND: 'ADAPTER_NOT_FOUND',
  REJECTED: 'ADAPTER_REJECTED',
} as const;

/**
 * Cluster adapter failures.
 * Only TRANSIENT is retried by the lifecycle manager; the others are definitive.
 */
export const AdapterErrors = {
  TRANSIENT: (target: ResourceTarget, reason: string) =>
    createError(
      ADAPTER_ERROR_CODES.TRANSIENT,
      `Transient failure on ${describeTarget(target)}: ${reason}`,
      503,
      { ...target, reason }
    ),
  CONFLICT: (target: ResourceTarget) =>
    createError(ADAPTER_ERROR_CODES.CONFLICT, `${describeTarget(target)} already exists`, 409, {
      ...target,
    }),
  NOT_FOUND: (target: ResourceTarget) =>
    createError(ADAPTER_ERROR_CODES.NOT_FOUND, `${describeTarget(target)} not found`, 404, {
      ...target,
    }),
  REJECTED: (target: ResourceTarget, reason: string) =>
    createError(
      ADAPTER_ERROR_CODES.REJECTED,
      `Cluster rejected ${describeTarget(target)}: ${reason}`,
      422,
      { ...target, reason }
    ),
  TIMEOUT: (target: ResourceTarget, timeoutMs: number) =>
    createError(
      ADAPTER_ERROR_CODES.TRANSIENT,
      `Call on ${describeTarget(target)} timed out after ${timeoutMs}ms`,
      504,
      { ...target, reason: 'timeout', timeoutMs }
    ),
} as const;

export const isTransientError = (error: AppError): boolean =>
  error.code === ADAPTER_ERROR_CODES.TRANSIENT;

export const isNotFoundError = (error: AppError): boolean =>
  error.code === ADAPTER_ERROR_CODES.NOT_FOUND;
