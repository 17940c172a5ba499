import type { AppError } from './base.js';
import { createError } from './base.js';

export type EnvironmentError = AppError;

export const EnvironmentErrors = {
  NOT_FOUND: (environmentId: string) =>
    createError('ENVIRONMENT_NOT_FOUND', `Environment ${environmentId} not found`, 404, {
      environmentId,
    }),
  INVALID_ACTION: (identity: string, state: string, action: string) =>
    createError(
      'ENVIRONMENT_INVALID_ACTION',
      `Cannot ${action} environment "${identity}" while it is ${state}`,
      409,
      { identity, state, action }
    ),
  INVALID_TRANSITION: (state: string, event: string) =>
    createError(
      'ENVIRONMENT_INVALID_TRANSITION',
      `No transition from ${state} on ${event}`,
      409,
      { state, event }
    ),
  MANIFEST_INVALID: (identity: string, reason: string) =>
    createError('MANIFEST_INVALID', `Cannot build manifests for "${identity}": ${reason}`, 400, {
      identity,
      reason,
    }),
  PARTIAL_PROVISIONING_FAILURE: (
    identity: string,
    failedStep: string,
    cause: AppError,
    rolledBack: string[],
    rollbackFailures: string[]
  ) =>
    createError(
      'PARTIAL_PROVISIONING_FAILURE',
      `Provisioning "${identity}" failed at ${failedStep}: ${cause.message}`,
      cause.status,
      { identity, failedStep, cause, rolledBack, rollbackFailures }
    ),
  PROVISIONING_TIMEOUT: (identity: string, timeoutMs: number) =>
    createError(
      'PROVISIONING_TIMEOUT',
      `Environment "${identity}" did not become ready within ${timeoutMs}ms`,
      504,
      { identity, timeoutMs }
    ),
  DELETION_FAILED: (identity: string, failures: string[], cause: AppError) =>
    createError(
      'DELETION_FAILED',
      `Failed to delete ${failures.length} resource(s) of "${identity}"`,
      502,
      { identity, failures, cause }
    ),
} as const;
