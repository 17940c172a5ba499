import type { AppError } from './base.js';
import { createError } from './base.js';

export type K8sConfigError = AppError;

export const K8sConfigErrors = {
  KUBECONFIG_NOT_FOUND: (path?: string) =>
    createError(
      'KUBECONFIG_NOT_FOUND',
      path ? `Kubeconfig not found at ${path}` : 'No kubeconfig found and not running in-cluster',
      500,
      { path }
    ),
  KUBECONFIG_INVALID: (reason: string) =>
    createError('KUBECONFIG_INVALID', `Invalid kubeconfig: ${reason}`, 500, { reason }),
  CONTEXT_NOT_FOUND: (context: string, available: string[]) =>
    createError('CONTEXT_NOT_FOUND', `Kubernetes context "${context}" not found`, 500, {
      context,
      available,
    }),
} as const;
