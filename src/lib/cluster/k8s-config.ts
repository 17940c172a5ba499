import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { KubeConfig } from '@kubernetes/client-node';
import type { K8sConfigError } from '../errors/k8s-errors.js';
import { K8sConfigErrors } from '../errors/k8s-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

/**
 * Labels stamped on every object the orchestrator creates.
 * Listing uses the managed label as its selector.
 */
export const MANAGED_SELECTOR = 'sandbox-orchestrator.io/managed=true';

export interface K8sConnectionOptions {
  /** Path to kubeconfig file (overrides auto-discovery) */
  kubeconfigPath?: string;
  /** Kubernetes context to use (defaults to current-context) */
  context?: string;
}

type Env = Record<string, string | undefined>;

const loadFrom = (kc: KubeConfig, path: string): Result<KubeConfig, K8sConfigError> => {
  try {
    kc.loadFromFile(path);
    return ok(kc);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(K8sConfigErrors.KUBECONFIG_INVALID(message));
  }
};

/**
 * Discover and load kubeconfig using a tiered approach:
 * 1. Explicit path
 * 2. K8S_KUBECONFIG env var
 * 3. KUBECONFIG env var (first existing entry)
 * 4. ~/.kube/config
 * 5. In-cluster service account (when KUBERNETES_SERVICE_HOST is set)
 */
export function loadKubeConfig(
  explicitPath?: string,
  env: Env = process.env
): Result<KubeConfig, K8sConfigError> {
  const kc = new KubeConfig();

  if (explicitPath) {
    if (!existsSync(explicitPath)) {
      return err(K8sConfigErrors.KUBECONFIG_NOT_FOUND(explicitPath));
    }
    return loadFrom(kc, explicitPath);
  }

  const k8sKubeconfigEnv = env.K8S_KUBECONFIG;
  if (k8sKubeconfigEnv) {
    if (!existsSync(k8sKubeconfigEnv)) {
      return err(K8sConfigErrors.KUBECONFIG_NOT_FOUND(k8sKubeconfigEnv));
    }
    return loadFrom(kc, k8sKubeconfigEnv);
  }

  const existingPath = env.KUBECONFIG?.split(':')
    .filter(Boolean)
    .find((path) => existsSync(path));
  if (existingPath) {
    return loadFrom(kc, existingPath);
  }

  const defaultPath = join(homedir(), '.kube', 'config');
  if (existsSync(defaultPath)) {
    return loadFrom(kc, defaultPath);
  }

  if (!env.KUBERNETES_SERVICE_HOST) {
    return err(K8sConfigErrors.KUBECONFIG_NOT_FOUND());
  }
  try {
    kc.loadFromCluster();
    return ok(kc);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(K8sConfigErrors.KUBECONFIG_INVALID(`in-cluster config unavailable: ${message}`));
  }
}

/** Switches to `requestedContext` when given, otherwise keeps the current one. */
export function resolveContext(
  kc: KubeConfig,
  requestedContext?: string
): Result<string, K8sConfigError> {
  if (requestedContext) {
    const available = kc.getContexts().map((context) => context.name);
    if (!available.includes(requestedContext)) {
      return err(K8sConfigErrors.CONTEXT_NOT_FOUND(requestedContext, available));
    }
    kc.setCurrentContext(requestedContext);
    return ok(requestedContext);
  }

  const currentContext = kc.getCurrentContext();
  if (!currentContext) {
    return err(K8sConfigErrors.KUBECONFIG_INVALID('No current context set in kubeconfig'));
  }
  return ok(currentContext);
}

export function getClusterInfo(kc: KubeConfig): { name: string; server: string } | null {
  const context = kc.getContextObject(kc.getCurrentContext());
  if (!context?.cluster) {
    return null;
  }

  const cluster = kc.getCluster(context.cluster);
  return cluster ? { name: context.cluster, server: cluster.server } : null;
}

export function connect(options: K8sConnectionOptions = {}): Result<KubeConfig, K8sConfigError> {
  const loaded = loadKubeConfig(options.kubeconfigPath);
  if (!loaded.ok) {
    return loaded;
  }
  const context = resolveContext(loaded.value, options.context);
  return context.ok ? loaded : context;
}
