import fs from 'node:fs/promises';
import type { AppError } from '../errors/base.js';
import { createError } from '../errors/base.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { orchestratorConfigSchema } from './schemas.js';
import { DEFAULT_ORCHESTRATOR_CONFIG, type OrchestratorConfig } from './types.js';

export type OrchestratorConfigResult = Result<OrchestratorConfig, AppError>;

type Env = Record<string, string | undefined>;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const invalidConfig = (reason: string, issues?: unknown) =>
  createError('ORCHESTRATOR_CONFIG_INVALID', 'Invalid orchestrator configuration', 400, {
    reason,
    issues,
  });

export const loadOrchestratorConfigFrom = async ({
  configPath,
}: {
  configPath?: string;
}): Promise<OrchestratorConfigResult> => {
  if (!configPath) {
    return ok(DEFAULT_ORCHESTRATOR_CONFIG);
  }

  let parsed: unknown;
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (error) {
    if (isMissingFile(error)) {
      return ok(DEFAULT_ORCHESTRATOR_CONFIG);
    }
    return err(invalidConfig(String(error)));
  }

  const validated = orchestratorConfigSchema.safeParse(parsed);
  if (!validated.success) {
    return err(invalidConfig('schema', validated.error.issues));
  }
  return ok(validated.data);
};

const parseEnvNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Loads the optional JSON config file and layers `SANDBOX_*` environment
 * variables on top. The merged result is validated again so an override
 * cannot push a value outside the schema's bounds.
 */
export const loadOrchestratorConfig = async ({
  configPath,
  env = process.env,
}: {
  configPath?: string;
  env?: Env;
} = {}): Promise<OrchestratorConfigResult> => {
  const baseResult = await loadOrchestratorConfigFrom({
    configPath: configPath ?? env.SANDBOX_CONFIG_PATH,
  });
  if (!baseResult.ok) {
    return baseResult;
  }

  const base = baseResult.value;
  const merged = {
    ...base,
    defaultTtlHours: parseEnvNumber(env.SANDBOX_DEFAULT_TTL_HOURS, base.defaultTtlHours),
    ingressDomain: env.SANDBOX_INGRESS_DOMAIN || base.ingressDomain,
    databasePath: env.SANDBOX_DATABASE_PATH || base.databasePath,
    batch: {
      concurrency: parseEnvNumber(env.SANDBOX_BATCH_CONCURRENCY, base.batch.concurrency),
      maxItems: parseEnvNumber(env.SANDBOX_BATCH_MAX_ITEMS, base.batch.maxItems),
    },
    retry: {
      ...base.retry,
      maxRetries: parseEnvNumber(env.SANDBOX_RETRY_MAX_RETRIES, base.retry.maxRetries),
      baseDelayMs: parseEnvNumber(env.SANDBOX_RETRY_BASE_DELAY_MS, base.retry.baseDelayMs),
    },
    timeouts: {
      ...base.timeouts,
      createMs: parseEnvNumber(env.SANDBOX_CREATE_TIMEOUT_MS, base.timeouts.createMs),
    },
    kubernetes: {
      ...base.kubernetes,
      kubeconfigPath: env.SANDBOX_KUBECONFIG || base.kubernetes.kubeconfigPath,
      context: env.SANDBOX_K8S_CONTEXT || base.kubernetes.context,
    },
  };

  const validated = orchestratorConfigSchema.safeParse(merged);
  if (!validated.success) {
    return err(invalidConfig('environment', validated.error.issues));
  }
  return ok(validated.data);
};
