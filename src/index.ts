import type { DatabaseHandle } from './db/client.js';
import { createDatabase } from './db/client.js';
import type { ClusterAdapter } from './lib/cluster/cluster-adapter.js';
import { createKubernetesClusterAdapter } from './lib/cluster/k8s-cluster-adapter.js';
import { loadOrchestratorConfig } from './lib/config/config-service.js';
import type { OrchestratorConfig } from './lib/config/types.js';
import type { AppError } from './lib/errors/base.js';
import type { Logger } from './lib/logging/logger.js';
import { createLogger } from './lib/logging/logger.js';
import { QuotaGovernor } from './lib/quota/quota-governor.js';
import { DockerImageBuilder } from './lib/stacks/docker-image-builder.js';
import type { ImageBuilder } from './lib/stacks/image-builder.js';
import { StackCompiler } from './lib/stacks/stack-compiler.js';
import type { Clock, Sleep } from './lib/utils/date.js';
import type { Result } from './lib/utils/result.js';
import { ok } from './lib/utils/result.js';
import {
  DrizzleEnvironmentRepository,
  DrizzleTemplateRepository,
  DrizzleUserRepository,
} from './repositories/index.js';
import { AdminService } from './services/admin.service.js';
import { BatchProvisioningService } from './services/batch-provisioning.service.js';
import { EnvironmentLifecycleService } from './services/environment-lifecycle.service.js';
import { TemplateService } from './services/template.service.js';

export type OrchestratorOptions = {
  /** Already-resolved configuration. When absent it is loaded from file and environment. */
  config?: OrchestratorConfig;
  configPath?: string;
  /** Cluster adapter to use instead of connecting through kubeconfig. */
  adapter?: ClusterAdapter;
  /** Image builder; defaults to the local Docker daemon. */
  imageBuilder?: ImageBuilder;
  /** SQLite file path; overrides `config.databasePath`. */
  databasePath?: string;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
};

export type Orchestrator = {
  config: OrchestratorConfig;
  lifecycle: EnvironmentLifecycleService;
  batches: BatchProvisioningService;
  templates: TemplateService;
  admin: AdminService;
  quota: QuotaGovernor;
  compiler: StackCompiler;
  close: () => void;
};

/** Wires configuration, persistence, the cluster adapter and the services. */
export async function createOrchestrator(
  options: OrchestratorOptions = {}
): Promise<Result<Orchestrator, AppError>> {
  const logger = options.logger ?? createLogger('Orchestrator');

  let config = options.config;
  if (!config) {
    const loaded = await loadOrchestratorConfig({ configPath: options.configPath });
    if (!loaded.ok) {
      return loaded;
    }
    config = loaded.value;
  }

  let adapter = options.adapter;
  if (!adapter) {
    const connected = createKubernetesClusterAdapter({
      kubeconfigPath: config.kubernetes.kubeconfigPath,
      context: config.kubernetes.context,
    });
    if (!connected.ok) {
      return connected;
    }
    adapter = connected.value;
  }

  const database: DatabaseHandle = createDatabase(options.databasePath ?? config.databasePath);
  const environments = new DrizzleEnvironmentRepository(database.db);
  const templates = new DrizzleTemplateRepository(database.db);
  const users = new DrizzleUserRepository(database.db);

  const quota = new QuotaGovernor({
    defaults: config.quotaDefaults,
    ceiling: config.quotaCeiling,
    thresholds: config.pressure,
  });
  const compiler = new StackCompiler({
    registryScope: config.imageRegistryScope,
    builder: options.imageBuilder ?? new DockerImageBuilder(),
  });

  const lifecycle = new EnvironmentLifecycleService({
    environments,
    templates,
    adapter,
    quota,
    config,
    clock: options.clock,
    sleep: options.sleep,
  });

  logger.info('Orchestrator ready', {
    data: { ingressDomain: config.ingressDomain, batchConcurrency: config.batch.concurrency },
  });

  return ok({
    config,
    lifecycle,
    batches: new BatchProvisioningService({
      lifecycle,
      environments,
      users,
      policy: config.batch,
      clock: options.clock,
    }),
    templates: new TemplateService({
      templates,
      environments,
      compiler,
      quota,
      clock: options.clock,
    }),
    admin: new AdminService({ environments, lifecycle, quota, config, clock: options.clock }),
    quota,
    compiler,
    close: database.close,
  });
}

export type { ClusterAdapter, ObservedState } from './lib/cluster/cluster-adapter.js';
export { KubernetesClusterAdapter } from './lib/cluster/k8s-cluster-adapter.js';
export { orchestratorConfigSchema } from './lib/config/schemas.js';
export type { OrchestratorConfig } from './lib/config/types.js';
export * from './lib/errors/index.js';
export { buildManifests } from './lib/manifests/manifest-builder.js';
export type { Manifest, ResourceKind, ResourceRef, ResourceSpec } from './lib/manifests/types.js';
export { compileStack } from './lib/stacks/stack-compiler.js';
export { getSupportedStacks } from './lib/stacks/stack-matrix.js';
export type { Result } from './lib/utils/result.js';
export type {
  EnvironmentFilter,
  EnvironmentRepository,
  TemplateRepository,
  UserRepository,
} from './repositories/index.js';
export type { BatchJob, BatchResult } from './services/batch-provisioning.service.js';
export type { CreateEnvironmentInput } from './services/environment-lifecycle.service.js';
