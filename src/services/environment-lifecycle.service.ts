import { createId } from '@paralleldrive/cuid2';
import { z } from 'zod';
import type { Environment } from '../db/schema/environments.js';
import type { Template } from '../db/schema/templates.js';
import type { ClusterAdapter, ObservedState } from '../lib/cluster/cluster-adapter.js';
import { quotaOverridesSchema } from '../lib/config/schemas.js';
import type { OrchestratorConfig } from '../lib/config/types.js';
import type { AdapterError } from '../lib/errors/adapter-errors.js';
import {
  ADAPTER_ERROR_CODES,
  AdapterErrors,
  isNotFoundError,
  isTransientError,
} from '../lib/errors/adapter-errors.js';
import type { AppError } from '../lib/errors/base.js';
import { toAppError, withDetails } from '../lib/errors/base.js';
import { EnvironmentErrors } from '../lib/errors/environment-errors.js';
import { TemplateErrors } from '../lib/errors/template-errors.js';
import { ValidationErrors } from '../lib/errors/validation-errors.js';
import type { Logger } from '../lib/logging/logger.js';
import { createLogger } from '../lib/logging/logger.js';
import { buildManifests } from '../lib/manifests/manifest-builder.js';
import { namespaceFor, resourceNames, slugify } from '../lib/manifests/naming.js';
import type { Manifest, ResourceKind, ResourceRef, ResourceSpec } from '../lib/manifests/types.js';
import { formatRef, RESOURCE_ORDER, toRef } from '../lib/manifests/types.js';
import type { QuotaGovernor } from '../lib/quota/quota-governor.js';
import { envVarsSchema } from '../lib/stacks/types.js';
import { canAct, isTerminal } from '../lib/state-machines/environment-lifecycle/guards.js';
import { transition } from '../lib/state-machines/environment-lifecycle/machine.js';
import { deriveState } from '../lib/state-machines/environment-lifecycle/reconcile.js';
import type {
  EnvironmentAction,
  EnvironmentLifecycleEvent,
  EnvironmentObservation,
  EnvironmentState,
} from '../lib/state-machines/environment-lifecycle/types.js';
import type { Clock, Sleep } from '../lib/utils/date.js';
import { addHours, sleep as defaultSleep, systemClock } from '../lib/utils/date.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';
import { withRetry, withTimeout } from '../lib/utils/retry.js';
import { runPool } from '../lib/utils/worker-pool.js';
import type { EnvironmentPatch, EnvironmentRepository, TemplateRepository } from '../repositories/types.js';

export const createEnvironmentInputSchema = z.object({
  name: z.string().min(1).max(128),
  userId: z.string().min(1),
  templateId: z.string().min(1),
  gitRepositoryUrl: z.string().min(1).optional(),
  gitBranch: z.string().min(1).optional(),
  quota: quotaOverridesSchema.optional(),
  ports: z.array(z.number().int().min(1).max(65535)).optional(),
  env: envVarsSchema.optional(),
  ttlHours: z.number().positive().optional(),
  awaitReady: z.boolean().optional(),
});

export type CreateEnvironmentInput = z.input<typeof createEnvironmentInputSchema>;

export type ActOptions = {
  /** Delete only: finish in `deleted` even if resources could not be confirmed gone. */
  force?: boolean;
  /** Start and restart: wait for readiness before returning. Defaults to true. */
  awaitReady?: boolean;
};

export type SweepOutcome = 'deleted' | 'deleting' | 'failed' | 'would_delete';

export type SweepItem = {
  environmentId: string;
  name: string;
  expiresAt: string;
  outcome: SweepOutcome;
  error?: AppError;
};

export type SweepResult = {
  now: string;
  dryRun: boolean;
  items: SweepItem[];
};

export type EnvironmentLifecycleDeps = {
  environments: EnvironmentRepository;
  templates: TemplateRepository;
  adapter: ClusterAdapter;
  quota: QuotaGovernor;
  config: OrchestratorConfig;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
};

/** Event that leads from a reconciled state into the derived one. */
const RECONCILE_EVENTS: Partial<Record<EnvironmentState, EnvironmentLifecycleEvent['type']>> = {
  running: 'READY',
  degraded: 'DEGRADE',
  stopped: 'STOPPED',
  deleted: 'DELETED',
  failed: 'FAIL',
};

/** States whose derived successor depends on what the cluster reports. */
const OBSERVED_STATES: readonly EnvironmentState[] = [
  'provisioning',
  'running',
  'degraded',
  'stopping',
  'deleting',
];

const DELETE_ORDER: readonly ResourceKind[] = [...RESOURCE_ORDER].reverse();

const byDeleteOrder = (a: ResourceRef, b: ResourceRef) =>
  DELETE_ORDER.indexOf(a.kind) - DELETE_ORDER.indexOf(b.kind);

const sameRef = (a: ResourceRef, b: ResourceRef) =>
  a.kind === b.kind && a.namespace === b.namespace && a.name === b.name;

/**
 * Drives environments through their lifecycle against the cluster adapter.
 * The service never polls on its own; `reconcile` and `expireSweep` are
 * invoked by callers.
 */
export class EnvironmentLifecycleService {
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(private readonly deps: EnvironmentLifecycleDeps) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? createLogger('EnvironmentLifecycle');
  }

  async create(request: CreateEnvironmentInput): Promise<Result<Environment, AppError>> {
    const parsed = createEnvironmentInputSchema.safeParse(request);
    if (!parsed.success) {
      return err(ValidationErrors.VALIDATION_ERROR(parsed.error.issues, request.name));
    }
    const input = parsed.data;
    const identity = input.name;
    const { config } = this.deps;

    const template = await this.deps.templates.findById(input.templateId);
    if (!template) {
      return err(withDetails(TemplateErrors.NOT_FOUND(input.templateId), { identity }));
    }
    if (template.status !== 'active') {
      return err(withDetails(TemplateErrors.NOT_ACTIVE(template.id, template.status), { identity }));
    }

    const quota = this.deps.quota.resolve(template.defaultQuota, input.quota);
    if (!quota.ok) {
      return err(withDetails(quota.error, { identity }));
    }

    const now = this.clock();
    let environment = await this.deps.environments.save({
      id: createId(),
      userId: input.userId,
      templateId: template.id,
      name: identity,
      namespace: namespaceFor(identity),
      status: 'pending',
      gitRepositoryUrl: input.gitRepositoryUrl ?? template.gitRepositoryUrl,
      gitBranch: input.gitBranch ?? template.gitBranch,
      quota: quota.value,
      ports: input.ports ?? [],
      envVars: input.env ?? {},
      image: this.imageOf(template),
      resources: [],
      expiresAt: addHours(now, input.ttlHours ?? config.defaultTtlHours).toISOString(),
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    });
    const log = this.logger.child({ environmentId: environment.id, identity });

    const manifest = this.buildManifest(environment, template);
    if (!manifest.ok) {
      await this.fail(environment, manifest.error);
      return manifest;
    }

    environment = await this.patch(environment, {
      accessUrl: manifest.value.accessUrl,
      provisioningStartedAt: this.clock().toISOString(),
    });

    const submitted = await this.submit(environment, manifest.value.specs, log);
    environment = submitted.environment;
    if (submitted.error) {
      if (
        submitted.failedStep === 'namespace' &&
        submitted.error.code === ADAPTER_ERROR_CODES.CONFLICT
      ) {
        // The namespace belongs to another environment; this record must not claim it.
        await this.retire(environment, submitted.error, log);
      } else {
        await this.fail(environment, submitted.error);
      }
      return err(submitted.error);
    }

    const moved = await this.apply(environment, { type: 'SUBMITTED' });
    if (!moved.ok) {
      return moved;
    }
    log.info('Manifests submitted', { data: { namespace: environment.namespace } });

    if (input.awaitReady === false) {
      return moved;
    }
    return this.awaitReady(moved.value);
  }

  async getById(id: string): Promise<Result<Environment, AppError>> {
    const environment = await this.deps.environments.findById(id);
    return environment ? ok(environment) : err(EnvironmentErrors.NOT_FOUND(id));
  }

  /**
   * Reads the per-environment view of the cluster. A missing namespace is
   * reported as `Absent`; a missing workload counts as zero replicas.
   */
  async observe(id: string): Promise<Result<EnvironmentObservation, AppError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    return this.inspect(found.value);
  }

  /**
   * Maps observed cluster state onto the lifecycle and persists the result
   * when it changes. Only reads from the cluster.
   */
  async reconcile(id: string): Promise<Result<Environment, AppError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    const environment = found.value;
    if (!OBSERVED_STATES.includes(environment.status)) {
      return ok(environment);
    }

    const observation = await this.inspect(environment);
    if (!observation.ok) {
      return observation;
    }

    let remaining = environment.resources;
    if (environment.status === 'deleting') {
      const present = await this.presentResources(environment.resources);
      if (!present.ok) {
        return present;
      }
      remaining = present.value;
    }

    const next = deriveState(environment.status, observation.value, {
      deadlinePassed: this.deadlinePassed(environment),
      remainingResources: remaining.length,
    });

    if (next === environment.status) {
      if (remaining.length !== environment.resources.length) {
        return ok(await this.patch(environment, { resources: remaining }));
      }
      return ok(environment);
    }

    const event = RECONCILE_EVENTS[next];
    if (!event) {
      return err(EnvironmentErrors.INVALID_TRANSITION(environment.status, next));
    }
    const reason =
      next === 'failed'
        ? EnvironmentErrors.PROVISIONING_TIMEOUT(environment.name, this.deps.config.timeouts.createMs)
            .message
        : undefined;

    return this.apply(
      environment,
      event === 'FAIL' ? { type: 'FAIL', reason } : { type: event },
      next === 'deleted' ? { resources: [], deletedAt: this.clock().toISOString() } : { resources: remaining }
    );
  }

  async act(
    id: string,
    action: EnvironmentAction,
    options: ActOptions = {}
  ): Promise<Result<Environment, AppError>> {
    const found = await this.getById(id);
    if (!found.ok) {
      return found;
    }
    const environment = found.value;

    if (!canAct(environment.status, action)) {
      return err(EnvironmentErrors.INVALID_ACTION(environment.name, environment.status, action));
    }

    switch (action) {
      case 'start':
        return this.start(environment, options);
      case 'stop':
        return this.stop(environment);
      case 'restart': {
        if (environment.status === 'stopped') {
          return this.start(environment, options);
        }
        const stopped = await this.stop(environment);
        return stopped.ok ? this.start(stopped.value, options) : stopped;
      }
      case 'delete':
        return this.delete(environment, options);
    }
  }

  /**
   * Initiates deletion for every live environment whose expiry has passed.
   * With `dryRun` the candidates are only reported.
   */
  async expireSweep(
    now: Date = this.clock(),
    options: { dryRun?: boolean } = {}
  ): Promise<Result<SweepResult, AppError>> {
    const dryRun = options.dryRun ?? false;
    const expired = await this.deps.environments.findExpired(now);

    const summarize = (
      environment: Environment,
      outcome: SweepOutcome,
      error?: AppError
    ): SweepItem => ({
      environmentId: environment.id,
      name: environment.name,
      expiresAt: environment.expiresAt,
      outcome,
      error,
    });

    if (dryRun) {
      return ok({
        now: now.toISOString(),
        dryRun,
        items: expired.map((environment) => summarize(environment, 'would_delete')),
      });
    }

    const items = await runPool(
      expired,
      async (environment): Promise<SweepItem> => {
        const deleted = await this.delete(environment, {});
        if (!deleted.ok) {
          return summarize(environment, 'failed', deleted.error);
        }
        return summarize(environment, deleted.value.status === 'deleted' ? 'deleted' : 'deleting');
      },
      {
        concurrency: this.deps.config.batch.concurrency,
        onSkipped: (environment) => summarize(environment, 'failed'),
        onThrown: (environment, _index, error) =>
          summarize(environment, 'failed', toAppError(error)),
      }
    );

    this.logger.info('Expiry sweep finished', {
      data: {
        expired: items.length,
        deleted: items.filter((item) => item.outcome === 'deleted').length,
        failed: items.filter((item) => item.outcome === 'failed').length,
      },
    });
    return ok({ now: now.toISOString(), dryRun, items });
  }

  private async start(
    environment: Environment,
    options: ActOptions
  ): Promise<Result<Environment, AppError>> {
    const template = await this.deps.templates.findById(environment.templateId);
    if (!template) {
      return err(withDetails(TemplateErrors.NOT_FOUND(environment.templateId), { identity: environment.name }));
    }
    const manifest = this.buildManifest(environment, template);
    if (!manifest.ok) {
      return manifest;
    }
    const workload = manifest.value.specs.find((spec) => spec.kind === 'workload');
    if (!workload) {
      return err(EnvironmentErrors.MANIFEST_INVALID(environment.name, 'no workload in manifest'));
    }

    const started = await this.apply(environment, { type: 'START' }, {
      provisioningStartedAt: this.clock().toISOString(),
    });
    if (!started.ok) {
      return started;
    }

    const created = await this.callAdapter('createResource', toRef(workload), () =>
      this.deps.adapter.createResource(workload)
    );
    // A workload that is already present is what start wants anyway.
    if (!created.ok && created.error.code !== ADAPTER_ERROR_CODES.CONFLICT) {
      const error = withDetails(created.error, { identity: environment.name });
      await this.fail(started.value, error);
      return err(error);
    }

    const current = started.value;
    const resources = current.resources.some((ref) => sameRef(ref, toRef(workload)))
      ? current.resources
      : [...current.resources, toRef(workload)];
    const environmentWithWorkload = await this.patch(current, { resources });

    if (options.awaitReady === false) {
      return ok(environmentWithWorkload);
    }
    return this.awaitReady(environmentWithWorkload);
  }

  /** Scales to zero by removing the workload; namespace, quota and volume stay. */
  private async stop(environment: Environment): Promise<Result<Environment, AppError>> {
    const stopping = await this.apply(environment, { type: 'STOP' });
    if (!stopping.ok) {
      return stopping;
    }

    const workload: ResourceRef = {
      kind: 'workload',
      namespace: environment.namespace,
      name: resourceNames(slugify(environment.name)).workload,
    };
    const deleted = await this.callAdapter('deleteResource', workload, () =>
      this.deps.adapter.deleteResource(workload.kind, workload.namespace, workload.name)
    );
    if (!deleted.ok) {
      const error = withDetails(deleted.error, { identity: environment.name });
      await this.fail(stopping.value, error);
      return err(error);
    }

    return this.apply(stopping.value, { type: 'STOPPED' }, {
      resources: stopping.value.resources.filter((ref) => !sameRef(ref, workload)),
    });
  }

  private async delete(
    environment: Environment,
    options: ActOptions
  ): Promise<Result<Environment, AppError>> {
    const deleting = await this.apply(environment, { type: 'DELETE' });
    if (!deleting.ok) {
      return deleting;
    }
    const log = this.logger.child({ environmentId: environment.id, identity: environment.name });
    const owned = [...deleting.value.resources].sort(byDeleteOrder);

    const failures: ResourceRef[] = [];
    let lastError: AppError | undefined;
    for (const ref of owned) {
      const deleted = await this.callAdapter('deleteResource', ref, () =>
        this.deps.adapter.deleteResource(ref.kind, ref.namespace, ref.name)
      );
      if (!deleted.ok) {
        failures.push(ref);
        lastError = deleted.error;
        log.error('Resource deletion failed', { data: { resource: formatRef(ref) }, error: deleted.error });
      }
    }

    if (lastError && !options.force) {
      const error = EnvironmentErrors.DELETION_FAILED(
        environment.name,
        failures.map(formatRef),
        lastError
      );
      await this.fail(await this.patch(deleting.value, { resources: failures }), error);
      return err(error);
    }

    const present = await this.presentResources(owned);
    const remaining = present.ok ? present.value : owned;

    if (remaining.length > 0 && !options.force) {
      log.info('Deletion pending confirmation', {
        data: { remaining: remaining.map(formatRef) },
      });
      return ok(await this.patch(deleting.value, { resources: remaining }));
    }

    if (remaining.length > 0) {
      log.warn('Forcing deletion with resources still present', {
        data: { remaining: remaining.map(formatRef) },
      });
    }
    return this.apply(deleting.value, { type: 'DELETED' }, {
      resources: [],
      deletedAt: this.clock().toISOString(),
    });
  }

  /**
   * Creates each spec in order. On a definitive failure every resource
   * created so far is deleted again, newest first. A step that ended in a
   * transient failure may still land on the cluster, so it is deleted too.
   */
  private async submit(
    environment: Environment,
    specs: ResourceSpec[],
    log: Logger
  ): Promise<{ environment: Environment; error?: AppError; failedStep?: ResourceKind }> {
    const created: ResourceRef[] = [];
    let current = environment;

    for (const spec of specs) {
      const ref = toRef(spec);
      const result = await this.createOwned(spec, log);

      if (result.ok) {
        created.push(ref);
        current = await this.patch(current, { resources: [...created] });
        log.debug('Resource created', { data: { resource: formatRef(ref) } });
        continue;
      }

      const owned = isTransientError(result.error) ? [...created, ref] : created;
      if (owned.length === 0) {
        return {
          environment: current,
          error: withDetails(result.error, { identity: environment.name }),
          failedStep: spec.kind,
        };
      }

      const rolledBack: ResourceRef[] = [];
      const rollbackFailures: ResourceRef[] = [];
      for (const createdRef of [...owned].reverse()) {
        const deleted = await this.callAdapter('deleteResource', createdRef, () =>
          this.deps.adapter.deleteResource(createdRef.kind, createdRef.namespace, createdRef.name)
        );
        if (deleted.ok) {
          rolledBack.push(createdRef);
        } else {
          rollbackFailures.push(createdRef);
          log.error('Rollback failed', { data: { resource: formatRef(createdRef) }, error: deleted.error });
        }
      }

      current = await this.patch(current, { resources: rollbackFailures });
      log.warn('Provisioning rolled back', {
        data: { failedStep: spec.kind, rolledBack: rolledBack.length },
      });
      if (created.length === 0) {
        return {
          environment: current,
          error: withDetails(result.error, { identity: environment.name }),
          failedStep: spec.kind,
        };
      }
      return {
        environment: current,
        failedStep: spec.kind,
        error: EnvironmentErrors.PARTIAL_PROVISIONING_FAILURE(
          environment.name,
          spec.kind,
          result.error,
          rolledBack.map(formatRef),
          rollbackFailures.map(formatRef)
        ),
      };
    }

    return { environment: current };
  }

  /**
   * Creates one object. A conflict after an attempt that timed out or failed
   * transiently is that attempt landing late, so the object is ours.
   */
  private async createOwned(
    spec: ResourceSpec,
    log: Logger
  ): Promise<Result<ResourceRef, AdapterError>> {
    const ref = toRef(spec);
    let transientAttempts = 0;
    const result = await this.callAdapter(
      'createResource',
      ref,
      () => this.deps.adapter.createResource(spec),
      (attempt) => {
        if (!attempt.ok && isTransientError(attempt.error)) {
          transientAttempts += 1;
        }
      }
    );

    if (!result.ok && result.error.code === ADAPTER_ERROR_CODES.CONFLICT && transientAttempts > 0) {
      log.warn('Adopting object created by an earlier attempt', {
        data: { resource: formatRef(ref), transientAttempts },
      });
      return ok(ref);
    }
    return result;
  }

  private async awaitReady(environment: Environment): Promise<Result<Environment, AppError>> {
    let current = environment;

    for (;;) {
      const reconciled = await this.reconcile(current.id);
      if (reconciled.ok) {
        current = reconciled.value;
        if (current.status === 'running') {
          return ok(current);
        }
        if (current.status === 'failed') {
          return err(
            EnvironmentErrors.PROVISIONING_TIMEOUT(current.name, this.deps.config.timeouts.createMs)
          );
        }
        if (current.status !== 'provisioning') {
          return ok(current);
        }
      } else if (!isTransientError(reconciled.error)) {
        return reconciled;
      } else if (this.deadlinePassed(current)) {
        const timeout = EnvironmentErrors.PROVISIONING_TIMEOUT(
          current.name,
          this.deps.config.timeouts.createMs
        );
        await this.fail(current, timeout);
        return err(timeout);
      }

      await this.sleep(this.deps.config.timeouts.readinessPollMs);
    }
  }

  private async inspect(environment: Environment): Promise<Result<EnvironmentObservation, AppError>> {
    const names = resourceNames(slugify(environment.name));
    const namespace = environment.namespace;

    const read = async (kind: ResourceKind, name: string): Promise<Result<ObservedState | null, AdapterError>> => {
      const result = await this.callAdapter('getResource', { kind, namespace, name }, () =>
        this.deps.adapter.getResource(kind, namespace, name)
      );
      if (!result.ok && isNotFoundError(result.error)) {
        return ok(null);
      }
      return result;
    };

    const [ns, quota, workload, ingress] = await Promise.all([
      read('namespace', namespace),
      read('quota', names.quota),
      read('workload', names.workload),
      read('ingress', names.ingress),
    ]);
    for (const result of [ns, quota, workload, ingress]) {
      if (!result.ok) {
        return err(withDetails(result.error, { identity: environment.name }));
      }
    }

    const value = (result: Result<ObservedState | null, AdapterError>) => (result.ok ? result.value : null);
    const observedNamespace = value(ns);
    const observedQuota = value(quota);
    const observedWorkload = value(workload);
    const observedIngress = value(ingress);

    return ok({
      namespacePhase: observedNamespace?.kind === 'namespace' ? observedNamespace.phase : 'Absent',
      quotaUsed: observedQuota?.kind === 'quota' ? observedQuota.used : null,
      workloadReadyReplicas: observedWorkload?.kind === 'workload' ? observedWorkload.readyReplicas : 0,
      workloadDesiredReplicas:
        observedWorkload?.kind === 'workload' ? observedWorkload.desiredReplicas : 0,
      networkEntryReady: observedIngress?.kind === 'ingress' ? observedIngress.ready : false,
    });
  }

  /** Subset of `refs` the cluster still reports. */
  private async presentResources(refs: ResourceRef[]): Promise<Result<ResourceRef[], AppError>> {
    const present: ResourceRef[] = [];
    for (const ref of refs) {
      const result = await this.callAdapter('getResource', ref, () =>
        this.deps.adapter.getResource(ref.kind, ref.namespace, ref.name)
      );
      if (result.ok) {
        present.push(ref);
      } else if (!isNotFoundError(result.error)) {
        return result;
      }
    }
    return ok(present);
  }

  private callAdapter<T>(
    operation: string,
    target: ResourceRef,
    fn: () => Promise<Result<T, AdapterError>>,
    onAttempt?: (result: Result<T, AdapterError>) => void
  ): Promise<Result<T, AdapterError>> {
    const timeoutMs = this.deps.config.timeouts.adapterCallMs;
    return withRetry(
      async () => {
        const result = await withTimeout<Result<T, AdapterError>>(fn(), timeoutMs, () =>
          err(AdapterErrors.TIMEOUT(target, timeoutMs))
        );
        onAttempt?.(result);
        return result;
      },
      {
        policy: this.deps.config.retry,
        sleep: this.sleep,
        isRetryable: isTransientError,
        logger: this.logger,
        operation: `${operation} ${formatRef(target)}`,
      }
    );
  }

  private buildManifest(environment: Environment, template: Template): Result<Manifest, AppError> {
    const { config } = this.deps;
    return buildManifests(
      {
        id: template.id,
        name: template.name,
        image: environment.image,
        env: template.envVars,
        ports: template.ports,
      },
      { environmentId: environment.id, userId: environment.userId, name: environment.name },
      environment.quota,
      {
        ingressDomain: config.ingressDomain,
        containerPort: config.containerPort,
        gitInitImage: config.gitInitImage,
        workspaceMountPath: config.workspaceMountPath,
        gitSource: environment.gitRepositoryUrl
          ? { url: environment.gitRepositoryUrl, branch: environment.gitBranch ?? 'main' }
          : undefined,
        env: environment.envVars,
        ports: environment.ports.length > 0 ? environment.ports : undefined,
        ingressClassName: config.kubernetes.ingressClassName,
        storageClassName: config.kubernetes.storageClassName,
      }
    );
  }

  private imageOf(template: Template): string {
    return template.imageTag ?? template.baseImage;
  }

  private deadlinePassed(environment: Environment): boolean {
    if (environment.status !== 'provisioning' || !environment.provisioningStartedAt) {
      return false;
    }
    const startedAt = new Date(environment.provisioningStartedAt).getTime();
    return this.clock().getTime() - startedAt >= this.deps.config.timeouts.createMs;
  }

  /** Validates the event against the transition table, then persists. */
  private async apply(
    environment: Environment,
    event: EnvironmentLifecycleEvent,
    extra: EnvironmentPatch = {}
  ): Promise<Result<Environment, AppError>> {
    const next = transition(environment.status, event);
    if (!next.ok) {
      return err(withDetails(next.error, { identity: environment.name }));
    }

    const updated = await this.patch(environment, {
      ...extra,
      status: next.value,
      statusMessage: event.type === 'FAIL' ? (event.reason ?? null) : null,
    });
    this.logger.info('Environment transitioned', {
      data: {
        environmentId: environment.id,
        identity: environment.name,
        from: environment.status,
        to: next.value,
      },
    });
    return ok(updated);
  }

  private async fail(environment: Environment, error: AppError): Promise<void> {
    if (isTerminal(environment.status) || environment.status === 'failed') {
      return;
    }
    const failed = await this.apply(environment, { type: 'FAIL', reason: error.message });
    if (!failed.ok) {
      this.logger.warn('Could not record failure', {
        data: { environmentId: environment.id, status: environment.status, cause: error.code },
        error: failed.error,
      });
    }
  }

  /** Closes a record that never owned anything on the cluster. */
  private async retire(environment: Environment, cause: AppError, log: Logger): Promise<void> {
    const deleting = await this.apply(environment, { type: 'DELETE' });
    const retired = deleting.ok
      ? await this.apply(deleting.value, { type: 'DELETED' }, {
          resources: [],
          deletedAt: this.clock().toISOString(),
        })
      : deleting;
    if (retired.ok) {
      log.warn('Environment retired', { data: { cause: cause.code } });
    } else {
      log.warn('Could not retire environment', { data: { cause: cause.code }, error: retired.error });
    }
  }

  private async patch(environment: Environment, changes: EnvironmentPatch): Promise<Environment> {
    const updated = await this.deps.environments.update(environment.id, {
      ...changes,
      updatedAt: this.clock().toISOString(),
    });
    return updated ?? { ...environment, ...changes };
  }
}
