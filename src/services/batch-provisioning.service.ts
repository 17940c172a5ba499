import { createId } from '@paralleldrive/cuid2';
import { z } from 'zod';
import type { Environment } from '../db/schema/environments.js';
import { quotaOverridesSchema } from '../lib/config/schemas.js';
import type { BatchPolicyConfig } from '../lib/config/types.js';
import type { AppError } from '../lib/errors/base.js';
import { toAppError, withDetails } from '../lib/errors/base.js';
import { BatchErrors } from '../lib/errors/batch-errors.js';
import { EnvironmentErrors } from '../lib/errors/environment-errors.js';
import type { Logger } from '../lib/logging/logger.js';
import { createLogger } from '../lib/logging/logger.js';
import { namespaceFor } from '../lib/manifests/naming.js';
import { envVarsSchema } from '../lib/stacks/types.js';
import { canAct } from '../lib/state-machines/environment-lifecycle/guards.js';
import { generateAccessCode } from '../lib/utils/access-code.js';
import type { Clock } from '../lib/utils/date.js';
import { systemClock } from '../lib/utils/date.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';
import { runPool } from '../lib/utils/worker-pool.js';
import type { EnvironmentRepository, UserRepository } from '../repositories/types.js';
import type { EnvironmentLifecycleService } from './environment-lifecycle.service.js';

const PREFIX_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;

const prefixSchema = z
  .string()
  .min(1)
  .max(40)
  .regex(PREFIX_PATTERN, 'prefix must be lowercase alphanumerics and dashes');

const modeSchema = z.enum(['apply', 'dry_run']).default('apply');

const createBatchSchema = z.object({
  operation: z.literal('create'),
  prefix: prefixSchema,
  count: z.number().int().min(1),
  mode: modeSchema,
  templateId: z.string().min(1),
  quota: quotaOverridesSchema.optional(),
  gitRepositoryUrl: z.string().min(1).optional(),
  gitBranch: z.string().min(1).optional(),
  ports: z.array(z.number().int().min(1).max(65535)).optional(),
  env: envVarsSchema.optional(),
  ttlHours: z.number().positive().optional(),
  awaitReady: z.boolean().optional(),
  concurrency: z.number().int().min(1).max(100).optional(),
});

const deleteBatchSchema = z.object({
  operation: z.literal('delete'),
  prefix: prefixSchema,
  /** Without a count every live environment under the prefix matches. */
  count: z.number().int().min(1).optional(),
  mode: modeSchema,
  force: z.boolean().optional(),
  concurrency: z.number().int().min(1).max(100).optional(),
});

export const batchJobSchema = z.discriminatedUnion('operation', [
  createBatchSchema,
  deleteBatchSchema,
]);

export type BatchJob = z.input<typeof batchJobSchema>;
type ParsedBatchJob = z.infer<typeof batchJobSchema>;
type CreateBatchJob = z.infer<typeof createBatchSchema>;
type DeleteBatchJob = z.infer<typeof deleteBatchSchema>;

export type BatchItemOutcome =
  | 'succeeded'
  | 'failed'
  | 'cancelled'
  | 'deletable'
  | 'not_deletable';

export type BatchItemResult = {
  index: number;
  identity: string;
  outcome: BatchItemOutcome;
  environmentId?: string;
  status?: string;
  error?: AppError;
  reason?: string;
};

export type BatchResult = {
  batchId: string;
  operation: ParsedBatchJob['operation'];
  mode: ParsedBatchJob['mode'];
  requested: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  deletable: number;
  notDeletable: number;
  elapsedMs: number;
  items: BatchItemResult[];
};

export type RunBatchOptions = {
  /** Items not started when this fires are reported as `cancelled`. */
  signal?: AbortSignal;
};

export type BatchProvisioningDeps = {
  lifecycle: EnvironmentLifecycleService;
  environments: EnvironmentRepository;
  users: UserRepository;
  policy: BatchPolicyConfig;
  clock?: Clock;
  logger?: Logger;
};

/** `prefix-01 … prefix-N`, zero-padded to at least two digits. */
export const batchIdentities = (prefix: string, count: number): string[] => {
  const width = Math.max(2, String(count).length);
  return Array.from({ length: count }, (_, i) => `${prefix}-${String(i + 1).padStart(width, '0')}`);
};

type DeleteTarget = { identity: string; environment?: Environment };

/**
 * Runs create or delete batches through a fixed-size worker pool. One
 * item's failure is recorded in its own slot and never stops the others.
 */
export class BatchProvisioningService {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: BatchProvisioningDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('BatchProvisioning');
  }

  async runBatch(job: BatchJob, options: RunBatchOptions = {}): Promise<Result<BatchResult, AppError>> {
    const parsed = batchJobSchema.safeParse(job);
    if (!parsed.success) {
      return err(BatchErrors.INVALID(parsed.error.issues));
    }
    const batch = parsed.data;
    const { maxItems } = this.deps.policy;

    if (batch.count !== undefined && batch.count > maxItems) {
      return err(BatchErrors.TOO_LARGE(batch.count, maxItems));
    }

    const batchId = createId();
    const log = this.logger.child({ batchId, operation: batch.operation, prefix: batch.prefix });
    const startedAt = this.clock().getTime();

    let items: BatchItemResult[];
    if (batch.operation === 'create') {
      if (batch.mode === 'dry_run') {
        return err(
          BatchErrors.INVALID([{ path: ['mode'], message: 'dry_run is only supported for delete batches' }])
        );
      }
      items = await this.runCreate(batch, options.signal, log);
    } else {
      const targets = await this.resolveDeleteTargets(batch);
      if (targets.length > maxItems) {
        return err(BatchErrors.TOO_LARGE(targets.length, maxItems));
      }
      items =
        batch.mode === 'dry_run'
          ? this.classify(targets)
          : await this.runDelete(batch, targets, options.signal, log);
    }

    const count = (outcome: BatchItemOutcome) =>
      items.filter((item) => item.outcome === outcome).length;
    const result: BatchResult = {
      batchId,
      operation: batch.operation,
      mode: batch.mode,
      requested: items.length,
      succeeded: count('succeeded'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      deletable: count('deletable'),
      notDeletable: count('not_deletable'),
      elapsedMs: this.clock().getTime() - startedAt,
      items,
    };

    log.info('Batch finished', {
      data: {
        mode: result.mode,
        requested: result.requested,
        succeeded: result.succeeded,
        failed: result.failed,
        cancelled: result.cancelled,
        elapsedMs: result.elapsedMs,
      },
    });
    return ok(result);
  }

  private async runCreate(
    batch: CreateBatchJob,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<BatchItemResult[]> {
    const identities = batchIdentities(batch.prefix, batch.count);

    return runPool(
      identities,
      async (identity, index): Promise<BatchItemResult> => {
        const user = await this.ensureUser(identity);
        const created = await this.deps.lifecycle.create({
          name: identity,
          userId: user.id,
          templateId: batch.templateId,
          quota: batch.quota,
          gitRepositoryUrl: batch.gitRepositoryUrl,
          gitBranch: batch.gitBranch,
          ports: batch.ports,
          env: batch.env,
          ttlHours: batch.ttlHours,
          awaitReady: batch.awaitReady,
        });

        if (!created.ok) {
          log.warn('Batch item failed', { data: { identity, code: created.error.code } });
          return { index, identity, outcome: 'failed', error: created.error };
        }
        return {
          index,
          identity,
          outcome: 'succeeded',
          environmentId: created.value.id,
          status: created.value.status,
        };
      },
      this.poolOptions(batch.concurrency, signal, (identity) => identity)
    );
  }

  private async runDelete(
    batch: DeleteBatchJob,
    targets: DeleteTarget[],
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<BatchItemResult[]> {
    return runPool(
      targets,
      async ({ identity, environment }, index): Promise<BatchItemResult> => {
        if (!environment) {
          return {
            index,
            identity,
            outcome: 'failed',
            error: withDetails(EnvironmentErrors.NOT_FOUND(identity), { identity }),
          };
        }

        const deleted = await this.deps.lifecycle.act(environment.id, 'delete', {
          force: batch.force,
        });
        if (!deleted.ok) {
          log.warn('Batch item failed', { data: { identity, code: deleted.error.code } });
          return { index, identity, outcome: 'failed', environmentId: environment.id, error: deleted.error };
        }
        return {
          index,
          identity,
          outcome: 'succeeded',
          environmentId: environment.id,
          status: deleted.value.status,
        };
      },
      this.poolOptions(batch.concurrency, signal, (target) => target.identity)
    );
  }

  /** Reads only the repository; the cluster is never touched. */
  private classify(targets: DeleteTarget[]): BatchItemResult[] {
    return targets.map(({ identity, environment }, index): BatchItemResult => {
      if (!environment) {
        return { index, identity, outcome: 'not_deletable', reason: 'no live environment' };
      }
      if (!canAct(environment.status, 'delete')) {
        return {
          index,
          identity,
          outcome: 'not_deletable',
          environmentId: environment.id,
          status: environment.status,
          reason: `environment is ${environment.status}`,
        };
      }
      return {
        index,
        identity,
        outcome: 'deletable',
        environmentId: environment.id,
        status: environment.status,
      };
    });
  }

  private async resolveDeleteTargets(batch: DeleteBatchJob): Promise<DeleteTarget[]> {
    const matches = await this.deps.environments.findByNamespacePrefix(
      `${namespaceFor(batch.prefix)}-`
    );

    if (batch.count === undefined) {
      return matches.map((environment) => ({ identity: environment.name, environment }));
    }

    const byName = new Map(matches.map((environment) => [environment.name, environment]));
    return batchIdentities(batch.prefix, batch.count).map((identity) => ({
      identity,
      environment: byName.get(identity),
    }));
  }

  private async ensureUser(name: string) {
    const existing = await this.deps.users.findByName(name);
    if (existing) {
      return existing;
    }
    return this.deps.users.save({ name, accessCode: generateAccessCode() });
  }

  private poolOptions<T>(
    concurrency: number | undefined,
    signal: AbortSignal | undefined,
    identityOf: (item: T) => string
  ) {
    return {
      concurrency: concurrency ?? this.deps.policy.concurrency,
      signal,
      onSkipped: (item: T, index: number): BatchItemResult => ({
        index,
        identity: identityOf(item),
        outcome: 'cancelled',
      }),
      onThrown: (item: T, index: number, error: unknown): BatchItemResult => {
        const identity = identityOf(item);
        this.logger.error('Batch item threw', { data: { identity }, error });
        return {
          index,
          identity,
          outcome: 'failed',
          error: withDetails(toAppError(error), { identity }),
        };
      },
    };
  }
}
