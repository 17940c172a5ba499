import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestEnvironment } from '../../../tests/factories/environment.factory.js';
import { createTestTemplate } from '../../../tests/factories/template.factory.js';
import { createTestUser } from '../../../tests/factories/user.factory.js';
import { FakeClusterAdapter } from '../../../tests/helpers/fake-cluster-adapter.js';
import { createTestServices, TEST_CONFIG, type TestServices } from '../../../tests/helpers/services.js';
import type { Template } from '../../db/schema/templates.js';
import type { User } from '../../db/schema/users.js';
import { AdapterErrors } from '../../lib/errors/adapter-errors.js';
import { toRef } from '../../lib/manifests/types.js';
import type { EnvironmentState } from '../../lib/state-machines/environment-lifecycle/types.js';
import { StackCompiler } from '../../lib/stacks/stack-compiler.js';
import { err } from '../../lib/utils/result.js';
import type { CreateEnvironmentInput } from '../environment-lifecycle.service.js';
import { TemplateService } from '../template.service.js';

describe('EnvironmentLifecycleService', () => {
  let services: TestServices;
  let user: User;
  let template: Template;

  beforeEach(async () => {
    services = createTestServices();
    user = await createTestUser({ name: 'alice' });
    template = await createTestTemplate({ name: 'node-react' });
  });

  const createAlice = (overrides: Partial<CreateEnvironmentInput> = {}) =>
    services.lifecycle.create({
      name: 'alice',
      userId: user.id,
      templateId: template.id,
      ...overrides,
    });

  describe('create', () => {
    it('provisions every resource and reaches running', async () => {
      const result = await createAlice();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('running');
      expect(result.value.namespace).toBe('env-alice');
      expect(result.value.accessUrl).toBe('http://alice.sandbox.test');
      expect(result.value.expiresAt).toBe('2026-03-01T17:00:00.000Z');
      expect(result.value.image).toBe('node:20-alpine');
      expect(result.value.resources).toEqual([
        { kind: 'namespace', namespace: 'env-alice', name: 'env-alice' },
        { kind: 'quota', namespace: 'env-alice', name: 'quota-alice' },
        { kind: 'volume', namespace: 'env-alice', name: 'pvc-alice' },
        { kind: 'workload', namespace: 'env-alice', name: 'ide-alice' },
        { kind: 'service', namespace: 'env-alice', name: 'svc-alice' },
        { kind: 'ingress', namespace: 'env-alice', name: 'ing-alice' },
      ]);
    });

    it('creates the quota before the workload', async () => {
      await createAlice();

      expect(services.adapter.callsOf('create').map((call) => call.kind)).toEqual([
        'namespace',
        'quota',
        'volume',
        'workload',
        'service',
        'ingress',
      ]);
    });

    it('uses the template image tag when one has been built', async () => {
      const built = await createTestTemplate({
        name: 'built',
        imageTag: 'sandboxes/node-react:abc123def456',
      });

      const result = await services.lifecycle.create({
        name: 'bob',
        userId: user.id,
        templateId: built.id,
      });

      expect(result.ok && result.value.image).toBe('sandboxes/node-react:abc123def456');
    });

    it('returns in provisioning when not asked to wait', async () => {
      const result = await createAlice({ awaitReady: false, ttlHours: 2 });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('provisioning');
      expect(result.value.expiresAt).toBe('2026-03-01T11:00:00.000Z');
      expect(services.adapter.callsOf('get')).toHaveLength(0);
    });

    it('rejects a quota above the ceiling without touching the cluster', async () => {
      const result = await createAlice({ quota: { cpuMillicores: 16_000 } });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('QUOTA_EXCEEDS_CEILING');
      expect(result.error.details?.identity).toBe('alice');
      expect(services.adapter.calls).toHaveLength(0);
      expect(await services.environments.list({ includeDeleted: true })).toHaveLength(0);
    });

    it('rejects invalid input with the identity attached', async () => {
      const result = await createAlice({ ports: [70_000] });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.details?.identity).toBe('alice');
    });

    it('rejects env names that could break out of the variable list', async () => {
      const result = await createAlice({ env: { 'A\nB': 'x' } });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.details?.errors).toEqual([
        { path: 'env.A\nB', message: 'Invalid environment variable name' },
      ]);
      expect(services.adapter.calls).toHaveLength(0);
    });

    it('refuses a template that is not active', async () => {
      const draft = await createTestTemplate({ name: 'draft', status: 'draft' });

      const result = await services.lifecycle.create({
        name: 'alice',
        userId: user.id,
        templateId: draft.id,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('TEMPLATE_NOT_ACTIVE');
      expect(services.adapter.calls).toHaveLength(0);
    });

    it('rolls back created resources in reverse order when a later step fails', async () => {
      services.adapter.failOn('create', { kind: 'workload' }, (target) =>
        AdapterErrors.REJECTED(target, 'image not allowed')
      );

      const result = await createAlice();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('PARTIAL_PROVISIONING_FAILURE');
      expect(result.error.details?.failedStep).toBe('workload');
      expect(result.error.details?.rolledBack).toEqual([
        'volume/env-alice/pvc-alice',
        'quota/env-alice/quota-alice',
        'namespace/env-alice',
      ]);
      expect(result.error.details?.rollbackFailures).toEqual([]);
      expect(services.adapter.callsOf('delete').map((call) => call.kind)).toEqual([
        'volume',
        'quota',
        'namespace',
      ]);
      expect(services.adapter.refs()).toEqual([]);

      const [stored] = await services.environments.list();
      expect(stored?.status).toBe('failed');
      expect(stored?.resources).toEqual([]);
    });

    it('surfaces a name collision on the first step without deleting anything', async () => {
      services.adapter.seed({
        kind: 'namespace',
        namespace: 'env-alice',
        name: 'env-alice',
        labels: {},
      });

      const result = await createAlice();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ADAPTER_CONFLICT');
      expect(result.error.details?.identity).toBe('alice');
      expect(services.adapter.callsOf('delete')).toHaveLength(0);
      expect(services.adapter.has('namespace', 'env-alice', 'env-alice')).toBe(true);

      const [stored] = await services.environments.list({ includeDeleted: true });
      expect(stored?.status).toBe('deleted');
      expect(stored?.resources).toEqual([]);
      expect(await services.environments.list()).toEqual([]);
    });

    it('leaves the live environment as the owner of its name after a duplicate create', async () => {
      const first = await createAlice();
      if (!first.ok) throw new Error('setup failed');

      const second = await createAlice();

      expect(second.ok).toBe(false);
      if (second.ok) return;
      expect(second.error.code).toBe('ADAPTER_CONFLICT');
      const owner = await services.environments.findByName('alice');
      expect(owner?.id).toBe(first.value.id);
      expect(owner?.status).toBe('running');
      expect(await services.environments.findByNamespacePrefix('env-alice')).toHaveLength(1);
    });

    it('adopts an object whose timed-out create landed on the cluster', async () => {
      const createResource = services.adapter.createResource.bind(services.adapter);
      vi.spyOn(services.adapter, 'createResource').mockImplementationOnce(async (spec) => {
        await createResource(spec);
        return err(AdapterErrors.TIMEOUT(toRef(spec), 1_000));
      });

      const result = await createAlice();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('running');
      expect(result.value.resources[0]).toEqual({
        kind: 'namespace',
        namespace: 'env-alice',
        name: 'env-alice',
      });
      const namespaceCreates = services.adapter.callsOf('create').filter((call) => call.kind === 'namespace');
      expect(namespaceCreates).toHaveLength(2);
      expect(services.time.sleeps).toEqual([10]);
    });

    it('rolls back an object whose create kept timing out after it landed', async () => {
      const createResource = services.adapter.createResource.bind(services.adapter);
      vi.spyOn(services.adapter, 'createResource').mockImplementation(async (spec) => {
        const created = await createResource(spec);
        return spec.kind === 'quota' ? err(AdapterErrors.TIMEOUT(toRef(spec), 1_000)) : created;
      });

      const result = await createAlice();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('PARTIAL_PROVISIONING_FAILURE');
      expect(result.error.details?.failedStep).toBe('quota');
      expect(result.error.details?.rolledBack).toEqual(['quota/env-alice/quota-alice', 'namespace/env-alice']);
      expect(services.adapter.refs()).toEqual([]);

      const [stored] = await services.environments.list();
      expect(stored?.status).toBe('failed');
      expect(stored?.resources).toEqual([]);
    });

    it('keeps tracking a namespace whose slow create outlived every timeout', async () => {
      services = createTestServices({
        adapter: new FakeClusterAdapter(60),
        config: { ...TEST_CONFIG, timeouts: { ...TEST_CONFIG.timeouts, adapterCallMs: 20 } },
      });

      const result = await services.lifecycle.create({
        name: 'slow-01',
        userId: user.id,
        templateId: template.id,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ADAPTER_TRANSIENT');
      const [stored] = await services.environments.list();
      expect(stored?.status).toBe('failed');
      expect(stored?.resources).toEqual([
        { kind: 'namespace', namespace: 'env-slow-01', name: 'env-slow-01' },
      ]);
    });

    it('uses the base image of a template whose image was never built', async () => {
      const templates = new TemplateService({
        templates: services.templates,
        environments: services.environments,
        compiler: new StackCompiler({ registryScope: 'sandboxes' }),
        quota: services.quota,
        clock: services.time.clock,
      });
      const created = await templates.create({
        name: 'web',
        baseImage: 'node:20-alpine',
        stack: { language: 'node', framework: 'react' },
      });
      if (!created.ok) throw new Error(created.error.message);

      const result = await services.lifecycle.create({
        name: 'bob',
        userId: user.id,
        templateId: created.value.id,
      });

      expect(result.ok && result.value.image).toBe('node:20-alpine');
    });

    it('retries transient failures with exponential backoff', async () => {
      services.adapter.failOn(
        'create',
        { kind: 'quota' },
        (target) => AdapterErrors.TRANSIENT(target, 'etcd leader changed'),
        2
      );

      const result = await createAlice();

      expect(result.ok && result.value.status).toBe('running');
      expect(services.adapter.callsOf('create').filter((call) => call.kind === 'quota')).toHaveLength(3);
      expect(services.time.sleeps).toEqual([10, 20]);
    });

    it('marks the environment failed when it is not ready within the create window', async () => {
      services.adapter.autoReady = false;

      const result = await createAlice();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('PROVISIONING_TIMEOUT');
      expect(services.time.sleeps).toHaveLength(60);

      const [stored] = await services.environments.list();
      expect(stored?.status).toBe('failed');
      expect(stored?.statusMessage).toBe('Environment "alice" did not become ready within 60000ms');
      expect(stored?.resources).toHaveLength(6);
    });
  });

  describe('act', () => {
    it('rejects start on a running environment', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');

      const result = await services.lifecycle.act(created.value.id, 'start');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ENVIRONMENT_INVALID_ACTION');
      expect(result.error.message).toBe('Cannot start environment "alice" while it is running');
    });

    it('stops by removing the workload and keeps the rest', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');

      const result = await services.lifecycle.act(created.value.id, 'stop');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('stopped');
      expect(result.value.resources.map((ref) => ref.kind)).toEqual([
        'namespace',
        'quota',
        'volume',
        'service',
        'ingress',
      ]);
      expect(services.adapter.has('workload', 'env-alice', 'ide-alice')).toBe(false);
      expect(services.adapter.has('volume', 'env-alice', 'pvc-alice')).toBe(true);
    });

    it('starts a stopped environment again', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');
      await services.lifecycle.act(created.value.id, 'stop');

      const result = await services.lifecycle.act(created.value.id, 'start');

      expect(result.ok && result.value.status).toBe('running');
      expect(services.adapter.has('workload', 'env-alice', 'ide-alice')).toBe(true);
    });

    it.each(['stop', 'restart'] as const)('refuses to %s a degraded environment', async (action) => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');
      services.adapter.setReadyReplicas('env-alice', 'ide-alice', 0);
      await services.lifecycle.reconcile(created.value.id);
      const deletesBefore = services.adapter.callsOf('delete').length;

      const result = await services.lifecycle.act(created.value.id, action);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ENVIRONMENT_INVALID_ACTION');
      expect(result.error.message).toBe(`Cannot ${action} environment "alice" while it is degraded`);
      expect(services.adapter.callsOf('delete')).toHaveLength(deletesBefore);
      expect((await services.environments.findById(created.value.id))?.status).toBe('degraded');
    });

    it('restarts a running environment through stop and start', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');

      const result = await services.lifecycle.act(created.value.id, 'restart');

      expect(result.ok && result.value.status).toBe('running');
      const workloadCalls = services.adapter.calls
        .filter((call) => call.kind === 'workload' && call.op !== 'get')
        .map((call) => call.op);
      expect(workloadCalls).toEqual(['create', 'delete', 'create']);
    });

    it('deletes owned resources in reverse creation order', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');

      const result = await services.lifecycle.act(created.value.id, 'delete');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('deleted');
      expect(result.value.resources).toEqual([]);
      expect(result.value.deletedAt).toBe('2026-03-01T09:00:00.000Z');
      expect(services.adapter.callsOf('delete').map((call) => call.kind)).toEqual([
        'ingress',
        'service',
        'workload',
        'volume',
        'quota',
        'namespace',
      ]);
      expect(services.adapter.refs()).toEqual([]);
    });

    it.each<EnvironmentState>([
      'pending',
      'provisioning',
      'running',
      'degraded',
      'stopping',
      'stopped',
      'deleting',
      'failed',
    ])('deletes an environment that is %s', async (status) => {
      const environment = await createTestEnvironment({
        name: `del-${status}`,
        status,
        userId: user.id,
        templateId: template.id,
      });

      const result = await services.lifecycle.act(environment.id, 'delete');

      expect(result.ok && result.value.status).toBe('deleted');
    });

    it('refuses to act on a deleted environment', async () => {
      const environment = await createTestEnvironment({
        status: 'deleted',
        userId: user.id,
        templateId: template.id,
      });

      const result = await services.lifecycle.act(environment.id, 'delete');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ENVIRONMENT_INVALID_ACTION');
    });

    it('stays deleting until the cluster confirms removal', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');
      services.adapter.lingerReads = 1;

      const deleting = await services.lifecycle.act(created.value.id, 'delete');

      expect(deleting.ok && deleting.value.status).toBe('deleting');
      expect(deleting.ok && deleting.value.resources).toHaveLength(6);

      const confirmed = await services.lifecycle.reconcile(created.value.id);

      expect(confirmed.ok && confirmed.value.status).toBe('deleted');
      expect(confirmed.ok && confirmed.value.resources).toEqual([]);
    });

    it('records a failed deletion and completes it when forced', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');
      services.adapter.failOn('delete', { kind: 'volume' }, (target) =>
        AdapterErrors.REJECTED(target, 'volume is protected')
      );

      const failed = await services.lifecycle.act(created.value.id, 'delete');

      expect(failed.ok).toBe(false);
      if (failed.ok) return;
      expect(failed.error.code).toBe('DELETION_FAILED');
      expect(failed.error.details?.failures).toEqual(['volume/env-alice/pvc-alice']);

      const stored = await services.environments.findById(created.value.id);
      expect(stored?.status).toBe('failed');
      expect(stored?.resources).toEqual([
        { kind: 'volume', namespace: 'env-alice', name: 'pvc-alice' },
      ]);

      const forced = await services.lifecycle.act(created.value.id, 'delete', { force: true });
      expect(forced.ok && forced.value.status).toBe('deleted');
    });

    it('returns not found for an unknown id', async () => {
      const result = await services.lifecycle.act('missing', 'stop');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ENVIRONMENT_NOT_FOUND');
    });
  });

  describe('reconcile', () => {
    it('degrades when replicas drop and recovers when they return', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');

      services.adapter.setReadyReplicas('env-alice', 'ide-alice', 0);
      const degraded = await services.lifecycle.reconcile(created.value.id);
      expect(degraded.ok && degraded.value.status).toBe('degraded');

      services.adapter.setReadyReplicas('env-alice', 'ide-alice', 1);
      const recovered = await services.lifecycle.reconcile(created.value.id);
      expect(recovered.ok && recovered.value.status).toBe('running');
    });

    it('is idempotent and only reads from the cluster', async () => {
      const created = await createAlice();
      if (!created.ok) throw new Error('setup failed');
      const writesBefore = services.adapter.calls.filter((call) => call.op !== 'get').length;

      const first = await services.lifecycle.reconcile(created.value.id);
      const second = await services.lifecycle.reconcile(created.value.id);

      expect(first.ok && first.value.status).toBe('running');
      expect(second.ok && second.value.status).toBe('running');
      expect(services.adapter.calls.filter((call) => call.op !== 'get')).toHaveLength(writesBefore);
    });

    it('leaves states that do not depend on the cluster alone', async () => {
      const environment = await createTestEnvironment({
        status: 'stopped',
        userId: user.id,
        templateId: template.id,
      });

      const result = await services.lifecycle.reconcile(environment.id);

      expect(result.ok && result.value.status).toBe('stopped');
      expect(services.adapter.calls).toHaveLength(0);
    });
  });

  describe('observe', () => {
    it('reports an absent namespace when nothing exists', async () => {
      const environment = await createTestEnvironment({
        name: 'ghost',
        userId: user.id,
        templateId: template.id,
      });

      const result = await services.lifecycle.observe(environment.id);

      expect(result.ok && result.value).toEqual({
        namespacePhase: 'Absent',
        quotaUsed: null,
        workloadReadyReplicas: 0,
        workloadDesiredReplicas: 0,
        networkEntryReady: false,
      });
    });
  });

  describe('expireSweep', () => {
    const seedExpiry = (name: string, expiresAt: string, status: EnvironmentState = 'running') =>
      createTestEnvironment({ name, expiresAt, status, userId: user.id, templateId: template.id });

    it('deletes only environments whose expiry has passed', async () => {
      await seedExpiry('old-1', '2026-03-01T10:00:00.000Z');
      await seedExpiry('old-2', '2026-03-01T11:00:00.000Z', 'stopped');
      await seedExpiry('edge', '2026-03-01T12:00:00.000Z');
      const fresh = await seedExpiry('fresh', '2026-03-01T13:00:00.000Z');
      await seedExpiry('gone', '2026-03-01T08:00:00.000Z', 'deleted');

      const result = await services.lifecycle.expireSweep(new Date('2026-03-01T12:00:00.000Z'));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.items.map((item) => [item.name, item.outcome])).toEqual([
        ['old-1', 'deleted'],
        ['old-2', 'deleted'],
        ['edge', 'deleted'],
      ]);
      expect((await services.environments.findById(fresh.id))?.status).toBe('running');
    });

    it('only reports candidates on a dry run', async () => {
      const expired = await seedExpiry('old-1', '2026-03-01T10:00:00.000Z');
      await seedExpiry('fresh', '2026-03-01T13:00:00.000Z');

      const result = await services.lifecycle.expireSweep(new Date('2026-03-01T12:00:00.000Z'), {
        dryRun: true,
      });

      expect(result.ok && result.value.items).toEqual([
        {
          environmentId: expired.id,
          name: 'old-1',
          expiresAt: '2026-03-01T10:00:00.000Z',
          outcome: 'would_delete',
          error: undefined,
        },
      ]);
      expect((await services.environments.findById(expired.id))?.status).toBe('running');
      expect(services.adapter.calls).toHaveLength(0);
    });
  });
});

describe('FakeClusterAdapter', () => {
  it('rejects namespaced objects whose namespace does not exist', async () => {
    const adapter = new FakeClusterAdapter();

    const result = await adapter.createResource({
      kind: 'service',
      namespace: 'env-nowhere',
      name: 'svc-nowhere',
      labels: {},
      port: 8080,
      targetPort: 8080,
      selector: {},
    });

    expect(result.ok).toBe(false);
  });
});
