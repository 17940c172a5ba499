import { beforeEach, describe, expect, it } from 'vitest';
import { createTestEnvironment } from '../../../tests/factories/environment.factory.js';
import { createTestTemplate } from '../../../tests/factories/template.factory.js';
import { createTestUser } from '../../../tests/factories/user.factory.js';
import { FakeClusterAdapter } from '../../../tests/helpers/fake-cluster-adapter.js';
import { createTestServices, type TestServices } from '../../../tests/helpers/services.js';
import type { Template } from '../../db/schema/templates.js';
import type { ResourceSpec } from '../../lib/manifests/types.js';
import { batchIdentities } from '../batch-provisioning.service.js';

/** Fires `controller.abort()` as soon as a given object is submitted. */
class AbortingClusterAdapter extends FakeClusterAdapter {
  constructor(
    private readonly controller: AbortController,
    private readonly trigger: string
  ) {
    super();
  }

  override async createResource(spec: ResourceSpec) {
    if (spec.name === this.trigger) {
      this.controller.abort();
    }
    return super.createResource(spec);
  }
}

describe('batchIdentities', () => {
  it('pads to two digits for small batches', () => {
    expect(batchIdentities('lab', 3)).toEqual(['lab-01', 'lab-02', 'lab-03']);
  });

  it('pads to the width of the count for large batches', () => {
    const identities = batchIdentities('lab', 120);

    expect(identities[0]).toBe('lab-001');
    expect(identities[119]).toBe('lab-120');
  });
});

describe('BatchProvisioningService', () => {
  let services: TestServices;
  let template: Template;

  beforeEach(async () => {
    services = createTestServices();
    template = await createTestTemplate({ name: 'workshop' });
  });

  describe('create batches', () => {
    it('rejects a batch above the ceiling before doing any work', async () => {
      const result = await services.batches.runBatch({
        operation: 'create',
        prefix: 'lab',
        count: 201,
        templateId: template.id,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('BATCH_TOO_LARGE');
      expect(result.error.details).toEqual({ requested: 201, ceiling: 200 });
      expect(services.adapter.calls).toHaveLength(0);
      expect(await services.users.findByName('lab-001')).toBeUndefined();
    });

    const createLive = async (name: string) => {
      const owner = await createTestUser({ name });
      const created = await services.lifecycle.create({
        name,
        userId: owner.id,
        templateId: template.id,
      });
      if (!created.ok) throw new Error(created.error.message);
      return created.value;
    };

    it('records one failed item without stopping the others', async () => {
      const existing = await createLive('lab-07');

      const result = await services.batches.runBatch({
        operation: 'create',
        prefix: 'lab',
        count: 10,
        templateId: template.id,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.requested).toBe(10);
      expect(result.value.succeeded).toBe(9);
      expect(result.value.failed).toBe(1);

      const failed = result.value.items[6];
      expect(failed?.identity).toBe('lab-07');
      expect(failed?.outcome).toBe('failed');
      expect(failed?.error?.code).toBe('ADAPTER_CONFLICT');
      expect(failed?.error?.details?.identity).toBe('lab-07');

      const others = result.value.items.filter((item) => item.identity !== 'lab-07');
      expect(others.every((item) => item.status === 'running')).toBe(true);

      const owner = await services.environments.findByName('lab-07');
      expect(owner?.id).toBe(existing.id);
      expect(owner?.status).toBe('running');
    });

    it('deletes the original environment after a duplicate create was refused', async () => {
      const existing = await createLive('lab-01');
      await services.batches.runBatch({
        operation: 'create',
        prefix: 'lab',
        count: 1,
        templateId: template.id,
      });

      const result = await services.batches.runBatch({ operation: 'delete', prefix: 'lab', count: 1 });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.succeeded).toBe(1);
      expect(result.value.items[0]?.environmentId).toBe(existing.id);
      expect((await services.environments.findById(existing.id))?.status).toBe('deleted');
      expect(services.adapter.has('namespace', 'env-lab-01', 'env-lab-01')).toBe(false);
    });

    it('keeps results in input order and creates one user per item', async () => {
      const result = await services.batches.runBatch({
        operation: 'create',
        prefix: 'lab',
        count: 4,
        templateId: template.id,
        awaitReady: false,
      });

      expect(result.ok && result.value.items.map((item) => [item.index, item.identity])).toEqual([
        [0, 'lab-01'],
        [1, 'lab-02'],
        [2, 'lab-03'],
        [3, 'lab-04'],
      ]);
      expect(await services.users.findByName('lab-03')).toBeDefined();
    });

    it('never has more items in flight than the pool size', async () => {
      const adapter = new FakeClusterAdapter(5);
      services = createTestServices({ adapter });

      const result = await services.batches.runBatch({
        operation: 'create',
        prefix: 'lab',
        count: 6,
        templateId: template.id,
        awaitReady: false,
      });

      expect(result.ok && result.value.succeeded).toBe(6);
      expect(adapter.maxInFlight).toBe(3);
    });

    it('reports unstarted items as cancelled once the signal fires', async () => {
      const controller = new AbortController();
      const adapter = new AbortingClusterAdapter(controller, 'ing-lab-01');
      services = createTestServices({ adapter });

      const result = await services.batches.runBatch(
        {
          operation: 'create',
          prefix: 'lab',
          count: 3,
          templateId: template.id,
          awaitReady: false,
          concurrency: 1,
        },
        { signal: controller.signal }
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.items.map((item) => item.outcome)).toEqual([
        'succeeded',
        'cancelled',
        'cancelled',
      ]);
      expect(result.value.cancelled).toBe(2);
      expect(adapter.has('namespace', 'env-lab-02', 'env-lab-02')).toBe(false);
    });

    it('rejects dry_run for create batches', async () => {
      const result = await services.batches.runBatch({
        operation: 'create',
        prefix: 'lab',
        count: 2,
        mode: 'dry_run',
        templateId: template.id,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('BATCH_INVALID');
    });

    it('rejects a prefix that cannot form resource names', async () => {
      const result = await services.batches.runBatch({
        operation: 'create',
        prefix: 'Lab_A',
        count: 2,
        templateId: template.id,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('BATCH_INVALID');
    });
  });

  describe('delete batches', () => {
    const seedLab = async (names: string[]) => {
      const user = await createTestUser({ name: 'owner' });
      return Promise.all(
        names.map((name) =>
          createTestEnvironment({ name, userId: user.id, templateId: template.id })
        )
      );
    };

    it('classifies matches on a dry run without touching anything', async () => {
      await seedLab(['lab-01', 'lab-02', 'lab-03', 'lab-04', 'lab-05', 'other-01']);

      const result = await services.batches.runBatch({
        operation: 'delete',
        prefix: 'lab',
        mode: 'dry_run',
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.deletable).toBe(5);
      expect(result.value.items.map((item) => item.identity)).toEqual([
        'lab-01',
        'lab-02',
        'lab-03',
        'lab-04',
        'lab-05',
      ]);
      expect(services.adapter.calls).toHaveLength(0);

      const stillRunning = await services.environments.list({ status: 'running' });
      expect(stillRunning).toHaveLength(6);
    });

    it('marks identities without a live environment as not deletable', async () => {
      await seedLab(['lab-01', 'lab-02']);

      const result = await services.batches.runBatch({
        operation: 'delete',
        prefix: 'lab',
        count: 3,
        mode: 'dry_run',
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.deletable).toBe(2);
      expect(result.value.notDeletable).toBe(1);
      expect(result.value.items[2]).toEqual({
        index: 2,
        identity: 'lab-03',
        outcome: 'not_deletable',
        reason: 'no live environment',
      });
    });

    it('deletes every live environment under the prefix', async () => {
      const seeded = await seedLab(['lab-01', 'lab-02', 'lab-03']);

      const result = await services.batches.runBatch({ operation: 'delete', prefix: 'lab' });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.succeeded).toBe(3);
      expect(result.value.items.every((item) => item.status === 'deleted')).toBe(true);
      for (const environment of seeded) {
        expect((await services.environments.findById(environment.id))?.status).toBe('deleted');
      }
    });

    it('fails the missing identities when a count is given', async () => {
      await seedLab(['lab-01']);

      const result = await services.batches.runBatch({
        operation: 'delete',
        prefix: 'lab',
        count: 2,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.succeeded).toBe(1);
      expect(result.value.failed).toBe(1);
      expect(result.value.items[1]?.error?.code).toBe('ENVIRONMENT_NOT_FOUND');
    });
  });
});
