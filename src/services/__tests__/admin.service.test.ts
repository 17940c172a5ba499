import { beforeEach, describe, expect, it } from 'vitest';
import { createTestEnvironment } from '../../../tests/factories/environment.factory.js';
import { createTestTemplate } from '../../../tests/factories/template.factory.js';
import { createTestUser } from '../../../tests/factories/user.factory.js';
import { createTestServices, type TestServices } from '../../../tests/helpers/services.js';
import { AdminService } from '../admin.service.js';

const GIB = 1024 ** 3;

describe('AdminService', () => {
  let services: TestServices;
  let admin: AdminService;

  beforeEach(() => {
    services = createTestServices();
    admin = new AdminService({
      environments: services.environments,
      lifecycle: services.lifecycle,
      quota: services.quota,
      config: services.config,
      clock: services.time.clock,
    });
  });

  describe('getAlerts', () => {
    it('flags environments about to expire', async () => {
      const soon = await createTestEnvironment({ name: 'soon', expiresAt: '2026-03-01T09:30:00.000Z' });
      await createTestEnvironment({ name: 'later', expiresAt: '2026-03-01T12:00:00.000Z' });

      const result = await admin.getAlerts();

      expect(result.ok && result.value).toEqual([
        {
          kind: 'expiring',
          severity: 'warning',
          environmentId: soon.id,
          name: 'soon',
          message: 'Expires in 30 minute(s)',
        },
      ]);
    });

    it('flags failed environments as critical', async () => {
      const broken = await createTestEnvironment({
        name: 'broken',
        status: 'failed',
        statusMessage: 'image pull failed',
      });

      const result = await admin.getAlerts();

      expect(result.ok && result.value).toEqual([
        {
          kind: 'failed',
          severity: 'critical',
          environmentId: broken.id,
          name: 'broken',
          message: 'image pull failed',
        },
      ]);
    });

    it('reports quota pressure from the observed usage', async () => {
      const user = await createTestUser({ name: 'hot' });
      const template = await createTestTemplate();
      const created = await services.lifecycle.create({
        name: 'hot',
        userId: user.id,
        templateId: template.id,
      });
      if (!created.ok) throw new Error('setup failed');
      services.adapter.setQuotaUsage('env-hot', 'quota-hot', {
        cpuMillicores: 950,
        memoryBytes: 0,
        pods: 1,
      });

      const result = await admin.getAlerts();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const [alert] = result.value;
      expect(result.value).toHaveLength(1);
      expect(alert?.kind).toBe('quota_pressure');
      expect(alert?.severity).toBe('critical');
      expect(alert?.pressure?.dimensions.cpu).toEqual({
        used: 950,
        allocated: 1000,
        ratio: 0.95,
        level: 'critical',
      });
      expect(alert?.pressure?.dimensions.pods.level).toBe('normal');
    });
  });

  describe('getOverview', () => {
    it('counts every status and sums the quota still allocated', async () => {
      await createTestEnvironment({ status: 'running' });
      await createTestEnvironment({ status: 'stopped' });
      await createTestEnvironment({ status: 'failed' });
      await createTestEnvironment({ status: 'deleted' });

      const result = await admin.getOverview();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.total).toBe(4);
      expect(result.value.byStatus).toEqual({
        pending: 0,
        provisioning: 0,
        running: 1,
        degraded: 0,
        stopping: 0,
        stopped: 1,
        deleting: 0,
        deleted: 1,
        failed: 1,
      });
      expect(result.value.allocated).toEqual({
        cpuMillicores: 2000,
        memoryBytes: 4 * GIB,
        storageBytes: 20 * GIB,
        maxPods: 10,
        maxServices: 10,
      });
    });
  });
});
