import type { Environment } from '../db/schema/environments.js';
import type { OrchestratorConfig } from '../lib/config/types.js';
import type { AppError } from '../lib/errors/base.js';
import type { Logger } from '../lib/logging/logger.js';
import { createLogger } from '../lib/logging/logger.js';
import type { QuotaGovernor } from '../lib/quota/quota-governor.js';
import type { PressureReport, QuotaPolicy } from '../lib/quota/types.js';
import { isActive } from '../lib/state-machines/environment-lifecycle/guards.js';
import type { EnvironmentState } from '../lib/state-machines/environment-lifecycle/types.js';
import type { Clock } from '../lib/utils/date.js';
import { addMinutes, systemClock } from '../lib/utils/date.js';
import type { Result } from '../lib/utils/result.js';
import { ok } from '../lib/utils/result.js';
import type { EnvironmentRepository } from '../repositories/types.js';
import type { EnvironmentLifecycleService } from './environment-lifecycle.service.js';

export type AlertSeverity = 'warning' | 'critical';

export type AlertKind = 'expiring' | 'failed' | 'quota_pressure';

export type Alert = {
  kind: AlertKind;
  severity: AlertSeverity;
  environmentId: string;
  name: string;
  message: string;
  pressure?: PressureReport;
};

export type Overview = {
  total: number;
  byStatus: Record<EnvironmentState, number>;
  /** Sum of the quota of every environment that is not deleted or failed. */
  allocated: QuotaPolicy;
};

export type AdminServiceDeps = {
  environments: EnvironmentRepository;
  lifecycle: EnvironmentLifecycleService;
  quota: QuotaGovernor;
  config: OrchestratorConfig;
  clock?: Clock;
  logger?: Logger;
};

const emptyCounts = (): Record<EnvironmentState, number> => ({
  pending: 0,
  provisioning: 0,
  running: 0,
  degraded: 0,
  stopping: 0,
  stopped: 0,
  deleting: 0,
  deleted: 0,
  failed: 0,
});

const emptyQuota = (): QuotaPolicy => ({
  cpuMillicores: 0,
  memoryBytes: 0,
  storageBytes: 0,
  maxPods: 0,
  maxServices: 0,
});

export class AdminService {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: AdminServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('AdminService');
  }

  async getAlerts(now: Date = this.clock()): Promise<Result<Alert[], AppError>> {
    const alerts: Alert[] = [];
    const live = await this.deps.environments.list();
    const horizon = addMinutes(now, this.deps.config.expiryAlertWindowMinutes).getTime();

    for (const environment of live) {
      const expiresAt = new Date(environment.expiresAt).getTime();
      if (environment.status !== 'deleting' && expiresAt > now.getTime() && expiresAt <= horizon) {
        const minutes = Math.ceil((expiresAt - now.getTime()) / 60_000);
        alerts.push(
          this.alert(environment, 'expiring', 'warning', `Expires in ${minutes} minute(s)`)
        );
      }

      if (environment.status === 'failed') {
        alerts.push(
          this.alert(
            environment,
            'failed',
            'critical',
            environment.statusMessage ?? 'Environment failed'
          )
        );
      }
    }

    for (const environment of live.filter((candidate) => isActive(candidate.status))) {
      const pressure = await this.pressureOf(environment);
      if (pressure && pressure.level !== 'normal') {
        alerts.push({
          ...this.alert(
            environment,
            'quota_pressure',
            pressure.level,
            `Quota pressure is ${pressure.level}`
          ),
          pressure,
        });
      }
    }

    return ok(alerts);
  }

  async getOverview(): Promise<Result<Overview, AppError>> {
    const environments = await this.deps.environments.list({ includeDeleted: true });

    const byStatus = emptyCounts();
    const allocated = emptyQuota();

    for (const environment of environments) {
      byStatus[environment.status] += 1;
      if (environment.status === 'deleted' || environment.status === 'failed') {
        continue;
      }
      allocated.cpuMillicores += environment.quota.cpuMillicores;
      allocated.memoryBytes += environment.quota.memoryBytes;
      allocated.storageBytes += environment.quota.storageBytes;
      allocated.maxPods += environment.quota.maxPods;
      allocated.maxServices += environment.quota.maxServices;
    }

    return ok({ total: environments.length, byStatus, allocated });
  }

  private async pressureOf(environment: Environment): Promise<PressureReport | null> {
    const observed = await this.deps.lifecycle.observe(environment.id);
    if (!observed.ok) {
      this.logger.warn('Could not observe environment', {
        data: { environmentId: environment.id },
        error: observed.error,
      });
      return null;
    }
    const used = observed.value.quotaUsed;
    return used ? this.deps.quota.measure(environment.quota, used) : null;
  }

  private alert(
    environment: Environment,
    kind: AlertKind,
    severity: AlertSeverity,
    message: string
  ): Alert {
    return { kind, severity, environmentId: environment.id, name: environment.name, message };
  }
}
