import type { PressureThresholds } from '../config/types.js';
import type { QuotaError, QuotaViolation } from '../errors/quota-errors.js';
import { QuotaErrors } from '../errors/quota-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import type {
  DimensionPressure,
  PressureLevel,
  PressureReport,
  QuotaDimension,
  QuotaOverrides,
  QuotaPolicy,
  ResourceUsage,
} from './types.js';

export const QUOTA_DIMENSIONS: readonly QuotaDimension[] = [
  'cpuMillicores',
  'memoryBytes',
  'storageBytes',
  'maxPods',
  'maxServices',
];

const PRESSURE_RANK: Record<PressureLevel, number> = {
  normal: 0,
  warning: 1,
  critical: 2,
};

export type QuotaGovernorOptions = {
  /** Fallback for dimensions neither the template nor the request sets. */
  defaults: QuotaPolicy;
  ceiling: QuotaPolicy;
  thresholds: PressureThresholds;
};

export class QuotaGovernor {
  constructor(private readonly options: QuotaGovernorOptions) {}

  get ceiling(): QuotaPolicy {
    return this.options.ceiling;
  }

  /**
   * Merges template defaults with request overrides. Any dimension above the
   * ceiling rejects the whole request; values are never clamped.
   */
  resolve(
    templateDefaults: QuotaOverrides | null | undefined,
    overrides?: QuotaOverrides,
    ceiling: QuotaPolicy = this.options.ceiling
  ): Result<QuotaPolicy, QuotaError> {
    const pick = (dimension: QuotaDimension): number =>
      overrides?.[dimension] ?? templateDefaults?.[dimension] ?? this.options.defaults[dimension];

    const resolved: QuotaPolicy = {
      cpuMillicores: pick('cpuMillicores'),
      memoryBytes: pick('memoryBytes'),
      storageBytes: pick('storageBytes'),
      maxPods: pick('maxPods'),
      maxServices: pick('maxServices'),
    };

    for (const dimension of QUOTA_DIMENSIONS) {
      const value = resolved[dimension];
      if (!Number.isFinite(value) || value <= 0) {
        return err(QuotaErrors.INVALID_VALUE(dimension, value));
      }
    }

    const violations: QuotaViolation[] = QUOTA_DIMENSIONS.filter(
      (dimension) => resolved[dimension] > ceiling[dimension]
    ).map((dimension) => ({
      dimension,
      requested: resolved[dimension],
      ceiling: ceiling[dimension],
    }));

    if (violations.length > 0) {
      return err(QuotaErrors.EXCEEDS_CEILING(violations));
    }

    return ok(resolved);
  }

  classify(ratio: number): PressureLevel {
    if (ratio >= this.options.thresholds.critical) return 'critical';
    if (ratio >= this.options.thresholds.warning) return 'warning';
    return 'normal';
  }

  measure(policy: QuotaPolicy, usage: ResourceUsage): PressureReport {
    const dimension = (used: number, allocated: number): DimensionPressure => {
      const ratio = allocated > 0 ? used / allocated : used > 0 ? Number.POSITIVE_INFINITY : 0;
      return { used, allocated, ratio, level: this.classify(ratio) };
    };

    const dimensions = {
      cpu: dimension(usage.cpuMillicores, policy.cpuMillicores),
      memory: dimension(usage.memoryBytes, policy.memoryBytes),
      pods: dimension(usage.pods, policy.maxPods),
    };

    const level = [dimensions.cpu, dimensions.memory, dimensions.pods].reduce<PressureLevel>(
      (worst, current) => (PRESSURE_RANK[current.level] > PRESSURE_RANK[worst] ? current.level : worst),
      'normal'
    );

    return { level, dimensions };
  }

  /** Overall pressure: the highest level across cpu, memory and pods. */
  evaluate(policy: QuotaPolicy, usage: ResourceUsage): PressureLevel {
    return this.measure(policy, usage).level;
  }
}
