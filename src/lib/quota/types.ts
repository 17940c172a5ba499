import type { QuotaPolicyConfig } from '../config/types.js';

/**
 * Resolved resource ceiling for one environment. Embedded in the
 * environment record rather than stored on its own.
 */
export type QuotaPolicy = QuotaPolicyConfig;

export type QuotaDimension = keyof QuotaPolicy;

export type QuotaOverrides = Partial<QuotaPolicy>;

/** Usage as reported by the cluster's quota status. */
export type ResourceUsage = {
  cpuMillicores: number;
  memoryBytes: number;
  pods: number;
};

export type PressureLevel = 'normal' | 'warning' | 'critical';

export type DimensionPressure = {
  used: number;
  allocated: number;
  ratio: number;
  level: PressureLevel;
};

export type PressureReport = {
  level: PressureLevel;
  dimensions: {
    cpu: DimensionPressure;
    memory: DimensionPressure;
    pods: DimensionPressure;
  };
};
