import type { z } from 'zod';
import type {
  batchPolicySchema,
  pressureThresholdsSchema,
  quotaPolicySchema,
  retryPolicySchema,
  timeoutsSchema,
} from './schemas.js';
import { orchestratorConfigSchema } from './schemas.js';

export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;
export type QuotaPolicyConfig = z.infer<typeof quotaPolicySchema>;
export type RetryPolicyConfig = z.infer<typeof retryPolicySchema>;
export type TimeoutsConfig = z.infer<typeof timeoutsSchema>;
export type BatchPolicyConfig = z.infer<typeof batchPolicySchema>;
export type PressureThresholds = z.infer<typeof pressureThresholdsSchema>;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = orchestratorConfigSchema.parse({});
