import { z } from 'zod';

const GIB = 1024 ** 3;

const positiveInt = z.number().int().positive();

export const quotaPolicySchema = z.object({
  cpuMillicores: positiveInt,
  memoryBytes: positiveInt,
  storageBytes: positiveInt,
  maxPods: positiveInt,
  maxServices: positiveInt,
});

export const quotaOverridesSchema = quotaPolicySchema.partial();

export const retryPolicySchema = z.object({
  baseDelayMs: z.number().int().min(0).default(500),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().int().min(0).default(8000),
  maxRetries: z.number().int().min(0).max(10).default(3),
});

export const timeoutsSchema = z.object({
  adapterCallMs: positiveInt.default(15_000),
  createMs: positiveInt.default(300_000),
  readinessPollMs: positiveInt.default(2_000),
});

export const batchPolicySchema = z.object({
  concurrency: z.number().int().min(1).max(100).default(10),
  maxItems: z.number().int().min(1).max(1000).default(200),
});

export const pressureThresholdsSchema = z
  .object({
    warning: z.number().gt(0).lte(1).default(0.7),
    critical: z.number().gt(0).lte(1).default(0.9),
  })
  .refine((value) => value.warning < value.critical, {
    message: 'warning threshold must be below critical threshold',
  });

export const kubernetesSettingsSchema = z.object({
  kubeconfigPath: z.string().optional(),
  context: z.string().optional(),
  ingressClassName: z.string().optional(),
  storageClassName: z.string().optional(),
});

export const orchestratorConfigSchema = z.object({
  defaultTtlHours: z.number().positive().max(24 * 90).default(8),
  ingressDomain: z.string().min(1).default('sandboxes.local'),
  containerPort: z.number().int().min(1).max(65535).default(8080),
  gitInitImage: z.string().min(1).default('alpine/git:latest'),
  workspaceMountPath: z.string().startsWith('/').default('/workspace'),
  imageRegistryScope: z.string().min(1).default('sandboxes'),
  databasePath: z.string().default('./data/orchestrator.db'),
  quotaDefaults: quotaPolicySchema.default({
    cpuMillicores: 1000,
    memoryBytes: 2 * GIB,
    storageBytes: 10 * GIB,
    maxPods: 5,
    maxServices: 5,
  }),
  quotaCeiling: quotaPolicySchema.default({
    cpuMillicores: 8000,
    memoryBytes: 16 * GIB,
    storageBytes: 100 * GIB,
    maxPods: 20,
    maxServices: 10,
  }),
  pressure: pressureThresholdsSchema.default({}),
  retry: retryPolicySchema.default({}),
  timeouts: timeoutsSchema.default({}),
  batch: batchPolicySchema.default({}),
  expiryAlertWindowMinutes: positiveInt.default(60),
  kubernetes: kubernetesSettingsSchema.default({}),
});

export type OrchestratorConfigInput = z.input<typeof orchestratorConfigSchema>;
