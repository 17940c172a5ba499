import type { NamespacePhase } from '../../cluster/cluster-adapter.js';
import type { ResourceUsage } from '../../quota/types.js';

export const ENVIRONMENT_STATES = [
  'pending',
  'provisioning',
  'running',
  'degraded',
  'stopping',
  'stopped',
  'deleting',
  'deleted',
  'failed',
] as const;

export type EnvironmentState = (typeof ENVIRONMENT_STATES)[number];

export type EnvironmentAction = 'start' | 'stop' | 'restart' | 'delete';

export type EnvironmentLifecycleEvent =
  | { type: 'SUBMITTED' }
  | { type: 'READY' }
  | { type: 'DEGRADE' }
  | { type: 'STOP' }
  | { type: 'STOPPED' }
  | { type: 'START' }
  | { type: 'DELETE' }
  | { type: 'DELETED' }
  | { type: 'FAIL'; reason?: string };

/**
 * Per-environment view of the cluster. `Absent` means the namespace could
 * not be found at all.
 */
export type EnvironmentObservation = {
  namespacePhase: NamespacePhase | 'Absent';
  quotaUsed: ResourceUsage | null;
  workloadReadyReplicas: number;
  workloadDesiredReplicas: number;
  networkEntryReady: boolean;
};
