import { isReady } from './guards.js';
import type { EnvironmentObservation, EnvironmentState } from './types.js';

export type ReconcileInput = {
  /** The create window has elapsed for an environment still provisioning. */
  deadlinePassed: boolean;
  /** Owned resources the cluster still reports. */
  remainingResources: number;
};

/**
 * Maps the recorded state and a cluster observation onto the next state.
 * Never returns a state the transition table would not allow from `current`.
 */
export function deriveState(
  current: EnvironmentState,
  observation: EnvironmentObservation,
  input: ReconcileInput
): EnvironmentState {
  const ready = isReady(observation.workloadReadyReplicas, observation.workloadDesiredReplicas);

  switch (current) {
    case 'provisioning':
      if (ready) return 'running';
      return input.deadlinePassed ? 'failed' : 'provisioning';
    case 'running':
      return ready ? 'running' : 'degraded';
    case 'degraded':
      return ready ? 'running' : 'degraded';
    case 'stopping':
      return observation.workloadReadyReplicas === 0 ? 'stopped' : 'stopping';
    case 'deleting':
      return input.remainingResources === 0 ? 'deleted' : 'deleting';
    default:
      return current;
  }
}
