import type { EnvironmentAction, EnvironmentState } from './types.js';

const ACTION_SOURCES: Record<Exclude<EnvironmentAction, 'delete'>, readonly EnvironmentState[]> = {
  start: ['stopped'],
  stop: ['running'],
  restart: ['running', 'stopped'],
};

export const isTerminal = (state: EnvironmentState) => state === 'deleted';

/** States in which a workload is expected to be serving. */
export const isActive = (state: EnvironmentState) => state === 'running' || state === 'degraded';

export const canAct = (state: EnvironmentState, action: EnvironmentAction): boolean =>
  action === 'delete' ? !isTerminal(state) : ACTION_SOURCES[action].includes(state);

export const isExpired = (expiresAt: string, now: Date) =>
  new Date(expiresAt).getTime() <= now.getTime();

export const isReady = (ready: number, desired: number) => desired > 0 && ready >= desired;
