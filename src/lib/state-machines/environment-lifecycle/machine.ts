import type { AppError } from '../../errors/base.js';
import { EnvironmentErrors } from '../../errors/environment-errors.js';
import type { Result } from '../../utils/result.js';
import { err, ok } from '../../utils/result.js';
import type { EnvironmentLifecycleEvent, EnvironmentState } from './types.js';

type EventType = EnvironmentLifecycleEvent['type'];

const TRANSITIONS: Record<EnvironmentState, Partial<Record<EventType, EnvironmentState>>> = {
  pending: { SUBMITTED: 'provisioning', FAIL: 'failed', DELETE: 'deleting' },
  provisioning: { READY: 'running', FAIL: 'failed', DELETE: 'deleting' },
  running: { STOP: 'stopping', DEGRADE: 'degraded', DELETE: 'deleting' },
  degraded: { READY: 'running', DELETE: 'deleting' },
  stopping: { STOPPED: 'stopped', FAIL: 'failed', DELETE: 'deleting' },
  stopped: { START: 'provisioning', DELETE: 'deleting' },
  // Re-entering deleting lets an interrupted teardown be driven again.
  deleting: { DELETED: 'deleted', FAIL: 'failed', DELETE: 'deleting' },
  failed: { DELETE: 'deleting' },
  deleted: {},
};

/** Pure transition lookup. */
export const transition = (
  state: EnvironmentState,
  event: EnvironmentLifecycleEvent
): Result<EnvironmentState, AppError> => {
  const next = TRANSITIONS[state][event.type];
  return next ? ok(next) : err(EnvironmentErrors.INVALID_TRANSITION(state, event.type));
};
