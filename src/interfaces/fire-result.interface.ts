import type { ActionError } from '../errors/action.error';
import type { TransitionError } from '../errors/transition.error';

export interface FireOptions {
  /** Bound on guard and before-action evaluation, in milliseconds. */
  timeoutMs?: number;
  /**
   * A fire carrying a key that already committed on this instance returns
   * the earlier outcome without running guards or actions again.
   */
  idempotencyKey?: string;
}

export interface FireSuccess {
  ok: true;
  machineType: string;
  instanceId: string;
  event: string;
  fromState: string;
  state: string;
  version: number;
  /** True when the idempotency key had already committed. */
  duplicate: boolean;
  afterActionErrors: ActionError[];
}

export interface FireFailure {
  ok: false;
  machineType: string;
  instanceId: string;
  event: string;
  /** Unchanged current state. */
  state: string;
  error: TransitionError;
}

export type FireResult = FireSuccess | FireFailure;
