export type TransitionErrorCode =
  | 'NO_TRANSITION'
  | 'GUARD_REJECTED'
  | 'ACTION_FAILED'
  | 'CONFLICT'
  | 'TIMEOUT'
  | 'IDEMPOTENCY_KEY_REUSED';

/**
 * Base class for every runtime failure of a fire. These are returned inside a
 * `FireResult`, never thrown out of the executor.
 */
export abstract class TransitionError extends Error {
  abstract readonly code: TransitionErrorCode;

  constructor(
    public readonly machineType: string,
    public readonly instanceId: string,
    public readonly state: string,
    public readonly event: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
