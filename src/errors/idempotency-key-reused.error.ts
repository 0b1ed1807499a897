import { TransitionError } from './transition.error';

export class IdempotencyKeyReusedError extends TransitionError {
  readonly code = 'IDEMPOTENCY_KEY_REUSED' as const;

  constructor(
    machineType: string,
    instanceId: string,
    state: string,
    event: string,
    public readonly idempotencyKey: string,
    public readonly committedEvent: string,
  ) {
    super(
      machineType,
      instanceId,
      state,
      event,
      `Idempotency key "${idempotencyKey}" was already used for "${committedEvent}" ` +
        `on ${machineType}/${instanceId}; it cannot be replayed as "${event}".`,
    );
    this.name = 'IdempotencyKeyReusedError';
  }
}
