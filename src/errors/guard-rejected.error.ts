import { TransitionError } from './transition.error';

export class GuardRejectedError extends TransitionError {
  readonly code = 'GUARD_REJECTED' as const;

  constructor(
    machineType: string,
    instanceId: string,
    state: string,
    event: string,
    public readonly guards: string[],
    cause?: unknown,
  ) {
    super(
      machineType,
      instanceId,
      state,
      event,
      `No guard passed for "${event}" on ${machineType}/${instanceId} in state "${state}" ` +
        `(evaluated: ${guards.join(', ')}).`,
      cause === undefined ? undefined : { cause },
    );
    this.name = 'GuardRejectedError';
  }
}
