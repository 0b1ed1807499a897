import { TransitionError } from './transition.error';

export class NoTransitionError extends TransitionError {
  readonly code = 'NO_TRANSITION' as const;

  constructor(
    machineType: string,
    instanceId: string,
    state: string,
    event: string,
  ) {
    super(
      machineType,
      instanceId,
      state,
      event,
      `Invalid state: ${machineType}/${instanceId} cannot handle "${event}" in state "${state}".`,
    );
    this.name = 'NoTransitionError';
  }
}
