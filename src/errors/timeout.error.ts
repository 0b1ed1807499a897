import { TransitionError } from './transition.error';

export class TimeoutError extends TransitionError {
  readonly code = 'TIMEOUT' as const;

  constructor(
    machineType: string,
    instanceId: string,
    state: string,
    event: string,
    public readonly timeoutMs: number,
  ) {
    super(
      machineType,
      instanceId,
      state,
      event,
      `Guards and before-actions for "${event}" on ${machineType}/${instanceId} ` +
        `did not finish within ${timeoutMs}ms.`,
    );
    this.name = 'TimeoutError';
  }
}
