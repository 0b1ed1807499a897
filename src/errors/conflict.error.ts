import { TransitionError } from './transition.error';

export class ConflictError extends TransitionError {
  readonly code = 'CONFLICT' as const;

  constructor(
    machineType: string,
    instanceId: string,
    state: string,
    event: string,
    public readonly expectedVersion: number,
  ) {
    super(
      machineType,
      instanceId,
      state,
      event,
      `${machineType}/${instanceId} changed while "${event}" was being resolved ` +
        `(expected version ${expectedVersion} in state "${state}"). Reload and fire again.`,
    );
    this.name = 'ConflictError';
  }
}
