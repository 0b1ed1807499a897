import type { TransitionError } from './transition.error';

export interface ChildFailure {
  machineType: string;
  instanceId: string;
  state: string;
  error: TransitionError | Error;
}

export class PartialFailureError extends Error {
  constructor(
    public readonly parentType: string,
    public readonly parentId: string,
    public readonly event: string,
    public readonly failures: ChildFailure[],
    public readonly succeeded: number,
  ) {
    super(
      `Broadcast of "${event}" from ${parentType}/${parentId} failed on ` +
        `${failures.length} of ${failures.length + succeeded} children: ` +
        failures.map((f) => `${f.machineType}/${f.instanceId}`).join(', '),
    );
    this.name = 'PartialFailureError';
  }
}
