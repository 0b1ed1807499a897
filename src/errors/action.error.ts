import { TransitionError } from './transition.error';

/**
 * `before`: the transition was aborted and the state is unchanged.
 * `after`: the transition committed; only the follow-up action failed.
 */
export type ActionPhase = 'before' | 'after';

export class ActionError extends TransitionError {
  readonly code = 'ACTION_FAILED' as const;

  constructor(
    public readonly phase: ActionPhase,
    public readonly actionName: string,
    machineType: string,
    instanceId: string,
    state: string,
    event: string,
    cause: unknown,
  ) {
    super(
      machineType,
      instanceId,
      state,
      event,
      `${phase === 'before' ? 'Before' : 'After'}-action "${actionName}" failed for "${event}" ` +
        `on ${machineType}/${instanceId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'ActionError';
  }

  get committed(): boolean {
    return this.phase === 'after';
  }
}
