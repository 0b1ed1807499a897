import type { StateMachineDefinition } from '../engines/state-machine-definition';

/**
 * Calculates the deadline for the given state from its timeoutMinutes.
 */
export function getTimeoutExpiry(
  definition: StateMachineDefinition,
  stateValue: string,
  now?: Date,
): Date | null {
  const minutes = definition.timeoutMinutes(stateValue);
  if (minutes === undefined) {
    return null;
  }

  const baseTime = now ?? new Date();
  return new Date(baseTime.getTime() + minutes * 60 * 1000);
}
