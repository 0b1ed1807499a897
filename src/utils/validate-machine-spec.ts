import { DefinitionError } from '../errors/definition.error';
import type {
  ActionRef,
  MachineSpec,
} from '../interfaces/machine-definition.interface';
import { toArray } from './to-array';

function assertActionRegistered(
  spec: MachineSpec,
  ref: ActionRef,
  where: string,
): void {
  if (typeof ref === 'string' && !declares(spec.actions, ref)) {
    throw new DefinitionError(
      spec.id,
      `${where} references unregistered action "${ref}"`,
    );
  }
}

/** Own keys only; `Object.prototype` members never count as declared. */
export function declares(
  record: Record<string, unknown> | undefined,
  name: string,
): boolean {
  return record !== undefined && Object.hasOwn(record, name);
}

export function validateMachineSpec(spec: MachineSpec): void {
  if (!spec.id || typeof spec.id !== 'string') {
    throw new DefinitionError('', 'id must be a non-empty string');
  }

  const stateNames = Object.keys(spec.states ?? {});
  if (stateNames.length === 0) {
    throw new DefinitionError(spec.id, 'at least one state is required');
  }

  const initials = stateNames.filter((name) => spec.states[name].initial);
  if (initials.length !== 1) {
    throw new DefinitionError(
      spec.id,
      `exactly one initial state is required, found ${initials.length}` +
        (initials.length > 1 ? ` (${initials.join(', ')})` : ''),
    );
  }

  const events = new Set<string>();
  for (const event of spec.events) {
    if (!event) {
      throw new DefinitionError(spec.id, 'event names must be non-empty');
    }
    if (events.has(event)) {
      throw new DefinitionError(spec.id, `event "${event}" is declared twice`);
    }
    if (declares(spec.states, event)) {
      throw new DefinitionError(
        spec.id,
        `event "${event}" collides with a state of the same name`,
      );
    }
    events.add(event);
  }

  for (const [name, state] of Object.entries(spec.states)) {
    if (
      state.timeoutMinutes !== undefined &&
      (typeof state.timeoutMinutes !== 'number' ||
        Number.isNaN(state.timeoutMinutes) ||
        state.timeoutMinutes < 0)
    ) {
      throw new DefinitionError(
        spec.id,
        `state "${name}" has invalid timeoutMinutes`,
      );
    }
  }

  spec.transitions.forEach((transition, index) => {
    const where = `transition #${index} (${transition.event})`;
    const sources = toArray(transition.from);

    if (sources.length === 0) {
      throw new DefinitionError(spec.id, `${where} has no source state`);
    }
    if (!events.has(transition.event)) {
      throw new DefinitionError(
        spec.id,
        `${where} uses undeclared event "${transition.event}"`,
      );
    }
    for (const from of [...sources, transition.to]) {
      if (!declares(spec.states, from)) {
        throw new DefinitionError(
          spec.id,
          `${where} references unknown state "${from}"`,
        );
      }
    }
    for (const from of sources) {
      if (spec.states[from].terminal) {
        throw new DefinitionError(
          spec.id,
          `${where} leaves terminal state "${from}"`,
        );
      }
    }

    if (
      typeof transition.guard === 'string' &&
      !declares(spec.guards, transition.guard)
    ) {
      throw new DefinitionError(
        spec.id,
        `${where} references unregistered guard "${transition.guard}"`,
      );
    }
    for (const ref of [
      ...toArray(transition.before),
      ...toArray(transition.after),
    ]) {
      assertActionRegistered(spec, ref, where);
    }
  });
}
