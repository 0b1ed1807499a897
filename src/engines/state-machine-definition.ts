import type {
  ActionRef,
  GuardRef,
  MachineAction,
  MachineData,
  MachineGuard,
  MachineSpec,
  StateSpec,
} from '../interfaces/machine-definition.interface';
import { cloneData } from '../utils/clone-data';
import { toArray } from '../utils/to-array';
import {
  declares,
  validateMachineSpec,
} from '../utils/validate-machine-spec';

export interface NamedGuard {
  readonly name: string;
  readonly run: MachineGuard;
}

export interface NamedAction {
  readonly name: string;
  readonly run: MachineAction;
}

export interface CompiledTransition {
  /** Unique per definition; also the transition name in the instance FSM. */
  readonly name: string;
  readonly from: string;
  readonly event: string;
  readonly to: string;
  readonly guard?: NamedGuard;
  readonly before: readonly NamedAction[];
  readonly after: readonly NamedAction[];
}

function candidateKey(from: string, event: string): string {
  return `${from}\u0000${event}`;
}

function inlineName(fn: { name: string }, fallback: string): string {
  return fn.name || fallback;
}

/**
 * Immutable, validated machine description shared by every instance of one
 * entity type. Build it with {@link defineMachine}.
 */
export class StateMachineDefinition {
  readonly id: string;
  readonly initial: string;
  readonly states: readonly string[];
  readonly terminalStates: readonly string[];
  readonly events: readonly string[];
  readonly transitions: readonly CompiledTransition[];

  private readonly stateSpecs: ReadonlyMap<string, Readonly<StateSpec>>;
  private readonly byCandidateKey: ReadonlyMap<string, readonly CompiledTransition[]>;
  private readonly seedData: MachineData;

  constructor(spec: MachineSpec) {
    validateMachineSpec(spec);

    const stateNames = Object.keys(spec.states);
    this.id = spec.id;
    this.initial = stateNames.filter((name) => spec.states[name].initial)[0];
    this.states = Object.freeze([...stateNames]);
    this.terminalStates = Object.freeze(
      stateNames.filter((name) => spec.states[name].terminal),
    );
    this.events = Object.freeze([...spec.events]);
    this.stateSpecs = new Map(
      stateNames.map((name) => [name, Object.freeze({ ...spec.states[name] })]),
    );
    this.seedData = cloneData(spec.data ?? {});

    const compiled: CompiledTransition[] = [];
    const index = new Map<string, CompiledTransition[]>();
    spec.transitions.forEach((transition, position) => {
      for (const from of toArray(transition.from)) {
        const entry: CompiledTransition = Object.freeze({
          name: `t${compiled.length}`,
          from,
          event: transition.event,
          to: transition.to,
          guard:
            transition.guard === undefined
              ? undefined
              : this.resolveGuard(spec, transition.guard, position),
          before: Object.freeze(
            toArray(transition.before).map((ref, i) =>
              this.resolveAction(spec, ref, `before#${position}.${i}`),
            ),
          ),
          after: Object.freeze(
            toArray(transition.after).map((ref, i) =>
              this.resolveAction(spec, ref, `after#${position}.${i}`),
            ),
          ),
        });
        compiled.push(entry);

        const key = candidateKey(from, transition.event);
        const bucket = index.get(key) ?? [];
        bucket.push(entry);
        index.set(key, bucket);
      }
    });

    this.transitions = Object.freeze(compiled);
    this.byCandidateKey = index;
    Object.freeze(this);
  }

  hasState(state: string): boolean {
    return this.stateSpecs.has(state);
  }

  isTerminal(state: string): boolean {
    return this.stateSpecs.get(state)?.terminal === true;
  }

  hasEvent(event: string): boolean {
    return this.events.includes(event);
  }

  timeoutMinutes(state: string): number | undefined {
    return this.stateSpecs.get(state)?.timeoutMinutes;
  }

  /** Transitions for `(from, event)`, in declaration order. */
  candidates(from: string, event: string): readonly CompiledTransition[] {
    return this.byCandidateKey.get(candidateKey(from, event)) ?? [];
  }

  defaultData(): MachineData {
    return cloneData(this.seedData);
  }

  private resolveGuard(
    spec: MachineSpec,
    ref: GuardRef,
    position: number,
  ): NamedGuard {
    if (typeof ref === 'string') {
      const run = declares(spec.guards, ref) ? spec.guards?.[ref] : undefined;
      if (!run) {
        throw new Error(`Guard "${ref}" vanished after validation`);
      }
      return { name: ref, run };
    }
    return { name: inlineName(ref, `guard#${position}`), run: ref };
  }

  private resolveAction(
    spec: MachineSpec,
    ref: ActionRef,
    fallback: string,
  ): NamedAction {
    if (typeof ref === 'string') {
      const run = declares(spec.actions, ref) ? spec.actions?.[ref] : undefined;
      if (!run) {
        throw new Error(`Action "${ref}" vanished after validation`);
      }
      return { name: ref, run };
    }
    return { name: inlineName(ref, fallback), run: ref };
  }
}

/**
 * Validates `spec` and publishes it as a frozen definition.
 * @throws DefinitionError when the spec is malformed
 */
export function defineMachine(spec: MachineSpec): StateMachineDefinition {
  return new StateMachineDefinition(spec);
}
