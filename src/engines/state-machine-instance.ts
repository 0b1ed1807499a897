import { randomUUID } from 'crypto';
import StateMachine from 'javascript-state-machine';
import { UnknownStateError } from '../errors/unknown-state.error';
import type { IMachineDbAdapter } from '../interfaces/machine-db-adapter.interface';
import type { HierarchyPort } from '../interfaces/hierarchy-port.interface';
import type {
  FireContext,
  MachineData,
} from '../interfaces/machine-definition.interface';
import type {
  FireOptions,
  FireResult,
} from '../interfaces/fire-result.interface';
import { cloneData } from '../utils/clone-data';
import type {
  CompiledTransition,
  StateMachineDefinition,
} from './state-machine-definition';
import { TransitionExecutor } from './transition-executor';

export interface InstanceRef {
  machineType: string;
  id: string;
}

/** Row an instance commits to. */
export interface InstanceStore {
  adapter: IMachineDbAdapter;
  tableName: string;
}

export interface CommittedTransition {
  event: string;
  fromState: string;
  toState: string;
  /** Version the commit produced; 0 when read back from a store journal. */
  version: number;
}

export interface BindOptions {
  id?: string;
  /** Defaults to the definition id. */
  machineType?: string;
  data?: MachineData;
  version?: number;
  parent?: InstanceRef | null;
  store?: InstanceStore;
  hierarchy?: HierarchyPort;
  /** Executor used by `fire`/`canFire` on this instance. */
  executor?: TransitionExecutor;
}

const defaultExecutor = new TransitionExecutor();

/**
 * One entity's runtime binding to a shared definition. The current state is
 * held by a javascript-state-machine FSM compiled from the definition, and
 * changes only through {@link TransitionExecutor} commits.
 */
export class StateMachineInstance {
  readonly id: string;
  readonly machineType: string;
  readonly parent: InstanceRef | null;
  readonly store?: InstanceStore;
  readonly hierarchy?: HierarchyPort;

  private fsm: StateMachine;
  private currentVersion: number;
  private currentData: MachineData;
  private readonly executor: TransitionExecutor;
  private readonly committedKeys = new Map<string, CommittedTransition>();

  constructor(
    readonly definition: StateMachineDefinition,
    state: string,
    options: BindOptions = {},
  ) {
    if (!definition.hasState(state)) {
      throw new UnknownStateError(definition.id, state);
    }

    this.id = options.id ?? randomUUID();
    this.machineType = options.machineType ?? definition.id;
    this.parent = options.parent ?? null;
    this.store = options.store;
    this.hierarchy = options.hierarchy;
    this.executor = options.executor ?? defaultExecutor;
    this.currentVersion = options.version ?? 0;
    this.currentData = cloneData({
      ...definition.defaultData(),
      ...(options.data ?? {}),
    });
    this.fsm = this.createFsm(state);
  }

  currentState(): string {
    return this.fsm.state;
  }

  get version(): number {
    return this.currentVersion;
  }

  /** Copy of the committed entity data. */
  get data(): MachineData {
    return cloneData(this.currentData);
  }

  /** Lock key; unique per machine type and id. */
  get key(): string {
    return `${this.machineType}:${this.id}`;
  }

  get ref(): InstanceRef {
    return { machineType: this.machineType, id: this.id };
  }

  isTerminal(): boolean {
    return this.definition.isTerminal(this.fsm.state);
  }

  canFire(event: string, context: FireContext = {}): Promise<boolean> {
    return this.executor.canFire(this, event, context);
  }

  fire(
    event: string,
    context: FireContext = {},
    options: FireOptions = {},
  ): Promise<FireResult> {
    return this.executor.fire(this, event, context, options);
  }

  /**
   * Looks up an idempotency key, first among this object's own commits, then
   * in the store's transition journal.
   */
  async findCommitted(
    idempotencyKey: string,
  ): Promise<CommittedTransition | null> {
    const local = this.committedKeys.get(idempotencyKey);
    if (local) return local;
    if (!this.store) return null;

    const history = await this.store.adapter.findHistoryByKey(
      this.store.tableName,
      this.id,
      idempotencyKey,
    );
    if (!history) return null;

    return {
      event: history.eventType,
      fromState: history.fromState,
      toState: history.toState,
      version: 0,
    };
  }

  /**
   * Applies a commit the executor has made durable. Only the executor calls
   * this, while holding the instance lock.
   * @internal
   */
  applyCommit(
    transition: CompiledTransition,
    version: number,
    data: MachineData,
    idempotencyKey?: string,
  ): void {
    if (!this.fsm.can(transition.name)) {
      throw new Error(
        `Transition ${transition.name} (${transition.from} -> ${transition.to}) ` +
          `is not legal from "${this.fsm.state}" on ${this.key}`,
      );
    }

    const transitionFn = this.fsm[transition.name];
    if (typeof transitionFn !== 'function') {
      throw new Error(
        `Compiled transition ${transition.name} is not available on ${this.key}`,
      );
    }
    transitionFn.call(this.fsm);

    this.currentVersion = version;
    this.currentData = cloneData(data);
    if (idempotencyKey) {
      this.committedKeys.set(idempotencyKey, {
        event: transition.event,
        fromState: transition.from,
        toState: transition.to,
        version,
      });
    }
  }

  private createFsm(state: string): StateMachine {
    return new StateMachine({
      init: state,
      transitions: this.definition.transitions.map((transition) => ({
        name: transition.name,
        from: transition.from,
        to: transition.to,
      })),
    });
  }
}

/**
 * Binds a definition to a new entity, in the initial state unless
 * `initialStateOverride` names another declared state.
 * @throws UnknownStateError for an undeclared override
 */
export function bind(
  definition: StateMachineDefinition,
  initialStateOverride?: string,
  options: BindOptions = {},
): StateMachineInstance {
  return new StateMachineInstance(
    definition,
    initialStateOverride ?? definition.initial,
    options,
  );
}

/** Free-function form of {@link StateMachineInstance.fire}. */
export function fire(
  instance: StateMachineInstance,
  event: string,
  context: FireContext = {},
  options: FireOptions = {},
): Promise<FireResult> {
  return instance.fire(event, context, options);
}
