import type { HierarchyPort } from '../interfaces/hierarchy-port.interface';
import type {
  FireOptions,
  FireResult,
} from '../interfaces/fire-result.interface';
import type { FireContext } from '../interfaces/machine-definition.interface';
import type { StateMachineDefinition } from './state-machine-definition';
import {
  BindOptions,
  StateMachineInstance,
  bind,
} from './state-machine-instance';
import { TransitionExecutor } from './transition-executor';

/**
 * Process-local hierarchy: instances bound here can broadcast to and report
 * to each other without a database.
 */
export class InMemoryHierarchy implements HierarchyPort {
  private readonly instances = new Map<string, StateMachineInstance>();
  private readonly childrenByParent = new Map<string, StateMachineInstance[]>();
  private readonly parentByChild = new Map<string, StateMachineInstance>();

  constructor(
    private readonly executor: TransitionExecutor = new TransitionExecutor(),
  ) {}

  bind(
    definition: StateMachineDefinition,
    initialStateOverride?: string,
    options: Omit<BindOptions, 'hierarchy' | 'executor'> = {},
  ): StateMachineInstance {
    const instance = bind(definition, initialStateOverride, {
      ...options,
      hierarchy: this,
      executor: this.executor,
    });
    if (this.instances.has(instance.key)) {
      throw new Error(`${instance.key} is already bound to this hierarchy`);
    }
    this.instances.set(instance.key, instance);

    const parent = options.parent
      ? this.instances.get(`${options.parent.machineType}:${options.parent.id}`)
      : undefined;
    if (parent) {
      this.link(parent, [instance]);
    }
    return instance;
  }

  /** Adds `children` to `parent`'s links, in order. */
  link(parent: StateMachineInstance, children: StateMachineInstance[]): void {
    for (const instance of [parent, ...children]) {
      if (this.instances.get(instance.key) !== instance) {
        throw new Error(`${instance.key} was not bound through this hierarchy`);
      }
    }

    const linked = this.childrenByParent.get(parent.key) ?? [];
    for (const child of children) {
      const current = this.parentByChild.get(child.key);
      if (current && current !== parent) {
        throw new Error(`${child.key} is already linked to ${current.key}`);
      }
      if (!linked.includes(child)) {
        linked.push(child);
      }
      this.parentByChild.set(child.key, parent);
    }
    this.childrenByParent.set(parent.key, linked);
  }

  async loadChildren(
    parent: StateMachineInstance,
    childType?: string,
  ): Promise<StateMachineInstance[]> {
    const children = this.childrenByParent.get(parent.key) ?? [];
    return childType === undefined
      ? [...children]
      : children.filter((child) => child.machineType === childType);
  }

  async loadParent(
    child: StateMachineInstance,
  ): Promise<StateMachineInstance | null> {
    return this.parentByChild.get(child.key) ?? null;
  }

  fire(
    instance: StateMachineInstance,
    event: string,
    context: FireContext = {},
    options: FireOptions = {},
  ): Promise<FireResult> {
    return this.executor.fire(instance, event, context, options);
  }

  get(machineType: string, id: string): StateMachineInstance | undefined {
    return this.instances.get(`${machineType}:${id}`);
  }
}
