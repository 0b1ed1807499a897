import { Logger } from '@nestjs/common';
import {
  ChildFailure,
  PartialFailureError,
} from '../errors/partial-failure.error';
import type { HierarchyPort } from '../interfaces/hierarchy-port.interface';
import type {
  FireOptions,
  FireResult,
} from '../interfaces/fire-result.interface';
import type {
  FireContext,
  MachineAction,
  MachineGuard,
} from '../interfaces/machine-definition.interface';
import { toArray } from '../utils/to-array';
import type { InstanceRef, StateMachineInstance } from './state-machine-instance';

export interface BroadcastOptions {
  /** Restrict the broadcast to children of this machine type. */
  childType?: string;
  context?: FireContext;
  /**
   * Options for every child fire. Without an idempotency key each child fire
   * gets one derived from the parent's committed version and the event.
   */
  fireOptions?: FireOptions;
}

export interface BroadcastReport {
  parent: InstanceRef;
  event: string;
  results: FireResult[];
  failures: ChildFailure[];
}

export interface ChildStateView extends InstanceRef {
  state: string;
}

export interface ChildrenInStateOptions {
  childType?: string;
  /** Whether a parent without children satisfies the guard. Default: false */
  allowEmpty?: boolean;
}

export interface NotifyParentOptions {
  context?: FireContext;
}

/**
 * Moves transition outcomes between linked instances: parent to children by
 * broadcast, children to parent by notification plus an aggregate guard that
 * reads the children's current states.
 */
export class HierarchicalBridge {
  private readonly logger = new Logger(HierarchicalBridge.name);

  constructor(private readonly port: HierarchyPort) {}

  static of(instance: StateMachineInstance): HierarchicalBridge {
    if (!instance.hierarchy) {
      throw new Error(
        `${instance.key} is not bound to a hierarchy; bind it through InMemoryHierarchy or MachineManager`,
      );
    }
    return new HierarchicalBridge(instance.hierarchy);
  }

  /**
   * Fires `event` on every linked child. Children are fired independently;
   * a failed child never blocks or rolls back its siblings.
   */
  async broadcast(
    parent: StateMachineInstance,
    event: string,
    options: BroadcastOptions = {},
  ): Promise<BroadcastReport> {
    const children = await this.port.loadChildren(parent, options.childType);
    const fireOptions: FireOptions = {
      ...options.fireOptions,
      idempotencyKey:
        options.fireOptions?.idempotencyKey ??
        `${parent.key}@${parent.version}:${event}`,
    };

    const settled = await Promise.allSettled(
      children.map((child) =>
        this.port.fire(child, event, options.context ?? {}, fireOptions),
      ),
    );

    const results: FireResult[] = [];
    const failures: ChildFailure[] = [];
    settled.forEach((outcome, index) => {
      const child = children[index];
      if (outcome.status === 'rejected') {
        failures.push({
          machineType: child.machineType,
          instanceId: child.id,
          state: child.currentState(),
          error:
            outcome.reason instanceof Error
              ? outcome.reason
              : new Error(String(outcome.reason)),
        });
        return;
      }

      results.push(outcome.value);
      if (!outcome.value.ok) {
        failures.push({
          machineType: child.machineType,
          instanceId: child.id,
          state: outcome.value.state,
          error: outcome.value.error,
        });
      }
    });

    this.logger.log(
      `Broadcast "${event}" from ${parent.key}: ${children.length - failures.length}/${children.length} children transitioned`,
    );

    return { parent: parent.ref, event, results, failures };
  }

  async childStates(
    parent: StateMachineInstance,
    childType?: string,
  ): Promise<ChildStateView[]> {
    const children = await this.port.loadChildren(parent, childType);
    return children.map((child) => ({
      machineType: child.machineType,
      id: child.id,
      state: child.currentState(),
    }));
  }

  async allChildrenIn(
    parent: StateMachineInstance,
    states: string | string[],
    options: ChildrenInStateOptions = {},
  ): Promise<boolean> {
    const wanted = toArray(states);
    const children = await this.childStates(parent, options.childType);
    if (children.length === 0) {
      return options.allowEmpty === true;
    }
    return children.every((child) => wanted.includes(child.state));
  }

  /**
   * Fires `event` on the child's parent. Returns null when the child has no
   * parent.
   */
  async reportToParent(
    child: StateMachineInstance,
    event: string,
    context: FireContext = {},
  ): Promise<FireResult | null> {
    const parent = await this.port.loadParent(child);
    if (!parent) {
      return null;
    }
    return this.port.fire(parent, event, {
      ...context,
      reportedBy: child.ref,
    });
  }
}

/**
 * After-action that broadcasts `event` to the instance's children.
 * @throws PartialFailureError naming every child that did not transition
 */
export function broadcastEvent(
  event: string,
  options: BroadcastOptions = {},
): MachineAction {
  return async ({ instance, context }) => {
    const report = await HierarchicalBridge.of(instance).broadcast(
      instance,
      event,
      { ...options, context: options.context ?? context },
    );

    if (report.failures.length > 0) {
      throw new PartialFailureError(
        instance.machineType,
        instance.id,
        event,
        report.failures,
        report.results.filter((result) => result.ok).length,
      );
    }
  };
}

/**
 * Aggregate guard: passes when every linked child is in one of `states`.
 */
export function childrenInState(
  states: string | string[],
  options: ChildrenInStateOptions = {},
): MachineGuard {
  return ({ instance }) =>
    HierarchicalBridge.of(instance).allChildrenIn(instance, states, options);
}

/**
 * After-action that reports the child's transition to its parent. A parent
 * whose aggregate guard is not yet satisfied, or that already moved on, is
 * not a failure.
 */
export function notifyParent(
  event: string,
  options: NotifyParentOptions = {},
): MachineAction {
  return async ({ instance, context }) => {
    const result = await HierarchicalBridge.of(instance).reportToParent(
      instance,
      event,
      options.context ?? context,
    );

    if (
      result &&
      !result.ok &&
      result.error.code !== 'GUARD_REJECTED' &&
      result.error.code !== 'NO_TRANSITION'
    ) {
      throw result.error;
    }
  };
}
