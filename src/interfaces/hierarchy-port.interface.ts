import type { StateMachineInstance } from '../engines/state-machine-instance';
import type { FireContext } from './machine-definition.interface';
import type { FireOptions, FireResult } from './fire-result.interface';

/**
 * Resolves parent/child links and fires events on linked instances.
 * Implemented in memory by InMemoryHierarchy and over a database by
 * MachineManager.
 */
export interface HierarchyPort {
  loadChildren(
    parent: StateMachineInstance,
    childType?: string,
  ): Promise<StateMachineInstance[]>;

  loadParent(child: StateMachineInstance): Promise<StateMachineInstance | null>;

  fire(
    instance: StateMachineInstance,
    event: string,
    context?: FireContext,
    options?: FireOptions,
  ): Promise<FireResult>;
}
