import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { MachineRegistry, RegisteredMachine } from './machine-registry.service';
import { IMachineDbAdapter } from '../interfaces/machine-db-adapter.interface';
import type { HierarchyPort } from '../interfaces/hierarchy-port.interface';
import type {
  FireOptions,
  FireResult,
} from '../interfaces/fire-result.interface';
import type {
  FireContext,
  MachineData,
} from '../interfaces/machine-definition.interface';
import type { MachineRecord } from '../interfaces/machine-records.interface';
import { MachineEventType } from '../events/machine-event-type.enum';
import type {
  MachineAfterActionFailedEvent,
  MachineCreatedEvent,
  MachineRejectedEvent,
  MachineTransitionEvent,
} from '../events/machine-events';
import { DuplicateInstanceError } from '../errors/duplicate-instance.error';
import { InstanceNotFoundError } from '../errors/instance-not-found.error';
import {
  InstanceRef,
  StateMachineInstance,
  bind,
} from '../engines/state-machine-instance';
import { TransitionExecutor } from '../engines/transition-executor';
import { getTimeoutExpiry } from '../utils/get-timeout-expiry';
import { hydrateRecord } from '../utils/hydrate-record';
import {
  MACHINE_DB_ADAPTER,
  MACHINE_MODULE_OPTIONS,
  TRANSITION_EXECUTOR,
} from '../state-machine.constants';

export interface MachineManagerOptions {
  fireTimeoutMs?: number;
}

export interface CreateInstanceOptions {
  /** Defaults to a random UUID. */
  id?: string;
  data?: MachineData;
  /** Parent instance; its table name is the parent's machine type. */
  parent?: InstanceRef;
  /** Start somewhere other than the definition's initial state. */
  initialState?: string;
}

/**
 * Creates, loads and fires persisted instances. Instances it returns commit
 * through the adapter and resolve their parent and children through it, so
 * the hierarchical bridge works across tables.
 */
@Injectable()
export class MachineManager implements HierarchyPort {
  private readonly logger = new Logger(MachineManager.name);
  private readonly executor: TransitionExecutor;

  constructor(
    private readonly registry: MachineRegistry,
    @Inject(MACHINE_DB_ADAPTER) private readonly adapter: IMachineDbAdapter,
    private readonly eventEmitter: EventEmitter2,
    @Inject(MACHINE_MODULE_OPTIONS)
    options: MachineManagerOptions,
    @Optional() @Inject(TRANSITION_EXECUTOR) executor?: TransitionExecutor,
  ) {
    this.executor =
      executor ??
      new TransitionExecutor({ defaultTimeoutMs: options.fireTimeoutMs });
  }

  async create(
    tableName: string,
    options: CreateInstanceOptions = {},
  ): Promise<StateMachineInstance> {
    const registration = this.registry.getOrThrow(tableName);

    if (options.parent) {
      this.registry.getOrThrow(options.parent.machineType);
      const parentRow = await this.adapter.findOne(
        options.parent.machineType,
        options.parent.id,
      );
      if (!parentRow) {
        throw new InstanceNotFoundError(
          options.parent.machineType,
          options.parent.id,
        );
      }
    }

    const instance = this.instantiate(registration, options.initialState, {
      id: options.id,
      data: options.data,
      version: 0,
      parent: options.parent ?? null,
    });
    const state = instance.currentState();

    const inserted = await this.adapter.insert(tableName, {
      id: instance.id,
      stateValue: state,
      version: 0,
      data: instance.data,
      parentType: instance.parent?.machineType ?? null,
      parentId: instance.parent?.id ?? null,
      expiresAt: getTimeoutExpiry(registration.definition, state),
    });
    if (!inserted) {
      throw new DuplicateInstanceError(tableName, instance.id);
    }

    this.eventEmitter.emit(MachineEventType.CREATED, {
      machineType: tableName,
      instanceId: instance.id,
      initialState: state,
      parentType: instance.parent?.machineType ?? null,
      parentId: instance.parent?.id ?? null,
      timestamp: new Date(),
    } satisfies MachineCreatedEvent);

    this.logger.log(`Created ${tableName}/${instance.id} in state ${state}`);
    return instance;
  }

  async load(tableName: string, id: string): Promise<StateMachineInstance> {
    const registration = this.registry.getOrThrow(tableName);
    const record = await this.adapter.findOne(tableName, id);
    if (!record) {
      throw new InstanceNotFoundError(tableName, id);
    }
    return this.hydrate(registration, record);
  }

  /**
   * Loads the instance and fires `event` on it.
   * @throws InstanceNotFoundError when the row does not exist
   */
  async send(
    tableName: string,
    id: string,
    event: string,
    context: FireContext = {},
    options: FireOptions = {},
  ): Promise<FireResult> {
    const instance = await this.load(tableName, id);
    return this.fire(instance, event, context, options);
  }

  async fire(
    instance: StateMachineInstance,
    event: string,
    context: FireContext = {},
    options: FireOptions = {},
  ): Promise<FireResult> {
    const result = await this.executor.fire(instance, event, context, options);

    if (!result.ok) {
      this.logger.warn(result.error.message);
      this.eventEmitter.emit(MachineEventType.REJECTED, {
        machineType: result.machineType,
        instanceId: result.instanceId,
        state: result.state,
        eventType: event,
        code: result.error.code,
        reason: result.error.message,
        timestamp: new Date(),
      } satisfies MachineRejectedEvent);
      return result;
    }

    if (result.duplicate) {
      return result;
    }

    this.eventEmitter.emit(MachineEventType.TRANSITION, {
      machineType: result.machineType,
      instanceId: result.instanceId,
      fromState: result.fromState,
      toState: result.state,
      eventType: event,
      version: result.version,
      context,
      timestamp: new Date(),
    } satisfies MachineTransitionEvent);

    for (const actionError of result.afterActionErrors) {
      this.eventEmitter.emit(MachineEventType.AFTER_ACTION_FAILED, {
        machineType: result.machineType,
        instanceId: result.instanceId,
        state: result.state,
        eventType: event,
        actionName: actionError.actionName,
        reason: actionError.message,
        timestamp: new Date(),
      } satisfies MachineAfterActionFailedEvent);
    }

    this.logger.log(
      `${result.machineType}/${result.instanceId}: ${result.fromState} -> ${result.state} on "${event}" (v${result.version})`,
    );
    return result;
  }

  async canFire(
    tableName: string,
    id: string,
    event: string,
    context: FireContext = {},
  ): Promise<boolean> {
    const instance = await this.load(tableName, id);
    return this.executor.canFire(instance, event, context);
  }

  async findByState(
    tableName: string,
    stateValue: string,
  ): Promise<StateMachineInstance[]> {
    const registration = this.registry.getOrThrow(tableName);
    const records = await this.adapter.findByState(tableName, stateValue);
    return records.map((record) => this.hydrate(registration, record));
  }

  /**
   * Children are looked up in `childType`'s table, or in every registered
   * table when it is omitted.
   */
  async loadChildren(
    parent: StateMachineInstance,
    childType?: string,
  ): Promise<StateMachineInstance[]> {
    const registrations =
      childType === undefined
        ? this.registry.getAll()
        : [this.registry.getOrThrow(childType)];

    const children: StateMachineInstance[] = [];
    for (const registration of registrations) {
      const records = await this.adapter.findChildren(
        registration.tableName,
        parent.machineType,
        parent.id,
      );
      for (const record of records) {
        children.push(this.hydrate(registration, record));
      }
    }
    return children;
  }

  async loadParent(
    child: StateMachineInstance,
  ): Promise<StateMachineInstance | null> {
    if (!child.parent) {
      return null;
    }
    return this.load(child.parent.machineType, child.parent.id);
  }

  private hydrate(
    registration: RegisteredMachine,
    record: MachineRecord,
  ): StateMachineInstance {
    const seed = hydrateRecord(
      registration.tableName,
      registration.definition,
      record,
    );
    return this.instantiate(registration, seed.state, {
      id: record.id,
      data: seed.data,
      version: seed.version,
      parent: seed.parent,
    });
  }

  private instantiate(
    registration: RegisteredMachine,
    state: string | undefined,
    options: {
      id?: string;
      data?: MachineData;
      version: number;
      parent: InstanceRef | null;
    },
  ): StateMachineInstance {
    return bind(registration.definition, state, {
      ...options,
      machineType: registration.tableName,
      store: { adapter: this.adapter, tableName: registration.tableName },
      hierarchy: this,
      executor: this.executor,
    });
  }
}
