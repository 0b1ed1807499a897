import 'reflect-metadata';

// Engine
export {
  StateMachineDefinition,
  defineMachine,
} from './engines/state-machine-definition';
export type {
  CompiledTransition,
  NamedAction,
  NamedGuard,
} from './engines/state-machine-definition';
export {
  StateMachineInstance,
  bind,
  fire,
} from './engines/state-machine-instance';
export type {
  BindOptions,
  CommittedTransition,
  InstanceRef,
  InstanceStore,
} from './engines/state-machine-instance';
export { TransitionExecutor } from './engines/transition-executor';
export type { TransitionExecutorOptions } from './engines/transition-executor';
export {
  HierarchicalBridge,
  broadcastEvent,
  childrenInState,
  notifyParent,
} from './engines/hierarchical-bridge';
export type {
  BroadcastOptions,
  BroadcastReport,
  ChildStateView,
  ChildrenInStateOptions,
  NotifyParentOptions,
} from './engines/hierarchical-bridge';
export { InMemoryHierarchy } from './engines/in-memory-hierarchy';
export { KeyedLock } from './utils/keyed-lock';

// Module
export { StateMachineModule } from './state-machine.module';

// Services
export { MachineManager } from './services/machine-manager.service';
export type {
  CreateInstanceOptions,
  MachineManagerOptions,
} from './services/machine-manager.service';
export { MachineRegistry } from './services/machine-registry.service';
export type { RegisteredMachine } from './services/machine-registry.service';
export { TimeoutCronService } from './services/timeout-cron.service';
export type {
  TimeoutCronOptions,
  TimeoutProcessingFailure,
  TimeoutProcessingResult,
} from './services/timeout-cron.service';

// Decorators
export { MachineEntity } from './decorators/machine-entity.decorator';
export type {
  MachineEntityMetadata,
  MachineEntityOptions,
} from './decorators/machine-entity.decorator';

// Interfaces
export type { IMachineDbAdapter } from './interfaces/machine-db-adapter.interface';
export type { HierarchyPort } from './interfaces/hierarchy-port.interface';
export type {
  ActionInput,
  ActionRef,
  FireContext,
  GuardRef,
  MachineAction,
  MachineData,
  MachineGuard,
  MachineSpec,
  StateSpec,
  TransitionSpec,
} from './interfaces/machine-definition.interface';
export type {
  FireFailure,
  FireOptions,
  FireResult,
  FireSuccess,
} from './interfaces/fire-result.interface';
export type {
  ExpectedRevision,
  HistoryRecord,
  MachineRecord,
  NextRevision,
} from './interfaces/machine-records.interface';
export type {
  StateMachineModuleAsyncOptions,
  StateMachineModuleOptions,
} from './interfaces/machine-module-options.interface';

// Adapters
export { DrizzleMachineAdapter } from './adapters/drizzle-machine.adapter';
export { InMemoryMachineAdapter } from './adapters/in-memory-machine.adapter';
export { PgMachineAdapter } from './adapters/pg-machine.adapter';

// Errors
export { TransitionError } from './errors/transition.error';
export type { TransitionErrorCode } from './errors/transition.error';
export { NoTransitionError } from './errors/no-transition.error';
export { GuardRejectedError } from './errors/guard-rejected.error';
export { ActionError } from './errors/action.error';
export type { ActionPhase } from './errors/action.error';
export { ConflictError } from './errors/conflict.error';
export { IdempotencyKeyReusedError } from './errors/idempotency-key-reused.error';
export { TimeoutError } from './errors/timeout.error';
export { PartialFailureError } from './errors/partial-failure.error';
export type { ChildFailure } from './errors/partial-failure.error';
export { DefinitionError } from './errors/definition.error';
export { UnknownStateError } from './errors/unknown-state.error';
export { InvalidRecordError } from './errors/invalid-record.error';
export { InstanceNotFoundError } from './errors/instance-not-found.error';
export { DuplicateInstanceError } from './errors/duplicate-instance.error';
export { MachineNotRegisteredError } from './errors/machine-not-registered.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';

// Events
export { MachineEventType } from './events/machine-event-type.enum';
export type {
  MachineAfterActionFailedEvent,
  MachineCreatedEvent,
  MachineRejectedEvent,
  MachineTimeoutTriggeredEvent,
  MachineTransitionEvent,
} from './events/machine-events';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  MACHINE_MODULE_OPTIONS,
  MACHINE_DB_ADAPTER,
  TRANSITION_EXECUTOR,
  DEFAULT_CRON_EXPRESSION,
  DEFAULT_TIMEOUT_EVENT,
  MACHINE_ENTITY_METADATA,
  TIMEOUT_CRON_JOB_NAME,
} from './state-machine.constants';
