import type { TransitionErrorCode } from '../errors/transition.error';

export interface MachineCreatedEvent {
  machineType: string;
  instanceId: string;
  initialState: string;
  parentType: string | null;
  parentId: string | null;
  timestamp: Date;
}

export interface MachineTransitionEvent {
  machineType: string;
  instanceId: string;
  fromState: string;
  toState: string;
  eventType: string;
  version: number;
  context: Record<string, unknown>;
  timestamp: Date;
}

export interface MachineRejectedEvent {
  machineType: string;
  instanceId: string;
  state: string;
  eventType: string;
  code: TransitionErrorCode;
  reason: string;
  timestamp: Date;
}

export interface MachineAfterActionFailedEvent {
  machineType: string;
  instanceId: string;
  state: string;
  eventType: string;
  actionName: string;
  reason: string;
  timestamp: Date;
}

export interface MachineTimeoutTriggeredEvent {
  machineType: string;
  instanceId: string;
  fromState: string;
  toState: string;
  timestamp: Date;
}
