import type { StateMachineInstance } from '../engines/state-machine-instance';

export type MachineData = Record<string, unknown>;
export type FireContext = Record<string, unknown>;

export interface ActionInput {
  instance: StateMachineInstance;
  event: string;
  /** Caller-supplied payload for this fire. */
  context: FireContext;
  /**
   * Entity data. Guards get a copy, before-actions a draft that is committed
   * with the new state, after-actions the committed data.
   */
  data: MachineData;
  fromState: string;
  toState: string;
  /** Aborted when the fire's guard/before-action timeout elapses. */
  signal?: AbortSignal;
}

export type MachineGuard = (input: ActionInput) => boolean | Promise<boolean>;
export type MachineAction = (input: ActionInput) => void | Promise<void>;

/** Inline function, or the name of an entry in the machine's registry. */
export type GuardRef = string | MachineGuard;
export type ActionRef = string | MachineAction;

export interface StateSpec {
  initial?: boolean;
  terminal?: boolean;
  /** Deadline after entering the state; see TimeoutCronService. */
  timeoutMinutes?: number;
}

export interface TransitionSpec {
  from: string | string[];
  event: string;
  to: string;
  guard?: GuardRef;
  before?: ActionRef | ActionRef[];
  after?: ActionRef | ActionRef[];
}

export interface MachineSpec {
  id: string;
  states: Record<string, StateSpec>;
  events: string[];
  transitions: TransitionSpec[];
  guards?: Record<string, MachineGuard>;
  actions?: Record<string, MachineAction>;
  /** Data a new instance starts with. */
  data?: MachineData;
}
