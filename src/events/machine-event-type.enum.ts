export enum MachineEventType {
  CREATED = 'state-machine.created',
  TRANSITION = 'state-machine.transition',
  REJECTED = 'state-machine.rejected',
  AFTER_ACTION_FAILED = 'state-machine.after-action-failed',
  TIMEOUT_TRIGGERED = 'state-machine.timeout.triggered',
}
