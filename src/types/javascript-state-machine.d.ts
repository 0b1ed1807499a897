declare module 'javascript-state-machine' {
  interface TransitionConfig {
    name: string;
    from: string | string[];
    to: string;
  }

  interface MachineConfig {
    init: string;
    transitions: TransitionConfig[];
  }

  class StateMachine {
    constructor(config: MachineConfig);
    state: string;
    is(state: string): boolean;
    can(transition: string): boolean;
    allStates(): string[];
    [key: string]: unknown;
  }

  export = StateMachine;
}
