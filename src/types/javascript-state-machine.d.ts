// javascript-state-machine 3.x ships no typings and @types/javascript-state-machine
// only describes the 2.x factory API.
declare module 'javascript-state-machine' {
  interface Lifecycle {
    transition: string;
    from: string;
    to: string;
  }

  interface Transition {
    name: string;
    from: string | string[];
    to: string;
  }

  interface Config {
    init: string;
    transitions: Transition[];
  }

  class StateMachine {
    constructor(config: Config);
    state: string;
    can(transition: string): boolean;
    is(state: string): boolean;
    observe(event: string, fn: (lifecycle: Lifecycle) => void): void;
    [key: string]: unknown;
  }

  export = StateMachine;
}
