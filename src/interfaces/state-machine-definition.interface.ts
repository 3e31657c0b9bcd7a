export interface StateTransitionInfo<L extends string> {
  /** `null` only when entering the initial state. */
  fromState: L | null;
  toState: L;
}

/** Hooks are synchronous: a hook returning a promise fails the transition. */
export type StateHook<L extends string> = (
  transition: StateTransitionInfo<L>,
) => void;

export interface StateDefinition<L extends string> {
  /** Labels reachable from this state. An empty list marks a terminal state. */
  allowed: readonly L[];
  entry?: StateHook<L> | StateHook<L>[];
  exit?: StateHook<L> | StateHook<L>[];
}

export interface StateMachineDefinition<L extends string> {
  id: string;
  initial: L;
  states: Record<L, StateDefinition<L>>;
  /**
   * State entered when a transition fails. Must be reachable from every
   * non-terminal state. Without it, a failed transition is rethrown.
   */
  failureState?: L;
}

export enum StateEventHook {
  ENTERING = 'entering',
  ENTERED = 'entered',
  EXITING = 'exiting',
}

export type StateEventCallback<L extends string> = (
  hook: StateEventHook,
  transition: StateTransitionInfo<L>,
) => void;

export interface TransitionFailure<L extends string> {
  fromState: L | null;
  toState: L;
  error: Error;
}
