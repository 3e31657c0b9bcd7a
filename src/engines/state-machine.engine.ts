import StateMachineRuntime from 'javascript-state-machine';
import { Logger } from '@nestjs/common';
import { InvalidStateError } from '../errors/invalid-state.error';
import { TransitionError } from '../errors/transition.error';
import {
  StateEventHook,
  type StateDefinition,
  type StateEventCallback,
  type StateHook,
  type StateMachineDefinition,
  type StateTransitionInfo,
  type TransitionFailure,
} from '../interfaces/state-machine-definition.interface';
import { toError } from '../utils/to-error';
import { validateStateMachineDefinition } from '../utils/validate-state-machine-definition';
import { DEFAULT_MAX_HISTORY } from '../process.constants';

interface CompiledTransition {
  name: string;
  from: string;
  to: string;
}

function toArray<T>(value?: T | T[]): T[] {
  if (!value) return [];
  return Array.isArray(value) ? value : [value];
}

function edgeKey(from: string, to: string): string {
  return `${from}->${to}`;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Finite state machine over a fixed transition table.
 *
 * The table is compiled into a javascript-state-machine runtime which holds
 * the authoritative edge set; this class layers entry/exit hooks, transition
 * callbacks, a bounded history and failure capture on top of it. Transitions
 * are synchronous and never nest.
 */
export class StateMachine<L extends string> {
  private readonly machineLogger = new Logger(StateMachine.name);
  private readonly compiled: CompiledTransition[] = [];
  private readonly edges = new Map<string, string>();
  private readonly callbacks = new Map<StateEventHook, StateEventCallback<L>[]>();
  private readonly stateHistory: L[] = [];
  private runtime: StateMachineRuntime | null = null;
  private current: L | null = null;
  private transitioning = false;
  private transitionFailing = false;
  private lastFailure: TransitionFailure<L> | null = null;

  constructor(
    protected readonly definition: StateMachineDefinition<L>,
    private readonly maxHistory: number = DEFAULT_MAX_HISTORY,
  ) {
    validateStateMachineDefinition(definition);
    this.buildCompiledTransitions();
  }

  get machineId(): string {
    return this.definition.id;
  }

  get isInitialized(): boolean {
    return this.current !== null;
  }

  get state(): L {
    if (this.current === null) {
      throw new InvalidStateError(
        this.definition.id,
        null,
        `State machine ${this.definition.id} has not been initialized`,
      );
    }
    return this.current;
  }

  get history(): readonly L[] {
    return [...this.stateHistory];
  }

  get failure(): TransitionFailure<L> | null {
    return this.lastFailure;
  }

  get isTransitioning(): boolean {
    return this.transitioning;
  }

  isTerminal(label: L = this.state): boolean {
    return this.definition.states[label].allowed.length === 0;
  }

  canTransitionTo(label: L): boolean {
    if (this.current === null || this.runtime === null) return false;
    const name = this.edges.get(edgeKey(this.current, label));
    return name !== undefined && this.runtime.can(name);
  }

  addStateEventCallback(
    hook: StateEventHook,
    callback: StateEventCallback<L>,
  ): void {
    const existing = this.callbacks.get(hook) ?? [];
    existing.push(callback);
    this.callbacks.set(hook, existing);
  }

  removeStateEventCallback(
    hook: StateEventHook,
    callback: StateEventCallback<L>,
  ): void {
    const existing = this.callbacks.get(hook) ?? [];
    const index = existing.indexOf(callback);
    if (index < 0) {
      throw new Error(`Callback not set for hook "${hook}"`);
    }
    existing.splice(index, 1);
  }

  /** Enters the initial (or given) state, firing its entry hooks. */
  initialize(label: L = this.definition.initial): void {
    if (this.current !== null) {
      throw new InvalidStateError(
        this.definition.id,
        this.current,
        `State machine ${this.definition.id} is already initialized`,
      );
    }

    this.runGuarded(null, label, () => {
      const info: StateTransitionInfo<L> = { fromState: null, toState: label };
      this.fireStateEvent(StateEventHook.ENTERING, info);
      this.runHooks(this.definition.states[label].entry, info);
      this.runtime = new StateMachineRuntime({
        init: label,
        transitions: this.compiled,
      });
      this.commit(label);
      this.fireStateEvent(StateEventHook.ENTERED, info);
      this.onStateEntered(info);
    });
  }

  /** Sets the current state without running hooks, for reconstruction. */
  restore(label: L, history: readonly L[] = [label]): void {
    if (this.current !== null) {
      throw new InvalidStateError(
        this.definition.id,
        this.current,
        `State machine ${this.definition.id} is already initialized`,
      );
    }
    if (!(label in this.definition.states)) {
      throw new InvalidStateError(
        this.definition.id,
        null,
        `Unknown state "${label}" for machine ${this.definition.id}`,
      );
    }

    this.runtime = new StateMachineRuntime({
      init: label,
      transitions: this.compiled,
    });
    this.current = label;
    this.stateHistory.length = 0;
    this.stateHistory.push(...history.slice(-this.maxHistory));
  }

  transitionTo(label: L): void {
    const fromState = this.state;

    if (this.transitioning) {
      throw new TransitionError(
        this.definition.id,
        fromState,
        label,
        `Cannot transition ${this.definition.id} to ${label} while another transition is in progress`,
      );
    }

    this.runGuarded(fromState, label, () => {
      const name = this.edges.get(edgeKey(fromState, label));
      if (name === undefined || this.runtime === null || !this.runtime.can(name)) {
        throw new TransitionError(
          this.definition.id,
          fromState,
          label,
          this.isTerminal(fromState)
            ? `Cannot transition ${this.definition.id} out of terminal state ${fromState}`
            : `Cannot transition ${this.definition.id} from ${fromState} to ${label}`,
        );
      }

      const info: StateTransitionInfo<L> = { fromState, toState: label };

      if (!this.transitionFailing) {
        this.fireStateEvent(StateEventHook.EXITING, info);
        this.runHooks(this.definition.states[fromState].exit, info);
        this.onStateExiting(info);
      }

      this.fireStateEvent(StateEventHook.ENTERING, info);
      this.runHooks(this.definition.states[label].entry, info);

      const transitionFn = this.runtime[name];
      if (typeof transitionFn !== 'function') {
        throw new Error(
          `Compiled transition ${name} is not available on runtime machine`,
        );
      }
      transitionFn.call(this.runtime);

      if (this.runtime.state !== label) {
        throw new Error(
          `Runtime machine settled in ${this.runtime.state} instead of ${label}`,
        );
      }

      this.commit(label);
      this.fireStateEvent(StateEventHook.ENTERED, info);
      this.onStateEntered(info);
    });
  }

  /**
   * Called when a transition fails. The default moves the machine to the
   * definition's failure state, or rethrows when there is none or the machine
   * is already terminal.
   */
  protected transitionFailed(failure: TransitionFailure<L>): void {
    const failureState = this.definition.failureState;
    const current = this.current;

    if (
      failureState === undefined ||
      current === null ||
      this.isTerminal(current) ||
      this.transitionFailing
    ) {
      throw failure.error;
    }

    this.transitionFailing = true;
    try {
      this.transitionTo(failureState);
    } finally {
      this.transitionFailing = false;
    }
  }

  protected onStateEntered(_transition: StateTransitionInfo<L>): void {}

  protected onStateExiting(_transition: StateTransitionInfo<L>): void {}

  private runGuarded(fromState: L | null, toState: L, body: () => void): void {
    this.transitioning = true;
    try {
      body();
    } catch (caught) {
      this.transitioning = false;
      const error = toError(caught);
      if (this.transitionFailing) {
        throw error;
      }
      this.lastFailure = { fromState, toState, error };
      this.transitionFailed(this.lastFailure);
    } finally {
      this.transitioning = false;
    }
  }

  private commit(label: L): void {
    this.current = label;
    this.stateHistory.push(label);
    if (this.stateHistory.length > this.maxHistory) {
      this.stateHistory.splice(0, this.stateHistory.length - this.maxHistory);
    }
  }

  private runHooks(
    hooks: StateHook<L> | StateHook<L>[] | undefined,
    info: StateTransitionInfo<L>,
  ): void {
    for (const hook of toArray(hooks)) {
      const result: unknown = hook(info);
      if (isPromiseLike(result)) {
        Promise.resolve(result).catch((error: unknown) => {
          this.machineLogger.error(
            `Asynchronous hook of ${this.definition.id} rejected after its transition failed`,
            error instanceof Error ? error.stack : error,
          );
        });
        throw new TransitionError(
          this.definition.id,
          info.fromState,
          info.toState,
          `State hooks of ${this.definition.id} must be synchronous`,
        );
      }
    }
  }

  private fireStateEvent(
    hook: StateEventHook,
    info: StateTransitionInfo<L>,
  ): void {
    for (const callback of [...(this.callbacks.get(hook) ?? [])]) {
      callback(hook, info);
    }
  }

  private buildCompiledTransitions(): void {
    let counter = 0;

    for (const [stateName, stateDef] of Object.entries<StateDefinition<L>>(
      this.definition.states,
    )) {
      const allowed: readonly string[] = stateDef.allowed;
      for (const target of allowed) {
        const name = `tr${counter++}`;
        this.compiled.push({ name, from: stateName, to: target });
        this.edges.set(edgeKey(stateName, target), name);
      }
    }
  }
}
