import { randomUUID } from 'crypto';
import { Logger } from '@nestjs/common';
import { StateMachine } from '../engines/state-machine.engine';
import { ProcessControlRouter } from '../communications/process-control-router';
import {
  buildStateChanged,
  stateChangedTopic,
} from '../communications/control-messages';
import { getProcessTypeId } from '../decorators/process-type.decorator';
import { BroadcastDeliveryWarning } from '../errors/broadcast-delivery.warning';
import { InvalidStateError } from '../errors/invalid-state.error';
import { ProcessKilledError } from '../errors/process-killed.error';
import { ReconstructionError } from '../errors/reconstruction.error';
import { StepError } from '../errors/step.error';
import type { IProcessBroker } from '../interfaces/process-broker.interface';
import type { IProcessCheckpointer } from '../interfaces/process-checkpointer.interface';
import type { ProcessListener } from '../interfaces/process-listener.interface';
import type {
  JsonObject,
  JsonValue,
  ProcessBundle,
  ProcessValues,
  StatusReport,
} from '../interfaces/process-records.interface';
import type {
  StateTransitionInfo,
  TransitionFailure,
} from '../interfaces/state-machine-definition.interface';
import { DEFAULT_BROADCAST_TIMEOUT_MS } from '../process.constants';
import { toError } from '../utils/to-error';
import { withTimeout } from '../utils/with-timeout';
import { ProcessState, createProcessDefinition } from './process-states';
import {
  assertNever,
  finishWith,
  isStepDirective,
  raiseError,
  type StepDirective,
  type WaitDirective,
} from './step-directives';

export interface ProcessOptions {
  /** Generated when omitted. */
  pid?: string;
  inputs?: ProcessValues;
  broker?: IProcessBroker;
  checkpointer?: IProcessCheckpointer;
  broadcastTimeoutMs?: number;
  listeners?: ProcessListener[];
}

export type ProcessConstructor<P extends Process = Process> = new (
  options?: ProcessOptions,
) => P;

interface NextStep {
  step: string;
  args: unknown[];
}

interface WaitingOn {
  step: string;
  message: string | null;
  data: unknown;
}

type Resumption =
  | { kind: 'value'; args: unknown[] }
  | { kind: 'error'; error: Error };

interface Outcome {
  successful: boolean;
  exitCode: number | null;
}

/** Name of the step executed on the first RUNNING entry. */
export const INITIAL_STEP = 'run';

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

/**
 * A resumable unit of work driven by the process state machine.
 *
 * Subclasses implement `run()` and any further step methods; each step
 * returns a directive (see `step-directives.ts`) naming where to go next.
 * Every step executes on its own turn of the event loop, so the continuation
 * recorded on each transition is always a step boundary.
 */
export abstract class Process extends StateMachine<ProcessState> {
  protected readonly logger: Logger;
  readonly inputs: Readonly<ProcessValues>;

  private readonly broker: IProcessBroker | null;
  private readonly checkpointer: IProcessCheckpointer | null;
  private readonly broadcastTimeoutMs: number;
  private readonly listeners = new Set<ProcessListener>();
  private readonly recordedOutputs: ProcessValues = {};

  private nextStep: NextStep = { step: INITIAL_STEP, args: [] };
  private waiting: WaitingOn | null = null;
  private pendingResume: Resumption | null = null;
  private outcome: Outcome | null = null;
  private exceptionValue: Error | null = null;
  private killMessageValue: string | null = null;
  private statusText: string | null = null;
  private isPaused = false;

  private stepping = false;
  private closed = false;
  private stepGeneration = 0;
  private waitGeneration = 0;
  private scheduled: NodeJS.Immediate | null = null;
  private pauseTimer: NodeJS.Timeout | null = null;
  private router: ProcessControlRouter | null = null;
  private wakers: Array<() => void> = [];
  private checkpointChain: Promise<void> = Promise.resolve();
  private broadcastChain: Promise<void> = Promise.resolve();

  private resolveTerminated: (label: ProcessState) => void = () => undefined;
  private readonly terminated: Promise<ProcessState>;

  constructor(options: ProcessOptions = {}) {
    const pid = options.pid ?? randomUUID();
    super(createProcessDefinition(pid));
    this.logger = new Logger(`${this.constructor.name}<${pid}>`);
    this.inputs = { ...(options.inputs ?? {}) };
    this.broker = options.broker ?? null;
    this.checkpointer = options.checkpointer ?? null;
    this.broadcastTimeoutMs =
      options.broadcastTimeoutMs ?? DEFAULT_BROADCAST_TIMEOUT_MS;
    for (const listener of options.listeners ?? []) {
      this.listeners.add(listener);
    }
    this.terminated = new Promise<ProcessState>((resolve) => {
      this.resolveTerminated = resolve;
    });
  }

  /** First step of every process. */
  protected abstract run(...args: unknown[]): unknown;

  get pid(): string {
    return this.machineId;
  }

  get typeId(): string {
    return getProcessTypeId(this.constructor);
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /** True once `close()` was called; a closed process never steps again. */
  get isClosed(): boolean {
    return this.closed;
  }

  get outputs(): ProcessValues {
    return { ...this.recordedOutputs };
  }

  /** Outputs of a FINISHED process, `null` otherwise. */
  get result(): ProcessValues | null {
    return this.isInitialized && this.state === ProcessState.FINISHED
      ? this.outputs
      : null;
  }

  get successful(): boolean | null {
    return this.outcome?.successful ?? null;
  }

  get exitCode(): number | null {
    return this.outcome?.exitCode ?? null;
  }

  get exception(): Error | null {
    return this.exceptionValue;
  }

  get killMessage(): string | null {
    return this.killMessageValue;
  }

  get status(): string | null {
    return this.statusText;
  }

  set status(text: string | null) {
    this.statusText = text;
  }

  /** Continuation step and arguments while CREATED or RUNNING. */
  get pendingStep(): Readonly<NextStep> {
    return { step: this.nextStep.step, args: [...this.nextStep.args] };
  }

  hasTerminated(): boolean {
    return this.isInitialized && this.isTerminal();
  }

  /** Resolves with the terminal label once the process terminates. */
  whenTerminated(): Promise<ProcessState> {
    return this.terminated;
  }

  /**
   * Resolves with the outputs once the process FINISHES. Rejects with the
   * recorded exception when it EXCEPTS and with `ProcessKilledError` when it
   * is killed.
   */
  whenFinished(): Promise<ProcessValues> {
    return this.terminated.then((label) => this.resultOf(label));
  }

  addListener(listener: ProcessListener): void {
    this.listeners.add(listener);
  }

  removeListener(listener: ProcessListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Enters CREATED (unless reconstructed), attaches the control router when a
   * broker is bound, and schedules the first step.
   */
  async start(): Promise<void> {
    this.assertOpen();
    if (!this.isInitialized) {
      this.initialize();
    }
    if (this.broker !== null && this.router === null) {
      const router = new ProcessControlRouter(this, this.broker);
      this.router = router;
      await router.attach();
      if (this.hasTerminated()) {
        router.seal(this.getStatusReport());
      }
    }
    this.scheduleStep();
  }

  /** Records one output; outputs recorded before a failure are kept. */
  out(key: string, value: unknown): void {
    this.recordedOutputs[key] = value;
    this.notify((listener) => listener.onOutputEmitted?.(this, key, value));
  }

  /**
   * Stops scheduling steps without changing the label. A step already in
   * flight completes. With `timeoutMs` the process plays again by itself.
   */
  pause(message: string | null = null, timeoutMs: number | null = null): boolean {
    if (this.hasTerminated() || this.closed) return false;
    if (this.isPaused) return true;

    this.isPaused = true;
    if (message !== null) this.statusText = message;
    this.cancelScheduledStep();
    if (timeoutMs !== null) {
      this.pauseTimer = setTimeout(() => {
        this.pauseTimer = null;
        this.play();
      }, timeoutMs);
    }
    this.logger.debug('Paused');
    this.notify((listener) => listener.onProcessPaused?.(this));
    if (this.isInitialized) this.checkpoint(this.state);
    return true;
  }

  /** Clears the paused flag; queued work runs from the next turn. */
  play(): boolean {
    if (this.hasTerminated() || this.closed) return false;
    if (!this.isPaused) return true;

    this.isPaused = false;
    this.clearPauseTimer();
    this.logger.debug('Played');
    this.notify((listener) => listener.onProcessPlayed?.(this));
    if (this.isInitialized) this.checkpoint(this.state);
    this.wake();
    this.scheduleStep();
    return true;
  }

  /**
   * Moves to KILLED from any non-terminal label. Idempotent on KILLED, and
   * returns false on the other terminal labels. A kill requested in the
   * middle of a transition is applied on the next turn.
   */
  kill(message: string | null = null): boolean {
    if (this.isInitialized && this.state === ProcessState.KILLED) return true;
    if (this.closed) return false;
    if (!this.isInitialized) this.initialize();
    if (this.isTerminal()) return false;

    if (this.isTransitioning) {
      setImmediate(() => {
        this.kill(message);
      });
      return true;
    }

    this.killMessageValue = message;
    this.stepGeneration++;
    this.waitGeneration++;
    this.pendingResume = null;
    this.transitionTo(ProcessState.KILLED);
    return true;
  }

  /** Resumes a WAITING process; `args` are passed to the waiting step. */
  resume(...args: unknown[]): void {
    this.assertOpen();
    if (!this.isInitialized || this.state !== ProcessState.WAITING) {
      throw new InvalidStateError(
        this.pid,
        this.isInitialized ? this.state : null,
        `Process ${this.pid} can only be resumed while waiting`,
      );
    }
    this.waitGeneration++;
    this.queueResume({ kind: 'value', args });
  }

  /**
   * Advances the process by one unit: CREATED enters RUNNING, WAITING with a
   * queued resumption re-enters RUNNING, RUNNING executes the pending step.
   * Does nothing while paused, terminated, closed or already stepping.
   */
  async step(): Promise<void> {
    if (
      this.closed ||
      this.stepping ||
      this.isPaused ||
      this.isTransitioning ||
      !this.isInitialized ||
      this.hasTerminated()
    ) {
      return;
    }

    this.stepping = true;
    try {
      switch (this.state) {
        case ProcessState.CREATED:
          this.transitionTo(ProcessState.RUNNING);
          break;
        case ProcessState.WAITING:
          this.resumeFromWait();
          break;
        case ProcessState.RUNNING:
          await this.executeStep();
          break;
        default:
          break;
      }
    } finally {
      this.stepping = false;
      this.wake();
    }
    this.scheduleStep();
  }

  /**
   * Drives the process on the caller's promise chain until it terminates,
   * without waiting for scheduler turns between steps. Waits (and pauses)
   * still block until they are resumed.
   */
  async stepUntilTerminated(): Promise<ProcessState> {
    this.assertOpen();
    if (!this.isInitialized) this.initialize();

    while (!this.hasTerminated()) {
      if (this.closed) {
        throw new InvalidStateError(
          this.pid,
          this.state,
          `Process ${this.pid} was closed before it terminated`,
        );
      }
      if (this.canStepNow()) {
        this.cancelScheduledStep();
        await this.step();
      } else {
        await new Promise<void>((resolve) => this.wakers.push(resolve));
      }
    }
    return this.state;
  }

  /** Runs the process to termination and returns its outputs, as `whenFinished()`. */
  async execute(): Promise<ProcessValues> {
    if (!this.hasTerminated()) {
      await this.stepUntilTerminated();
    }
    return this.resultOf(this.state);
  }

  getStatusReport(): StatusReport {
    const report: StatusReport = {
      pid: this.pid,
      label: this.state,
      is_terminal: this.isTerminal(),
      paused: this.isPaused,
    };
    if (this.statusText !== null) report.status = this.statusText;
    return report;
  }

  /** Waits for pending checkpoint writes and state-change broadcasts. */
  async flush(): Promise<void> {
    await Promise.all([this.checkpointChain, this.broadcastChain]);
  }

  /**
   * Stops the process on this host: a step in flight has its result
   * discarded, triggers are ignored, and no further checkpoint is written.
   * Flushes pending I/O and detaches the control router.
   */
  async close(): Promise<void> {
    this.closed = true;
    this.stepGeneration++;
    this.waitGeneration++;
    this.wake();
    this.cancelScheduledStep();
    this.clearPauseTimer();
    const router = this.router;
    this.router = null;
    await this.flush();
    if (router !== null) await router.detach();
  }

  /**
   * State needed to resume from the current label. Subclasses extend it
   * and read it back in `loadContinuation`.
   */
  saveContinuation(): Record<string, unknown> {
    const base = { status: this.statusText };
    const label = this.state;

    switch (label) {
      case ProcessState.CREATED:
      case ProcessState.RUNNING:
        return { ...base, step: this.nextStep.step, args: [...this.nextStep.args] };
      case ProcessState.WAITING: {
        const pending = this.pendingResume;
        return {
          ...base,
          step: this.waiting?.step ?? null,
          message: this.waiting?.message ?? null,
          data: this.waiting?.data ?? null,
          pending_args: pending?.kind === 'value' ? [...pending.args] : null,
        };
      }
      case ProcessState.FINISHED:
        return {
          ...base,
          successful: this.outcome?.successful ?? true,
          exit_code: this.outcome?.exitCode ?? null,
        };
      case ProcessState.EXCEPTED: {
        const error = this.exceptionValue;
        return {
          ...base,
          error:
            error === null
              ? null
              : { name: error.name, message: error.message, stack: error.stack ?? null },
        };
      }
      case ProcessState.KILLED:
        return { ...base, message: this.killMessageValue };
      default:
        return assertNever(label);
    }
  }

  /**
   * Launches a nested process sharing this process's broker, checkpointer
   * and broadcast timeout. Wait on `child.whenFinished()` to use its outputs.
   */
  async launch<P extends Process>(
    processClass: ProcessConstructor<P>,
    inputs: ProcessValues = {},
    options: { pid?: string } = {},
  ): Promise<P> {
    const child = new processClass({
      pid: options.pid,
      inputs,
      broker: this.broker ?? undefined,
      checkpointer: this.checkpointer ?? undefined,
      broadcastTimeoutMs: this.broadcastTimeoutMs,
    });
    await child.start();
    this.logger.debug(`Launched child ${child.constructor.name}<${child.pid}>`);
    return child;
  }

  /** Rebuilds a persisted process; called by the persister before `start()`. */
  restoreFromBundle(bundle: ProcessBundle): void {
    if (bundle.pid !== this.pid) {
      throw new ReconstructionError(
        bundle.pid,
        `Bundle of process ${bundle.pid} cannot restore process ${this.pid}`,
      );
    }
    this.loadContinuation(bundle.label, bundle.continuation);
    Object.assign(this.recordedOutputs, bundle.outputs);
    this.isPaused = bundle.paused;
    this.restore(bundle.label);
    if (this.isTerminal()) {
      this.resolveTerminated(bundle.label);
    }
  }

  protected loadContinuation(label: ProcessState, continuation: JsonObject): void {
    const status = continuation.status;
    this.statusText = typeof status === 'string' ? status : null;

    switch (label) {
      case ProcessState.CREATED:
      case ProcessState.RUNNING: {
        const step = this.readStepName(continuation);
        const args = continuation.args;
        if (!Array.isArray(args)) {
          throw this.malformed(label, 'args must be an array');
        }
        this.nextStep = { step, args: [...args] };
        return;
      }
      case ProcessState.WAITING: {
        const step = this.readStepName(continuation);
        const message = continuation.message;
        const pending = continuation.pending_args;
        this.waiting = {
          step,
          message: typeof message === 'string' ? message : null,
          data: continuation.data ?? null,
        };
        this.pendingResume = Array.isArray(pending)
          ? { kind: 'value', args: [...pending] }
          : null;
        return;
      }
      case ProcessState.FINISHED: {
        const successful = continuation.successful;
        const exitCode = continuation.exit_code;
        this.outcome = {
          successful: typeof successful === 'boolean' ? successful : true,
          exitCode: typeof exitCode === 'number' ? exitCode : null,
        };
        return;
      }
      case ProcessState.EXCEPTED:
        this.exceptionValue = this.readError(continuation.error);
        return;
      case ProcessState.KILLED: {
        const message = continuation.message;
        this.killMessageValue = typeof message === 'string' ? message : null;
        return;
      }
      default:
        assertNever(label);
    }
  }

  protected transitionFailed(failure: TransitionFailure<ProcessState>): void {
    if (
      this.isInitialized &&
      !this.isTerminal() &&
      failure.toState !== ProcessState.EXCEPTED
    ) {
      this.exceptionValue = failure.error;
    }
    super.transitionFailed(failure);
  }

  protected onStateEntered(info: StateTransitionInfo<ProcessState>): void {
    const { fromState, toState } = info;
    this.logger.debug(`${fromState ?? '(none)'} -> ${toState}`);

    this.checkpoint(toState);
    this.broadcastStateChange(fromState, toState);
    this.notifyTransition(fromState, toState);

    if (this.isTerminal(toState)) {
      this.onTerminated(toState);
    }
  }

  private async executeStep(): Promise<void> {
    const { step, args } = this.nextStep;
    const generation = ++this.stepGeneration;

    let stepFn: (...stepArgs: unknown[]) => unknown;
    try {
      stepFn = this.resolveStep(step);
    } catch (error) {
      this.fail(toError(error));
      return;
    }

    let directive: StepDirective;
    try {
      const result: unknown = await stepFn(...args);
      directive = this.toDirective(step, result);
    } catch (error) {
      directive = raiseError(toError(error));
    }

    if (generation !== this.stepGeneration || this.hasTerminated() || this.closed) {
      this.logger.debug(`Discarding result of step "${step}"`);
      return;
    }
    this.applyDirective(step, directive);
  }

  private toDirective(step: string, result: unknown): StepDirective {
    if (result === undefined) return finishWith();
    if (isStepDirective(result)) return result;
    return raiseError(
      new TypeError(
        `Step "${step}" returned ${describeValue(result)} instead of a step directive`,
      ),
    );
  }

  private applyDirective(step: string, directive: StepDirective): void {
    switch (directive.kind) {
      case 'continue':
        this.nextStep = { step: directive.step, args: directive.args };
        this.transitionTo(ProcessState.RUNNING);
        return;
      case 'wait':
        this.enterWait(directive);
        return;
      case 'finish':
        for (const [key, value] of Object.entries(directive.outputs)) {
          this.out(key, value);
        }
        this.outcome = {
          successful: directive.successful,
          exitCode: directive.exitCode,
        };
        this.transitionTo(ProcessState.FINISHED);
        return;
      case 'raise':
        this.fail(
          directive.error instanceof StepError
            ? directive.error
            : new StepError(this.pid, step, directive.error),
        );
        return;
      default:
        assertNever(directive);
    }
  }

  private enterWait(directive: WaitDirective): void {
    this.waiting = {
      step: directive.step,
      message: directive.message,
      data: directive.data,
    };
    this.pendingResume = null;
    const generation = ++this.waitGeneration;
    this.transitionTo(ProcessState.WAITING);

    const trigger = directive.trigger;
    if (trigger === undefined) return;

    Promise.resolve(trigger).then(
      (value) => {
        if (generation === this.waitGeneration && !this.hasTerminated()) {
          this.queueResume({ kind: 'value', args: value === undefined ? [] : [value] });
        }
      },
      (error: unknown) => {
        if (generation === this.waitGeneration && !this.hasTerminated()) {
          this.queueResume({ kind: 'error', error: toError(error) });
        }
      },
    );
  }

  private resumeFromWait(): void {
    const waiting = this.waiting;
    const resumption = this.pendingResume;
    if (waiting === null || resumption === null) return;

    this.pendingResume = null;
    this.waiting = null;
    this.waitGeneration++;

    if (resumption.kind === 'error') {
      this.fail(new StepError(this.pid, waiting.step, resumption.error));
      return;
    }
    this.nextStep = { step: waiting.step, args: resumption.args };
    this.transitionTo(ProcessState.RUNNING);
  }

  private queueResume(resumption: Resumption): void {
    if (this.closed) return;
    this.pendingResume = resumption;
    this.wake();
    this.scheduleStep();
  }

  private canStepNow(): boolean {
    if (this.stepping || this.isPaused || this.isTransitioning) return false;
    return this.state !== ProcessState.WAITING || this.pendingResume !== null;
  }

  private wake(): void {
    const wakers = this.wakers;
    this.wakers = [];
    for (const resolve of wakers) resolve();
  }

  private resultOf(label: ProcessState): ProcessValues {
    switch (label) {
      case ProcessState.FINISHED:
        return this.outputs;
      case ProcessState.EXCEPTED:
        throw this.exceptionValue ?? new Error(`Process ${this.pid} excepted`);
      case ProcessState.KILLED:
        throw new ProcessKilledError(this.pid, this.killMessageValue);
      default:
        throw new InvalidStateError(
          this.pid,
          label,
          `Process ${this.pid} has not terminated`,
        );
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new InvalidStateError(
        this.pid,
        this.isInitialized ? this.state : null,
        `Process ${this.pid} is closed`,
      );
    }
  }

  private fail(error: Error): void {
    if (this.hasTerminated()) return;
    this.exceptionValue = error;
    this.transitionTo(ProcessState.EXCEPTED);
  }

  private resolveStep(name: string): (...args: unknown[]) => unknown {
    if (name !== INITIAL_STEP && name in Process.prototype) {
      throw new ReconstructionError(
        this.pid,
        `"${name}" is a process operation, not a step`,
      );
    }
    const candidate: unknown = Reflect.get(this, name);
    if (typeof candidate !== 'function') {
      throw new ReconstructionError(
        this.pid,
        `${this.constructor.name} has no step "${name}"`,
      );
    }
    return (...args: unknown[]): unknown => candidate.apply(this, args);
  }

  private readStepName(continuation: JsonObject): string {
    const step = continuation.step;
    if (typeof step !== 'string') {
      throw this.malformed(this.isInitialized ? this.state : null, 'step must be a string');
    }
    this.resolveStep(step);
    return step;
  }

  private readError(value: JsonValue | undefined): Error | null {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return null;
    }
    const error = new Error(typeof value.message === 'string' ? value.message : '');
    if (typeof value.name === 'string') error.name = value.name;
    if (typeof value.stack === 'string') error.stack = value.stack;
    return error;
  }

  private malformed(label: ProcessState | null, detail: string): ReconstructionError {
    return new ReconstructionError(
      this.pid,
      `Malformed ${label ?? 'unknown'} continuation for process ${this.pid}: ${detail}`,
    );
  }

  private scheduleStep(): void {
    if (
      this.closed ||
      this.scheduled !== null ||
      this.stepping ||
      this.isPaused ||
      !this.isInitialized ||
      this.hasTerminated()
    ) {
      return;
    }
    if (this.state === ProcessState.WAITING && this.pendingResume === null) {
      return;
    }

    this.scheduled = setImmediate(() => {
      this.scheduled = null;
      this.step().catch((error: unknown) => {
        this.logger.error(
          'Unhandled error while stepping',
          error instanceof Error ? error.stack : String(error),
        );
      });
    });
  }

  private cancelScheduledStep(): void {
    if (this.scheduled !== null) {
      clearImmediate(this.scheduled);
      this.scheduled = null;
    }
  }

  private clearPauseTimer(): void {
    if (this.pauseTimer !== null) {
      clearTimeout(this.pauseTimer);
      this.pauseTimer = null;
    }
  }

  private checkpoint(label: ProcessState): void {
    const checkpointer = this.checkpointer;
    if (checkpointer === null || this.closed) return;

    let bundle: ProcessBundle;
    try {
      bundle = checkpointer.save(this);
    } catch (error) {
      this.reportCheckpointFailure(label, toError(error));
      return;
    }
    this.checkpointChain = this.checkpointChain.then(() =>
      checkpointer.persist(bundle).catch((error: unknown) => {
        this.reportCheckpointFailure(label, toError(error));
      }),
    );
  }

  private reportCheckpointFailure(label: ProcessState, error: Error): void {
    const message = `Checkpoint in ${label} failed: ${error.message}`;
    if (label === ProcessState.WAITING) {
      this.logger.error(message, error.stack);
    } else {
      this.logger.warn(message);
    }
    this.notify((listener) => listener.onCheckpointFailed?.(this, error));
  }

  private broadcastStateChange(
    fromState: ProcessState | null,
    toState: ProcessState,
  ): void {
    const broker = this.broker;
    if (broker === null) return;

    const topic = stateChangedTopic(this.pid);
    const message = buildStateChanged(this.pid, fromState, toState);
    const timeoutMs = this.broadcastTimeoutMs;

    this.broadcastChain = this.broadcastChain.then(() =>
      withTimeout(
        broker.publish(topic, message),
        timeoutMs,
        () => new Error(`not acknowledged within ${timeoutMs}ms`),
      ).catch((error: unknown) => {
        const warning = new BroadcastDeliveryWarning(topic, toError(error).message);
        this.logger.warn(warning.message);
      }),
    );
  }

  private notifyTransition(
    fromState: ProcessState | null,
    toState: ProcessState,
  ): void {
    this.notify((listener) =>
      listener.onProcessTransition?.(this, fromState, toState),
    );

    switch (toState) {
      case ProcessState.CREATED:
        this.notify((listener) => listener.onProcessCreated?.(this));
        return;
      case ProcessState.RUNNING:
        this.notify((listener) => listener.onProcessRunning?.(this));
        return;
      case ProcessState.WAITING:
        this.notify((listener) => listener.onProcessWaiting?.(this));
        return;
      case ProcessState.FINISHED:
        this.notify((listener) => listener.onProcessFinished?.(this, this.outputs));
        return;
      case ProcessState.EXCEPTED: {
        const reason = this.exceptionValue?.message ?? 'unknown failure';
        this.notify((listener) => listener.onProcessExcepted?.(this, reason));
        return;
      }
      case ProcessState.KILLED:
        this.notify((listener) =>
          listener.onProcessKilled?.(this, this.killMessageValue),
        );
        return;
      default:
        assertNever(toState);
    }
  }

  private notify(callback: (listener: ProcessListener) => void): void {
    for (const listener of [...this.listeners]) {
      try {
        callback(listener);
      } catch (error) {
        this.logger.error(
          'Process listener failed',
          error instanceof Error ? error.stack : String(error),
        );
      }
    }
  }

  private onTerminated(label: ProcessState): void {
    this.cancelScheduledStep();
    this.clearPauseTimer();
    this.pendingResume = null;
    this.listeners.clear();
    this.router?.seal(this.getStatusReport());
    this.resolveTerminated(label);
    this.wake();
  }
}
