import { InvalidStateError } from '../errors/invalid-state.error';
import { ReconstructionError } from '../errors/reconstruction.error';
import type { JsonObject } from '../interfaces/process-records.interface';
import { Process } from '../process/process';
import { ProcessState } from '../process/process-states';
import {
  continueWith,
  finishWith,
  waitFor,
  type StepDirective,
  type WaitOptions,
} from '../process/step-directives';
import type { Instruction, OutlineCursor, OutlineRuntime } from './instructions';

/** Step method that advances the outline cursor by one instruction. */
export const OUTLINE_STEP = 'advance';

/** Awaiting key of `awaitAllInto`; the resumed record is merged into `ctx`. */
export const ALL_KEYS = '*';

export type Awaitable = PromiseLike<unknown> | Process;

/**
 * Wait directive for outline steps. The value the process is resumed with
 * is stored in `ctx[key]` before the outline continues.
 */
export function awaitInto(key: string, options: WaitOptions = {}): StepDirective {
  return waitFor(key, options);
}

/**
 * Waits for every awaitable and stores each result under its key in `ctx`.
 * A process settles with its outputs. The first rejection fails the wait.
 */
export function awaitAllInto(
  awaitables: Record<string, Awaitable>,
  options: Omit<WaitOptions, 'trigger'> = {},
): StepDirective {
  const trigger = Promise.all(
    Object.entries(awaitables).map(([key, awaitable]) =>
      Promise.resolve(
        awaitable instanceof Process ? awaitable.whenFinished() : awaitable,
      ).then((value) => [key, value] as const),
    ),
  ).then((entries) => Object.fromEntries(entries));
  return waitFor(ALL_KEYS, { ...options, trigger });
}

/**
 * A process whose steps are laid out declaratively by `outline()`. `run()`
 * only creates the cursor; each instruction executed is one RUNNING step; the outline cursor and `ctx`
 * travel in the continuation, so a reconstructed process resumes at the
 * instruction it stopped on.
 */
export abstract class OutlineProcess extends Process {
  /** Scratch data shared by the steps of the outline. */
  readonly ctx: Record<string, unknown> = {};

  private cursor: OutlineCursor<this> | null = null;
  private awaitingKey: string | null = null;

  /** Must return the same outline on every call. */
  protected abstract outline(): Instruction<this>;

  describeOutline(): string {
    return this.outline().describe().join('\n');
  }

  protected run(): StepDirective {
    this.cursor = this.outline().createCursor();
    return continueWith(OUTLINE_STEP);
  }

  protected async advance(...resumed: unknown[]): Promise<StepDirective> {
    if (this.awaitingKey !== null && resumed.length > 0) {
      this.storeResumed(this.awaitingKey, resumed[0]);
    }
    this.awaitingKey = null;

    const cursor = this.cursor;
    if (cursor === null) {
      throw new InvalidStateError(
        this.pid,
        this.state,
        `Outline of process ${this.pid} has no cursor to advance`,
      );
    }

    const runtime: OutlineRuntime<this> = {
      process: this,
      warn: (message) => this.logger.warn(message),
    };
    const { finished, directive } = await cursor.step(runtime);

    if (directive !== null) {
      switch (directive.kind) {
        case 'finish':
        case 'raise':
          this.cursor = null;
          return directive;
        case 'wait':
          this.awaitingKey = directive.step;
          return waitFor(OUTLINE_STEP, {
            trigger: directive.trigger,
            message: directive.message ?? undefined,
            data: directive.data,
          });
        case 'continue':
          this.logger.warn(
            `Ignoring continue("${directive.step}") returned by an outline step`,
          );
          break;
      }
    }

    if (finished) {
      this.cursor = null;
      return finishWith();
    }
    return continueWith(OUTLINE_STEP);
  }

  private storeResumed(key: string, value: unknown): void {
    if (key !== ALL_KEYS) {
      this.ctx[key] = value;
      return;
    }
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      Object.assign(this.ctx, value);
    } else {
      this.logger.warn(`Ignoring ${typeof value} resumed into every awaited key`);
    }
  }

  saveContinuation(): Record<string, unknown> {
    return {
      ...super.saveContinuation(),
      cursor: this.cursor?.save() ?? null,
      context: { ...this.ctx },
      awaiting_key: this.awaitingKey,
    };
  }

  protected loadContinuation(label: ProcessState, continuation: JsonObject): void {
    super.loadContinuation(label, continuation);

    const context = continuation.context;
    if (typeof context === 'object' && context !== null && !Array.isArray(context)) {
      Object.assign(this.ctx, context);
    }
    const awaitingKey = continuation.awaiting_key;
    this.awaitingKey = typeof awaitingKey === 'string' ? awaitingKey : null;

    const cursorState = continuation.cursor;
    if (typeof cursorState === 'object' && cursorState !== null && !Array.isArray(cursorState)) {
      try {
        this.cursor = this.outline().restoreCursor(cursorState);
      } catch (error) {
        throw new ReconstructionError(
          this.pid,
          `Process ${this.pid}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return;
    }

    const resumesOutline =
      (label === ProcessState.RUNNING || label === ProcessState.WAITING) &&
      continuation.step === OUTLINE_STEP;
    if (resumesOutline) {
      throw new ReconstructionError(
        this.pid,
        `Continuation of process ${this.pid} resumes its outline but carries no cursor`,
      );
    }
  }
}
