import { isPromiseLike } from '../engines/state-machine.engine';
import { OutlinePredicateError } from '../errors/outline-predicate.error';
import { ReconstructionError } from '../errors/reconstruction.error';
import type { JsonObject, JsonValue } from '../interfaces/process-records.interface';
import {
  finishWith,
  isStepDirective,
  raiseError,
  type StepDirective,
  type StepResult,
} from '../process/step-directives';

/** Called with the process as both `this` and the first argument. */
export type OutlineStepFn<P> = (
  this: P,
  process: P,
) => StepResult | Promise<StepResult>;

export type OutlinePredicateFn<P> = (this: P, process: P) => unknown;

export interface OutlineRuntime<P> {
  readonly process: P;
  warn(message: string): void;
}

export interface CursorStepResult {
  /** The instruction has nothing left to run. */
  finished: boolean;
  directive: StepDirective | null;
}

/** Position inside one instruction; saved as JSON in the continuation. */
export interface OutlineCursor<P> {
  step(runtime: OutlineRuntime<P>): Promise<CursorStepResult>;
  save(): JsonObject;
}

export interface Instruction<P> {
  createCursor(): OutlineCursor<P>;
  restoreCursor(state: JsonObject): OutlineCursor<P>;
  describe(): string[];
}

export type OutlineEntry<P> = Instruction<P> | OutlineStepFn<P>;

function indent(lines: string[]): string[] {
  return lines.map((line) => `  ${line}`);
}

function nameOf(fn: Function, fallback: string): string {
  return fn.name.length > 0 ? fn.name : fallback;
}

function malformedCursor(detail: string): ReconstructionError {
  return new ReconstructionError(null, `Outline cursor does not fit the outline: ${detail}`);
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIndex(value: JsonValue | undefined, max: number, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    throw malformedCursor(`${field} must be an integer between 0 and ${max}`);
  }
  return value;
}

function toDirective(name: string, result: unknown): StepDirective | null {
  if (result === undefined) return null;
  if (isStepDirective(result)) return result;
  return raiseError(
    new TypeError(`Outline step "${name}" returned a value that is not a step directive`),
  );
}

function evaluatePredicate<P>(
  predicate: OutlinePredicateFn<P>,
  name: string,
  runtime: OutlineRuntime<P>,
): boolean {
  const result: unknown = predicate.call(runtime.process, runtime.process);
  if (isPromiseLike(result)) {
    throw new OutlinePredicateError(
      name,
      `Predicate "${name}" returned a promise; predicates must be synchronous`,
    );
  }
  if (typeof result !== 'boolean') {
    runtime.warn(
      `Predicate "${name}" returned ${result === null ? 'null' : typeof result} instead of a boolean; using its truthiness`,
    );
  }
  return Boolean(result);
}

function toInstruction<P>(entry: OutlineEntry<P>): Instruction<P> {
  return typeof entry === 'function' ? new StepInstruction(entry) : entry;
}

class StepCursor<P> implements OutlineCursor<P> {
  constructor(private readonly instruction: StepInstruction<P>) {}

  async step(runtime: OutlineRuntime<P>): Promise<CursorStepResult> {
    const result: unknown = await this.instruction.fn.call(
      runtime.process,
      runtime.process,
    );
    return { finished: true, directive: toDirective(this.instruction.name, result) };
  }

  save(): JsonObject {
    return {};
  }
}

export class StepInstruction<P> implements Instruction<P> {
  readonly name: string;

  constructor(
    readonly fn: OutlineStepFn<P>,
    name?: string,
  ) {
    this.name = name ?? nameOf(fn, 'step');
  }

  createCursor(): OutlineCursor<P> {
    return new StepCursor(this);
  }

  restoreCursor(_state: JsonObject): OutlineCursor<P> {
    return new StepCursor(this);
  }

  describe(): string[] {
    return [this.name];
  }
}

class BlockCursor<P> implements OutlineCursor<P> {
  constructor(
    private readonly instructions: readonly Instruction<P>[],
    private pos = 0,
    private child: OutlineCursor<P> | null = null,
  ) {}

  async step(runtime: OutlineRuntime<P>): Promise<CursorStepResult> {
    if (this.pos >= this.instructions.length) {
      return { finished: true, directive: null };
    }

    const child = this.child ?? this.instructions[this.pos].createCursor();
    this.child = child;
    const { finished, directive } = await child.step(runtime);
    if (finished) {
      this.pos++;
      this.child = null;
    }
    return { finished: this.pos >= this.instructions.length, directive };
  }

  save(): JsonObject {
    return { pos: this.pos, child: this.child?.save() ?? null };
  }
}

/** Runs its instructions in order. */
export class BlockInstruction<P> implements Instruction<P> {
  readonly instructions: readonly Instruction<P>[];

  constructor(entries: readonly OutlineEntry<P>[]) {
    this.instructions = entries.map((entry) => toInstruction(entry));
  }

  createCursor(): OutlineCursor<P> {
    return new BlockCursor(this.instructions);
  }

  restoreCursor(state: JsonObject): OutlineCursor<P> {
    const pos = readIndex(state.pos, this.instructions.length, 'pos');
    const childState = state.child;
    if (childState === null || childState === undefined) {
      return new BlockCursor(this.instructions, pos);
    }
    if (!isJsonObject(childState) || pos >= this.instructions.length) {
      throw malformedCursor(`block child at position ${pos} cannot be restored`);
    }
    return new BlockCursor(
      this.instructions,
      pos,
      this.instructions[pos].restoreCursor(childState),
    );
  }

  describe(): string[] {
    return this.instructions.flatMap((instruction) => instruction.describe());
  }
}

interface ConditionalBranch<P> {
  /** `null` for the else branch. */
  predicate: OutlinePredicateFn<P> | null;
  name: string;
  body: BlockInstruction<P>;
}

class ConditionalCursor<P> implements OutlineCursor<P> {
  constructor(
    private readonly instruction: ConditionalInstruction<P>,
    private branch: number | null = null,
    private child: OutlineCursor<P> | null = null,
  ) {}

  async step(runtime: OutlineRuntime<P>): Promise<CursorStepResult> {
    let child = this.child;
    if (child === null) {
      const selected = this.instruction.select(runtime);
      if (selected === null) {
        return { finished: true, directive: null };
      }
      this.branch = selected;
      child = this.instruction.branches[selected].body.createCursor();
      this.child = child;
    }
    return child.step(runtime);
  }

  save(): JsonObject {
    return { branch: this.branch, child: this.child?.save() ?? null };
  }
}

/** `if_(...)`, optionally followed by `elif_(...)` branches and one `else_`. */
export class ConditionalInstruction<P> implements Instruction<P> {
  constructor(readonly branches: readonly ConditionalBranch<P>[]) {}

  elif_(predicate: OutlinePredicateFn<P>): (...body: OutlineEntry<P>[]) => ConditionalInstruction<P> {
    this.assertOpen('elif_');
    return (...body) =>
      new ConditionalInstruction([
        ...this.branches,
        { predicate, name: nameOf(predicate, 'predicate'), body: new BlockInstruction(body) },
      ]);
  }

  else_(...body: OutlineEntry<P>[]): ConditionalInstruction<P> {
    this.assertOpen('else_');
    return new ConditionalInstruction([
      ...this.branches,
      { predicate: null, name: 'else', body: new BlockInstruction(body) },
    ]);
  }

  /** Index of the first branch whose predicate holds, or `null`. */
  select(runtime: OutlineRuntime<P>): number | null {
    for (const [index, branch] of this.branches.entries()) {
      if (branch.predicate === null || evaluatePredicate(branch.predicate, branch.name, runtime)) {
        return index;
      }
    }
    return null;
  }

  createCursor(): OutlineCursor<P> {
    return new ConditionalCursor(this);
  }

  restoreCursor(state: JsonObject): OutlineCursor<P> {
    const childState = state.child;
    if (state.branch === null || state.branch === undefined) {
      return new ConditionalCursor(this);
    }
    const branch = readIndex(state.branch, this.branches.length - 1, 'branch');
    if (!isJsonObject(childState)) {
      throw malformedCursor(`conditional branch ${branch} has no cursor`);
    }
    return new ConditionalCursor(
      this,
      branch,
      this.branches[branch].body.restoreCursor(childState),
    );
  }

  describe(): string[] {
    return this.branches.flatMap((branch, index) => {
      const header =
        branch.predicate === null
          ? 'else:'
          : `${index === 0 ? 'if' : 'elif'}(${branch.name}):`;
      return [header, ...indent(branch.body.describe())];
    });
  }

  private assertOpen(method: string): void {
    if (this.branches.some((branch) => branch.predicate === null)) {
      throw new Error(`${method} cannot follow else_`);
    }
  }
}

class LoopCursor<P> implements OutlineCursor<P> {
  constructor(
    private readonly instruction: LoopInstruction<P>,
    private child: OutlineCursor<P> | null = null,
  ) {}

  async step(runtime: OutlineRuntime<P>): Promise<CursorStepResult> {
    let child = this.child;
    if (child === null) {
      if (!evaluatePredicate(this.instruction.predicate, this.instruction.name, runtime)) {
        return { finished: true, directive: null };
      }
      child = this.instruction.body.createCursor();
      this.child = child;
    }
    const { finished, directive } = await child.step(runtime);
    if (finished) this.child = null;
    return { finished: false, directive };
  }

  save(): JsonObject {
    return { child: this.child?.save() ?? null };
  }
}

/** Re-evaluates its predicate before every pass over the body. */
export class LoopInstruction<P> implements Instruction<P> {
  readonly name: string;

  constructor(
    readonly predicate: OutlinePredicateFn<P>,
    readonly body: BlockInstruction<P>,
  ) {
    this.name = nameOf(predicate, 'predicate');
  }

  createCursor(): OutlineCursor<P> {
    return new LoopCursor(this);
  }

  restoreCursor(state: JsonObject): OutlineCursor<P> {
    const childState = state.child;
    if (childState === null || childState === undefined) {
      return new LoopCursor(this);
    }
    if (!isJsonObject(childState)) {
      throw malformedCursor('loop body cursor must be an object');
    }
    return new LoopCursor(this, this.body.restoreCursor(childState));
  }

  describe(): string[] {
    return [`while(${this.name}):`, ...indent(this.body.describe())];
  }
}

class ReturnCursor<P> implements OutlineCursor<P> {
  constructor(private readonly exitCode: number) {}

  async step(_runtime: OutlineRuntime<P>): Promise<CursorStepResult> {
    return { finished: true, directive: finishWith({}, { exitCode: this.exitCode }) };
  }

  save(): JsonObject {
    return {};
  }
}

/** Stops the outline, finishing the process with `exitCode`. */
export class ReturnInstruction<P> implements Instruction<P> {
  constructor(readonly exitCode: number) {}

  createCursor(): OutlineCursor<P> {
    return new ReturnCursor(this.exitCode);
  }

  restoreCursor(_state: JsonObject): OutlineCursor<P> {
    return new ReturnCursor(this.exitCode);
  }

  describe(): string[] {
    return [`return(${this.exitCode})`];
  }
}

export function outline<P>(...entries: OutlineEntry<P>[]): BlockInstruction<P> {
  return new BlockInstruction(entries);
}

export function step<P>(fn: OutlineStepFn<P>, name?: string): StepInstruction<P> {
  return new StepInstruction(fn, name);
}

export function if_<P>(
  predicate: OutlinePredicateFn<P>,
): (...body: OutlineEntry<P>[]) => ConditionalInstruction<P> {
  return (...body) =>
    new ConditionalInstruction([
      { predicate, name: nameOf(predicate, 'predicate'), body: new BlockInstruction(body) },
    ]);
}

export function while_<P>(
  predicate: OutlinePredicateFn<P>,
): (...body: OutlineEntry<P>[]) => LoopInstruction<P> {
  return (...body) => new LoopInstruction(predicate, new BlockInstruction(body));
}

export function return_<P>(exitCode = 0): ReturnInstruction<P> {
  return new ReturnInstruction(exitCode);
}
