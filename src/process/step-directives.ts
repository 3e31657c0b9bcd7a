/**
 * What a step returns to tell the process where to go next.
 *
 * - `continue`: RUNNING again with the named step and arguments
 * - `wait`: WAITING until `trigger` settles or `resume()` is called; the
 *   resumed value is passed to `step`
 * - `finish`: FINISHED, merging `outputs` into the recorded outputs
 * - `raise`: EXCEPTED with `error`
 */
export type StepDirective =
  | ContinueDirective
  | WaitDirective
  | FinishDirective
  | RaiseDirective;

export interface ContinueDirective {
  kind: 'continue';
  step: string;
  args: unknown[];
}

export interface WaitDirective {
  kind: 'wait';
  step: string;
  trigger?: PromiseLike<unknown>;
  message: string | null;
  data: unknown;
}

export interface FinishDirective {
  kind: 'finish';
  outputs: Record<string, unknown>;
  successful: boolean;
  exitCode: number | null;
}

export interface RaiseDirective {
  kind: 'raise';
  error: Error;
}

/** A step may also return nothing, which finishes the process. */
export type StepResult = StepDirective | void | undefined;

export interface WaitOptions {
  trigger?: PromiseLike<unknown>;
  message?: string;
  data?: unknown;
}

export function continueWith(step: string, ...args: unknown[]): ContinueDirective {
  return { kind: 'continue', step, args };
}

export function waitFor(step: string, options: WaitOptions = {}): WaitDirective {
  return {
    kind: 'wait',
    step,
    trigger: options.trigger,
    message: options.message ?? null,
    data: options.data ?? null,
  };
}

export function finishWith(
  outputs: Record<string, unknown> = {},
  options: { successful?: boolean; exitCode?: number } = {},
): FinishDirective {
  const exitCode = options.exitCode ?? null;
  return {
    kind: 'finish',
    outputs,
    successful: options.successful ?? (exitCode === null || exitCode === 0),
    exitCode,
  };
}

export function raiseError(error: Error): RaiseDirective {
  return { kind: 'raise', error };
}

const DIRECTIVE_KINDS: readonly string[] = ['continue', 'wait', 'finish', 'raise'];

export function isStepDirective(value: unknown): value is StepDirective {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    DIRECTIVE_KINDS.includes(value.kind)
  );
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
