import { InMemoryCheckpointStore } from '../../src/adapters/in-memory-checkpoint.store';
import { OutlinePredicateError } from '../../src/errors/outline-predicate.error';
import { ReconstructionError } from '../../src/errors/reconstruction.error';
import { StepError } from '../../src/errors/step.error';
import {
  if_,
  outline,
  return_,
  step,
  while_,
  type Instruction,
} from '../../src/outline/instructions';
import {
  OutlineProcess,
  awaitAllInto,
  awaitInto,
} from '../../src/outline/outline-process';
import { ProcessState } from '../../src/process/process-states';
import { finishWith, type StepResult } from '../../src/process/step-directives';
import { ProcessPersister } from '../../src/services/process-persister.service';
import { ProcessRegistry } from '../../src/services/process-registry.service';
import { DoublerProcess, waitUntil } from '../helpers';

abstract class TracingProcess extends OutlineProcess {
  get trail(): unknown[] {
    const trail = this.ctx.trail;
    return Array.isArray(trail) ? trail : [];
  }

  record(name: string): void {
    this.ctx.trail = [...this.trail, name];
  }
}

class ReviewProcess extends TracingProcess {
  protected outline(): Instruction<this> {
    return outline<ReviewProcess>(
      prepare,
      if_(needsReview)(review).else_(approve),
      ship,
    );
  }
}

function prepare(this: TracingProcess): void {
  this.record('prepare');
}

function needsReview(this: TracingProcess): boolean {
  const amount = this.inputs.amount;
  return typeof amount === 'number' && amount > 100;
}

function review(this: TracingProcess): void {
  this.record('review');
}

function approve(this: TracingProcess): void {
  this.record('approve');
}

function ship(this: TracingProcess): StepResult {
  this.record('ship');
  return finishWith({ trail: this.trail });
}

class CountingProcess extends TracingProcess {
  protected outline(): Instruction<this> {
    return outline<CountingProcess>(
      step(function init(this: CountingProcess) {
        this.ctx.counter = 0;
      }),
      while_(belowThree)(
        step(function increment(this: CountingProcess) {
          this.ctx.counter = counterOf(this) + 1;
          this.record('increment');
        }),
      ),
      step(function report(this: CountingProcess) {
        return finishWith({ counter: counterOf(this), passes: this.trail.length });
      }),
    );
  }
}

function counterOf(process: OutlineProcess): number {
  const counter = process.ctx.counter;
  return typeof counter === 'number' ? counter : 0;
}

function belowThree(this: CountingProcess): boolean {
  return counterOf(this) < 3;
}

class QuestionProcess extends OutlineProcess {
  protected outline(): Instruction<this> {
    return outline<QuestionProcess>(
      step(function ask() {
        return awaitInto('answer', { message: 'need an answer' });
      }),
      if_(function accepted(this: QuestionProcess) {
        return this.ctx.answer === 'yes';
      })(
        step(function onYes() {
          return finishWith({ result: 'accepted' });
        }),
      ),
      step(function onNo() {
        return finishWith({ result: 'rejected' });
      }),
    );
  }
}

class EarlyReturnProcess extends TracingProcess {
  protected outline(): Instruction<this> {
    return outline<EarlyReturnProcess>(
      prepare,
      return_(2),
      ship,
    );
  }
}

class GradingProcess extends TracingProcess {
  protected outline(): Instruction<this> {
    return outline<GradingProcess>(
      if_(function high(this: GradingProcess) {
        return this.inputs.score === 'high';
      })(function gradeA(this: GradingProcess) {
        this.record('A');
      })
        .elif_(function middle(this: GradingProcess) {
          return this.inputs.score === 'middle';
        })(function gradeB(this: GradingProcess) {
          this.record('B');
        })
        .else_(function gradeC(this: GradingProcess) {
          this.record('C');
        }),
      function done(this: GradingProcess) {
        return finishWith({ trail: this.trail });
      },
    );
  }
}

class AsyncPredicateProcess extends OutlineProcess {
  protected outline(): Instruction<this> {
    return outline<AsyncPredicateProcess>(
      while_(async function isReady() {
        return true;
      })(function never() {
        return finishWith({ reached: true });
      }),
    );
  }
}

class LoosePredicateProcess extends OutlineProcess {
  protected outline(): Instruction<this> {
    return outline<LoosePredicateProcess>(
      if_(function count() {
        return 1;
      })(function truthy() {
        return finishWith({ branch: 'truthy' });
      }),
    );
  }
}

class GatherProcess extends OutlineProcess {
  protected outline(): Instruction<this> {
    return outline<GatherProcess>(
      step(async function spawn(this: GatherProcess) {
        const child = await this.launch(DoublerProcess, { x: 5 }, { pid: 'gather-child' });
        return awaitAllInto({ doubled: child, label: Promise.resolve('five') });
      }),
      step(function report(this: GatherProcess) {
        return finishWith({ doubled: this.ctx.doubled, label: this.ctx.label });
      }),
    );
  }
}

class BrokenGatherProcess extends OutlineProcess {
  protected outline(): Instruction<this> {
    return outline<BrokenGatherProcess>(
      step(function gather() {
        return awaitAllInto({
          first: Promise.reject(new Error('lost')),
          second: new Promise<never>(() => undefined),
        });
      }),
      step(function unreachable() {
        return finishWith({ reached: true });
      }),
    );
  }
}

function createPersister(): ProcessPersister {
  const registry = new ProcessRegistry();
  registry.register(QuestionProcess);
  registry.register(CountingProcess);
  registry.register(GatherProcess);
  return new ProcessPersister(registry, new InMemoryCheckpointStore());
}

describe('OutlineProcess', () => {
  it('takes the else branch', async () => {
    const process = new ReviewProcess({ inputs: { amount: 10 } });
    await process.start();

    await expect(process.whenTerminated()).resolves.toBe(ProcessState.FINISHED);
    expect(process.result).toEqual({ trail: ['prepare', 'approve', 'ship'] });
  });

  it('takes the if branch', async () => {
    const process = new ReviewProcess({ inputs: { amount: 500 } });
    await process.start();
    await process.whenTerminated();

    expect(process.result).toEqual({ trail: ['prepare', 'review', 'ship'] });
  });

  it('runs every instruction as its own step', async () => {
    const process = new ReviewProcess({ inputs: { amount: 10 } });
    await process.start();
    await process.whenTerminated();

    expect(process.history).toEqual([
      'created',
      'running',
      'running',
      'running',
      'running',
      'finished',
    ]);
  });

  it('chooses among elif branches', async () => {
    const grades: unknown[] = [];
    for (const score of ['high', 'middle', 'low']) {
      const process = new GradingProcess({ inputs: { score } });
      await process.start();
      await process.whenTerminated();
      grades.push(process.result);
    }

    expect(grades).toEqual([{ trail: ['A'] }, { trail: ['B'] }, { trail: ['C'] }]);
  });

  it('loops while its predicate holds', async () => {
    const process = new CountingProcess();
    await process.start();
    await process.whenTerminated();

    expect(process.result).toEqual({ counter: 3, passes: 3 });
  });

  it('stops early on return_ with its exit code', async () => {
    const process = new EarlyReturnProcess();
    await process.start();
    await process.whenTerminated();

    expect(process.exitCode).toBe(2);
    expect(process.successful).toBe(false);
    expect(process.ctx.trail).toEqual(['prepare']);
  });

  it('stores the resumed value in ctx and continues', async () => {
    const process = new QuestionProcess();
    await process.start();
    await waitUntil(() => process.state === ProcessState.WAITING);

    process.resume('no');
    await process.whenTerminated();

    expect(process.ctx.answer).toBe('no');
    expect(process.result).toEqual({ result: 'rejected' });
  });

  it('stores every awaited result in ctx, including a child process', async () => {
    const process = new GatherProcess({ pid: 'g-1' });
    await process.start();

    await expect(process.whenTerminated()).resolves.toBe(ProcessState.FINISHED);
    expect(process.ctx.doubled).toEqual({ y: 10 });
    expect(process.result).toEqual({ doubled: { y: 10 }, label: 'five' });
  });

  it('fails the wait on the first awaited rejection', async () => {
    const process = new BrokenGatherProcess({ pid: 'g-2' });
    await process.start();

    await expect(process.whenTerminated()).resolves.toBe(ProcessState.EXCEPTED);
    expect(process.exception?.message).toBe('Step "advance" of process g-2 failed: lost');
    expect(process.ctx).toEqual({});
  });

  it('merges a record passed to resume() after a restart into ctx', async () => {
    const persister = createPersister();
    const restored = persister.load(
      {
        schema: 'process-bundle',
        version: 1,
        type_id: 'gather_process',
        pid: 'g-3',
        label: ProcessState.WAITING,
        inputs: {},
        outputs: {},
        paused: false,
        continuation: {
          status: null,
          step: 'advance',
          message: null,
          data: null,
          pending_args: null,
          cursor: { pos: 1, child: null },
          context: {},
          awaiting_key: '*',
        },
      },
      { checkpointer: null },
    );

    await restored.start();
    restored.resume({ doubled: { y: 2 }, label: 'one' });

    await expect(restored.whenTerminated()).resolves.toBe(ProcessState.FINISHED);
    expect(restored.result).toEqual({ doubled: { y: 2 }, label: 'one' });
  });

  it('resumes a reconstructed process at its outline position', async () => {
    const persister = createPersister();
    const original = new QuestionProcess({ pid: 'q-1' });
    await original.start();
    await waitUntil(() => original.state === ProcessState.WAITING);

    const bundle = persister.save(original);
    original.kill();
    expect(bundle.continuation).toEqual({
      status: null,
      step: 'advance',
      message: 'need an answer',
      data: null,
      pending_args: null,
      cursor: { pos: 1, child: null },
      context: {},
      awaiting_key: 'answer',
    });

    const restored = persister.load(bundle, { checkpointer: null });
    await restored.start();
    restored.resume('yes');

    await expect(restored.whenTerminated()).resolves.toBe(ProcessState.FINISHED);
    expect(restored.result).toEqual({ result: 'accepted' });
  });

  it('resumes a reconstructed loop mid-way', async () => {
    const persister = createPersister();
    const restored = persister.load(
      {
        schema: 'process-bundle',
        version: 1,
        type_id: 'counting_process',
        pid: 'c-1',
        label: 'running',
        inputs: {},
        outputs: {},
        paused: false,
        continuation: {
          status: null,
          step: 'advance',
          args: [],
          cursor: { pos: 1, child: { child: null } },
          context: { counter: 2, trail: ['increment', 'increment'] },
          awaiting_key: null,
        },
      },
      { checkpointer: null },
    );

    await restored.start();
    await restored.whenTerminated();

    expect(restored.result).toEqual({ counter: 3, passes: 3 });
  });

  it('rejects a cursor that does not fit the outline', () => {
    const persister = createPersister();
    expect(() =>
      persister.load({
        schema: 'process-bundle',
        version: 1,
        type_id: 'counting_process',
        pid: 'c-2',
        label: 'running',
        inputs: {},
        outputs: {},
        paused: false,
        continuation: {
          status: null,
          step: 'advance',
          args: [],
          cursor: { pos: 9, child: null },
          context: {},
          awaiting_key: null,
        },
      }),
    ).toThrow(
      new ReconstructionError(
        'c-2',
        'Process c-2: Outline cursor does not fit the outline: pos must be an integer between 0 and 3',
      ),
    );
  });

  it('rejects an outline continuation without a cursor', () => {
    const persister = createPersister();
    expect(() =>
      persister.load({
        schema: 'process-bundle',
        version: 1,
        type_id: 'counting_process',
        pid: 'c-3',
        label: 'running',
        inputs: {},
        outputs: {},
        paused: false,
        continuation: { status: null, step: 'advance', args: [], cursor: null },
      }),
    ).toThrow('Continuation of process c-3 resumes its outline but carries no cursor');
  });

  it('fails on a predicate that returns a promise', async () => {
    const process = new AsyncPredicateProcess({ pid: 'a-1' });
    await process.start();

    await expect(process.whenTerminated()).resolves.toBe(ProcessState.EXCEPTED);
    const exception = process.exception;
    expect(exception).toBeInstanceOf(StepError);
    if (!(exception instanceof StepError)) return;
    expect(exception.cause).toBeInstanceOf(OutlinePredicateError);
    expect(exception.message).toBe(
      'Step "advance" of process a-1 failed: Predicate "isReady" returned a promise; predicates must be synchronous',
    );
  });

  it('uses the truthiness of a non-boolean predicate', async () => {
    const process = new LoosePredicateProcess();
    await process.start();
    await process.whenTerminated();

    expect(process.result).toEqual({ branch: 'truthy' });
  });

  it('describes its outline', () => {
    expect(new ReviewProcess().describeOutline()).toBe(
      ['prepare', 'if(needsReview):', '  review', 'else:', '  approve', 'ship'].join('\n'),
    );
    expect(new CountingProcess().describeOutline()).toBe(
      ['init', 'while(belowThree):', '  increment', 'report'].join('\n'),
    );
    expect(new EarlyReturnProcess().describeOutline()).toBe(
      ['prepare', 'return(2)', 'ship'].join('\n'),
    );
  });

  it('refuses branches after else_', () => {
    const conditional = if_(needsReview)(review).else_(approve);
    expect(() => conditional.else_(ship)).toThrow('else_ cannot follow else_');
    expect(() => conditional.elif_(needsReview)).toThrow('elif_ cannot follow else_');
  });
});
