import 'reflect-metadata';
import { ProcessType } from '../src/decorators/process-type.decorator';
import { Process } from '../src/process/process';
import {
  continueWith,
  finishWith,
  raiseError,
  waitFor,
  type StepResult,
} from '../src/process/step-directives';

/** Lets `turns` rounds of setImmediate callbacks run. */
export async function settle(turns = 10): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export async function waitUntil(
  predicate: () => boolean,
  maxTurns = 200,
): Promise<void> {
  for (let i = 0; i < maxTurns; i++) {
    if (predicate()) return;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error(`Condition not met within ${maxTurns} turns`);
}

@ProcessType({ typeId: 'doubler' })
export class DoublerProcess extends Process {
  protected run(): StepResult {
    const x = this.inputs.x;
    if (typeof x !== 'number') {
      return raiseError(new TypeError('x must be a number'));
    }
    return finishWith({ y: x * 2 });
  }
}

@ProcessType({ typeId: 'approval' })
export class ApprovalProcess extends Process {
  protected run(): StepResult {
    this.out('requested', true);
    return waitFor('decide', { message: 'waiting for approval' });
  }

  protected decide(answer: unknown): StepResult {
    return finishWith({ approved: answer });
  }
}

@ProcessType({ typeId: 'counter' })
export class CounterProcess extends Process {
  protected run(): StepResult {
    return continueWith('tick', 0);
  }

  protected tick(n: number): StepResult {
    if (n < 3) return continueWith('tick', n + 1);
    return finishWith({ count: n });
  }
}

export class FailingProcess extends Process {
  protected run(): StepResult {
    this.out('partial', 1);
    throw new Error('boom');
  }
}

export class TriggeredProcess extends Process {
  protected run(): StepResult {
    return waitFor('done', { trigger: Promise.resolve(7) });
  }

  protected done(value: number): StepResult {
    return finishWith({ value });
  }
}
