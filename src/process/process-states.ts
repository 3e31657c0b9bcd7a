import type { StateMachineDefinition } from '../interfaces/state-machine-definition.interface';

export enum ProcessState {
  CREATED = 'created',
  RUNNING = 'running',
  WAITING = 'waiting',
  FINISHED = 'finished',
  EXCEPTED = 'excepted',
  KILLED = 'killed',
}

const PROCESS_STATES: readonly string[] = Object.values(ProcessState);

export function isProcessState(value: unknown): value is ProcessState {
  return typeof value === 'string' && PROCESS_STATES.includes(value);
}

export const TERMINAL_PROCESS_STATES: readonly ProcessState[] = [
  ProcessState.FINISHED,
  ProcessState.EXCEPTED,
  ProcessState.KILLED,
];

export function isTerminalProcessState(label: string): boolean {
  return TERMINAL_PROCESS_STATES.some((terminal) => terminal === label);
}

/**
 * Transition table of every process. RUNNING -> RUNNING is the edge taken
 * between steps; EXCEPTED is entered whenever a transition fails.
 */
export function createProcessDefinition(
  pid: string,
): StateMachineDefinition<ProcessState> {
  return {
    id: pid,
    initial: ProcessState.CREATED,
    failureState: ProcessState.EXCEPTED,
    states: {
      [ProcessState.CREATED]: {
        allowed: [ProcessState.RUNNING, ProcessState.KILLED, ProcessState.EXCEPTED],
      },
      [ProcessState.RUNNING]: {
        allowed: [
          ProcessState.RUNNING,
          ProcessState.WAITING,
          ProcessState.FINISHED,
          ProcessState.KILLED,
          ProcessState.EXCEPTED,
        ],
      },
      [ProcessState.WAITING]: {
        allowed: [
          ProcessState.RUNNING,
          ProcessState.WAITING,
          ProcessState.FINISHED,
          ProcessState.KILLED,
          ProcessState.EXCEPTED,
        ],
      },
      [ProcessState.FINISHED]: { allowed: [] },
      [ProcessState.EXCEPTED]: { allowed: [] },
      [ProcessState.KILLED]: { allowed: [] },
    },
  };
}
