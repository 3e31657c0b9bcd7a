import type { ProcessState } from '../process/process-states';

export interface ProcessCreatedEvent {
  processType: string;
  pid: string;
  inputs: Record<string, unknown>;
  timestamp: Date;
}

export interface ProcessTransitionEvent {
  processType: string;
  pid: string;
  fromState: ProcessState | null;
  toState: ProcessState;
  timestamp: Date;
}

export interface ProcessTerminatedEvent {
  processType: string;
  pid: string;
  state: ProcessState;
  outputs: Record<string, unknown>;
  error: string | null;
  timestamp: Date;
}

export interface ProcessCheckpointFailedEvent {
  processType: string;
  pid: string;
  state: ProcessState;
  error: string;
  timestamp: Date;
}

export interface ProcessCheckpointsPurgedEvent {
  pid: string;
  state: string;
  timestamp: Date;
}
