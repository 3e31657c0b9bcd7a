import type { Process } from '../process/process';
import type { ProcessState } from '../process/process-states';

/**
 * Callbacks a process fires during its lifecycle. Listeners receive the
 * process as an argument and are unregistered on the terminal transition.
 */
export interface ProcessListener {
  onProcessCreated?(process: Process): void;
  onProcessRunning?(process: Process): void;
  onProcessWaiting?(process: Process): void;
  onProcessPaused?(process: Process): void;
  onProcessPlayed?(process: Process): void;
  onProcessTransition?(
    process: Process,
    fromState: ProcessState | null,
    toState: ProcessState,
  ): void;
  onOutputEmitted?(process: Process, key: string, value: unknown): void;
  onProcessFinished?(process: Process, outputs: Record<string, unknown>): void;
  onProcessExcepted?(process: Process, reason: string): void;
  onProcessKilled?(process: Process, message: string | null): void;
  onCheckpointFailed?(process: Process, error: Error): void;
}
