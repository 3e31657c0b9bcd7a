import type { ICheckpointStore } from './checkpoint-store.interface';
import type { IProcessBroker } from './process-broker.interface';
import type { ProcessConstructor } from '../process/process';

export interface ProcessModuleOptions {
  /** Checkpoint storage implementing ICheckpointStore */
  store: ICheckpointStore;
  /** Broker client. Default: in-process EventEmitterBroker */
  broker?: IProcessBroker;
  /** Process classes resolvable by type id during reconstruction */
  processes?: ProcessConstructor[];

  /** Controller RPC timeout. Default: 10000 ms */
  rpcTimeoutMs?: number;
  /** State-change broadcast timeout. Default: 5000 ms */
  broadcastTimeoutMs?: number;
  /** Write a checkpoint on every transition. Default: true */
  checkpointOnTransition?: boolean;

  /** Cron expression for terminated checkpoint cleanup. Default: hourly */
  cleanupCronExpression?: string;
  /** Enable the cleanup cron. Default: false */
  enableCheckpointCleanup?: boolean;
}

export interface ResolvedProcessModuleOptions {
  processes: ProcessConstructor[];
  rpcTimeoutMs: number;
  broadcastTimeoutMs: number;
  checkpointOnTransition: boolean;
  cleanupCronExpression: string;
  enableCheckpointCleanup: boolean;
}

export interface ProcessModuleAsyncOptions {
  imports?: any[];
  useFactory: (
    ...args: any[]
  ) => Promise<ProcessModuleOptions> | ProcessModuleOptions;
  inject?: any[];
}
