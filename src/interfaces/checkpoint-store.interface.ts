import type {
  CheckpointRecord,
  PersistedCheckpoint,
  ProcessBundle,
} from './process-records.interface';

export interface ICheckpointStore {
  /**
   * Insert or replace the checkpoint identified by (pid, tag).
   * A `null` tag is the rolling checkpoint written on every transition.
   */
  save(bundle: ProcessBundle, tag?: string | null): Promise<void>;

  /** The stored record, or `null` when there is none for (pid, tag). */
  load(pid: string, tag?: string | null): Promise<CheckpointRecord | null>;

  list(): Promise<PersistedCheckpoint[]>;

  listForProcess(pid: string): Promise<PersistedCheckpoint[]>;

  delete(pid: string, tag?: string | null): Promise<void>;

  deleteForProcess(pid: string): Promise<void>;
}
