import type { Process } from '../process/process';
import type { ProcessBundle } from './process-records.interface';

/** What a process needs from the persister to checkpoint itself. */
export interface IProcessCheckpointer {
  /** Captures the bundle synchronously; throws SerializationError. */
  save(process: Process): ProcessBundle;
  persist(bundle: ProcessBundle, tag?: string | null): Promise<void>;
}
