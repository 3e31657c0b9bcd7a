import { Inject, Injectable } from '@nestjs/common';
import { ReconstructionError } from '../errors/reconstruction.error';
import type { ICheckpointStore } from '../interfaces/checkpoint-store.interface';
import type { IProcessBroker } from '../interfaces/process-broker.interface';
import type { IProcessCheckpointer } from '../interfaces/process-checkpointer.interface';
import type { ProcessListener } from '../interfaces/process-listener.interface';
import {
  BUNDLE_SCHEMA,
  BUNDLE_VERSION,
  type PersistedCheckpoint,
  type ProcessBundle,
} from '../interfaces/process-records.interface';
import type { Process } from '../process/process';
import { PROCESS_CHECKPOINT_STORE } from '../process.constants';
import { hydrateBundle } from '../utils/hydrate-bundle';
import { toRepresentableObject } from '../utils/to-representable';
import { ProcessRegistry } from './process-registry.service';

/** Runtime wiring handed to a reconstructed process. */
export interface ProcessBindings {
  broker?: IProcessBroker;
  broadcastTimeoutMs?: number;
  listeners?: ProcessListener[];
  /** Defaults to the persister itself; `null` disables checkpointing. */
  checkpointer?: IProcessCheckpointer | null;
}

function assertTag(tag: string | null): void {
  if (tag !== null && tag.length === 0) {
    throw new Error('Checkpoint tags must be non-empty strings or null');
  }
}

/**
 * Turns processes into bundles and back, and keeps checkpoints in the
 * configured store.
 */
@Injectable()
export class ProcessPersister implements IProcessCheckpointer {
  constructor(
    private readonly registry: ProcessRegistry,
    @Inject(PROCESS_CHECKPOINT_STORE) private readonly store: ICheckpointStore,
  ) {}

  /** Throws SerializationError when any value is not representable. */
  save(process: Process): ProcessBundle {
    const pid = process.pid;
    return {
      schema: BUNDLE_SCHEMA,
      version: BUNDLE_VERSION,
      type_id: process.typeId,
      pid,
      label: process.state,
      inputs: toRepresentableObject(pid, 'inputs', process.inputs),
      outputs: toRepresentableObject(pid, 'outputs', process.outputs),
      paused: process.paused,
      continuation: toRepresentableObject(
        pid,
        'continuation',
        process.saveContinuation(),
      ),
    };
  }

  /**
   * Rebuilds a process from a bundle without running it. Throws
   * ReconstructionError on a malformed bundle or unknown type id.
   */
  load(raw: unknown, bindings: ProcessBindings = {}): Process {
    const bundle = hydrateBundle(raw);
    const registration = this.registry.get(bundle.type_id);
    if (!registration) {
      throw new ReconstructionError(
        bundle.pid,
        `Bundle for process ${bundle.pid} names unknown type "${bundle.type_id}"`,
      );
    }

    const checkpointer =
      bindings.checkpointer === undefined ? this : bindings.checkpointer;
    let process: Process;
    try {
      process = new registration.targetClass({
        pid: bundle.pid,
        inputs: bundle.inputs,
        broker: bindings.broker,
        broadcastTimeoutMs: bindings.broadcastTimeoutMs,
        listeners: bindings.listeners,
        checkpointer: checkpointer ?? undefined,
      });
    } catch (error) {
      throw new ReconstructionError(
        bundle.pid,
        `Could not construct ${registration.targetClass.name} for process ${bundle.pid}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
    process.restoreFromBundle(bundle);
    return process;
  }

  async persist(bundle: ProcessBundle, tag: string | null = null): Promise<void> {
    assertTag(tag);
    await this.store.save(bundle, tag);
  }

  async saveCheckpoint(process: Process, tag: string | null = null): Promise<ProcessBundle> {
    const bundle = this.save(process);
    await this.persist(bundle, tag);
    return bundle;
  }

  /** Latest (or tagged) bundle of `pid`, validated. */
  async loadBundle(pid: string, tag: string | null = null): Promise<ProcessBundle> {
    assertTag(tag);
    const record = await this.store.load(pid, tag);
    if (!record) {
      throw new ReconstructionError(
        pid,
        tag === null
          ? `No checkpoint stored for process ${pid}`
          : `No checkpoint tagged "${tag}" stored for process ${pid}`,
      );
    }
    return hydrateBundle(record.bundle);
  }

  async loadCheckpoint(
    pid: string,
    tag: string | null = null,
    bindings: ProcessBindings = {},
  ): Promise<Process> {
    return this.load(await this.loadBundle(pid, tag), bindings);
  }

  getCheckpoints(): Promise<PersistedCheckpoint[]> {
    return this.store.list();
  }

  getProcessCheckpoints(pid: string): Promise<PersistedCheckpoint[]> {
    return this.store.listForProcess(pid);
  }

  async deleteCheckpoint(pid: string, tag: string | null = null): Promise<void> {
    assertTag(tag);
    await this.store.delete(pid, tag);
  }

  deleteProcessCheckpoints(pid: string): Promise<void> {
    return this.store.deleteForProcess(pid);
  }
}
