import type { ICheckpointStore } from '../interfaces/checkpoint-store.interface';
import type {
  CheckpointRecord,
  PersistedCheckpoint,
  ProcessBundle,
} from '../interfaces/process-records.interface';

function cloneJson(value: object): Record<string, unknown> {
  return JSON.parse(JSON.stringify(value)) as Record<string, unknown>;
}

function cloneRecord(record: CheckpointRecord): CheckpointRecord {
  return { ...toSummary(record), bundle: cloneJson(record.bundle) };
}

function toSummary(record: CheckpointRecord): PersistedCheckpoint {
  return {
    pid: record.pid,
    tag: record.tag,
    typeId: record.typeId,
    label: record.label,
    savedAt: new Date(record.savedAt),
  };
}

function tagKey(tag: string | null): string {
  return tag ?? '';
}

export class InMemoryCheckpointStore implements ICheckpointStore {
  private readonly byProcess = new Map<string, Map<string, CheckpointRecord>>();

  async save(bundle: ProcessBundle, tag: string | null = null): Promise<void> {
    const rows = this.byProcess.get(bundle.pid) ?? new Map<string, CheckpointRecord>();
    rows.set(tagKey(tag), {
      pid: bundle.pid,
      tag,
      typeId: bundle.type_id,
      label: bundle.label,
      savedAt: new Date(),
      bundle: cloneJson(bundle),
    });
    this.byProcess.set(bundle.pid, rows);
  }

  async load(pid: string, tag: string | null = null): Promise<CheckpointRecord | null> {
    const row = this.byProcess.get(pid)?.get(tagKey(tag));
    return row ? cloneRecord(row) : null;
  }

  async list(): Promise<PersistedCheckpoint[]> {
    const summaries: PersistedCheckpoint[] = [];
    for (const rows of this.byProcess.values()) {
      for (const row of rows.values()) {
        summaries.push(toSummary(row));
      }
    }
    return summaries;
  }

  async listForProcess(pid: string): Promise<PersistedCheckpoint[]> {
    const rows = this.byProcess.get(pid);
    return rows ? [...rows.values()].map((row) => toSummary(row)) : [];
  }

  async delete(pid: string, tag: string | null = null): Promise<void> {
    const rows = this.byProcess.get(pid);
    if (!rows) return;
    rows.delete(tagKey(tag));
    if (rows.size === 0) this.byProcess.delete(pid);
  }

  async deleteForProcess(pid: string): Promise<void> {
    this.byProcess.delete(pid);
  }
}
