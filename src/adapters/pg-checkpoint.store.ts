import type { Pool } from 'pg';
import { ReconstructionError } from '../errors/reconstruction.error';
import type { ICheckpointStore } from '../interfaces/checkpoint-store.interface';
import type {
  CheckpointRecord,
  PersistedCheckpoint,
  ProcessBundle,
} from '../interfaces/process-records.interface';

export const DEFAULT_CHECKPOINT_TABLE = 'process_checkpoints';

const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

interface PgCheckpointSummaryRow {
  pid: string;
  tag: string;
  type_id: string;
  label: string;
  saved_at: Date | string;
}

interface PgCheckpointRow extends PgCheckpointSummaryRow {
  bundle: unknown;
}

type PgQueryable = Pick<Pool, 'query'>;

/**
 * Checkpoints in a PostgreSQL table (see generateCheckpointMigration). The
 * rolling checkpoint of a process is stored with an empty tag.
 */
export class PgCheckpointStore implements ICheckpointStore {
  constructor(
    private readonly pool: PgQueryable,
    private readonly tableName: string = DEFAULT_CHECKPOINT_TABLE,
  ) {
    if (!TABLE_NAME_REGEX.test(tableName)) {
      throw new Error(
        `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
      );
    }
  }

  async save(bundle: ProcessBundle, tag: string | null = null): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.tableName} (pid, tag, type_id, label, bundle, saved_at)
       VALUES ($1, $2, $3, $4, $5::jsonb, CURRENT_TIMESTAMP)
       ON CONFLICT (pid, tag) DO UPDATE SET
         type_id = $3,
         label = $4,
         bundle = $5::jsonb,
         saved_at = CURRENT_TIMESTAMP`,
      [bundle.pid, tag ?? '', bundle.type_id, bundle.label, JSON.stringify(bundle)],
    );
  }

  async load(pid: string, tag: string | null = null): Promise<CheckpointRecord | null> {
    const result = await this.pool.query<PgCheckpointRow>(
      `SELECT pid, tag, type_id, label, bundle, saved_at
       FROM ${this.tableName}
       WHERE pid = $1 AND tag = $2`,
      [pid, tag ?? ''],
    );

    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    return { ...this.toSummary(row), bundle: this.parseBundle(row) };
  }

  async list(): Promise<PersistedCheckpoint[]> {
    const result = await this.pool.query<PgCheckpointSummaryRow>(
      `SELECT pid, tag, type_id, label, saved_at
       FROM ${this.tableName}
       ORDER BY saved_at`,
    );
    return result.rows.map((row) => this.toSummary(row));
  }

  async listForProcess(pid: string): Promise<PersistedCheckpoint[]> {
    const result = await this.pool.query<PgCheckpointSummaryRow>(
      `SELECT pid, tag, type_id, label, saved_at
       FROM ${this.tableName}
       WHERE pid = $1
       ORDER BY saved_at`,
      [pid],
    );
    return result.rows.map((row) => this.toSummary(row));
  }

  async delete(pid: string, tag: string | null = null): Promise<void> {
    await this.pool.query(
      `DELETE FROM ${this.tableName} WHERE pid = $1 AND tag = $2`,
      [pid, tag ?? ''],
    );
  }

  async deleteForProcess(pid: string): Promise<void> {
    await this.pool.query(`DELETE FROM ${this.tableName} WHERE pid = $1`, [pid]);
  }

  private toSummary(row: PgCheckpointSummaryRow): PersistedCheckpoint {
    return {
      pid: row.pid,
      tag: row.tag === '' ? null : row.tag,
      typeId: row.type_id,
      label: row.label,
      savedAt: new Date(row.saved_at),
    };
  }

  private parseBundle(row: PgCheckpointRow): Record<string, unknown> {
    let bundle: unknown = row.bundle;
    if (typeof bundle === 'string') {
      try {
        bundle = JSON.parse(bundle);
      } catch {
        throw new ReconstructionError(
          row.pid,
          `Checkpoint of process ${row.pid} in ${this.tableName} is not valid JSON`,
        );
      }
    }
    if (typeof bundle !== 'object' || bundle === null || Array.isArray(bundle)) {
      throw new ReconstructionError(
        row.pid,
        `Checkpoint of process ${row.pid} in ${this.tableName} is not a JSON object`,
      );
    }
    return { ...bundle };
  }
}
