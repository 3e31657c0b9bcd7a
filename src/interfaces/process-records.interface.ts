import type { ProcessState } from '../process/process-states';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Inputs and outputs of a process; checked for representability on save. */
export type ProcessValues = Record<string, unknown>;

export const BUNDLE_SCHEMA = 'process-bundle';
export const BUNDLE_VERSION = 1;

export interface ProcessBundle {
  schema: typeof BUNDLE_SCHEMA;
  version: typeof BUNDLE_VERSION;
  type_id: string;
  pid: string;
  label: ProcessState;
  inputs: JsonObject;
  outputs: JsonObject;
  paused: boolean;
  /** Everything needed to resume: next step, wait details, outline cursor. */
  continuation: JsonObject;
}

export interface StatusReport {
  pid: string;
  label: ProcessState;
  is_terminal: boolean;
  paused: boolean;
  status?: string | null;
}

export interface PersistedCheckpoint {
  pid: string;
  /** `null` for the checkpoint written on every transition. */
  tag: string | null;
  typeId: string;
  label: string;
  savedAt: Date;
}

export interface CheckpointRecord extends PersistedCheckpoint {
  bundle: Record<string, unknown>;
}
