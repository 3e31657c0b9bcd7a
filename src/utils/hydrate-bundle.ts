import { ReconstructionError } from '../errors/reconstruction.error';
import { SerializationError } from '../errors/serialization.error';
import {
  BUNDLE_SCHEMA,
  BUNDLE_VERSION,
  type JsonObject,
  type ProcessBundle,
} from '../interfaces/process-records.interface';
import { isProcessState } from '../process/process-states';
import { toRepresentableObject } from './to-representable';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validates an untrusted bundle and returns a deep copy of it. */
export function hydrateBundle(raw: unknown): ProcessBundle {
  if (!isPlainObject(raw)) {
    throw new ReconstructionError(null, 'Bundle is not an object');
  }

  const pid = typeof raw.pid === 'string' && raw.pid.length > 0 ? raw.pid : null;
  if (pid === null) {
    throw new ReconstructionError(null, 'Bundle is missing its pid');
  }

  if (raw.schema !== BUNDLE_SCHEMA || raw.version !== BUNDLE_VERSION) {
    throw new ReconstructionError(
      pid,
      `Bundle for process ${pid} is not a supported V${BUNDLE_VERSION} process bundle`,
    );
  }

  if (typeof raw.type_id !== 'string' || raw.type_id.length === 0) {
    throw new ReconstructionError(pid, `Bundle for process ${pid} has no type id`);
  }

  if (!isProcessState(raw.label)) {
    throw new ReconstructionError(
      pid,
      `Bundle for process ${pid} has invalid label ${String(raw.label)}`,
    );
  }

  if (typeof raw.paused !== 'boolean') {
    throw new ReconstructionError(
      pid,
      `Bundle for process ${pid} has invalid paused flag`,
    );
  }

  return {
    schema: BUNDLE_SCHEMA,
    version: BUNDLE_VERSION,
    type_id: raw.type_id,
    pid,
    label: raw.label,
    inputs: hydrateSection(pid, 'inputs', raw.inputs),
    outputs: hydrateSection(pid, 'outputs', raw.outputs),
    paused: raw.paused,
    continuation: hydrateSection(pid, 'continuation', raw.continuation),
  };
}

function hydrateSection(pid: string, name: string, value: unknown): JsonObject {
  if (!isPlainObject(value)) {
    throw new ReconstructionError(
      pid,
      `Bundle for process ${pid} has invalid ${name} payload`,
    );
  }
  try {
    return toRepresentableObject(pid, name, value);
  } catch (error) {
    if (error instanceof SerializationError) {
      throw new ReconstructionError(pid, error.message);
    }
    throw error;
  }
}
