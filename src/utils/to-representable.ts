import { SerializationError } from '../errors/serialization.error';
import type {
  JsonObject,
  JsonValue,
} from '../interfaces/process-records.interface';

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return `instance of ${value.constructor?.name ?? 'unknown class'}`;
  }
  return typeof value === 'number' ? String(value) : typeof value;
}

/**
 * Returns a JSON copy of `value`, or throws SerializationError naming the
 * path of the first value a bundle cannot carry: functions, symbols,
 * bigints, non-finite numbers, `undefined`, class instances and cycles.
 */
export function toRepresentable(
  pid: string,
  path: string,
  value: unknown,
  ancestors: Set<object> = new Set<object>(),
): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(pid, path, `${describe(value)} is not representable`);
    }
    return value;
  }
  if (typeof value !== 'object') {
    throw new SerializationError(pid, path, `${describe(value)} is not representable`);
  }
  if (ancestors.has(value)) {
    throw new SerializationError(pid, path, 'circular reference');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) =>
        toRepresentable(pid, `${path}[${index}]`, item, ancestors),
      );
    }
    if (!isPlainObject(value)) {
      throw new SerializationError(pid, path, `${describe(value)} is not representable`);
    }
    return toRepresentableObject(pid, path, value, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

export function toRepresentableObject(
  pid: string,
  path: string,
  value: object,
  ancestors: Set<object> = new Set<object>(),
): JsonObject {
  const result: JsonObject = {};
  ancestors.add(value);
  try {
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toRepresentable(pid, `${path}.${key}`, entry, ancestors);
    }
  } finally {
    ancestors.delete(value);
  }
  return result;
}
