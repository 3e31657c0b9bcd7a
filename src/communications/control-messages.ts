import { MalformedMessageError } from '../errors/malformed-message.error';
import type { StatusReport } from '../interfaces/process-records.interface';
import { isProcessState, type ProcessState } from '../process/process-states';
import { STATE_CHANGED_TOPIC_PREFIX } from '../process.constants';

export enum ControlKind {
  PLAY = 'PLAY',
  PAUSE = 'PAUSE',
  KILL = 'KILL',
  STATUS = 'STATUS',
  STATE_CHANGED = 'STATE_CHANGED',
  LAUNCH = 'LAUNCH',
  CONTINUE = 'CONTINUE',
}

export type ControlPayload = Record<string, unknown>;

export interface RpcRequest {
  type: 'rpc';
  kind: ControlKind;
  pid: string;
  correlation_id: string;
  payload: ControlPayload;
}

export interface BroadcastMessage {
  type: 'broadcast';
  kind: ControlKind;
  pid: string;
  payload: ControlPayload;
}

export interface RpcErrorDetail {
  name: string;
  message: string;
}

export type RpcResponse =
  | { correlation_id: string; status: 'ok'; result: unknown }
  | { correlation_id: string; status: 'error'; error_detail: RpcErrorDetail };

/** Pid placeholder of broadcasts addressed to every process. */
export const ALL_PROCESSES = '*';

const CONTROL_KINDS: readonly string[] = Object.values(ControlKind);

function isControlKind(value: unknown): value is ControlKind {
  return typeof value === 'string' && CONTROL_KINDS.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stateChangedTopic(pid: string): string {
  return `${STATE_CHANGED_TOPIC_PREFIX}.${pid}`;
}

export function buildRpcRequest(
  kind: ControlKind,
  pid: string,
  correlationId: string,
  payload: ControlPayload = {},
): RpcRequest {
  return { type: 'rpc', kind, pid, correlation_id: correlationId, payload };
}

export function buildBroadcast(
  kind: ControlKind,
  pid: string,
  payload: ControlPayload = {},
): BroadcastMessage {
  return { type: 'broadcast', kind, pid, payload };
}

export function buildStateChanged(
  pid: string,
  from: ProcessState | null,
  to: ProcessState,
): BroadcastMessage {
  return buildBroadcast(ControlKind.STATE_CHANGED, pid, { from, to });
}

export function okResponse(correlationId: string, result: unknown): RpcResponse {
  return { correlation_id: correlationId, status: 'ok', result };
}

export function errorResponse(correlationId: string, error: unknown): RpcResponse {
  const detail: RpcErrorDetail =
    error instanceof Error
      ? { name: error.name, message: error.message }
      : { name: 'Error', message: String(error) };
  return { correlation_id: correlationId, status: 'error', error_detail: detail };
}

/** Best-effort correlation id of an envelope that may fail validation. */
export function correlationIdOf(raw: unknown): string {
  return isRecord(raw) && typeof raw.correlation_id === 'string'
    ? raw.correlation_id
    : '';
}

export function decodeRpcRequest(raw: unknown): RpcRequest {
  if (!isRecord(raw) || raw.type !== 'rpc') {
    throw new MalformedMessageError('Expected an RPC request envelope');
  }
  if (!isControlKind(raw.kind)) {
    throw new MalformedMessageError(`Unknown control kind: ${String(raw.kind)}`);
  }
  if (typeof raw.pid !== 'string' || raw.pid.length === 0) {
    throw new MalformedMessageError('RPC request is missing pid');
  }
  if (typeof raw.correlation_id !== 'string' || raw.correlation_id.length === 0) {
    throw new MalformedMessageError('RPC request is missing correlation_id');
  }
  const payload = raw.payload ?? {};
  if (!isRecord(payload)) {
    throw new MalformedMessageError('RPC payload must be an object');
  }
  return buildRpcRequest(raw.kind, raw.pid, raw.correlation_id, payload);
}

export function decodeBroadcast(raw: unknown): BroadcastMessage {
  if (!isRecord(raw) || raw.type !== 'broadcast') {
    throw new MalformedMessageError('Expected a broadcast envelope');
  }
  if (!isControlKind(raw.kind)) {
    throw new MalformedMessageError(`Unknown control kind: ${String(raw.kind)}`);
  }
  if (typeof raw.pid !== 'string') {
    throw new MalformedMessageError('Broadcast is missing pid');
  }
  const payload = raw.payload ?? {};
  if (!isRecord(payload)) {
    throw new MalformedMessageError('Broadcast payload must be an object');
  }
  return buildBroadcast(raw.kind, raw.pid, payload);
}

export function decodeRpcResponse(
  raw: unknown,
  expectedCorrelationId: string,
): RpcResponse {
  if (!isRecord(raw)) {
    throw new MalformedMessageError('Expected an RPC response object');
  }
  if (raw.correlation_id !== expectedCorrelationId) {
    throw new MalformedMessageError(
      `Response correlation id ${String(raw.correlation_id)} does not match ${expectedCorrelationId}`,
    );
  }
  if (raw.status === 'ok') {
    return okResponse(expectedCorrelationId, raw.result);
  }
  if (raw.status === 'error') {
    const detail = raw.error_detail;
    if (
      !isRecord(detail) ||
      typeof detail.name !== 'string' ||
      typeof detail.message !== 'string'
    ) {
      throw new MalformedMessageError('Error response is missing error_detail');
    }
    return {
      correlation_id: expectedCorrelationId,
      status: 'error',
      error_detail: { name: detail.name, message: detail.message },
    };
  }
  throw new MalformedMessageError(`Unknown response status: ${String(raw.status)}`);
}

export function isStatusReport(value: unknown): value is StatusReport {
  return (
    isRecord(value) &&
    typeof value.pid === 'string' &&
    isProcessState(value.label) &&
    typeof value.is_terminal === 'boolean' &&
    typeof value.paused === 'boolean'
  );
}

/** Optional string field of a payload; anything else counts as absent. */
export function payloadString(payload: ControlPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' ? value : null;
}

export function payloadNumber(payload: ControlPayload, key: string): number | null {
  const value = payload[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function payloadRecord(
  payload: ControlPayload,
  key: string,
): Record<string, unknown> | null {
  const value = payload[key];
  return isRecord(value) ? value : null;
}
