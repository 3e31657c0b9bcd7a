import { randomUUID } from 'crypto';
import { Logger } from '@nestjs/common';
import { ControlTimeoutError } from '../errors/control-timeout.error';
import { MalformedMessageError } from '../errors/malformed-message.error';
import { RemoteControlError } from '../errors/remote-control.error';
import type { IProcessBroker } from '../interfaces/process-broker.interface';
import type { StatusReport } from '../interfaces/process-records.interface';
import {
  CONTROL_BROADCAST_TOPIC,
  DEFAULT_RPC_TIMEOUT_MS,
  LAUNCHER_TARGET,
} from '../process.constants';
import { withTimeout } from '../utils/with-timeout';
import {
  ALL_PROCESSES,
  ControlKind,
  buildBroadcast,
  buildRpcRequest,
  decodeRpcResponse,
  isStatusReport,
  type ControlPayload,
  type RpcRequest,
} from './control-messages';

export interface ProcessControllerOptions {
  /** Bound on every RPC round trip. Default: 10000 ms */
  timeoutMs?: number;
  correlationIdFactory?: () => string;
  /** Pid generator for LAUNCH requests. */
  pidFactory?: () => string;
}

/**
 * Request building and response handling shared by both controller flavors,
 * so that they put identical messages on the wire.
 */
export class ControlChannel {
  private readonly logger = new Logger(ControlChannel.name);
  private readonly timeoutMs: number;
  private readonly correlationIdFactory: () => string;
  private readonly pidFactory: () => string;

  constructor(
    private readonly broker: IProcessBroker,
    options: ProcessControllerOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.correlationIdFactory = options.correlationIdFactory ?? randomUUID;
    this.pidFactory = options.pidFactory ?? randomUUID;
  }

  newPid(): string {
    return this.pidFactory();
  }

  request(kind: ControlKind, pid: string, payload: ControlPayload = {}): RpcRequest {
    return buildRpcRequest(kind, pid, this.correlationIdFactory(), payload);
  }

  /** Resolves with the `result` of an ok response. */
  async send(request: RpcRequest): Promise<unknown> {
    const target =
      request.kind === ControlKind.LAUNCH || request.kind === ControlKind.CONTINUE
        ? LAUNCHER_TARGET
        : request.pid;
    this.logger.debug(`${request.kind} -> ${target} (${request.correlation_id})`);

    const raw = await withTimeout(
      this.broker.rpcSend(target, request),
      this.timeoutMs,
      () =>
        new ControlTimeoutError(
          request.pid,
          request.kind,
          request.correlation_id,
          this.timeoutMs,
        ),
    );
    const response = decodeRpcResponse(raw, request.correlation_id);
    if (response.status === 'error') {
      throw new RemoteControlError(
        request.pid,
        request.kind,
        response.error_detail.name,
        response.error_detail.message,
      );
    }
    return response.result;
  }

  async broadcast(kind: ControlKind, payload: ControlPayload = {}): Promise<void> {
    await this.broker.publish(
      CONTROL_BROADCAST_TOPIC,
      buildBroadcast(kind, ALL_PROCESSES, payload),
    );
  }
}

export function expectBoolean(request: RpcRequest, result: unknown): boolean {
  if (typeof result !== 'boolean') {
    throw new MalformedMessageError(
      `${request.kind} of ${request.pid} answered with a non-boolean result`,
    );
  }
  return result;
}

export function expectPid(request: RpcRequest, result: unknown): string {
  if (typeof result !== 'string') {
    throw new MalformedMessageError(
      `${request.kind} of ${request.pid} answered without a pid`,
    );
  }
  return result;
}

export function expectStatusReport(request: RpcRequest, result: unknown): StatusReport {
  if (!isStatusReport(result)) {
    throw new MalformedMessageError(
      `${request.kind} of ${request.pid} answered with a malformed status report`,
    );
  }
  return result;
}

export function pausePayload(
  message: string | null,
  timeoutMs: number | null,
): ControlPayload {
  const payload: ControlPayload = { message };
  if (timeoutMs !== null) payload.timeout_ms = timeoutMs;
  return payload;
}
