import { Logger } from '@nestjs/common';
import { MalformedMessageError } from '../errors/malformed-message.error';
import type {
  IProcessBroker,
  Unsubscribe,
} from '../interfaces/process-broker.interface';
import type { StatusReport } from '../interfaces/process-records.interface';
import type { Process } from '../process/process';
import { ProcessState } from '../process/process-states';
import { CONTROL_BROADCAST_TOPIC } from '../process.constants';
import {
  ALL_PROCESSES,
  ControlKind,
  correlationIdOf,
  decodeBroadcast,
  decodeRpcRequest,
  errorResponse,
  okResponse,
  payloadNumber,
  payloadString,
  type BroadcastMessage,
  type ControlPayload,
  type RpcResponse,
} from './control-messages';

/**
 * Server side of the control protocol for one process. Serves RPCs addressed
 * to the process pid and the PLAY/PAUSE/KILL broadcasts sent to every
 * process. Holds the process until it is sealed or detached; once the
 * process terminates the router answers from the final status report.
 */
export class ProcessControlRouter {
  private readonly logger: Logger;
  private readonly pid: string;
  private process: Process | null;
  private finalReport: StatusReport | null = null;
  private unsubscribers: Unsubscribe[] = [];

  constructor(
    process: Process,
    private readonly broker: IProcessBroker,
  ) {
    this.pid = process.pid;
    this.process = process;
    this.logger = new Logger(`${ProcessControlRouter.name}<${process.pid}>`);
  }

  get isSealed(): boolean {
    return this.finalReport !== null;
  }

  async attach(): Promise<void> {
    this.unsubscribers.push(
      await this.broker.serveRpc(this.pid, (message) => this.handleRpc(message)),
    );
    this.unsubscribers.push(
      await this.broker.subscribe(CONTROL_BROADCAST_TOPIC, (message) =>
        this.handleBroadcast(message),
      ),
    );
  }

  async detach(): Promise<void> {
    this.process = null;
    const unsubscribers = this.unsubscribers;
    this.unsubscribers = [];
    await Promise.all(unsubscribers.map((unsubscribe) => unsubscribe()));
  }

  /** Drops the process reference; later requests see `report`. */
  seal(report: StatusReport): void {
    this.finalReport = report;
    this.process = null;
  }

  async handleRpc(raw: unknown): Promise<RpcResponse> {
    let correlationId = correlationIdOf(raw);
    try {
      const request = decodeRpcRequest(raw);
      correlationId = request.correlation_id;
      if (request.pid !== this.pid) {
        throw new MalformedMessageError(
          `Request for ${request.pid} delivered to ${this.pid}`,
        );
      }
      this.logger.debug(`RPC ${request.kind} (${correlationId})`);
      return okResponse(correlationId, this.dispatch(request.kind, request.payload));
    } catch (error) {
      return errorResponse(correlationId, error);
    }
  }

  handleBroadcast(raw: unknown): void {
    let message: BroadcastMessage;
    try {
      message = decodeBroadcast(raw);
    } catch (error) {
      this.logger.warn(
        `Ignoring malformed broadcast: ${error instanceof Error ? error.message : String(error)}`,
      );
      return;
    }
    if (message.pid !== ALL_PROCESSES && message.pid !== this.pid) return;
    if (
      message.kind !== ControlKind.PLAY &&
      message.kind !== ControlKind.PAUSE &&
      message.kind !== ControlKind.KILL
    ) {
      return;
    }
    try {
      this.dispatch(message.kind, message.payload);
    } catch (error) {
      this.logger.warn(
        `Broadcast ${message.kind} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private dispatch(kind: ControlKind, payload: ControlPayload): unknown {
    const process = this.process;
    if (process === null) {
      return this.answerSealed(kind);
    }

    switch (kind) {
      case ControlKind.PLAY:
        return process.play();
      case ControlKind.PAUSE:
        return process.pause(
          payloadString(payload, 'message'),
          payloadNumber(payload, 'timeout_ms'),
        );
      case ControlKind.KILL:
        return process.kill(payloadString(payload, 'message'));
      case ControlKind.STATUS:
        return process.getStatusReport();
      default:
        throw new MalformedMessageError(`${kind} is not served by a process`);
    }
  }

  private answerSealed(kind: ControlKind): unknown {
    const report = this.finalReport;
    if (report === null) {
      throw new Error(`Process ${this.pid} is no longer live`);
    }
    switch (kind) {
      case ControlKind.PLAY:
      case ControlKind.PAUSE:
        return false;
      case ControlKind.KILL:
        return report.label === ProcessState.KILLED;
      case ControlKind.STATUS:
        return report;
      default:
        throw new MalformedMessageError(`${kind} is not served by a process`);
    }
  }
}
