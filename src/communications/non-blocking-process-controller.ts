import type { IProcessBroker } from '../interfaces/process-broker.interface';
import type { StatusReport } from '../interfaces/process-records.interface';
import { ControlKind, type RpcRequest } from './control-messages';
import {
  ControlChannel,
  expectBoolean,
  expectPid,
  expectStatusReport,
  pausePayload,
  type ProcessControllerOptions,
} from './control-channel';

/** Handle returned before the request has been answered. */
export interface ControlFuture<T> {
  correlationId: string;
  request: RpcRequest;
  result: Promise<T>;
}

/**
 * Same operations as RemoteProcessController, returning immediately with a
 * future for the response instead of awaiting it.
 */
export class NonBlockingProcessController {
  private readonly channel: ControlChannel;

  constructor(broker: IProcessBroker, options: ProcessControllerOptions = {}) {
    this.channel = new ControlChannel(broker, options);
  }

  launch(
    typeId: string,
    inputs: Record<string, unknown> = {},
    options: { pid?: string } = {},
  ): ControlFuture<string> {
    const request = this.channel.request(
      ControlKind.LAUNCH,
      options.pid ?? this.channel.newPid(),
      { type_id: typeId, inputs },
    );
    return this.dispatch(request, (result) => expectPid(request, result));
  }

  continueProcess(pid: string, tag: string | null = null): ControlFuture<string> {
    const request = this.channel.request(ControlKind.CONTINUE, pid, { tag });
    return this.dispatch(request, (result) => expectPid(request, result));
  }

  pause(
    pid: string,
    message: string | null = null,
    timeoutMs: number | null = null,
  ): ControlFuture<boolean> {
    const request = this.channel.request(
      ControlKind.PAUSE,
      pid,
      pausePayload(message, timeoutMs),
    );
    return this.dispatch(request, (result) => expectBoolean(request, result));
  }

  play(pid: string): ControlFuture<boolean> {
    const request = this.channel.request(ControlKind.PLAY, pid);
    return this.dispatch(request, (result) => expectBoolean(request, result));
  }

  kill(pid: string, message: string | null = null): ControlFuture<boolean> {
    const request = this.channel.request(ControlKind.KILL, pid, { message });
    return this.dispatch(request, (result) => expectBoolean(request, result));
  }

  status(pid: string): ControlFuture<StatusReport> {
    const request = this.channel.request(ControlKind.STATUS, pid);
    return this.dispatch(request, (result) => expectStatusReport(request, result));
  }

  pauseAll(message: string | null = null): Promise<void> {
    return this.channel.broadcast(ControlKind.PAUSE, { message });
  }

  playAll(): Promise<void> {
    return this.channel.broadcast(ControlKind.PLAY);
  }

  killAll(message: string | null = null): Promise<void> {
    return this.channel.broadcast(ControlKind.KILL, { message });
  }

  private dispatch<T>(
    request: RpcRequest,
    parse: (result: unknown) => T,
  ): ControlFuture<T> {
    return {
      correlationId: request.correlation_id,
      request,
      result: this.channel.send(request).then(parse),
    };
  }
}
