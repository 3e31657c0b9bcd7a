import type { IProcessBroker } from '../interfaces/process-broker.interface';
import type { StatusReport } from '../interfaces/process-records.interface';
import { ControlKind } from './control-messages';
import {
  ControlChannel,
  expectBoolean,
  expectPid,
  expectStatusReport,
  pausePayload,
  type ProcessControllerOptions,
} from './control-channel';

/**
 * Controls processes remotely; every call awaits the response of the process
 * (or of the launcher) and rejects with ControlTimeoutError or
 * RemoteControlError.
 */
export class RemoteProcessController {
  private readonly channel: ControlChannel;

  constructor(broker: IProcessBroker, options: ProcessControllerOptions = {}) {
    this.channel = new ControlChannel(broker, options);
  }

  /** Launches a process of a registered type and returns its pid. */
  async launch(
    typeId: string,
    inputs: Record<string, unknown> = {},
    options: { pid?: string } = {},
  ): Promise<string> {
    const request = this.channel.request(
      ControlKind.LAUNCH,
      options.pid ?? this.channel.newPid(),
      { type_id: typeId, inputs },
    );
    return expectPid(request, await this.channel.send(request));
  }

  /** Reconstructs a process from its checkpoint and runs it. */
  async continueProcess(pid: string, tag: string | null = null): Promise<string> {
    const request = this.channel.request(ControlKind.CONTINUE, pid, { tag });
    return expectPid(request, await this.channel.send(request));
  }

  async pause(
    pid: string,
    message: string | null = null,
    timeoutMs: number | null = null,
  ): Promise<boolean> {
    const request = this.channel.request(
      ControlKind.PAUSE,
      pid,
      pausePayload(message, timeoutMs),
    );
    return expectBoolean(request, await this.channel.send(request));
  }

  async play(pid: string): Promise<boolean> {
    const request = this.channel.request(ControlKind.PLAY, pid);
    return expectBoolean(request, await this.channel.send(request));
  }

  async kill(pid: string, message: string | null = null): Promise<boolean> {
    const request = this.channel.request(ControlKind.KILL, pid, { message });
    return expectBoolean(request, await this.channel.send(request));
  }

  async status(pid: string): Promise<StatusReport> {
    const request = this.channel.request(ControlKind.STATUS, pid);
    return expectStatusReport(request, await this.channel.send(request));
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
}
