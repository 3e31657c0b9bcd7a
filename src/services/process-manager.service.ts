import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ControlKind,
  correlationIdOf,
  decodeRpcRequest,
  errorResponse,
  okResponse,
  payloadRecord,
  payloadString,
  type RpcResponse,
} from '../communications/control-messages';
import { MalformedMessageError } from '../errors/malformed-message.error';
import { ProcessEventType } from '../events/process-event-type.enum';
import type {
  ProcessCheckpointFailedEvent,
  ProcessCreatedEvent,
  ProcessTerminatedEvent,
  ProcessTransitionEvent,
} from '../events/process-events';
import type {
  IProcessBroker,
  Unsubscribe,
} from '../interfaces/process-broker.interface';
import type { StatusReport } from '../interfaces/process-records.interface';
import type { Process } from '../process/process';
import { isTerminalProcessState } from '../process/process-states';
import {
  LAUNCHER_TARGET,
  PROCESS_BROKER,
  PROCESS_MODULE_OPTIONS,
} from '../process.constants';
import { ProcessPersister, type ProcessBindings } from './process-persister.service';
import { ProcessRegistry } from './process-registry.service';

export interface ProcessManagerOptions {
  broadcastTimeoutMs: number;
  checkpointOnTransition: boolean;
}

/**
 * Hosts live processes: launches and reconstructs them, keeps the
 * pid -> process map, and serves LAUNCH/CONTINUE requests from remote
 * controllers. A process leaves the map on its terminal transition.
 */
@Injectable()
export class ProcessManager implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ProcessManager.name);
  private readonly live = new Map<string, Process>();
  /** Launches and continuations that have not finished starting. */
  private readonly starting = new Map<string, Promise<Process>>();
  private stopServing: Unsubscribe | null = null;

  constructor(
    private readonly registry: ProcessRegistry,
    private readonly persister: ProcessPersister,
    @Inject(PROCESS_BROKER) private readonly broker: IProcessBroker,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PROCESS_MODULE_OPTIONS)
    private readonly options: ProcessManagerOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    this.stopServing = await this.broker.serveRpc(LAUNCHER_TARGET, (message) =>
      this.handleLauncherRequest(message),
    );
    this.logger.log(`Serving launch requests on ${LAUNCHER_TARGET}`);
  }

  async onModuleDestroy(): Promise<void> {
    const stopServing = this.stopServing;
    this.stopServing = null;
    if (stopServing) await stopServing();

    await Promise.allSettled(this.starting.values());
    const processes = [...this.live.values()];
    this.live.clear();
    await Promise.all(processes.map((process) => process.close()));
  }

  async launch(
    typeId: string,
    inputs: Record<string, unknown> = {},
    options: { pid?: string } = {},
  ): Promise<Process> {
    const registration = this.registry.getOrThrow(typeId);
    if (
      options.pid !== undefined &&
      (this.live.has(options.pid) || this.starting.has(options.pid))
    ) {
      throw new Error(`Process ${options.pid} is already running`);
    }

    const bindings = this.bindings();
    const process = new registration.targetClass({
      pid: options.pid,
      inputs,
      broker: bindings.broker,
      broadcastTimeoutMs: bindings.broadcastTimeoutMs,
      checkpointer: bindings.checkpointer ?? undefined,
    });
    await this.startTracked(process.pid, async () => {
      await this.run(process);
      return process;
    });

    this.logger.log(`Launched ${typeId} process ${process.pid}`);
    return process;
  }

  /**
   * Reconstructs a process from its latest (or tagged) checkpoint and runs
   * it. Concurrent calls for the same pid share one reconstruction.
   */
  continueProcess(pid: string, tag: string | null = null): Promise<Process> {
    const running = this.live.get(pid);
    if (running) return Promise.resolve(running);
    const pending = this.starting.get(pid);
    if (pending) return pending;

    return this.startTracked(pid, async () => {
      const process = await this.persister.loadCheckpoint(pid, tag, this.bindings());
      if (process.hasTerminated()) {
        this.logger.log(`Process ${pid} was already ${process.state}; not resuming`);
        return process;
      }
      await this.run(process);
      this.logger.log(`Continued process ${pid} from ${process.state}`);
      return process;
    });
  }

  get(pid: string): Process | undefined {
    return this.live.get(pid);
  }

  list(): Process[] {
    return Array.from(this.live.values());
  }

  /** Status of a live process, or the one recorded in its latest checkpoint. */
  async getStatus(pid: string): Promise<StatusReport> {
    const process = this.live.get(pid);
    if (process) return process.getStatusReport();

    const bundle = await this.persister.loadBundle(pid);
    const report: StatusReport = {
      pid: bundle.pid,
      label: bundle.label,
      is_terminal: isTerminalProcessState(bundle.label),
      paused: bundle.paused,
    };
    const status = bundle.continuation.status;
    if (typeof status === 'string') report.status = status;
    return report;
  }

  private bindings(): ProcessBindings {
    return {
      broker: this.broker,
      broadcastTimeoutMs: this.options.broadcastTimeoutMs,
      checkpointer: this.options.checkpointOnTransition ? this.persister : null,
    };
  }

  /** Registers `start` as the in-flight start of `pid` until it settles. */
  private startTracked(pid: string, start: () => Promise<Process>): Promise<Process> {
    const pending: Promise<Process> = start().finally(() => {
      if (this.starting.get(pid) === pending) this.starting.delete(pid);
    });
    this.starting.set(pid, pending);
    return pending;
  }

  /** Starts a process and maps it once started; one that fails to start is closed. */
  private async run(process: Process): Promise<void> {
    this.track(process);
    try {
      await process.start();
    } catch (error) {
      await process.close();
      throw error;
    }
    if (!process.hasTerminated()) {
      this.live.set(process.pid, process);
    }
  }

  private track(process: Process): void {
    const processType = process.typeId;

    process.addListener({
      onProcessCreated: (created) => {
        this.eventEmitter.emit(ProcessEventType.CREATED, {
          processType,
          pid: created.pid,
          inputs: { ...created.inputs },
          timestamp: new Date(),
        } satisfies ProcessCreatedEvent);
      },
      onProcessTransition: (transitioned, fromState, toState) => {
        this.eventEmitter.emit(ProcessEventType.TRANSITION, {
          processType,
          pid: transitioned.pid,
          fromState,
          toState,
          timestamp: new Date(),
        } satisfies ProcessTransitionEvent);
        if (isTerminalProcessState(toState)) {
          this.retire(transitioned);
        }
      },
      onCheckpointFailed: (failed, error) => {
        this.eventEmitter.emit(ProcessEventType.CHECKPOINT_FAILED, {
          processType,
          pid: failed.pid,
          state: failed.state,
          error: error.message,
          timestamp: new Date(),
        } satisfies ProcessCheckpointFailedEvent);
      },
    });
  }

  private retire(process: Process): void {
    if (this.live.get(process.pid) === process) {
      this.live.delete(process.pid);
    }
    this.eventEmitter.emit(ProcessEventType.TERMINATED, {
      processType: process.typeId,
      pid: process.pid,
      state: process.state,
      outputs: process.outputs,
      error: process.exception?.message ?? null,
      timestamp: new Date(),
    } satisfies ProcessTerminatedEvent);
    this.logger.log(`Process ${process.pid} terminated in ${process.state}`);

    process.close().catch((error: unknown) => {
      this.logger.error(
        `Failed to close process ${process.pid}`,
        error instanceof Error ? error.stack : String(error),
      );
    });
  }

  private async handleLauncherRequest(raw: unknown): Promise<RpcResponse> {
    let correlationId = correlationIdOf(raw);
    try {
      const request = decodeRpcRequest(raw);
      correlationId = request.correlation_id;

      switch (request.kind) {
        case ControlKind.LAUNCH: {
          const typeId = payloadString(request.payload, 'type_id');
          if (typeId === null) {
            throw new MalformedMessageError('LAUNCH payload is missing type_id');
          }
          const inputs = payloadRecord(request.payload, 'inputs') ?? {};
          const process = await this.launch(typeId, inputs, { pid: request.pid });
          return okResponse(correlationId, process.pid);
        }
        case ControlKind.CONTINUE: {
          const process = await this.continueProcess(
            request.pid,
            payloadString(request.payload, 'tag'),
          );
          return okResponse(correlationId, process.pid);
        }
        default:
          throw new MalformedMessageError(
            `${request.kind} is not served by the launcher`,
          );
      }
    } catch (error) {
      return errorResponse(correlationId, error);
    }
  }
}
