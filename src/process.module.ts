import { DynamicModule, Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { EventEmitterBroker } from './adapters/event-emitter-broker.adapter';
import { NonBlockingProcessController } from './communications/non-blocking-process-controller';
import { RemoteProcessController } from './communications/remote-process-controller';
import type { IProcessBroker } from './interfaces/process-broker.interface';
import type {
  ProcessModuleAsyncOptions,
  ProcessModuleOptions,
  ResolvedProcessModuleOptions,
} from './interfaces/process-module-options.interface';
import {
  DEFAULT_BROADCAST_TIMEOUT_MS,
  DEFAULT_CLEANUP_CRON_EXPRESSION,
  DEFAULT_RPC_TIMEOUT_MS,
  PROCESS_BROKER,
  PROCESS_CHECKPOINT_STORE,
  PROCESS_MODULE_OPTIONS,
} from './process.constants';
import { CheckpointCleanupService } from './services/checkpoint-cleanup.service';
import { ProcessManager } from './services/process-manager.service';
import { ProcessPersister } from './services/process-persister.service';
import { ProcessRegistry } from './services/process-registry.service';

function resolveOptions(options: ProcessModuleOptions): ResolvedProcessModuleOptions {
  return {
    processes: options.processes ?? [],
    rpcTimeoutMs: options.rpcTimeoutMs ?? DEFAULT_RPC_TIMEOUT_MS,
    broadcastTimeoutMs: options.broadcastTimeoutMs ?? DEFAULT_BROADCAST_TIMEOUT_MS,
    checkpointOnTransition: options.checkpointOnTransition ?? true,
    cleanupCronExpression:
      options.cleanupCronExpression ?? DEFAULT_CLEANUP_CRON_EXPRESSION,
    enableCheckpointCleanup: options.enableCheckpointCleanup ?? false,
  };
}

const controllerProvider = {
  provide: RemoteProcessController,
  useFactory: (broker: IProcessBroker, options: ResolvedProcessModuleOptions) =>
    new RemoteProcessController(broker, { timeoutMs: options.rpcTimeoutMs }),
  inject: [PROCESS_BROKER, PROCESS_MODULE_OPTIONS],
};

const nonBlockingControllerProvider = {
  provide: NonBlockingProcessController,
  useFactory: (broker: IProcessBroker, options: ResolvedProcessModuleOptions) =>
    new NonBlockingProcessController(broker, { timeoutMs: options.rpcTimeoutMs }),
  inject: [PROCESS_BROKER, PROCESS_MODULE_OPTIONS],
};

const services = [
  ProcessRegistry,
  ProcessPersister,
  ProcessManager,
  CheckpointCleanupService,
  controllerProvider,
  nonBlockingControllerProvider,
];

const exported = [
  ProcessManager,
  ProcessRegistry,
  ProcessPersister,
  RemoteProcessController,
  NonBlockingProcessController,
  CheckpointCleanupService,
  PROCESS_CHECKPOINT_STORE,
  PROCESS_BROKER,
];

@Module({})
export class ProcessModule {
  static forRoot(options: ProcessModuleOptions): DynamicModule {
    return {
      module: ProcessModule,
      imports: [EventEmitterModule.forRoot()],
      providers: [
        {
          provide: PROCESS_CHECKPOINT_STORE,
          useValue: options.store,
        },
        {
          provide: PROCESS_BROKER,
          useValue: options.broker ?? new EventEmitterBroker(),
        },
        {
          provide: PROCESS_MODULE_OPTIONS,
          useValue: resolveOptions(options),
        },
        ...services,
      ],
      exports: exported,
      global: true,
    };
  }

  static forRootAsync(options: ProcessModuleAsyncOptions): DynamicModule {
    return {
      module: ProcessModule,
      imports: [EventEmitterModule.forRoot(), ...(options.imports ?? [])],
      providers: [
        {
          provide: PROCESS_MODULE_OPTIONS,
          useFactory: async (...args: any[]) =>
            resolveOptions(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        {
          provide: PROCESS_CHECKPOINT_STORE,
          useFactory: async (...args: any[]) => {
            const opts = await options.useFactory(...args);
            return opts.store;
          },
          inject: options.inject ?? [],
        },
        {
          provide: PROCESS_BROKER,
          useFactory: async (...args: any[]) => {
            const opts = await options.useFactory(...args);
            return opts.broker ?? new EventEmitterBroker();
          },
          inject: options.inject ?? [],
        },
        ...services,
      ],
      exports: exported,
      global: true,
    };
  }
}
