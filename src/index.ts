import 'reflect-metadata';

// Module
export { ProcessModule } from './process.module';

// Services
export { ProcessManager } from './services/process-manager.service';
export type { ProcessManagerOptions } from './services/process-manager.service';
export { ProcessRegistry } from './services/process-registry.service';
export type { RegisteredProcessType } from './services/process-registry.service';
export { ProcessPersister } from './services/process-persister.service';
export type { ProcessBindings } from './services/process-persister.service';
export { CheckpointCleanupService } from './services/checkpoint-cleanup.service';
export type {
  CheckpointCleanupOptions,
  CheckpointCleanupFailure,
  CheckpointCleanupResult,
} from './services/checkpoint-cleanup.service';

// State machine
export { StateMachine, isPromiseLike } from './engines/state-machine.engine';
export { StateEventHook } from './interfaces/state-machine-definition.interface';
export type {
  StateDefinition,
  StateEventCallback,
  StateHook,
  StateMachineDefinition,
  StateTransitionInfo,
  TransitionFailure,
} from './interfaces/state-machine-definition.interface';

// Processes
export { Process, INITIAL_STEP } from './process/process';
export type { ProcessConstructor, ProcessOptions } from './process/process';
export {
  ProcessState,
  TERMINAL_PROCESS_STATES,
  createProcessDefinition,
  isProcessState,
  isTerminalProcessState,
} from './process/process-states';
export {
  continueWith,
  finishWith,
  isStepDirective,
  raiseError,
  waitFor,
} from './process/step-directives';
export type {
  ContinueDirective,
  FinishDirective,
  RaiseDirective,
  StepDirective,
  StepResult,
  WaitDirective,
  WaitOptions,
} from './process/step-directives';
export { ProcessType } from './decorators/process-type.decorator';
export type { ProcessTypeOptions } from './decorators/process-type.decorator';

// Outline
export {
  BlockInstruction,
  ConditionalInstruction,
  LoopInstruction,
  ReturnInstruction,
  StepInstruction,
  if_,
  outline,
  return_,
  step,
  while_,
} from './outline/instructions';
export type {
  Instruction,
  OutlineCursor,
  OutlineEntry,
  OutlinePredicateFn,
  OutlineRuntime,
  OutlineStepFn,
} from './outline/instructions';
export {
  ALL_KEYS,
  OutlineProcess,
  OUTLINE_STEP,
  awaitAllInto,
  awaitInto,
  type Awaitable,
} from './outline/outline-process';

// Communications
export {
  ALL_PROCESSES,
  ControlKind,
  buildBroadcast,
  buildRpcRequest,
  buildStateChanged,
  decodeBroadcast,
  decodeRpcRequest,
  decodeRpcResponse,
  stateChangedTopic,
} from './communications/control-messages';
export type {
  BroadcastMessage,
  ControlPayload,
  RpcRequest,
  RpcResponse,
} from './communications/control-messages';
export { RemoteProcessController } from './communications/remote-process-controller';
export { NonBlockingProcessController } from './communications/non-blocking-process-controller';
export type { ControlFuture } from './communications/non-blocking-process-controller';
export type { ProcessControllerOptions } from './communications/control-channel';
export { ProcessControlRouter } from './communications/process-control-router';

// Interfaces
export type { ICheckpointStore } from './interfaces/checkpoint-store.interface';
export type {
  BroadcastHandler,
  IProcessBroker,
  RpcHandler,
  Unsubscribe,
} from './interfaces/process-broker.interface';
export type { IProcessCheckpointer } from './interfaces/process-checkpointer.interface';
export type { ProcessListener } from './interfaces/process-listener.interface';
export type {
  ProcessModuleAsyncOptions,
  ProcessModuleOptions,
} from './interfaces/process-module-options.interface';
export type {
  CheckpointRecord,
  JsonObject,
  JsonValue,
  PersistedCheckpoint,
  ProcessBundle,
  ProcessValues,
  StatusReport,
} from './interfaces/process-records.interface';

// Adapters
export { EventEmitterBroker } from './adapters/event-emitter-broker.adapter';
export { InMemoryCheckpointStore } from './adapters/in-memory-checkpoint.store';
export {
  PgCheckpointStore,
  DEFAULT_CHECKPOINT_TABLE,
} from './adapters/pg-checkpoint.store';

// Errors
export { BroadcastDeliveryWarning } from './errors/broadcast-delivery.warning';
export { ControlTimeoutError } from './errors/control-timeout.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { InvalidStateError } from './errors/invalid-state.error';
export { MalformedMessageError } from './errors/malformed-message.error';
export { OutlinePredicateError } from './errors/outline-predicate.error';
export { ProcessKilledError } from './errors/process-killed.error';
export { ProcessTypeNotRegisteredError } from './errors/process-type-not-registered.error';
export { ReconstructionError } from './errors/reconstruction.error';
export { RemoteControlError } from './errors/remote-control.error';
export { SerializationError } from './errors/serialization.error';
export { StepError } from './errors/step.error';
export { TransitionError } from './errors/transition.error';
export { UnroutableMessageError } from './errors/unroutable-message.error';

// Events
export { ProcessEventType } from './events/process-event-type.enum';
export type {
  ProcessCheckpointFailedEvent,
  ProcessCheckpointsPurgedEvent,
  ProcessCreatedEvent,
  ProcessTerminatedEvent,
  ProcessTransitionEvent,
} from './events/process-events';

// CLI
export { generateCheckpointMigration } from './utils/generate-checkpoint-migration';

// Constants
export {
  CONTROL_BROADCAST_TOPIC,
  DEFAULT_BROADCAST_TIMEOUT_MS,
  DEFAULT_CLEANUP_CRON_EXPRESSION,
  DEFAULT_MAX_HISTORY,
  DEFAULT_RPC_TIMEOUT_MS,
  LAUNCHER_TARGET,
  PROCESS_BROKER,
  PROCESS_CHECKPOINT_STORE,
  PROCESS_MODULE_OPTIONS,
  PROCESS_TYPE_METADATA,
  STATE_CHANGED_TOPIC_PREFIX,
} from './process.constants';
