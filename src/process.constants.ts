export const PROCESS_MODULE_OPTIONS = Symbol('PROCESS_MODULE_OPTIONS');
export const PROCESS_CHECKPOINT_STORE = Symbol('PROCESS_CHECKPOINT_STORE');
export const PROCESS_BROKER = Symbol('PROCESS_BROKER');
export const PROCESS_TYPE_METADATA = 'nestjs-resumable-processes:process-type';

export const DEFAULT_RPC_TIMEOUT_MS = 10_000;
export const DEFAULT_BROADCAST_TIMEOUT_MS = 5_000;
export const DEFAULT_CLEANUP_CRON_EXPRESSION = '0 0 * * * *';
export const DEFAULT_MAX_HISTORY = 100;

/** RPC target served by the process manager for LAUNCH and CONTINUE. */
export const LAUNCHER_TARGET = 'process.launcher';
/** Broadcast topic prefix; the full topic is `${prefix}.${pid}`. */
export const STATE_CHANGED_TOPIC_PREFIX = 'process.state_changed';
/** Broadcast topic for PLAY/PAUSE/KILL addressed to every process. */
export const CONTROL_BROADCAST_TOPIC = 'process.control';
