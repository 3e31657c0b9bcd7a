export enum ProcessEventType {
  CREATED = 'process.created',
  TRANSITION = 'process.transition',
  TERMINATED = 'process.terminated',
  CHECKPOINT_FAILED = 'process.checkpoint_failed',
  CHECKPOINTS_PURGED = 'process.checkpoints_purged',
}
