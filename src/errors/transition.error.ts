export class TransitionError extends Error {
  constructor(
    public readonly machineId: string,
    public readonly fromState: string | null,
    public readonly toState: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TransitionError';
  }
}
