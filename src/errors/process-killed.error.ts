/** Thrown by `execute()` and `whenFinished()` for a process that was killed. */
export class ProcessKilledError extends Error {
  constructor(
    public readonly pid: string,
    public readonly killMessage: string | null,
  ) {
    super(
      killMessage === null
        ? `Process ${pid} was killed`
        : `Process ${pid} was killed: ${killMessage}`,
    );
    this.name = 'ProcessKilledError';
  }
}
