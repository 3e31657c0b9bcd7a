export class ControlTimeoutError extends Error {
  constructor(
    public readonly pid: string,
    public readonly kind: string,
    public readonly correlationId: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `No response to ${kind} for process ${pid} within ${timeoutMs}ms (correlation ${correlationId})`,
    );
    this.name = 'ControlTimeoutError';
  }
}
