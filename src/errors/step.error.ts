/**
 * Raised (and recorded on the EXCEPTED state) when user step logic throws or
 * returns a Raise directive. The original error is kept as `cause`.
 */
export class StepError extends Error {
  constructor(
    public readonly pid: string,
    public readonly step: string,
    public readonly cause: unknown,
  ) {
    super(
      `Step "${step}" of process ${pid} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = 'StepError';
  }
}
