export class ReconstructionError extends Error {
  constructor(
    public readonly pid: string | null,
    message: string,
  ) {
    super(message);
    this.name = 'ReconstructionError';
  }
}
