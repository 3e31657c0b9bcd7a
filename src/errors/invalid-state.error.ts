export class InvalidStateError extends Error {
  constructor(
    public readonly machineId: string,
    public readonly state: string | null,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidStateError';
  }
}
