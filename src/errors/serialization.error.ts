export class SerializationError extends Error {
  constructor(
    public readonly pid: string,
    public readonly path: string,
    message: string,
  ) {
    super(`Cannot serialize process ${pid} at ${path}: ${message}`);
    this.name = 'SerializationError';
  }
}
