export class RemoteControlError extends Error {
  constructor(
    public readonly pid: string,
    public readonly kind: string,
    public readonly remoteName: string,
    message: string,
  ) {
    super(message);
    this.name = 'RemoteControlError';
  }
}
