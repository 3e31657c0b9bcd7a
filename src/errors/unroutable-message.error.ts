export class UnroutableMessageError extends Error {
  constructor(public readonly target: string) {
    super(`No receiver is subscribed to RPC target "${target}".`);
    this.name = 'UnroutableMessageError';
  }
}
