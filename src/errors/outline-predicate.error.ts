export class OutlinePredicateError extends Error {
  constructor(
    public readonly predicate: string,
    message: string,
  ) {
    super(message);
    this.name = 'OutlinePredicateError';
  }
}
