export class ProcessTypeNotRegisteredError extends Error {
  constructor(public readonly typeId: string) {
    super(`No process type registered for type id "${typeId}".`);
    this.name = 'ProcessTypeNotRegisteredError';
  }
}
