export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly typeId: string,
    public readonly class1: string,
    public readonly class2: string,
  ) {
    super(
      `Duplicate process type id "${typeId}". ` +
        `Both ${class1} and ${class2} are registered with the same type id.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
