export class DuplicateInstanceError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly instanceId: string,
  ) {
    super(`A ${tableName} instance with id "${instanceId}" already exists.`);
    this.name = 'DuplicateInstanceError';
  }
}
