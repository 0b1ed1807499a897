export class InstanceNotFoundError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly instanceId: string,
  ) {
    super(`No ${tableName} instance with id "${instanceId}".`);
    this.name = 'InstanceNotFoundError';
  }
}
