export class InvalidRecordError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly instanceId: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}
