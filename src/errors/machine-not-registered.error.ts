export class MachineNotRegisteredError extends Error {
  constructor(public readonly tableName: string) {
    super(`No state machine entity registered for table "${tableName}".`);
    this.name = 'MachineNotRegisteredError';
  }
}
