export class DefinitionError extends Error {
  constructor(
    public readonly machineId: string,
    message: string,
  ) {
    super(`Machine definition ${machineId || '<unnamed>'}: ${message}`);
    this.name = 'DefinitionError';
  }
}
