export class UnknownStateError extends Error {
  constructor(
    public readonly machineId: string,
    public readonly state: string,
  ) {
    super(`State "${state}" is not declared by machine ${machineId}.`);
    this.name = 'UnknownStateError';
  }
}
