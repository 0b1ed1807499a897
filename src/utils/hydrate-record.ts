import { InvalidRecordError } from '../errors/invalid-record.error';
import type { StateMachineDefinition } from '../engines/state-machine-definition';
import type { MachineRecord } from '../interfaces/machine-records.interface';
import { cloneData, isPlainObject } from './clone-data';

export interface HydratedInstanceSeed {
  state: string;
  version: number;
  data: Record<string, unknown>;
  parent: { machineType: string; id: string } | null;
}

/**
 * Checks a persisted row against the definition it is loaded with.
 */
export function hydrateRecord(
  tableName: string,
  definition: StateMachineDefinition,
  record: MachineRecord,
): HydratedInstanceSeed {
  if (!definition.hasState(record.stateValue)) {
    throw new InvalidRecordError(
      tableName,
      record.id,
      `Row ${tableName}/${record.id} is in state "${record.stateValue}", which machine ${definition.id} does not declare`,
    );
  }

  if (!Number.isInteger(record.version) || record.version < 0) {
    throw new InvalidRecordError(
      tableName,
      record.id,
      `Row ${tableName}/${record.id} has invalid version ${String(record.version)}`,
    );
  }

  if (!isPlainObject(record.data)) {
    throw new InvalidRecordError(
      tableName,
      record.id,
      `Row ${tableName}/${record.id} has invalid data payload`,
    );
  }

  if ((record.parentType === null) !== (record.parentId === null)) {
    throw new InvalidRecordError(
      tableName,
      record.id,
      `Row ${tableName}/${record.id} has a half-set parent link`,
    );
  }

  return {
    state: record.stateValue,
    version: record.version,
    data: cloneData(record.data),
    parent:
      record.parentType !== null && record.parentId !== null
        ? { machineType: record.parentType, id: record.parentId }
        : null,
  };
}
