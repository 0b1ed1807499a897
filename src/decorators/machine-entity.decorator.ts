import 'reflect-metadata';
import { SetMetadata } from '@nestjs/common';
import { MACHINE_ENTITY_METADATA } from '../state-machine.constants';
import { deriveTableName } from '../utils/derive-table-name';
import type { StateMachineDefinition } from '../engines/state-machine-definition';

export interface MachineEntityOptions {
  /** Database table name. If omitted, derived from class name. */
  tableName?: string;
  /** Definition shared by every instance stored in the table */
  definition: StateMachineDefinition;
}

export interface MachineEntityMetadata {
  tableName: string;
  definition: StateMachineDefinition;
}

export function MachineEntity(options: MachineEntityOptions): ClassDecorator {
  return (target: Function) => {
    const tableName = options.tableName ?? deriveTableName(target.name);
    const metadata: MachineEntityMetadata = {
      tableName,
      definition: options.definition,
    };
    SetMetadata(MACHINE_ENTITY_METADATA, metadata)(target);
    Reflect.defineMetadata(MACHINE_ENTITY_METADATA, metadata, target);
  };
}
