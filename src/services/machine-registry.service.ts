import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { MachineNotRegisteredError } from '../errors/machine-not-registered.error';
import { MACHINE_ENTITY_METADATA } from '../state-machine.constants';
import type { MachineEntityMetadata } from '../decorators/machine-entity.decorator';
import type { StateMachineDefinition } from '../engines/state-machine-definition';
import { validateTableName } from '../utils/validate-table-name';

export interface RegisteredMachine {
  tableName: string;
  definition: StateMachineDefinition;
  targetClass: Function;
}

@Injectable()
export class MachineRegistry implements OnModuleInit {
  private readonly logger = new Logger(MachineRegistry.name);
  private readonly registrations = new Map<string, RegisteredMachine>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  onModuleInit(): void {
    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<MachineEntityMetadata | undefined>(
        MACHINE_ENTITY_METADATA,
        wrapper.metatype,
      );

      if (metadata) {
        this.register(metadata.tableName, metadata.definition, wrapper.metatype);
        this.logger.log(
          `Registered state machine entity: ${wrapper.metatype.name} -> ${metadata.tableName} (${metadata.definition.id})`,
        );
      }
    }
  }

  register(
    tableName: string,
    definition: StateMachineDefinition,
    targetClass: Function,
  ): void {
    validateTableName(tableName);
    const existing = this.registrations.get(tableName);
    if (existing) {
      throw new DuplicateRegistrationError(
        tableName,
        existing.targetClass.name,
        targetClass.name,
      );
    }
    this.registrations.set(tableName, { tableName, definition, targetClass });
  }

  get(tableName: string): RegisteredMachine | undefined {
    return this.registrations.get(tableName);
  }

  getAll(): RegisteredMachine[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(tableName: string): RegisteredMachine {
    const registration = this.registrations.get(tableName);
    if (!registration) {
      throw new MachineNotRegisteredError(tableName);
    }
    return registration;
  }
}
