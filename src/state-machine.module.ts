import { DynamicModule, Module } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { MachineManager } from './services/machine-manager.service';
import { MachineRegistry } from './services/machine-registry.service';
import { TimeoutCronService } from './services/timeout-cron.service';
import { TransitionExecutor } from './engines/transition-executor';
import {
  StateMachineModuleOptions,
  StateMachineModuleAsyncOptions,
} from './interfaces/machine-module-options.interface';
import {
  MACHINE_MODULE_OPTIONS,
  MACHINE_DB_ADAPTER,
  TRANSITION_EXECUTOR,
  DEFAULT_CRON_EXPRESSION,
  DEFAULT_TIMEOUT_EVENT,
} from './state-machine.constants';

function resolveOptions(options: StateMachineModuleOptions) {
  return {
    timeoutEventType: options.timeoutEventType ?? DEFAULT_TIMEOUT_EVENT,
    cronExpression: options.cronExpression ?? DEFAULT_CRON_EXPRESSION,
    enableTimeoutCron: options.enableTimeoutCron ?? true,
    fireTimeoutMs: options.fireTimeoutMs,
  };
}

function resolveExecutor(options: StateMachineModuleOptions): TransitionExecutor {
  return (
    options.executor ??
    new TransitionExecutor({ defaultTimeoutMs: options.fireTimeoutMs })
  );
}

@Module({})
export class StateMachineModule {
  static forRoot(options: StateMachineModuleOptions): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [
        DiscoveryModule,
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
      ],
      providers: [
        {
          provide: MACHINE_DB_ADAPTER,
          useValue: options.adapter,
        },
        {
          provide: TRANSITION_EXECUTOR,
          useValue: resolveExecutor(options),
        },
        {
          provide: MACHINE_MODULE_OPTIONS,
          useValue: resolveOptions(options),
        },
        MachineRegistry,
        MachineManager,
        TimeoutCronService,
      ],
      exports: [
        MachineManager,
        MachineRegistry,
        MACHINE_DB_ADAPTER,
        TRANSITION_EXECUTOR,
      ],
      global: true,
    };
  }

  static forRootAsync(options: StateMachineModuleAsyncOptions): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [
        DiscoveryModule,
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: MACHINE_MODULE_OPTIONS,
          useFactory: async (...args: any[]) =>
            resolveOptions(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        {
          provide: MACHINE_DB_ADAPTER,
          useFactory: async (...args: any[]) => {
            const opts = await options.useFactory(...args);
            return opts.adapter;
          },
          inject: options.inject ?? [],
        },
        {
          provide: TRANSITION_EXECUTOR,
          useFactory: async (...args: any[]) =>
            resolveExecutor(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        MachineRegistry,
        MachineManager,
        TimeoutCronService,
      ],
      exports: [
        MachineManager,
        MachineRegistry,
        MACHINE_DB_ADAPTER,
        TRANSITION_EXECUTOR,
      ],
      global: true,
    };
  }
}
