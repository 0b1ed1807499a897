import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { IMachineDbAdapter } from './machine-db-adapter.interface';
import type { TransitionExecutor } from '../engines/transition-executor';

export interface StateMachineModuleOptions {
  /** Database adapter instance implementing IMachineDbAdapter */
  adapter: IMachineDbAdapter;
  /** Optional executor override (e.g. to share a lock table) */
  executor?: TransitionExecutor;

  /** Cron expression for the deadline sweep. Default: every minute */
  cronExpression?: string;

  /** Event fired on instances past their deadline. Default: 'TIMEOUT' */
  timeoutEventType?: string;

  /** Enable internal timeout cron registration. Default: true */
  enableTimeoutCron?: boolean;

  /** Default bound on guards and before-actions per fire, in ms. Default: none */
  fireTimeoutMs?: number;
}

export interface StateMachineModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: (
    ...args: any[]
  ) => Promise<StateMachineModuleOptions> | StateMachineModuleOptions;
  inject?: FactoryProvider['inject'];
}
