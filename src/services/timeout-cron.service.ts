import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { MachineRegistry } from './machine-registry.service';
import { MachineManager } from './machine-manager.service';
import { IMachineDbAdapter } from '../interfaces/machine-db-adapter.interface';
import { MachineEventType } from '../events/machine-event-type.enum';
import type { MachineTimeoutTriggeredEvent } from '../events/machine-events';
import type { FireResult } from '../interfaces/fire-result.interface';
import {
  MACHINE_DB_ADAPTER,
  MACHINE_MODULE_OPTIONS,
  TIMEOUT_CRON_JOB_NAME,
} from '../state-machine.constants';

export interface TimeoutCronOptions {
  cronExpression: string;
  timeoutEventType: string;
  enableTimeoutCron: boolean;
}

export interface TimeoutProcessingFailure {
  machineType: string;
  instanceId: string;
  error: string;
}

export interface TimeoutProcessingResult {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  machineTypesScanned: number;
  expiredFound: number;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: TimeoutProcessingFailure[];
}

@Injectable()
export class TimeoutCronService implements OnModuleInit {
  private readonly logger = new Logger(TimeoutCronService.name);

  constructor(
    private readonly registry: MachineRegistry,
    private readonly manager: MachineManager,
    @Inject(MACHINE_DB_ADAPTER) private readonly adapter: IMachineDbAdapter,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(MACHINE_MODULE_OPTIONS)
    private readonly options: TimeoutCronOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableTimeoutCron) {
      this.logger.log('Timeout cron disabled by configuration');
      return;
    }

    const job = new CronJob(this.options.cronExpression, () => {
      this.processExpiredInstances()
        .then((summary) => {
          this.logger.log(
            `Timeout cron summary: scanned=${summary.machineTypesScanned}, expired=${summary.expiredFound}, attempted=${summary.attempted}, succeeded=${summary.succeeded}, failed=${summary.failed}, durationMs=${summary.durationMs}`,
          );
        })
        .catch((err: unknown) => {
          this.logger.error(
            'Unhandled error in timeout cron',
            err instanceof Error ? err.stack : err,
          );
        });
    });

    this.schedulerRegistry.addCronJob(TIMEOUT_CRON_JOB_NAME, job);
    job.start();
    this.logger.log(
      `Timeout cron registered with expression: ${this.options.cronExpression}`,
    );
  }

  async processExpiredInstances(): Promise<TimeoutProcessingResult> {
    const startedAt = new Date();
    const summary: TimeoutProcessingResult = {
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      machineTypesScanned: 0,
      expiredFound: 0,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      failures: [],
    };

    for (const registration of this.registry.getAll()) {
      summary.machineTypesScanned++;
      const expired = await this.adapter.findExpired(registration.tableName);
      summary.expiredFound += expired.length;

      for (const { id } of expired) {
        summary.attempted++;
        let result: FireResult;
        try {
          result = await this.manager.send(
            registration.tableName,
            id,
            this.options.timeoutEventType,
          );
        } catch (error) {
          this.recordFailure(summary, registration.tableName, id, error);
          continue;
        }

        if (!result.ok) {
          this.recordFailure(summary, registration.tableName, id, result.error);
          continue;
        }
        summary.succeeded++;

        try {
          this.eventEmitter.emit(MachineEventType.TIMEOUT_TRIGGERED, {
            machineType: registration.tableName,
            instanceId: id,
            fromState: result.fromState,
            toState: result.state,
            timestamp: new Date(),
          } satisfies MachineTimeoutTriggeredEvent);

          this.logger.log(
            `Timeout processed: ${registration.tableName}/${id} ${result.fromState} -> ${result.state}`,
          );
        } catch (error) {
          this.logger.error(
            `Timeout side effects failed for ${registration.tableName}/${id}`,
            error instanceof Error ? error.stack : error,
          );
        }
      }
    }

    summary.finishedAt = new Date();
    summary.durationMs =
      summary.finishedAt.getTime() - summary.startedAt.getTime();

    return summary;
  }

  private recordFailure(
    summary: TimeoutProcessingResult,
    machineType: string,
    instanceId: string,
    error: unknown,
  ): void {
    summary.failed++;
    summary.failures.push({
      machineType,
      instanceId,
      error: error instanceof Error ? error.message : String(error),
    });

    // Remaining instances are still processed
    this.logger.error(
      `Failed to process timeout for ${machineType}/${instanceId}`,
      error instanceof Error ? error.stack : error,
    );
  }
}
