import { EventEmitter2 } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import { InMemoryMachineAdapter } from '../../src/adapters/in-memory-machine.adapter';
import { MachineEventType } from '../../src/events/machine-event-type.enum';
import { MachineManager } from '../../src/services/machine-manager.service';
import { MachineRegistry } from '../../src/services/machine-registry.service';
import { TimeoutCronService } from '../../src/services/timeout-cron.service';
import {
  DEFAULT_TIMEOUT_EVENT,
  TIMEOUT_CRON_JOB_NAME,
} from '../../src/state-machine.constants';
import { createMockRegistry } from '../helpers';
import {
  createCollaborators,
  createTransferMachines,
} from '../fixtures/transfer-machines';

async function insertBankTransaction(
  adapter: InMemoryMachineAdapter,
  id: string,
  stateValue: string,
  expiresAt: Date | null,
): Promise<void> {
  await adapter.insert('bank_transactions', {
    id,
    stateValue,
    version: 0,
    data: {},
    parentType: null,
    parentId: null,
    expiresAt,
  });
}

describe('TimeoutCronService', () => {
  let adapter: InMemoryMachineAdapter;
  let registry: MachineRegistry;
  let manager: MachineManager;
  let cronService: TimeoutCronService;
  let emitter: EventEmitter2;
  let schedulerRegistry: SchedulerRegistry;

  const past = () => new Date(Date.now() - 60_000);

  function createCronService(enableTimeoutCron: boolean): TimeoutCronService {
    return new TimeoutCronService(
      registry,
      manager,
      adapter,
      schedulerRegistry,
      emitter,
      {
        cronExpression: '*/60 * * * * *',
        timeoutEventType: DEFAULT_TIMEOUT_EVENT,
        enableTimeoutCron,
      },
    );
  }

  beforeEach(() => {
    const machines = createTransferMachines(createCollaborators());
    adapter = new InMemoryMachineAdapter();
    registry = createMockRegistry();
    registry.register(
      'bank_transactions',
      machines.bankTransaction,
      class BankTransaction {},
    );
    registry.register('transactions', machines.transaction, class Transaction {});

    emitter = new EventEmitter2();
    manager = new MachineManager(registry, adapter, emitter, {});
    schedulerRegistry = new SchedulerRegistry();
    cronService = createCronService(true);
  });

  describe('onModuleInit', () => {
    it('should register cron job when enableTimeoutCron=true', () => {
      const addCronJobSpy = jest.spyOn(schedulerRegistry, 'addCronJob');

      cronService.onModuleInit();

      expect(addCronJobSpy).toHaveBeenCalledWith(
        TIMEOUT_CRON_JOB_NAME,
        expect.any(Object),
      );

      const job = schedulerRegistry.getCronJob(TIMEOUT_CRON_JOB_NAME);
      job.stop();
      schedulerRegistry.deleteCronJob(TIMEOUT_CRON_JOB_NAME);
    });

    it('should not register cron job when enableTimeoutCron=false', () => {
      const addCronJobSpy = jest.spyOn(schedulerRegistry, 'addCronJob');

      createCronService(false).onModuleInit();

      expect(addCronJobSpy).not.toHaveBeenCalled();
    });
  });

  it('should fire the timeout event on each expired instance', async () => {
    await insertBankTransaction(adapter, 'bank-1', 'pending', past());
    await insertBankTransaction(adapter, 'bank-2', 'pending', past());
    await insertBankTransaction(
      adapter,
      'bank-3',
      'pending',
      new Date(Date.now() + 60_000),
    );

    const sendSpy = jest.spyOn(manager, 'send');

    const summary = await cronService.processExpiredInstances();

    expect(sendSpy).toHaveBeenCalledTimes(2);
    expect(sendSpy).toHaveBeenCalledWith('bank_transactions', 'bank-1', 'TIMEOUT');
    expect(sendSpy).toHaveBeenCalledWith('bank_transactions', 'bank-2', 'TIMEOUT');
    expect(summary).toMatchObject({
      machineTypesScanned: 2,
      expiredFound: 2,
      attempted: 2,
      succeeded: 2,
      failed: 0,
      failures: [],
    });
    expect(summary.durationMs).toBeGreaterThanOrEqual(0);

    await expect(
      adapter.findOne('bank_transactions', 'bank-1'),
    ).resolves.toMatchObject({ stateValue: 'failed', version: 1, expiresAt: null });
    await expect(
      adapter.findOne('bank_transactions', 'bank-3'),
    ).resolves.toMatchObject({ stateValue: 'pending', version: 0 });
  });

  it('should emit state-machine.timeout.triggered for each processed instance', async () => {
    await insertBankTransaction(adapter, 'bank-1', 'pending', past());
    const emitSpy = jest.spyOn(emitter, 'emit');

    const summary = await cronService.processExpiredInstances();

    expect(emitSpy).toHaveBeenCalledWith(
      MachineEventType.TIMEOUT_TRIGGERED,
      expect.objectContaining({
        machineType: 'bank_transactions',
        instanceId: 'bank-1',
        fromState: 'pending',
        toState: 'failed',
      }),
    );
    expect(summary.succeeded).toBe(1);
  });

  it('should keep send metrics when side effects fail', async () => {
    await insertBankTransaction(adapter, 'bank-1', 'pending', past());

    const originalEmit = emitter.emit.bind(emitter);
    jest.spyOn(emitter, 'emit').mockImplementation((...emitArgs: any[]) => {
      const [event, ...args] = emitArgs;
      if (event === MachineEventType.TIMEOUT_TRIGGERED) {
        throw new Error('emitter failed');
      }
      return originalEmit(event, ...args);
    });

    const summary = await cronService.processExpiredInstances();

    expect(summary).toMatchObject({
      attempted: 1,
      succeeded: 1,
      failed: 0,
      failures: [],
    });
  });

  it('should count a rejected timeout transition as a failure', async () => {
    await insertBankTransaction(adapter, 'bank-1', 'creating', past());

    const summary = await cronService.processExpiredInstances();

    expect(summary).toMatchObject({ attempted: 1, succeeded: 0, failed: 1 });
    expect(summary.failures).toEqual([
      {
        machineType: 'bank_transactions',
        instanceId: 'bank-1',
        error:
          'Invalid state: bank_transactions/bank-1 cannot handle "TIMEOUT" in state "creating".',
      },
    ]);
  });

  it('should continue processing when one instance fails', async () => {
    await insertBankTransaction(adapter, 'bank-fail', 'pending', past());
    await insertBankTransaction(adapter, 'bank-ok', 'pending', past());

    const originalSend = manager.send.bind(manager);
    const sendSpy = jest
      .spyOn(manager, 'send')
      .mockImplementationOnce(async () => {
        throw new Error('DB connection lost');
      })
      .mockImplementation(originalSend);

    // Should not throw
    const summary = await cronService.processExpiredInstances();

    expect(sendSpy).toHaveBeenCalledTimes(2);
    expect(summary).toMatchObject({
      expiredFound: 2,
      attempted: 2,
      succeeded: 1,
      failed: 1,
    });
    expect(summary.failures).toEqual([
      {
        machineType: 'bank_transactions',
        instanceId: 'bank-fail',
        error: 'DB connection lost',
      },
    ]);
  });

  it('should not process instances when none are expired', async () => {
    await insertBankTransaction(adapter, 'bank-1', 'draft', null);
    const sendSpy = jest.spyOn(manager, 'send');

    const summary = await cronService.processExpiredInstances();

    expect(sendSpy).not.toHaveBeenCalled();
    expect(summary).toMatchObject({
      machineTypesScanned: 2,
      expiredFound: 0,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      failures: [],
    });
  });
});
