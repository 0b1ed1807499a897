import { randomUUID } from 'crypto';
import { IMachineDbAdapter } from '../interfaces/machine-db-adapter.interface';
import {
  ExpectedRevision,
  HistoryRecord,
  MachineRecord,
  NextRevision,
} from '../interfaces/machine-records.interface';
import { cloneData } from '../utils/clone-data';
import { KeyedLock } from '../utils/keyed-lock';
import { validateTableName } from '../utils/validate-table-name';

const TRANSACTION_LOCK = 'transaction';

interface InMemoryState {
  liveByTable: Map<string, Map<string, MachineRecord>>;
  historyByTable: Map<string, HistoryRecord[]>;
}

function cloneMachineRecord(record: MachineRecord): MachineRecord {
  return {
    ...record,
    data: cloneData(record.data),
    expiresAt: record.expiresAt ? new Date(record.expiresAt) : null,
    updatedAt: new Date(record.updatedAt),
  };
}

function cloneHistoryRecord(record: HistoryRecord): HistoryRecord {
  return {
    ...record,
    context: cloneData(record.context),
    transitionedAt: new Date(record.transitionedAt),
  };
}

function createEmptyState(): InMemoryState {
  return {
    liveByTable: new Map<string, Map<string, MachineRecord>>(),
    historyByTable: new Map<string, HistoryRecord[]>(),
  };
}

function cloneState(state: InMemoryState): InMemoryState {
  const liveByTable = new Map<string, Map<string, MachineRecord>>();
  for (const [tableName, rows] of state.liveByTable.entries()) {
    const clonedRows = new Map<string, MachineRecord>();
    for (const [id, row] of rows.entries()) {
      clonedRows.set(id, cloneMachineRecord(row));
    }
    liveByTable.set(tableName, clonedRows);
  }

  const historyByTable = new Map<string, HistoryRecord[]>();
  for (const [tableName, rows] of state.historyByTable.entries()) {
    historyByTable.set(tableName, rows.map(cloneHistoryRecord));
  }

  return { liveByTable, historyByTable };
}

/**
 * Process-local adapter for tests and embedded use. Transactions run one at a
 * time against a copy of the state that replaces it on success; writes made
 * outside a transaction queue behind the open one so the swap cannot drop them.
 */
export class InMemoryMachineAdapter implements IMachineDbAdapter {
  private state: InMemoryState;
  private readonly transactionLock = new KeyedLock();

  constructor(
    state?: InMemoryState,
    private readonly transactionBound = false,
  ) {
    this.state = state ?? createEmptyState();
  }

  async findOne(tableName: string, id: string): Promise<MachineRecord | null> {
    validateTableName(tableName);
    const row = this.getLiveTable(tableName).get(id);
    return row ? cloneMachineRecord(row) : null;
  }

  async insert(
    tableName: string,
    record: Omit<MachineRecord, 'updatedAt'>,
  ): Promise<boolean> {
    validateTableName(tableName);
    return this.write(() => {
      const table = this.getLiveTable(tableName);
      if (table.has(record.id)) {
        return false;
      }

      table.set(
        record.id,
        cloneMachineRecord({ ...record, updatedAt: new Date() }),
      );
      return true;
    });
  }

  async compareAndSet(
    tableName: string,
    id: string,
    expected: ExpectedRevision,
    next: NextRevision,
  ): Promise<boolean> {
    validateTableName(tableName);
    return this.write(() => {
      const table = this.getLiveTable(tableName);
      const row = table.get(id);
      if (
        !row ||
        row.stateValue !== expected.stateValue ||
        row.version !== expected.version
      ) {
        return false;
      }

      table.set(id, {
        ...row,
        stateValue: next.stateValue,
        version: row.version + 1,
        data: cloneData(next.data),
        expiresAt: next.expiresAt ? new Date(next.expiresAt) : null,
        updatedAt: new Date(),
      });
      return true;
    });
  }

  async insertHistory(
    tableName: string,
    data: Omit<HistoryRecord, 'id' | 'transitionedAt'>,
  ): Promise<void> {
    validateTableName(tableName);
    validateTableName(`${tableName}_history`);

    await this.write(() => {
      this.getHistoryTable(tableName).push({
        ...data,
        id: randomUUID(),
        context: cloneData(data.context),
        transitionedAt: new Date(),
      });
    });
  }

  async findHistoryByKey(
    tableName: string,
    instanceId: string,
    idempotencyKey: string,
  ): Promise<HistoryRecord | null> {
    validateTableName(tableName);
    const match = this.getHistoryTable(tableName).find(
      (row) =>
        row.instanceId === instanceId && row.idempotencyKey === idempotencyKey,
    );
    return match ? cloneHistoryRecord(match) : null;
  }

  /** Transition journal of one instance, oldest first. */
  async findHistory(
    tableName: string,
    instanceId: string,
  ): Promise<HistoryRecord[]> {
    validateTableName(tableName);
    return this.getHistoryTable(tableName)
      .filter((row) => row.instanceId === instanceId)
      .map(cloneHistoryRecord);
  }

  async findExpired(tableName: string): Promise<{ id: string }[]> {
    validateTableName(tableName);
    const now = Date.now();

    const expired: { id: string }[] = [];
    for (const row of this.getLiveTable(tableName).values()) {
      if (row.expiresAt && row.expiresAt.getTime() < now) {
        expired.push({ id: row.id });
      }
    }
    return expired;
  }

  async findByState(
    tableName: string,
    stateValue: string,
  ): Promise<MachineRecord[]> {
    validateTableName(tableName);
    return [...this.getLiveTable(tableName).values()]
      .filter((row) => row.stateValue === stateValue)
      .map(cloneMachineRecord);
  }

  async findChildren(
    tableName: string,
    parentType: string,
    parentId: string,
  ): Promise<MachineRecord[]> {
    validateTableName(tableName);
    return [...this.getLiveTable(tableName).values()]
      .filter((row) => row.parentType === parentType && row.parentId === parentId)
      .map(cloneMachineRecord);
  }

  async transaction<T>(
    cb: (adapter: IMachineDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.transactionBound) {
      return cb(this);
    }

    return this.transactionLock.runExclusive(TRANSACTION_LOCK, async () => {
      const txState = cloneState(this.state);
      const txAdapter = new InMemoryMachineAdapter(txState, true);

      const result = await cb(txAdapter);
      this.state = txState;
      return result;
    });
  }

  private async write<T>(apply: () => T): Promise<T> {
    if (this.transactionBound) {
      return apply();
    }
    return this.transactionLock.runExclusive(TRANSACTION_LOCK, async () =>
      apply(),
    );
  }

  private getLiveTable(tableName: string): Map<string, MachineRecord> {
    const table = this.state.liveByTable.get(tableName);
    if (table) return table;

    const next = new Map<string, MachineRecord>();
    this.state.liveByTable.set(tableName, next);
    return next;
  }

  private getHistoryTable(tableName: string): HistoryRecord[] {
    const table = this.state.historyByTable.get(tableName);
    if (table) return table;

    const next: HistoryRecord[] = [];
    this.state.historyByTable.set(tableName, next);
    return next;
  }
}
