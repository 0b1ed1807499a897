import {
  ExpectedRevision,
  HistoryRecord,
  MachineRecord,
  NextRevision,
} from './machine-records.interface';

export interface IMachineDbAdapter {
  /**
   * Find a machine instance by ID. Commits never lock the row on read; they
   * rely on `compareAndSet`.
   */
  findOne(tableName: string, id: string): Promise<MachineRecord | null>;

  /**
   * Insert a new instance row. Resolves false when the id is taken.
   */
  insert(
    tableName: string,
    record: Omit<MachineRecord, 'updatedAt'>,
  ): Promise<boolean>;

  /**
   * Move a row to `next` only if it still holds `expected`, bumping its
   * version by one. Resolves false when the row changed or does not exist.
   */
  compareAndSet(
    tableName: string,
    id: string,
    expected: ExpectedRevision,
    next: NextRevision,
  ): Promise<boolean>;

  insertHistory(
    tableName: string,
    data: Omit<HistoryRecord, 'id' | 'transitionedAt'>,
  ): Promise<void>;

  /**
   * Find the transition an idempotency key already committed, if any.
   */
  findHistoryByKey(
    tableName: string,
    instanceId: string,
    idempotencyKey: string,
  ): Promise<HistoryRecord | null>;

  /**
   * Find all instances with expires_at in the past.
   */
  findExpired(tableName: string): Promise<{ id: string }[]>;

  findByState(tableName: string, stateValue: string): Promise<MachineRecord[]>;

  /**
   * Find the rows of `tableName` linked to the given parent instance, oldest
   * first.
   */
  findChildren(
    tableName: string,
    parentType: string,
    parentId: string,
  ): Promise<MachineRecord[]>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives an adapter instance bound to the transaction.
   */
  transaction<T>(cb: (adapter: IMachineDbAdapter) => Promise<T>): Promise<T>;
}
