import { sql } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { IMachineDbAdapter } from '../interfaces/machine-db-adapter.interface';
import {
  ExpectedRevision,
  HistoryRecord,
  MachineRecord,
  NextRevision,
} from '../interfaces/machine-records.interface';
import {
  HISTORY_COLUMNS,
  MACHINE_COLUMNS,
  SqlRow,
  toHistoryRecord,
  toMachineRecord,
} from '../utils/parse-machine-row';
import { validateTableName } from '../utils/validate-table-name';

function isRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
export function extractRows(result: unknown): SqlRow[] {
  if (Array.isArray(result)) return result.filter(isRow);
  if (isRow(result) && Array.isArray(result.rows)) {
    return result.rows.filter(isRow);
  }
  return [];
}

export class DrizzleMachineAdapter implements IMachineDbAdapter {
  constructor(private readonly db: PgDatabase<any, any, any>) {}

  async findOne(tableName: string, id: string): Promise<MachineRecord | null> {
    validateTableName(tableName);
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(MACHINE_COLUMNS)} FROM ${sql.raw(tableName)} WHERE id = ${id}`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toMachineRecord(tableName, rows[0]);
  }

  async insert(
    tableName: string,
    record: Omit<MachineRecord, 'updatedAt'>,
  ): Promise<boolean> {
    validateTableName(tableName);
    const dataJson = JSON.stringify(record.data);

    const result = await this.db.execute(
      sql`INSERT INTO ${sql.raw(tableName)} (id, state_value, version, data, parent_type, parent_id, expires_at, updated_at)
          VALUES (${record.id}, ${record.stateValue}, ${record.version}, ${dataJson}::jsonb, ${record.parentType}, ${record.parentId}, ${record.expiresAt}, CURRENT_TIMESTAMP)
          ON CONFLICT (id) DO NOTHING
          RETURNING id`,
    );

    return extractRows(result).length > 0;
  }

  async compareAndSet(
    tableName: string,
    id: string,
    expected: ExpectedRevision,
    next: NextRevision,
  ): Promise<boolean> {
    validateTableName(tableName);
    const dataJson = JSON.stringify(next.data);

    const result = await this.db.execute(
      sql`UPDATE ${sql.raw(tableName)} SET
            state_value = ${next.stateValue},
            version = version + 1,
            data = ${dataJson}::jsonb,
            expires_at = ${next.expiresAt},
            updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id} AND state_value = ${expected.stateValue} AND version = ${expected.version}
          RETURNING id`,
    );

    return extractRows(result).length > 0;
  }

  async insertHistory(
    tableName: string,
    data: Omit<HistoryRecord, 'id' | 'transitionedAt'>,
  ): Promise<void> {
    validateTableName(tableName);
    const historyTable = `${tableName}_history`;
    validateTableName(historyTable);
    const contextJson = JSON.stringify(data.context);

    await this.db.execute(
      sql`INSERT INTO ${sql.raw(historyTable)} (instance_id, from_state, to_state, event_type, context, idempotency_key)
          VALUES (${data.instanceId}, ${data.fromState}, ${data.toState}, ${data.eventType}, ${contextJson}::jsonb, ${data.idempotencyKey})`,
    );
  }

  async findHistoryByKey(
    tableName: string,
    instanceId: string,
    idempotencyKey: string,
  ): Promise<HistoryRecord | null> {
    validateTableName(tableName);
    const historyTable = `${tableName}_history`;
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(HISTORY_COLUMNS)} FROM ${sql.raw(historyTable)} WHERE instance_id = ${instanceId} AND idempotency_key = ${idempotencyKey} LIMIT 1`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toHistoryRecord(historyTable, rows[0]);
  }

  async findExpired(tableName: string): Promise<{ id: string }[]> {
    validateTableName(tableName);
    const result = await this.db.execute(
      sql`SELECT id FROM ${sql.raw(tableName)} WHERE expires_at < CURRENT_TIMESTAMP`,
    );

    return extractRows(result).map((row) => ({ id: String(row.id) }));
  }

  async findByState(
    tableName: string,
    stateValue: string,
  ): Promise<MachineRecord[]> {
    validateTableName(tableName);
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(MACHINE_COLUMNS)} FROM ${sql.raw(tableName)} WHERE state_value = ${stateValue}`,
    );

    return extractRows(result).map((row) => toMachineRecord(tableName, row));
  }

  async findChildren(
    tableName: string,
    parentType: string,
    parentId: string,
  ): Promise<MachineRecord[]> {
    validateTableName(tableName);
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(MACHINE_COLUMNS)} FROM ${sql.raw(tableName)} WHERE parent_type = ${parentType} AND parent_id = ${parentId} ORDER BY created_at, id`,
    );

    return extractRows(result).map((row) => toMachineRecord(tableName, row));
  }

  async transaction<T>(
    cb: (adapter: IMachineDbAdapter) => Promise<T>,
  ): Promise<T> {
    return this.db.transaction(async (tx) => cb(new DrizzleMachineAdapter(tx)));
  }
}
