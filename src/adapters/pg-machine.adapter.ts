import type { Pool, PoolClient } from 'pg';
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

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

export class PgMachineAdapter implements IMachineDbAdapter {
  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient,
  ) {}

  async findOne(tableName: string, id: string): Promise<MachineRecord | null> {
    validateTableName(tableName);
    const conn = this.getConn();

    const result = await conn.query<SqlRow>(
      `SELECT ${MACHINE_COLUMNS}
       FROM ${tableName}
       WHERE id = $1::uuid`,
      [id],
    );

    if (result.rows.length === 0) return null;
    return toMachineRecord(tableName, result.rows[0]);
  }

  async insert(
    tableName: string,
    record: Omit<MachineRecord, 'updatedAt'>,
  ): Promise<boolean> {
    validateTableName(tableName);
    const conn = this.getConn();

    const result = await conn.query<SqlRow>(
      `INSERT INTO ${tableName}
       (id, state_value, version, data, parent_type, parent_id, expires_at, updated_at)
       VALUES ($1::uuid, $2, $3, $4::jsonb, $5, $6::uuid, $7, CURRENT_TIMESTAMP)
       ON CONFLICT (id) DO NOTHING
       RETURNING id`,
      [
        record.id,
        record.stateValue,
        record.version,
        JSON.stringify(record.data),
        record.parentType,
        record.parentId,
        record.expiresAt,
      ],
    );

    return result.rows.length > 0;
  }

  async compareAndSet(
    tableName: string,
    id: string,
    expected: ExpectedRevision,
    next: NextRevision,
  ): Promise<boolean> {
    validateTableName(tableName);
    const conn = this.getConn();

    const result = await conn.query<SqlRow>(
      `UPDATE ${tableName} SET
         state_value = $4,
         version = version + 1,
         data = $5::jsonb,
         expires_at = $6,
         updated_at = CURRENT_TIMESTAMP
       WHERE id = $1::uuid AND state_value = $2 AND version = $3
       RETURNING id`,
      [
        id,
        expected.stateValue,
        expected.version,
        next.stateValue,
        JSON.stringify(next.data),
        next.expiresAt,
      ],
    );

    return result.rows.length > 0;
  }

  async insertHistory(
    tableName: string,
    data: Omit<HistoryRecord, 'id' | 'transitionedAt'>,
  ): Promise<void> {
    validateTableName(tableName);
    const historyTable = `${tableName}_history`;
    validateTableName(historyTable);
    const conn = this.getConn();

    await conn.query(
      `INSERT INTO ${historyTable}
       (instance_id, from_state, to_state, event_type, context, idempotency_key)
       VALUES ($1::uuid, $2, $3, $4, $5::jsonb, $6)`,
      [
        data.instanceId,
        data.fromState,
        data.toState,
        data.eventType,
        JSON.stringify(data.context),
        data.idempotencyKey,
      ],
    );
  }

  async findHistoryByKey(
    tableName: string,
    instanceId: string,
    idempotencyKey: string,
  ): Promise<HistoryRecord | null> {
    validateTableName(tableName);
    const historyTable = `${tableName}_history`;
    const conn = this.getConn();

    const result = await conn.query<SqlRow>(
      `SELECT ${HISTORY_COLUMNS}
       FROM ${historyTable}
       WHERE instance_id = $1::uuid AND idempotency_key = $2
       LIMIT 1`,
      [instanceId, idempotencyKey],
    );

    if (result.rows.length === 0) return null;
    return toHistoryRecord(historyTable, result.rows[0]);
  }

  async findExpired(tableName: string): Promise<{ id: string }[]> {
    validateTableName(tableName);
    const conn = this.getConn();
    const result = await conn.query<{ id: string }>(
      `SELECT id FROM ${tableName} WHERE expires_at < CURRENT_TIMESTAMP`,
    );

    return result.rows.map((row) => ({ id: row.id }));
  }

  async findByState(
    tableName: string,
    stateValue: string,
  ): Promise<MachineRecord[]> {
    validateTableName(tableName);
    const conn = this.getConn();
    const result = await conn.query<SqlRow>(
      `SELECT ${MACHINE_COLUMNS}
       FROM ${tableName}
       WHERE state_value = $1`,
      [stateValue],
    );

    return result.rows.map((row) => toMachineRecord(tableName, row));
  }

  async findChildren(
    tableName: string,
    parentType: string,
    parentId: string,
  ): Promise<MachineRecord[]> {
    validateTableName(tableName);
    const conn = this.getConn();
    const result = await conn.query<SqlRow>(
      `SELECT ${MACHINE_COLUMNS}
       FROM ${tableName}
       WHERE parent_type = $1 AND parent_id = $2::uuid
       ORDER BY created_at, id`,
      [parentType, parentId],
    );

    return result.rows.map((row) => toMachineRecord(tableName, row));
  }

  async transaction<T>(
    cb: (adapter: IMachineDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new PgMachineAdapter(this.pool, client);
      const result = await cb(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
