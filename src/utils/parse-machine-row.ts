import { InvalidRecordError } from '../errors/invalid-record.error';
import type {
  HistoryRecord,
  MachineRecord,
} from '../interfaces/machine-records.interface';
import { isPlainObject } from './clone-data';

export type SqlRow = Record<string, unknown>;

export const MACHINE_COLUMNS =
  'id, state_value, version, data, parent_type, parent_id, expires_at, updated_at';

export const HISTORY_COLUMNS =
  'id, instance_id, from_state, to_state, event_type, context, idempotency_key, transitioned_at';

function text(tableName: string, row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  throw new InvalidRecordError(
    tableName,
    String(row.id),
    `Column ${column} of ${tableName} row ${String(row.id)} is not text`,
  );
}

function nullableText(row: SqlRow, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

function timestamp(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    return new Date(value);
  }
  return null;
}

function jsonObject(
  tableName: string,
  row: SqlRow,
  column: string,
): Record<string, unknown> {
  const raw = row[column];
  const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (isPlainObject(value)) return value;
  throw new InvalidRecordError(
    tableName,
    String(row.id),
    `Column ${column} of ${tableName} row ${String(row.id)} is not a JSON object`,
  );
}

function integer(tableName: string, row: SqlRow, column: string): number {
  const raw = row[column];
  const value = typeof raw === 'string' ? Number.parseInt(raw, 10) : raw;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new InvalidRecordError(
    tableName,
    String(row.id),
    `Column ${column} of ${tableName} row ${String(row.id)} is not an integer`,
  );
}

export function toMachineRecord(tableName: string, row: SqlRow): MachineRecord {
  return {
    id: text(tableName, row, 'id'),
    stateValue: text(tableName, row, 'state_value'),
    version: integer(tableName, row, 'version'),
    data: jsonObject(tableName, row, 'data'),
    parentType: nullableText(row, 'parent_type'),
    parentId: nullableText(row, 'parent_id'),
    expiresAt: timestamp(row.expires_at),
    updatedAt: timestamp(row.updated_at) ?? new Date(0),
  };
}

export function toHistoryRecord(tableName: string, row: SqlRow): HistoryRecord {
  return {
    id: text(tableName, row, 'id'),
    instanceId: text(tableName, row, 'instance_id'),
    fromState: text(tableName, row, 'from_state'),
    toState: text(tableName, row, 'to_state'),
    eventType: text(tableName, row, 'event_type'),
    context: jsonObject(tableName, row, 'context'),
    idempotencyKey: nullableText(row, 'idempotency_key'),
    transitionedAt: timestamp(row.transitioned_at) ?? new Date(0),
  };
}
