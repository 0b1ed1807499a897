#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { validateTableName } from '../utils/validate-table-name';

const USAGE = 'Usage: nestjs-transactional-fsm generate-migration <tableName>';

export function generateMigration(tableName: string): string {
  validateTableName(tableName);

  return `-- migrate:up
CREATE TABLE ${tableName} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    state_value TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 0,
    data JSONB NOT NULL DEFAULT '{}'::jsonb,
    parent_type TEXT,
    parent_id UUID,
    expires_at TIMESTAMPTZ,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    created_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
    CHECK ((parent_type IS NULL) = (parent_id IS NULL))
);

CREATE INDEX idx_${tableName}_expires_at
    ON ${tableName} (expires_at)
    WHERE expires_at IS NOT NULL;

CREATE INDEX idx_${tableName}_state_value
    ON ${tableName} (state_value);

CREATE INDEX idx_${tableName}_parent
    ON ${tableName} (parent_type, parent_id, created_at)
    WHERE parent_id IS NOT NULL;

CREATE TABLE ${tableName}_history (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    instance_id UUID NOT NULL REFERENCES ${tableName}(id),
    from_state TEXT NOT NULL,
    to_state TEXT NOT NULL,
    event_type TEXT NOT NULL,
    context JSONB NOT NULL DEFAULT '{}'::jsonb,
    idempotency_key TEXT,
    transitioned_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${tableName}_history_instance_id
    ON ${tableName}_history (instance_id);

CREATE INDEX idx_${tableName}_history_transitioned_at
    ON ${tableName}_history (transitioned_at);

CREATE UNIQUE INDEX idx_${tableName}_history_idempotency_key
    ON ${tableName}_history (instance_id, idempotency_key)
    WHERE idempotency_key IS NOT NULL;

-- migrate:down
DROP TABLE IF EXISTS ${tableName}_history;
DROP TABLE IF EXISTS ${tableName};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      `${USAGE}\n\n` +
        'Generates a dbmate-compatible SQL migration file for a state machine table\n' +
        'and its transition history table.\n\n' +
        'Arguments:\n' +
        '  tableName    The database table name (alphanumeric and underscores only)\n\n' +
        'Example:\n' +
        '  npx nestjs-transactional-fsm generate-migration bank_transactions',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tableName = args[1];
  if (!tableName) {
    console.error('Error: tableName argument is required.');
    console.error(USAGE);
    process.exit(1);
  }

  const sql = generateMigration(tableName);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${tableName}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
