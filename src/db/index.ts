import { knex, type Knex } from 'knex';
import path from 'path';
import fs from 'fs';
import type { Config } from '../config/index.js';
import { migrationSource } from './migrations/index.js';

export type Database = Knex;

export function createDatabase(database: Config['database']): Database {
  if (database.type === 'postgres' && database.url) {
    return knex({
      client: 'pg',
      connection: database.url,
      pool: { min: 2, max: 10 },
    });
  }

  if (database.path !== ':memory:') {
    // SQLite - ensure data directory exists
    const dataDir = path.dirname(path.resolve(database.path));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  return knex({
    client: 'better-sqlite3',
    connection: { filename: database.path },
    useNullAsDefault: true,
  });
}

export async function runMigrations(db: Database): Promise<void> {
  await db.migrate.latest({ migrationSource });
}

export async function closeDatabase(db: Database): Promise<void> {
  await db.destroy();
}
