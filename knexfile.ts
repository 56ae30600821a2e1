import type { Knex } from 'knex';
import path from 'path';
import { fileURLToPath } from 'url';
import { migrationSource } from './src/db/migrations/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const config: Record<string, Knex.Config> = {
  development: {
    client: 'better-sqlite3',
    connection: {
      filename: path.join(__dirname, 'data', 'reminders.db'),
    },
    useNullAsDefault: true,
    migrations: { migrationSource },
  },

  production: {
    client: 'pg',
    connection: process.env.DATABASE_URL,
    pool: {
      min: 2,
      max: 10,
    },
    migrations: { migrationSource },
  },
};

export default config;
