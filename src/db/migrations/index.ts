import type { Knex } from 'knex';
import * as createReminders from './001_create_reminders.js';
import * as createActivities from './002_create_activities.js';
import * as createGuardState from './003_create_guard_state.js';
import * as addPreReminders from './004_add_pre_reminders.js';

const migrations: Record<string, Knex.Migration> = {
  '001_create_reminders': createReminders,
  '002_create_activities': createActivities,
  '003_create_guard_state': createGuardState,
  '004_add_pre_reminders': addPreReminders,
};

/**
 * Migrations are registered in code rather than discovered on disk, so the
 * same list runs from TypeScript sources, the compiled build and the tests.
 */
export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = migrations[name];
    if (!migration) {
      throw new Error(`Unknown migration: ${name}`);
    }
    return migration;
  },
};
