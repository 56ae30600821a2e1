import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.alterTable('reminders', (table) => {
    table.string('kind', 16).notNullable().defaultTo('reminder');
    table.string('parent_id', 36);

    table.index(['parent_id'], 'reminders_parent_idx');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('reminders', (table) => {
    table.dropIndex(['parent_id'], 'reminders_parent_idx');
    table.dropColumn('parent_id');
    table.dropColumn('kind');
  });
}
