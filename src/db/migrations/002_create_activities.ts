import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('activities', (table) => {
    table.string('id', 36).primary();
    table.string('chat_id', 64).notNullable().index();
    table.enum('action', ['create', 'delete', 'fire']).notNullable();
    table.json('entity_ids').notNullable();
    table.json('metadata').notNullable();
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now()).index();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('activities');
}
