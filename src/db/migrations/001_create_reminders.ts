import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('reminders', (table) => {
    table.string('id', 36).primary();
    table.string('chat_id', 64).notNullable();
    table.text('title').notNullable();
    table.timestamp('due_at', { useTz: true }).notNullable();
    table
      .enum('status', ['pending', 'sent', 'cancelled'])
      .notNullable()
      .defaultTo('pending');
    table.json('recurrence');
    table.string('series_id', 36);
    table.timestamp('anchor_at', { useTz: true });
    table.integer('occurrence').notNullable().defaultTo(1);
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.index(['chat_id', 'status', 'due_at'], 'reminders_chat_status_due_idx');
    table.index(['status', 'due_at'], 'reminders_status_due_idx');
    table.unique(['series_id', 'occurrence'], { indexName: 'reminders_series_occurrence_uq' });
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('reminders');
}
