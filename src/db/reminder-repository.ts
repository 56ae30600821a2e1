import type { Knex } from 'knex';
import { v7 as uuid } from 'uuid';
import { AppError, StoreError } from '../errors.js';
import { parseReminderRow, toReminderRow, type NewReminder, type Reminder, type ReminderStatus } from './models/Reminder.js';
import type { CreateActivityInput } from './models/Activity.js';

/**
 * Selection applied by list and delete; every field narrows the result.
 * Only user-visible reminders match, never pre-reminders.
 */
export interface ReminderCriteria {
  statuses: readonly ReminderStatus[];
  /** Full id or its trailing characters, lower case. */
  idSuffix?: string;
  /** Case-insensitive substring of the title. */
  search?: string;
  /** Inclusive lower bound on `due_at`. */
  dueFrom?: Date;
  /** Exclusive upper bound on `due_at`. */
  dueBefore?: Date;
}

/**
 * Persistence contract of the reminder core. Implementations own atomicity:
 * everything inside `transaction` commits or rolls back together.
 */
export interface ReminderRepository {
  insertMany(reminders: NewReminder[]): Promise<Reminder[]>;
  /** Matches ordered by `due_at`, then creation order. */
  findMatching(chatId: string, criteria: ReminderCriteria): Promise<Reminder[]>;
  /** The `limit` most recently created matches, newest first. */
  findLastCreated(chatId: string, criteria: ReminderCriteria, limit: number): Promise<Reminder[]>;
  findById(id: string): Promise<Reminder | null>;
  /** Pending reminders due at or before `until`, oldest first. */
  findDue(until: Date, limit: number): Promise<Reminder[]>;
  /** pending -> cancelled for the given ids of one chat; returns rows changed. */
  cancelByIds(chatId: string, ids: readonly string[], at: Date): Promise<number>;
  /** pending -> cancelled for the pre-reminders of the given reminders. */
  cancelPreReminders(chatId: string, parentIds: readonly string[], at: Date): Promise<number>;
  /** pending -> sent; false when the reminder was no longer pending. */
  markSent(id: string, at: Date): Promise<boolean>;
  recordActivity(activity: CreateActivityInput, at: Date): Promise<void>;
  transaction<T>(work: (repository: ReminderRepository) => Promise<T>): Promise<T>;
}

export class KnexReminderRepository implements ReminderRepository {
  constructor(private readonly db: Knex) {}

  async insertMany(reminders: NewReminder[]): Promise<Reminder[]> {
    if (reminders.length === 0) return [];
    const rows = reminders.map((reminder) => toReminderRow(reminder));
    await this.run('insertMany', () => this.db('reminders').insert(rows));
    return rows.map(parseReminderRow);
  }

  async findMatching(chatId: string, criteria: ReminderCriteria): Promise<Reminder[]> {
    const rows = await this.run('findMatching', () =>
      this.select(chatId, criteria)
        .orderBy([
          { column: 'due_at', order: 'asc' },
          { column: 'created_at', order: 'asc' },
          { column: 'id', order: 'asc' },
        ])
    );
    return this.applySearch(rows.map(parseReminderRow), criteria);
  }

  async findLastCreated(chatId: string, criteria: ReminderCriteria, limit: number): Promise<Reminder[]> {
    let query = this.select(chatId, criteria).orderBy([
      { column: 'created_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ]);
    if (!criteria.search) {
      query = query.limit(limit);
    }
    const rows = await this.run('findLastCreated', () => query);
    return this.applySearch(rows.map(parseReminderRow), criteria).slice(0, limit);
  }

  async findById(id: string): Promise<Reminder | null> {
    const row: unknown = await this.run('findById', () => this.db('reminders').where('id', id).first());
    return row ? parseReminderRow(row) : null;
  }

  async findDue(until: Date, limit: number): Promise<Reminder[]> {
    const rows = await this.run('findDue', () =>
      this.db('reminders')
        .where('status', 'pending')
        .where('due_at', '<=', until.toISOString())
        .orderBy([
          { column: 'due_at', order: 'asc' },
          { column: 'id', order: 'asc' },
        ])
        .limit(limit)
    );
    return rows.map(parseReminderRow);
  }

  async cancelByIds(chatId: string, ids: readonly string[], at: Date): Promise<number> {
    if (ids.length === 0) return 0;
    return this.run('cancelByIds', () =>
      this.db('reminders')
        .where('chat_id', chatId)
        .where('status', 'pending')
        .whereIn('id', [...ids])
        .update({ status: 'cancelled', updated_at: at.toISOString() })
    );
  }

  async cancelPreReminders(chatId: string, parentIds: readonly string[], at: Date): Promise<number> {
    if (parentIds.length === 0) return 0;
    return this.run('cancelPreReminders', () =>
      this.db('reminders')
        .where('chat_id', chatId)
        .where('kind', 'pre_reminder')
        .where('status', 'pending')
        .whereIn('parent_id', [...parentIds])
        .update({ status: 'cancelled', updated_at: at.toISOString() })
    );
  }

  async markSent(id: string, at: Date): Promise<boolean> {
    const changed = await this.run('markSent', () =>
      this.db('reminders')
        .where('id', id)
        .where('status', 'pending')
        .update({ status: 'sent', updated_at: at.toISOString() })
    );
    return changed === 1;
  }

  async recordActivity(activity: CreateActivityInput, at: Date): Promise<void> {
    await this.run('recordActivity', () =>
      this.db('activities').insert({
        id: uuid(),
        chat_id: activity.chat_id,
        action: activity.action,
        entity_ids: JSON.stringify(activity.entity_ids),
        metadata: JSON.stringify(activity.metadata ?? {}),
        created_at: at.toISOString(),
      })
    );
  }

  async transaction<T>(work: (repository: ReminderRepository) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction((trx) => work(new KnexReminderRepository(trx)));
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new StoreError('transaction', error);
    }
  }

  private select(chatId: string, criteria: ReminderCriteria): Knex.QueryBuilder {
    let query = this.db('reminders')
      .where('chat_id', chatId)
      .where('kind', 'reminder')
      .whereIn('status', [...criteria.statuses]);
    if (criteria.idSuffix) {
      query = query.where('id', 'like', `%${criteria.idSuffix}`);
    }
    if (criteria.dueFrom) {
      query = query.where('due_at', '>=', criteria.dueFrom.toISOString());
    }
    if (criteria.dueBefore) {
      query = query.where('due_at', '<', criteria.dueBefore.toISOString());
    }
    return query;
  }

  // SQLite's lower() and LIKE only fold ASCII, so title search runs here.
  private applySearch(reminders: Reminder[], criteria: ReminderCriteria): Reminder[] {
    if (!criteria.search) return reminders;
    const needle = criteria.search.toLocaleLowerCase();
    return reminders.filter((reminder) => reminder.title.toLocaleLowerCase().includes(needle));
  }

  private async run<T>(operation: string, query: () => PromiseLike<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }
}
