import { v7 as uuid } from 'uuid';
import {
  deleteCommandIssues,
  type Command,
  type CreateCommand,
  type DeleteCommand,
  type ReminderDraft,
  type ReminderFilter,
} from '../commands/schema.js';
import type { NewReminder, Reminder } from '../db/models/Reminder.js';
import type { ReminderCriteria, ReminderRepository } from '../db/reminder-repository.js';
import { InvalidTimeSpecError, ValidationError, type FieldIssue } from '../errors.js';
import type { Logger } from '../logger.js';
import { systemClock, type Clock } from '../types/clock.js';
import { KeyedMutex } from './keyed-mutex.js';
import { nextOccurrence, type Occurrence } from './recurrence.js';
import { localDayRange, resolveDueAt } from './timezone.js';

export type CommandOutcome =
  | { kind: 'created'; reminders: Reminder[] }
  | { kind: 'listed'; filter: ReminderFilter; reminders: Reminder[] }
  | { kind: 'deleted'; count: number; reminders: Reminder[] }
  /** Reported to the user, not an error. `requested` is null in by_filter mode. */
  | { kind: 'nothing_to_delete'; requested: number | null; available: number };

export type DeleteOutcome = Extract<CommandOutcome, { kind: 'deleted' | 'nothing_to_delete' }>;

export interface FireResult {
  /** True only for the call that moved the reminder from pending to sent. */
  fired: boolean;
  reminder: Reminder | null;
  next: Reminder | null;
}

export interface ReminderServiceOptions {
  repository: ReminderRepository;
  /** IANA zone used for day boundaries and default times. */
  timezone: string;
  logger: Logger;
  now?: Clock;
  generateId?: () => string;
  locks?: KeyedMutex;
  /** Adds a hidden notice an hour before reminders due on a later day. Off unless set. */
  preReminders?: boolean;
}

const VISIBLE_STATUSES = ['pending', 'sent'] as const;

export const PRE_REMINDER_LEAD_MS = 60 * 60 * 1000;

/**
 * Executes validated commands against the reminder store. The only place
 * with business rules: time resolution, all-or-nothing batches, delete
 * policy and recurrence.
 */
export class ReminderService {
  private readonly repository: ReminderRepository;
  private readonly timezone: string;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly generateId: () => string;
  private readonly locks: KeyedMutex;
  private readonly preReminders: boolean;

  constructor(options: ReminderServiceOptions) {
    this.repository = options.repository;
    this.timezone = options.timezone;
    this.logger = options.logger.child({ component: 'reminder-service' });
    this.now = options.now ?? systemClock;
    this.generateId = options.generateId ?? uuid;
    this.locks = options.locks ?? new KeyedMutex();
    this.preReminders = options.preReminders ?? false;
  }

  async execute(chatId: string, command: Command): Promise<CommandOutcome> {
    switch (command.command) {
      case 'create_reminders':
        return { kind: 'created', reminders: await this.create(chatId, command) };
      case 'list_reminders':
        return { kind: 'listed', filter: command.filter, reminders: await this.list(chatId, command.filter) };
      case 'delete_reminders':
        return this.delete(chatId, command);
      default: {
        const unreachable: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Resolves every reminder before writing anything; one bad entry fails the
   * whole batch and nothing is persisted.
   */
  async create(chatId: string, command: CreateCommand): Promise<Reminder[]> {
    const now = this.now();
    const issues: FieldIssue[] = [];
    const drafts: NewReminder[] = [];

    command.reminders.forEach((entry, index) => {
      const draft = this.draft(chatId, entry, index, now, issues);
      if (draft) drafts.push(draft);
    });

    if (issues.length > 0) {
      throw issues.every((issue) => issue.rule === 'must_be_future')
        ? new InvalidTimeSpecError(issues)
        : new ValidationError(issues);
    }

    const notices = drafts.flatMap((draft) => this.preReminderFor(draft, now) ?? []);

    const created = await this.locks.withLock(chatId, () =>
      this.repository.transaction(async (tx) => {
        const inserted = (await tx.insertMany([...drafts, ...notices])).filter((reminder) => reminder.kind === 'reminder');
        await tx.recordActivity(
          {
            chat_id: chatId,
            action: 'create',
            entity_ids: inserted.map((reminder) => reminder.id),
            metadata: { titles: inserted.map((reminder) => reminder.title), preReminders: notices.length },
          },
          now
        );
        return inserted;
      })
    );

    this.logger.info({ chatId, count: created.length }, 'Reminders created');
    return created;
  }

  async list(chatId: string, filter: ReminderFilter): Promise<Reminder[]> {
    return this.repository.findMatching(chatId, this.criteriaFor(filter, this.now()));
  }

  /**
   * Cancels pending reminders together with their pending pre-reminders.
   * `last_n` is all-or-nothing: with fewer than N matches nothing is
   * cancelled and the shortfall is reported. Deleting every reminder needs
   * `confirm_all`.
   */
  async delete(chatId: string, command: DeleteCommand): Promise<DeleteOutcome> {
    const issues = deleteCommandIssues(command);
    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    const now = this.now();
    const requested = command.mode === 'last_n' ? (command.last_n ?? null) : null;
    const filter: ReminderFilter = command.filter ?? { kind: 'all' };
    if (filter.kind === 'status' && filter.status !== 'pending') {
      return { kind: 'nothing_to_delete', requested, available: 0 };
    }
    const criteria: ReminderCriteria = { ...this.criteriaFor(filter, now), statuses: ['pending'] };

    const outcome = await this.locks.withLock(chatId, () =>
      this.repository.transaction(async (tx): Promise<DeleteOutcome> => {
        const matches =
          requested === null
            ? await tx.findMatching(chatId, criteria)
            : await tx.findLastCreated(chatId, criteria, requested);

        if (matches.length === 0 || (requested !== null && matches.length < requested)) {
          return { kind: 'nothing_to_delete', requested, available: matches.length };
        }
        if (filter.kind === 'id' && requested === null && matches.length > 1) {
          throw new ValidationError([
            { path: 'filter.id', rule: 'ambiguous_id', message: `${matches.length} reminders match this id` },
          ]);
        }

        const ids = matches.map((reminder) => reminder.id);
        const count = await tx.cancelByIds(chatId, ids, now);
        await tx.cancelPreReminders(chatId, ids, now);
        await tx.recordActivity(
          { chat_id: chatId, action: 'delete', entity_ids: ids, metadata: { mode: command.mode, filter: filter.kind } },
          now
        );
        return {
          kind: 'deleted',
          count,
          reminders: matches.map((reminder): Reminder => ({ ...reminder, status: 'cancelled', updated_at: now })),
        };
      })
    );

    this.logger.info({ chatId, outcome: outcome.kind, mode: command.mode }, 'Delete command executed');
    return outcome;
  }

  /**
   * Marks a delivered reminder as sent and, for recurring ones, inserts the
   * next pending instance and its pre-reminder. Safe to call repeatedly for
   * the same reminder: only the call that wins the pending -> sent
   * transition spawns.
   */
  async markFired(reminderId: string, now: Date = this.now()): Promise<FireResult> {
    return this.repository.transaction(async (tx): Promise<FireResult> => {
      const reminder = await tx.findById(reminderId);
      if (!reminder || !(await tx.markSent(reminderId, now))) {
        return { fired: false, reminder, next: null };
      }

      const sent: Reminder = { ...reminder, status: 'sent', updated_at: now };
      const upcoming = this.upcoming(reminder, now);
      let next: Reminder | null = null;
      if (upcoming) {
        const instance: NewReminder = {
          id: this.generateId(),
          chat_id: reminder.chat_id,
          title: reminder.title,
          due_at: upcoming.dueAt,
          recurrence: reminder.recurrence,
          series_id: reminder.series_id,
          anchor_at: reminder.anchor_at,
          occurrence: upcoming.occurrence,
          created_at: now,
        };
        const notice = this.preReminderFor(instance, now);
        [next] = await tx.insertMany(notice ? [instance, notice] : [instance]);
      }

      await tx.recordActivity(
        {
          chat_id: reminder.chat_id,
          action: 'fire',
          entity_ids: next ? [reminder.id, next.id] : [reminder.id],
          metadata: { occurrence: reminder.occurrence },
        },
        now
      );
      return { fired: true, reminder: sent, next };
    });
  }

  private upcoming(reminder: Reminder, now: Date): Occurrence | null {
    if (!reminder.recurrence) return null;
    return nextOccurrence({
      rule: reminder.recurrence,
      anchor: reminder.anchor_at ?? reminder.due_at,
      previousOccurrence: reminder.occurrence,
      now,
      timezone: this.timezone,
    });
  }

  /** Only for reminders due on a later local day, and only while the notice is still ahead. */
  private preReminderFor(reminder: NewReminder, now: Date): NewReminder | null {
    if (!this.preReminders) return null;
    const noticeAt = new Date(reminder.due_at.getTime() - PRE_REMINDER_LEAD_MS);
    const { to: startOfTomorrow } = localDayRange(now, this.timezone);
    if (reminder.due_at.getTime() < startOfTomorrow.getTime() || noticeAt.getTime() <= now.getTime()) {
      return null;
    }
    return {
      id: this.generateId(),
      chat_id: reminder.chat_id,
      title: reminder.title,
      due_at: noticeAt,
      kind: 'pre_reminder',
      parent_id: reminder.id,
      recurrence: null,
      series_id: null,
      anchor_at: null,
      occurrence: 1,
      created_at: now,
    };
  }

  private draft(chatId: string, entry: ReminderDraft, index: number, now: Date, issues: FieldIssue[]): NewReminder | null {
    let dueAt: Date;
    try {
      dueAt = resolveDueAt(now, entry.day, entry.time, this.timezone);
    } catch (error) {
      if (!(error instanceof InvalidTimeSpecError)) throw error;
      issues.push(...error.issues.map((issue) => ({ ...issue, path: `reminders.${index}.${issue.path}` })));
      return null;
    }

    const end = entry.recurrence?.end;
    if (end?.kind === 'until' && end.until.getTime() <= dueAt.getTime()) {
      issues.push({
        path: `reminders.${index}.recurrence.end.until`,
        rule: 'after_first_occurrence',
        message: 'Recurrence must end after its first occurrence',
      });
      return null;
    }

    const id = this.generateId();
    return {
      id,
      chat_id: chatId,
      title: entry.title,
      due_at: dueAt,
      recurrence: entry.recurrence ?? null,
      series_id: entry.recurrence ? id : null,
      anchor_at: entry.recurrence ? dueAt : null,
      occurrence: 1,
      created_at: now,
    };
  }

  private criteriaFor(filter: ReminderFilter, now: Date): ReminderCriteria {
    switch (filter.kind) {
      case 'all':
        return { statuses: VISIBLE_STATUSES };
      case 'id':
        return { statuses: VISIBLE_STATUSES, idSuffix: filter.id };
      case 'today': {
        const { from, to } = localDayRange(now, this.timezone);
        return { statuses: VISIBLE_STATUSES, dueFrom: from, dueBefore: to };
      }
      case 'status':
        return { statuses: [filter.status] };
      case 'search':
        return { statuses: VISIBLE_STATUSES, search: filter.text };
      case 'interval':
        return { statuses: VISIBLE_STATUSES, dueFrom: filter.from, dueBefore: filter.to };
    }
  }
}
