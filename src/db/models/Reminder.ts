import { z } from 'zod';
import { RecurrenceRule, ReminderStatus } from '../../commands/schema.js';
import { jsonColumn } from './columns.js';

export { ReminderStatus };

/** `pre_reminder` rows are hidden early notices tied to a `reminder` row by `parent_id`. */
export const ReminderKind = z.enum(['reminder', 'pre_reminder']);
export type ReminderKind = z.infer<typeof ReminderKind>;

export const ReminderSchema = z.object({
  id: z.string(),
  chat_id: z.coerce.string(),
  title: z.string(),
  due_at: z.coerce.date(),
  status: ReminderStatus,
  kind: ReminderKind,
  parent_id: z.string().nullable(),
  recurrence: jsonColumn(RecurrenceRule.nullable()),
  series_id: z.string().nullable(),
  anchor_at: z.coerce.date().nullable(),
  occurrence: z.coerce.number().int(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type Reminder = z.infer<typeof ReminderSchema>;

export type NewReminder = Omit<Reminder, 'status' | 'updated_at' | 'kind' | 'parent_id'> &
  Partial<Pick<Reminder, 'kind' | 'parent_id'>>;

export function parseReminderRow(row: unknown): Reminder {
  return ReminderSchema.parse(row);
}

export function toReminderRow(reminder: NewReminder, status: ReminderStatus = 'pending'): Record<string, unknown> {
  return {
    id: reminder.id,
    chat_id: reminder.chat_id,
    title: reminder.title,
    due_at: reminder.due_at.toISOString(),
    status,
    kind: reminder.kind ?? 'reminder',
    parent_id: reminder.parent_id ?? null,
    recurrence: reminder.recurrence ? JSON.stringify(reminder.recurrence) : null,
    series_id: reminder.series_id,
    anchor_at: reminder.anchor_at ? reminder.anchor_at.toISOString() : null,
    occurrence: reminder.occurrence,
    created_at: reminder.created_at.toISOString(),
    updated_at: reminder.created_at.toISOString(),
  };
}

/** Short form shown to users; the id filter accepts it. */
export function shortId(id: string): string {
  return id.slice(-6);
}
