import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';

/**
 * Wire schema of the JSON commands produced by the language model.
 *
 * Everything here is untrusted input: the same schema is applied whether a
 * command came from the model, the API or a test fixture.
 */

// Models like to emit `null` for fields they leave out.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

export const ReminderStatus = z.enum(['pending', 'sent', 'cancelled']);
export type ReminderStatus = z.infer<typeof ReminderStatus>;

export const Weekday = z.enum([
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
]);
export type Weekday = z.infer<typeof Weekday>;

const CalendarDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD')
  .refine((value) => isValid(parseISO(value)), 'Not a calendar date');

export const DaySpec = z.union([
  z.enum(['today', 'tomorrow', 'day_after_tomorrow']),
  z.object({ weekday: Weekday }).strict(),
  z.object({ date: CalendarDate }).strict(),
]);
export type DaySpec = z.infer<typeof DaySpec>;

const TimeObject = z
  .object({
    hour: z.number().int().min(0).max(23),
    minute: z.number().int().min(0).max(59).default(0),
  })
  .strict();

// "10:30", "10.30" and "10-30" all mean 10:30.
const TimeString = z
  .string()
  .regex(/^\d{1,2}[:.-]\d{2}$/, 'Expected a time as HH:MM')
  .transform((value) => {
    const [hour, minute] = value.split(/[:.-]/).map((part) => parseInt(part, 10));
    return { hour, minute };
  })
  .pipe(TimeObject);

export const TimeOfDay = z.union([TimeObject, TimeString]);
export type TimeOfDay = z.infer<typeof TimeOfDay>;

export const Frequency = z.enum(['hourly', 'daily', 'weekly', 'monthly']);
export type Frequency = z.infer<typeof Frequency>;

const RecurrenceEnd = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('count'), count: z.number().int().min(1).max(1000) }).strict(),
  z
    .object({
      kind: z.literal('until'),
      until: z
        .string()
        .datetime({ offset: true })
        .transform((value) => new Date(value)),
    })
    .strict(),
]);

const RecurrenceObject = z
  .object({
    frequency: Frequency,
    interval: z.number().int().min(1).max(1000).default(1),
    end: optional(RecurrenceEnd),
  })
  .strict();

/**
 * Converts `FREQ=WEEKLY;INTERVAL=2;COUNT=4` into the object form. Unknown or
 * malformed parts are passed through so the object schema reports them on
 * the right field.
 */
export function rruleToObject(rule: string): Record<string, unknown> {
  const parts = new Map<string, string>();
  for (const token of rule.replace(/^RRULE:/i, '').split(';')) {
    const separator = token.indexOf('=');
    if (separator === -1) continue;
    parts.set(token.slice(0, separator).trim().toUpperCase(), token.slice(separator + 1).trim());
  }

  const result: Record<string, unknown> = {
    frequency: parts.get('FREQ')?.toLowerCase(),
  };
  const interval = parts.get('INTERVAL');
  if (interval !== undefined) {
    result.interval = Number(interval);
  }
  const count = parts.get('COUNT');
  const until = parts.get('UNTIL');
  if (count !== undefined) {
    result.end = { kind: 'count', count: Number(count) };
  } else if (until !== undefined) {
    result.end = { kind: 'until', until };
  }
  return result;
}

export const RecurrenceRule = z.preprocess(
  (value) => (typeof value === 'string' ? rruleToObject(value) : value),
  RecurrenceObject
);
export type RecurrenceRule = z.infer<typeof RecurrenceRule>;

export const ReminderDraft = z
  .object({
    title: z.string().trim().min(1, 'Title must not be empty').max(1000),
    day: DaySpec,
    time: optional(TimeOfDay),
    recurrence: optional(RecurrenceRule),
  })
  .strict();
export type ReminderDraft = z.infer<typeof ReminderDraft>;

const Instant = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

// Replies show `#` plus the last characters of the id; either form selects it.
const ReminderIdRef = z
  .string()
  .trim()
  .regex(/^#?[0-9a-zA-Z-]{4,36}$/, 'Expected a reminder id such as #1a2b3c')
  .transform((value) => value.replace(/^#/, '').toLowerCase());

export const ReminderFilter = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('all') }).strict(),
  z.object({ kind: z.literal('id'), id: ReminderIdRef }).strict(),
  z.object({ kind: z.literal('today') }).strict(),
  z.object({ kind: z.literal('status'), status: ReminderStatus }).strict(),
  z.object({ kind: z.literal('search'), text: z.string().trim().min(1).max(200) }).strict(),
  z.object({ kind: z.literal('interval'), from: Instant, to: Instant }).strict(),
]);
export type ReminderFilter = z.infer<typeof ReminderFilter>;

export const CreateCommand = z
  .object({
    command: z.literal('create_reminders'),
    reminders: z.array(ReminderDraft).min(1, 'At least one reminder is required').max(30),
  })
  .strict();
export type CreateCommand = z.infer<typeof CreateCommand>;

export const ListCommand = z
  .object({
    command: z.literal('list_reminders'),
    filter: ReminderFilter.default({ kind: 'all' }),
  })
  .strict();
export type ListCommand = z.infer<typeof ListCommand>;

export const DeleteMode = z.enum(['by_filter', 'last_n']);
export type DeleteMode = z.infer<typeof DeleteMode>;

export const DeleteCommand = z
  .object({
    command: z.literal('delete_reminders'),
    mode: DeleteMode,
    last_n: optional(z.number().int().min(1).max(100)),
    /** Required in by_filter mode; last_n mode counts over all reminders without one. */
    filter: optional(ReminderFilter),
    /** A by_filter delete over every reminder must say so explicitly. */
    confirm_all: z.boolean().default(false),
  })
  .strict();
export type DeleteCommand = z.infer<typeof DeleteCommand>;

export interface DeleteRuleIssue {
  path: string;
  rule: string;
  message: string;
}

/** Cross-field rules of a delete; an implicit delete of everything is refused. */
export function deleteCommandIssues(command: DeleteCommand): DeleteRuleIssue[] {
  if (command.mode === 'last_n') {
    return command.last_n === undefined
      ? [{ path: 'last_n', rule: 'required_for_last_n', message: 'last_n is required when mode is last_n' }]
      : [];
  }

  const issues: DeleteRuleIssue[] = [];
  if (command.last_n !== undefined) {
    issues.push({ path: 'last_n', rule: 'not_allowed_for_by_filter', message: 'last_n is only allowed when mode is last_n' });
  }
  if (command.filter === undefined) {
    issues.push({ path: 'filter', rule: 'required_for_by_filter', message: 'filter is required when mode is by_filter' });
  } else if (command.filter.kind === 'all' && !command.confirm_all) {
    issues.push({ path: 'confirm_all', rule: 'confirm_delete_all', message: 'Deleting every reminder requires confirm_all' });
  }
  return issues;
}

export const Command = z
  .discriminatedUnion('command', [CreateCommand, ListCommand, DeleteCommand])
  .superRefine((command, ctx) => {
    if (command.command === 'delete_reminders') {
      for (const issue of deleteCommandIssues(command)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [issue.path],
          message: issue.message,
          params: { rule: issue.rule },
        });
      }
    }
    const filter = command.command === 'create_reminders' ? undefined : command.filter;
    if (filter?.kind === 'interval' && filter.from.getTime() >= filter.to.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['filter', 'to'],
        message: 'Interval end must be after its start',
        params: { rule: 'after_from' },
      });
    }
  });
export type Command = z.infer<typeof Command>;
export type CommandName = Command['command'];
