import { addDays, addHours, addMonths, addWeeks } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';
import type { RecurrenceRule } from '../commands/schema.js';

export interface Occurrence {
  dueAt: Date;
  /** 1-based position inside the series. */
  occurrence: number;
}

/**
 * Due time of the `occurrence`-th instance of a series. Always computed from
 * the series anchor, so monthly series keep their day of month (Jan 31,
 * Feb 28, Mar 31) and calendar steps keep the local wall-clock time across
 * DST changes.
 */
export function occurrenceAt(anchor: Date, rule: RecurrenceRule, occurrence: number, timezone: string): Date {
  const steps = (occurrence - 1) * rule.interval;
  if (rule.frequency === 'hourly') {
    return addHours(anchor, steps);
  }

  const local = toZonedTime(anchor, timezone);
  switch (rule.frequency) {
    case 'daily':
      return fromZonedTime(addDays(local, steps), timezone);
    case 'weekly':
      return fromZonedTime(addWeeks(local, steps), timezone);
    case 'monthly':
      return fromZonedTime(addMonths(local, steps), timezone);
  }
}

function isPastEnd(rule: RecurrenceRule, candidate: Occurrence): boolean {
  if (!rule.end) return false;
  if (rule.end.kind === 'count') {
    return candidate.occurrence > rule.end.count;
  }
  return candidate.dueAt.getTime() > rule.end.until.getTime();
}

/**
 * Next pending instance after `previousOccurrence` was consumed, or null once
 * the end condition is reached.
 *
 * Steps forward until the due time is strictly after `now`, so runs missed
 * during downtime are skipped rather than replayed; skipped runs still count
 * toward a `count` end condition. Pure: the same inputs always give the same
 * occurrence.
 */
export function nextOccurrence(params: {
  rule: RecurrenceRule;
  anchor: Date;
  previousOccurrence: number;
  now: Date;
  timezone: string;
}): Occurrence | null {
  const { rule, anchor, now, timezone } = params;

  let occurrence = params.previousOccurrence;
  for (;;) {
    occurrence += 1;
    const candidate = { dueAt: occurrenceAt(anchor, rule, occurrence, timezone), occurrence };
    if (isPastEnd(rule, candidate)) {
      return null;
    }
    if (candidate.dueAt.getTime() > now.getTime()) {
      return candidate;
    }
  }
}

export function describeRecurrence(rule: RecurrenceRule): string {
  const unit = { hourly: 'hour', daily: 'day', weekly: 'week', monthly: 'month' }[rule.frequency];
  const every = rule.interval === 1 ? `every ${unit}` : `every ${rule.interval} ${unit}s`;
  if (!rule.end) return every;
  if (rule.end.kind === 'count') return `${every}, ${rule.end.count} times`;
  return `${every} until ${rule.end.until.toISOString()}`;
}
