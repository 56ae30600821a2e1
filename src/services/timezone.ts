import { formatInTimeZone, toZonedTime, fromZonedTime } from 'date-fns-tz';
import { addDays, addHours, getDay, parseISO, set, startOfDay, startOfHour, isSameDay } from 'date-fns';
import { InvalidTimeSpecError } from '../errors.js';
import type { DaySpec, TimeOfDay, Weekday } from '../commands/schema.js';

export const DEFAULT_REMINDER_HOUR = 8;

const WEEKDAY_INDEX: Record<Weekday, number> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

export function formatInTimezone(date: Date, timezone: string, format: string = 'yyyy-MM-dd HH:mm'): string {
  return formatInTimeZone(date, timezone, format);
}

// Dates below are "zoned": their local fields carry the wall clock of `timezone`.
function resolveLocalDay(zonedNow: Date, day: Exclude<DaySpec, 'today'>): Date {
  const today = startOfDay(zonedNow);

  if (day === 'tomorrow') {
    return addDays(today, 1);
  }
  if (day === 'day_after_tomorrow') {
    return addDays(today, 2);
  }
  if ('weekday' in day) {
    const ahead = (WEEKDAY_INDEX[day.weekday] - getDay(today) + 7) % 7;
    return addDays(today, ahead === 0 ? 7 : ahead);
  }
  return parseISO(day.date);
}

/**
 * Turns a day and an optional time of day into an absolute instant.
 *
 * - today, no time: the next full local hour strictly after `now`
 * - any later day, no time: that day at 08:00 local
 * - explicit time: combined with the day as given, never rounded
 *
 * A result that is not strictly after `now` is rejected, never shifted.
 */
export function resolveDueAt(now: Date, day: DaySpec, time: TimeOfDay | undefined, timezone: string): Date {
  const zonedNow = toZonedTime(now, timezone);

  const localDay = day === 'today' ? startOfDay(zonedNow) : resolveLocalDay(zonedNow, day);

  let dueAt: Date;
  if (time) {
    dueAt = fromZonedTime(set(localDay, { hours: time.hour, minutes: time.minute, seconds: 0, milliseconds: 0 }), timezone);
  } else if (isSameDay(localDay, zonedNow)) {
    // Also covers an explicit date that happens to be today.
    dueAt = fromZonedTime(addHours(startOfHour(zonedNow), 1), timezone);
  } else {
    dueAt = fromZonedTime(set(localDay, { hours: DEFAULT_REMINDER_HOUR, minutes: 0, seconds: 0, milliseconds: 0 }), timezone);
  }

  if (dueAt.getTime() <= now.getTime()) {
    const field = time ? 'time' : 'day';
    throw InvalidTimeSpecError.at(field, `Resolved time ${formatInTimezone(dueAt, timezone)} is not in the future`);
  }
  return dueAt;
}

/** `[start of today, start of tomorrow)` in `timezone`, as absolute instants. */
export function localDayRange(now: Date, timezone: string): { from: Date; to: Date } {
  const today = startOfDay(toZonedTime(now, timezone));
  return {
    from: fromZonedTime(today, timezone),
    to: fromZonedTime(addDays(today, 1), timezone),
  };
}

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}
