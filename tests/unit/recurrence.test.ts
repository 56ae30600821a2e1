import { describe, it, expect } from 'vitest';
import type { RecurrenceRule } from '../../src/commands/schema.js';
import { describeRecurrence, nextOccurrence, occurrenceAt } from '../../src/services/recurrence.js';

const TZ = 'Europe/Moscow';
const ANCHOR = new Date('2026-03-10T05:00:00Z'); // 08:00 local

const daily: RecurrenceRule = { frequency: 'daily', interval: 1 };

describe('occurrenceAt', () => {
  it('keeps the anchor day of month for monthly series', () => {
    const rule: RecurrenceRule = { frequency: 'monthly', interval: 1 };
    const anchor = new Date('2026-01-31T05:00:00Z');

    expect(occurrenceAt(anchor, rule, 2, TZ).toISOString()).toBe('2026-02-28T05:00:00.000Z');
    expect(occurrenceAt(anchor, rule, 3, TZ).toISOString()).toBe('2026-03-31T05:00:00.000Z');
  });

  it('steps hourly series by elapsed time', () => {
    const rule: RecurrenceRule = { frequency: 'hourly', interval: 3 };
    expect(occurrenceAt(ANCHOR, rule, 2, TZ).toISOString()).toBe('2026-03-10T08:00:00.000Z');
  });

  it('steps weekly series by whole weeks', () => {
    const rule: RecurrenceRule = { frequency: 'weekly', interval: 2 };
    expect(occurrenceAt(ANCHOR, rule, 3, TZ).toISOString()).toBe('2026-04-07T05:00:00.000Z');
  });

  it('returns the anchor for the first occurrence', () => {
    expect(occurrenceAt(ANCHOR, daily, 1, TZ)).toEqual(ANCHOR);
  });
});

describe('nextOccurrence', () => {
  it('returns the following instance', () => {
    expect(nextOccurrence({ rule: daily, anchor: ANCHOR, previousOccurrence: 1, now: ANCHOR, timezone: TZ })).toEqual({
      dueAt: new Date('2026-03-11T05:00:00Z'),
      occurrence: 2,
    });
  });

  it('skips instances missed while the service was down', () => {
    const now = new Date('2026-03-13T06:00:00Z');
    expect(nextOccurrence({ rule: daily, anchor: ANCHOR, previousOccurrence: 1, now, timezone: TZ })).toEqual({
      dueAt: new Date('2026-03-14T05:00:00Z'),
      occurrence: 5,
    });
  });

  it('stops after the configured count', () => {
    const rule: RecurrenceRule = { ...daily, end: { kind: 'count', count: 3 } };
    expect(nextOccurrence({ rule, anchor: ANCHOR, previousOccurrence: 2, now: ANCHOR, timezone: TZ })?.occurrence).toBe(3);
    expect(nextOccurrence({ rule, anchor: ANCHOR, previousOccurrence: 3, now: ANCHOR, timezone: TZ })).toBeNull();
  });

  it('includes an instance exactly on the end date and nothing after it', () => {
    const rule: RecurrenceRule = { ...daily, end: { kind: 'until', until: new Date('2026-03-12T05:00:00Z') } };

    expect(nextOccurrence({ rule, anchor: ANCHOR, previousOccurrence: 2, now: ANCHOR, timezone: TZ })).toEqual({
      dueAt: new Date('2026-03-12T05:00:00Z'),
      occurrence: 3,
    });
    expect(nextOccurrence({ rule, anchor: ANCHOR, previousOccurrence: 3, now: ANCHOR, timezone: TZ })).toBeNull();
  });

  it('counts skipped instances toward the count', () => {
    const rule: RecurrenceRule = { ...daily, end: { kind: 'count', count: 3 } };
    const now = new Date('2026-03-13T06:00:00Z');
    expect(nextOccurrence({ rule, anchor: ANCHOR, previousOccurrence: 1, now, timezone: TZ })).toBeNull();
  });

  it('gives the same answer for the same inputs', () => {
    const params = { rule: daily, anchor: ANCHOR, previousOccurrence: 4, now: ANCHOR, timezone: TZ };
    expect(nextOccurrence(params)).toEqual(nextOccurrence(params));
  });

  it('produces strictly increasing due times', () => {
    const rule: RecurrenceRule = { frequency: 'monthly', interval: 1, end: { kind: 'count', count: 12 } };
    const anchor = new Date('2026-01-31T05:00:00Z');
    const seen: number[] = [];
    let previous = 1;
    for (;;) {
      const next = nextOccurrence({ rule, anchor, previousOccurrence: previous, now: anchor, timezone: TZ });
      if (!next) break;
      seen.push(next.dueAt.getTime());
      previous = next.occurrence;
    }

    expect(seen).toHaveLength(11);
    for (let i = 1; i < seen.length; i++) {
      expect(seen[i]).toBeGreaterThan(seen[i - 1] ?? Infinity);
    }
  });
});

describe('describeRecurrence', () => {
  it('describes the interval and end condition', () => {
    expect(describeRecurrence(daily)).toBe('every day');
    expect(describeRecurrence({ frequency: 'weekly', interval: 2, end: { kind: 'count', count: 4 } })).toBe(
      'every 2 weeks, 4 times'
    );
    expect(
      describeRecurrence({ frequency: 'hourly', interval: 1, end: { kind: 'until', until: new Date('2026-04-01T00:00:00Z') } })
    ).toBe('every hour until 2026-04-01T00:00:00.000Z');
  });
});
