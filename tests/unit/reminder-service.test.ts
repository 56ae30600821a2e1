import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { validateCommand } from '../../src/commands/validator.js';
import { closeDatabase, type Database } from '../../src/db/index.js';
import { KnexReminderRepository } from '../../src/db/reminder-repository.js';
import { InvalidTimeSpecError, ValidationError } from '../../src/errors.js';
import { ReminderService, type CommandOutcome } from '../../src/services/reminder-service.js';
import type { DeleteCommand } from '../../src/commands/schema.js';
import { createClock, createMockLogger, createTestDatabase, sequentialIds, type TestClock } from '../helpers/factories.js';

const TZ = 'Europe/Moscow';
const CHAT = 'chat-1';

function titles(outcome: CommandOutcome): string[] {
  return 'reminders' in outcome ? outcome.reminders.map((reminder) => reminder.title) : [];
}

describe('ReminderService', () => {
  let db: Database;
  let clock: TestClock;
  let repository: KnexReminderRepository;
  let service: ReminderService;

  const run = (raw: unknown, chatId = CHAT) => service.execute(chatId, validateCommand(raw));
  const create = (title: string, day: unknown, time?: unknown, recurrence?: unknown) =>
    run({ command: 'create_reminders', reminders: [{ title, day, time, recurrence }] });

  beforeEach(async () => {
    db = await createTestDatabase();
    clock = createClock('2026-03-10T11:07:00Z'); // Tuesday 14:07 in Moscow
    repository = new KnexReminderRepository(db);
    service = new ReminderService({
      repository,
      timezone: TZ,
      logger: createMockLogger(),
      now: clock.now,
      generateId: sequentialIds(),
    });
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  describe('create', () => {
    it('persists a batch with resolved due times', async () => {
      const outcome = await run({
        command: 'create_reminders',
        reminders: [
          { title: 'buy milk', day: 'tomorrow', time: '10:30' },
          { title: 'call mom', day: 'today' },
        ],
      });

      expect(outcome.kind).toBe('created');
      if (outcome.kind !== 'created') return;
      expect(outcome.reminders.map((r) => [r.id, r.title, r.due_at.toISOString(), r.status])).toEqual([
        ['id-01', 'buy milk', '2026-03-11T07:30:00.000Z', 'pending'],
        ['id-02', 'call mom', '2026-03-10T12:00:00.000Z', 'pending'],
      ]);

      const activities: unknown[] = await db('activities').where('action', 'create');
      expect(activities).toHaveLength(1);
    });

    it('anchors a recurring reminder to its first occurrence', async () => {
      const outcome = await create('standup', 'tomorrow', '09:00', 'FREQ=DAILY;COUNT=3');
      if (outcome.kind !== 'created') throw new Error(`unexpected ${outcome.kind}`);

      expect(outcome.reminders[0]).toMatchObject({
        id: 'id-01',
        series_id: 'id-01',
        anchor_at: new Date('2026-03-11T06:00:00Z'),
        occurrence: 1,
        recurrence: { frequency: 'daily', interval: 1, end: { kind: 'count', count: 3 } },
      });
    });

    it('writes nothing when one time in the batch is in the past', async () => {
      const attempt = run({
        command: 'create_reminders',
        reminders: [
          { title: 'fine', day: 'tomorrow' },
          { title: 'too late', day: 'today', time: '09:00' },
        ],
      });

      await expect(attempt).rejects.toBeInstanceOf(InvalidTimeSpecError);
      await expect(attempt).rejects.toMatchObject({
        issues: [expect.objectContaining({ path: 'reminders.1.time', rule: 'must_be_future' })],
      });
      const rows: unknown[] = await db('reminders').select();
      expect(rows).toHaveLength(0);
    });

    it('rejects a recurrence that ends before it starts', async () => {
      const attempt = create('pills', 'today', undefined, {
        frequency: 'daily',
        end: { kind: 'until', until: '2026-03-10T11:30:00Z' },
      });

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        issues: [{ path: 'reminders.0.recurrence.end.until', rule: 'after_first_occurrence' }],
      });
    });
  });

  describe('list', () => {
    it('limits the today filter to the local calendar day', async () => {
      await create('later today', 'today', '16:00');
      await create('tomorrow', 'tomorrow', '09:00');

      expect(titles(await run({ command: 'list_reminders', filter: { kind: 'today' } }))).toEqual(['later today']);
    });

    it('searches titles case-insensitively', async () => {
      await create('Buy milk', 'tomorrow');
      await create('bread', 'tomorrow');

      expect(titles(await run({ command: 'list_reminders', filter: { kind: 'search', text: 'MILK' } }))).toEqual([
        'Buy milk',
      ]);
    });

    it('keeps other chats out', async () => {
      await create('mine', 'tomorrow');
      await run({ command: 'create_reminders', reminders: [{ title: 'theirs', day: 'tomorrow' }] }, 'chat-2');

      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['mine']);
    });

    it('finds a reminder by its full or short id', async () => {
      await create('A', 'tomorrow');
      await create('B', 'tomorrow');

      expect(titles(await run({ command: 'list_reminders', filter: { kind: 'id', id: 'id-01' } }))).toEqual(['A']);
      expect(titles(await run({ command: 'list_reminders', filter: { kind: 'id', id: '#ID-02' } }))).toEqual(['B']);
    });

    it('shows cancelled reminders only when asked for by status', async () => {
      await create('dentist', 'tomorrow');
      await run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'search', text: 'dentist' } });

      expect(titles(await run({ command: 'list_reminders' }))).toEqual([]);
      expect(titles(await run({ command: 'list_reminders', filter: { kind: 'status', status: 'cancelled' } }))).toEqual([
        'dentist',
      ]);
    });
  });

  describe('delete', () => {
    async function createFive(): Promise<void> {
      const specs: Array<[string, string, string]> = [
        ['A', 'tomorrow', '09:00'],
        ['B', 'tomorrow', '07:00'],
        ['C', 'day_after_tomorrow', '10:00'],
        ['D', 'tomorrow', '08:30'],
        ['E', 'tomorrow', '12:00'],
      ];
      for (const [title, day, time] of specs) {
        await create(title, day, time);
        clock.advance(60_000);
      }
    }

    it('cancels the most recently created reminders regardless of due time', async () => {
      await createFive();

      const outcome = await run({ command: 'delete_reminders', mode: 'last_n', last_n: 3 });
      expect(outcome).toMatchObject({ kind: 'deleted', count: 3 });
      expect(titles(outcome)).toEqual(['E', 'D', 'C']);
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['B', 'A']);
    });

    it('cancels nothing when fewer than last_n reminders match', async () => {
      await create('A', 'tomorrow');
      await create('B', 'tomorrow');

      expect(await run({ command: 'delete_reminders', mode: 'last_n', last_n: 3 })).toEqual({
        kind: 'nothing_to_delete',
        requested: 3,
        available: 2,
      });
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['A', 'B']);
    });

    it('reports an empty by_filter delete', async () => {
      await create('A', 'tomorrow');

      expect(await run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'search', text: 'zzz' } })).toEqual({
        kind: 'nothing_to_delete',
        requested: null,
        available: 0,
      });
    });

    it('never deletes reminders that are no longer pending', async () => {
      await create('A', 'tomorrow');

      expect(await run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'status', status: 'sent' } })).toEqual({
        kind: 'nothing_to_delete',
        requested: null,
        available: 0,
      });
    });

    it('never cancels everything implicitly', async () => {
      await create('A', 'tomorrow');
      await create('B', 'tomorrow');

      expect(() => validateCommand({ command: 'delete_reminders', last_n: 1 })).toThrow(ValidationError);
      expect(() => validateCommand({ command: 'delete_reminders' })).toThrow(ValidationError);

      const unconfirmed: DeleteCommand = {
        command: 'delete_reminders',
        mode: 'by_filter',
        filter: { kind: 'all' },
        confirm_all: false,
      };
      await expect(service.delete(CHAT, unconfirmed)).rejects.toMatchObject({
        issues: [{ path: 'confirm_all', rule: 'confirm_delete_all' }],
      });
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['A', 'B']);
    });

    it('cancels every pending reminder when confirmed', async () => {
      await create('A', 'tomorrow');
      await create('B', 'tomorrow');

      const outcome = await run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'all' }, confirm_all: true });
      expect(outcome).toMatchObject({ kind: 'deleted', count: 2 });
      expect(titles(await run({ command: 'list_reminders' }))).toEqual([]);
    });

    it('cancels a single reminder by its short id', async () => {
      await create('A', 'tomorrow');
      await create('B', 'tomorrow');

      const outcome = await run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'id', id: '#id-02' } });
      expect(outcome).toMatchObject({ kind: 'deleted', count: 1 });
      expect(titles(outcome)).toEqual(['B']);
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['A']);
    });

    it('refuses an id that matches several reminders', async () => {
      const ids = ['aaaa-0001', 'bbbb-0001'];
      const shared = new ReminderService({
        repository,
        timezone: TZ,
        logger: createMockLogger(),
        now: clock.now,
        generateId: () => ids.shift() ?? 'unexpected',
      });
      await shared.execute(CHAT, validateCommand({ command: 'create_reminders', reminders: [{ title: 'A', day: 'tomorrow' }] }));
      await shared.execute(CHAT, validateCommand({ command: 'create_reminders', reminders: [{ title: 'B', day: 'tomorrow' }] }));

      const attempt = run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'id', id: '0001' } });
      await expect(attempt).rejects.toMatchObject({ issues: [{ path: 'filter.id', rule: 'ambiguous_id' }] });
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['A', 'B']);
    });

    it('serializes concurrent deletes in the same chat', async () => {
      await create('A', 'tomorrow');
      clock.advance(60_000);
      await create('B', 'tomorrow');
      clock.advance(60_000);
      await create('C', 'tomorrow');

      const command = validateCommand({ command: 'delete_reminders', mode: 'last_n', last_n: 2 });
      const outcomes = await Promise.all([service.execute(CHAT, command), service.execute(CHAT, command)]);

      expect(outcomes.map((outcome) => outcome.kind).sort()).toEqual(['deleted', 'nothing_to_delete']);
      expect(outcomes).toContainEqual({ kind: 'nothing_to_delete', requested: 2, available: 1 });
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['A']);
    });
  });

  describe('markFired', () => {
    it('marks the reminder sent and spawns the next occurrence once', async () => {
      await create('standup', 'tomorrow', '09:00', { frequency: 'daily', end: { kind: 'count', count: 3 } });
      const firedAt = new Date('2026-03-11T06:00:30Z');

      const first = await service.markFired('id-01', firedAt);
      expect(first.fired).toBe(true);
      expect(first.reminder).toMatchObject({ id: 'id-01', status: 'sent', updated_at: firedAt });
      expect(first.next).toMatchObject({
        id: 'id-02',
        status: 'pending',
        due_at: new Date('2026-03-12T06:00:00Z'),
        occurrence: 2,
        series_id: 'id-01',
        anchor_at: new Date('2026-03-11T06:00:00Z'),
      });

      const second = await service.markFired('id-01', firedAt);
      expect(second).toMatchObject({ fired: false, next: null });
      expect(second.reminder?.status).toBe('sent');
    });

    it('stops spawning at the end of the series', async () => {
      await create('standup', 'tomorrow', '09:00', { frequency: 'daily', end: { kind: 'count', count: 2 } });

      const first = await service.markFired('id-01', new Date('2026-03-11T06:00:30Z'));
      expect(first.next?.id).toBe('id-02');
      const second = await service.markFired('id-02', new Date('2026-03-12T06:00:30Z'));
      expect(second).toMatchObject({ fired: true, next: null });
    });

    it('leaves one-off reminders alone after sending', async () => {
      await create('once', 'tomorrow');

      expect(await service.markFired('id-01', new Date('2026-03-11T05:00:10Z'))).toMatchObject({ fired: true, next: null });
      expect(await service.markFired('missing')).toEqual({ fired: false, reminder: null, next: null });
    });
  });

  describe('pre-reminders', () => {
    beforeEach(() => {
      service = new ReminderService({
        repository,
        timezone: TZ,
        logger: createMockLogger(),
        now: clock.now,
        generateId: sequentialIds(),
        preReminders: true,
      });
    });

    it('adds a hidden notice an hour before reminders due on a later day', async () => {
      const outcome = await run({
        command: 'create_reminders',
        reminders: [
          { title: 'dentist', day: 'tomorrow', time: '10:00' },
          { title: 'call', day: 'today', time: '18:00' },
        ],
      });

      expect(outcome.kind === 'created' && outcome.reminders.map((r) => r.id)).toEqual(['id-01', 'id-02']);
      expect(await repository.findById('id-03')).toMatchObject({
        kind: 'pre_reminder',
        parent_id: 'id-01',
        title: 'dentist',
        status: 'pending',
        due_at: new Date('2026-03-11T06:00:00Z'),
      });
      const rows: unknown[] = await db('reminders').select();
      expect(rows).toHaveLength(3);
      expect(titles(await run({ command: 'list_reminders' }))).toEqual(['call', 'dentist']);
    });

    it('skips the notice when its time has already passed', async () => {
      clock.set('2026-03-10T20:50:00Z'); // 23:50 in Moscow

      await create('late night', 'tomorrow', '00:30');
      const rows: unknown[] = await db('reminders').select();
      expect(rows).toHaveLength(1);
    });

    it('cancels the notice together with its reminder', async () => {
      await create('dentist', 'tomorrow', '10:00');

      await run({ command: 'delete_reminders', mode: 'by_filter', filter: { kind: 'search', text: 'dentist' } });
      expect(await repository.findById('id-02')).toMatchObject({ kind: 'pre_reminder', status: 'cancelled' });
    });

    it('adds a notice for the next occurrence of a series', async () => {
      await create('standup', 'tomorrow', '09:00', 'FREQ=DAILY;COUNT=3');

      const fired = await service.markFired('id-01', new Date('2026-03-11T06:00:30Z'));
      expect(fired.next).toMatchObject({ id: 'id-03', kind: 'reminder', due_at: new Date('2026-03-12T06:00:00Z') });
      expect(await repository.findById('id-04')).toMatchObject({
        kind: 'pre_reminder',
        parent_id: 'id-03',
        due_at: new Date('2026-03-12T05:00:00Z'),
      });
    });

    it('fires a notice without spawning anything', async () => {
      await create('standup', 'tomorrow', '09:00', 'FREQ=DAILY;COUNT=3');

      expect(await service.markFired('id-02', new Date('2026-03-11T05:00:10Z'))).toMatchObject({ fired: true, next: null });
    });
  });
});
