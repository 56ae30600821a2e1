import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Reminder } from '../db/models/Reminder.js';
import type { ReminderRepository } from '../db/reminder-repository.js';
import type { ChatSender } from './notifier.js';
import type { FireResult, ReminderService } from './reminder-service.js';
import { systemClock, type Clock } from '../types/clock.js';

export interface DispatchSummary {
  due: number;
  sent: number;
  failed: number;
  spawned: number;
}

export interface DispatcherOptions {
  repository: ReminderRepository;
  reminders: ReminderService;
  sender: ChatSender;
  logger: Logger;
  batchSize: number;
  now?: Clock;
}

/**
 * Delivers due reminders. Delivery is at-least-once: a reminder is marked
 * sent only after the message went out, so a crash in between resends it,
 * and `markFired` keeps the follow-up occurrence from being spawned twice.
 */
export class ReminderDispatcher {
  private readonly logger: Logger;
  private readonly now: Clock;
  private schedulerInterval: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger.child({ component: 'dispatcher' });
    this.now = options.now ?? systemClock;
  }

  async dispatchDue(now: Date = this.now()): Promise<DispatchSummary> {
    const due = await this.options.repository.findDue(now, this.options.batchSize);
    const summary: DispatchSummary = { due: due.length, sent: 0, failed: 0, spawned: 0 };

    for (const reminder of due) {
      try {
        await this.options.sender.sendMessage(reminder.chat_id, messageFor(reminder));
      } catch (error) {
        summary.failed++;
        this.logger.error({ reminderId: reminder.id, error: describeError(error) }, 'Reminder delivery failed');
        continue;
      }

      // The message is out; a reminder left pending here is sent again on a later tick.
      let result: FireResult;
      try {
        result = await this.options.reminders.markFired(reminder.id, now);
      } catch (error) {
        summary.failed++;
        this.logger.error(
          { reminderId: reminder.id, chatId: reminder.chat_id, error: describeError(error) },
          'Marking reminder as sent failed'
        );
        continue;
      }
      if (result.fired) {
        summary.sent++;
      }
      if (result.next) {
        summary.spawned++;
        this.logger.info({ reminderId: reminder.id, nextId: result.next.id, dueAt: result.next.due_at }, 'Next occurrence scheduled');
      }
    }

    if (summary.due > 0) {
      this.logger.info({ ...summary }, 'Dispatch finished');
    }
    return summary;
  }

  startScheduler(intervalMs: number): void {
    if (this.schedulerInterval) {
      return;
    }

    this.logger.info({ intervalMs }, 'Starting scheduler');
    this.schedulerInterval = setInterval(() => this.tick(), intervalMs);
  }

  /** Stops the timer and waits for a dispatch already in progress. */
  async stopScheduler(): Promise<void> {
    if (this.schedulerInterval) {
      clearInterval(this.schedulerInterval);
      this.schedulerInterval = null;
      this.logger.info('Scheduler stopped');
    }
    if (this.running) {
      await this.running;
    }
  }

  // Skips a tick while the previous dispatch is still running.
  private tick(): void {
    if (this.running) {
      return;
    }
    this.running = this.dispatchDue()
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ error: describeError(error) }, 'Scheduler error');
        }
      )
      .finally(() => {
        this.running = null;
      });
  }
}

function messageFor(reminder: Reminder): string {
  return reminder.kind === 'pre_reminder' ? `Reminder in 1 hour: ${reminder.title}` : `Reminder: ${reminder.title}`;
}
