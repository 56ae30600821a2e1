import { parseCommandJson, validateCommand } from '../commands/validator.js';
import { shortId, type Reminder } from '../db/models/Reminder.js';
import {
  AbortedError,
  BudgetExceededError,
  CircuitOpenError,
  InvalidTimeSpecError,
  PermanentUpstreamError,
  RateLimitedError,
  StoreError,
  TransientUpstreamError,
  ValidationError,
  describeError,
  type ErrorCode,
} from '../errors.js';
import type { Logger } from '../logger.js';
import { systemClock, type Clock } from '../types/clock.js';
import type { InvocationGuard } from './invocation-guard.js';
import { describeRecurrence } from './recurrence.js';
import type { CommandOutcome, ReminderService } from './reminder-service.js';
import { formatInTimezone } from './timezone.js';
import type { WebhookDedupGuard } from './webhook-dedup.js';

export interface InboundMessage {
  updateId: number;
  chatId: string;
  text: string;
}

export type PipelineOutcome =
  | { kind: 'duplicate' }
  | { kind: 'aborted' }
  | { kind: 'executed'; result: CommandOutcome }
  | { kind: 'rejected'; code: ErrorCode | 'EMPTY_MESSAGE' };

export interface PipelineReply {
  /** Text for the user; null when nothing should be sent. */
  message: string | null;
  /** The transport always acknowledges, so the update is not redelivered. */
  ack: true;
  outcome: PipelineOutcome;
}

export interface ChatPipelineOptions {
  dedup: WebhookDedupGuard;
  guard: InvocationGuard;
  reminders: ReminderService;
  timezone: string;
  logger: Logger;
  now?: Clock;
}

const DATE_FORMAT = 'EEE d MMM HH:mm';

export class ChatPipeline {
  private readonly logger: Logger;
  private readonly now: Clock;

  constructor(private readonly options: ChatPipelineOptions) {
    this.logger = options.logger.child({ component: 'chat-pipeline' });
    this.now = options.now ?? systemClock;
  }

  async handle(inbound: InboundMessage, options: { signal?: AbortSignal } = {}): Promise<PipelineReply> {
    if (!this.options.dedup.admit(inbound.updateId)) {
      this.logger.info({ updateId: inbound.updateId, chatId: inbound.chatId }, 'Duplicate update skipped');
      return { message: null, ack: true, outcome: { kind: 'duplicate' } };
    }

    const text = inbound.text.trim();
    if (!text) {
      return reply('Please send your request as a text message.', { kind: 'rejected', code: 'EMPTY_MESSAGE' });
    }

    try {
      const completion = await this.options.guard.invoke(
        inbound.chatId,
        { text, now: this.now(), timezone: this.options.timezone },
        options
      );
      const command = validateCommand(parseCommandJson(completion.text));
      const result = await this.options.reminders.execute(inbound.chatId, command);
      return reply(this.describe(result), { kind: 'executed', result });
    } catch (error) {
      return this.fail(inbound, error);
    }
  }

  private fail(inbound: InboundMessage, error: unknown): PipelineReply {
    const context = { updateId: inbound.updateId, chatId: inbound.chatId };

    if (error instanceof AbortedError) {
      this.logger.info(context, 'Update processing aborted');
      return { message: null, ack: true, outcome: { kind: 'aborted' } };
    }
    if (error instanceof InvalidTimeSpecError) {
      const [issue] = error.issues;
      return rejected(error, `That time has already passed (${issue?.path ?? 'time'}). Please choose a later time.`);
    }
    if (error instanceof ValidationError) {
      const [issue] = error.issues;
      const detail = issue ? (issue.path ? `${issue.path}: ${issue.message}` : issue.message) : error.message;
      return rejected(error, `I could not use that request (${detail}). Please rephrase it.`);
    }
    if (error instanceof RateLimitedError) {
      return rejected(error, 'Too many requests. Please wait a moment and try again.');
    }
    if (error instanceof TransientUpstreamError || error instanceof CircuitOpenError) {
      return rejected(error, 'The assistant is temporarily unavailable. Please try again later.');
    }
    if (error instanceof PermanentUpstreamError) {
      this.logger.warn({ ...context, error: error.message }, 'Model output rejected');
      return rejected(error, 'Sorry, I could not understand the request. Please rephrase it.');
    }
    if (error instanceof BudgetExceededError) {
      return rejected(error, 'The service is paused: the monthly usage limit has been reached.');
    }
    if (error instanceof StoreError) {
      this.logger.error({ ...context, operation: error.operation, error: describeError(error.cause) }, 'Store failure');
      return rejected(error, 'Something went wrong while handling your reminders. Please try again.');
    }
    throw error;
  }

  private describe(result: CommandOutcome): string {
    switch (result.kind) {
      case 'created':
        return [`Created ${plural(result.reminders.length)}:`, ...result.reminders.map((r) => this.line(r))].join('\n');
      case 'listed':
        if (result.reminders.length === 0) return 'No reminders found.';
        return ['Your reminders:', ...result.reminders.map((r) => this.line(r, true))].join('\n');
      case 'deleted':
        return [`Deleted ${plural(result.count)}:`, ...result.reminders.map((r) => this.line(r))].join('\n');
      case 'nothing_to_delete':
        if (result.requested === null) return 'No matching reminders found, nothing was deleted.';
        return `Only ${plural(result.available)} matched, fewer than the ${result.requested} requested. Nothing was deleted.`;
    }
  }

  private line(reminder: Reminder, withStatus = false): string {
    const status = withStatus ? `[${reminder.status}] ` : '';
    const repeat = reminder.recurrence ? ` (${describeRecurrence(reminder.recurrence)})` : '';
    return `- #${shortId(reminder.id)} ${status}${reminder.title}: ${formatInTimezone(reminder.due_at, this.options.timezone, DATE_FORMAT)}${repeat}`;
  }
}

function plural(count: number): string {
  return count === 1 ? '1 reminder' : `${count} reminders`;
}

function reply(message: string, outcome: PipelineOutcome): PipelineReply {
  return { message, ack: true, outcome };
}

function rejected(error: { code: ErrorCode }, message: string): PipelineReply {
  return reply(message, { kind: 'rejected', code: error.code });
}
