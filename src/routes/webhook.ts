import { Router } from 'express';
import { z } from 'zod';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { requireWebhookSecret } from '../middleware/webhook-secret.js';
import type { ChatPipeline } from '../services/chat-pipeline.js';
import type { ChatSender } from '../services/notifier.js';
import { systemClock, type Clock } from '../types/clock.js';

// Only the fields the pipeline reads; everything else Telegram sends is dropped.
export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      message_id: z.number().int(),
      /** Unix seconds. */
      date: z.number().int(),
      chat: z.object({ id: z.union([z.number().int(), z.string()]) }),
      text: z.string().optional(),
    })
    .optional(),
});
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export interface WebhookRouteOptions {
  pipeline: Pick<ChatPipeline, 'handle'>;
  sender: ChatSender;
  secret: string;
  maxUpdateAgeSeconds: number;
  logger: Logger;
  now?: Clock;
}

/**
 * Telegram webhook. Once the secret checks out the answer is always
 * `{ ok: true }`, so Telegram never redelivers an update that was already
 * handled or deliberately skipped.
 */
export function createWebhookRouter(options: WebhookRouteOptions): Router {
  const router = Router();
  const logger = options.logger.child({ component: 'webhook' });
  const now = options.now ?? systemClock;

  router.post('/', requireWebhookSecret(options.secret), async (req, res) => {
    const parsed = TelegramUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, 'Malformed update ignored');
      res.json({ ok: true });
      return;
    }

    const { update_id: updateId, message } = parsed.data;
    if (!message) {
      res.json({ ok: true });
      return;
    }

    const ageSeconds = now().getTime() / 1000 - message.date;
    if (ageSeconds > options.maxUpdateAgeSeconds) {
      logger.info({ updateId, ageSeconds: Math.round(ageSeconds) }, 'Stale update skipped');
      res.json({ ok: true });
      return;
    }

    // Stop retries once Telegram gives up on this request.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const chatId = String(message.chat.id);
    try {
      const reply = await options.pipeline.handle(
        { updateId, chatId, text: message.text ?? '' },
        { signal: controller.signal }
      );
      if (reply.message) {
        await options.sender.sendMessage(chatId, reply.message).catch((error: unknown) => {
          logger.error({ updateId, chatId, error: describeError(error) }, 'Failed to send reply');
        });
      }
      res.json({ ok: true });
    } catch (error) {
      logger.error({ updateId, chatId, error: describeError(error) }, 'Update handling failed');
      res.status(500).json({ ok: false });
    }
  });

  return router;
}
