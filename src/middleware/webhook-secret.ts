import type { Request, Response, NextFunction, RequestHandler } from 'express';
import crypto from 'crypto';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

// Middleware: Require the secret token Telegram sends with every webhook call
export function requireWebhookSecret(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const provided = req.get(SECRET_HEADER);
    if (!provided || !safeEqual(provided, secret)) {
      res.status(401).json({ ok: false, error: 'Invalid webhook secret' });
      return;
    }
    next();
  };
}
