import express, { type Express } from 'express';
import { createWebhookRouter, type WebhookRouteOptions } from './routes/webhook.js';

export interface AppOptions extends WebhookRouteOptions {
  webhookPath: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(options.webhookPath, createWebhookRouter(options));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: 'Not found' });
  });

  return app;
}
