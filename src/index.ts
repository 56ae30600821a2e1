#!/usr/bin/env node

import { loadConfig } from './config/index.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { closeDatabase, createDatabase, runMigrations } from './db/index.js';
import { KnexReminderRepository } from './db/reminder-repository.js';
import { createApp } from './http.js';
import { ChatPipeline } from './services/chat-pipeline.js';
import { CircuitBreaker, CircuitSnapshotSchema } from './services/circuit-breaker.js';
import { CostController, CostLedgerSchema } from './services/cost-controller.js';
import { KnexStateStore, StateWriter } from './services/guard-state.js';
import { InvocationGuard, circuitOutcome } from './services/invocation-guard.js';
import { OpenAiLlmClient } from './services/llm-client.js';
import { LogSender, TelegramSender } from './services/notifier.js';
import { SlidingWindowRateLimiter } from './services/rate-limiter.js';
import { ReminderService } from './services/reminder-service.js';
import { ReminderDispatcher } from './services/scheduler.js';
import { isValidTimezone } from './services/timezone.js';
import { WebhookDedupGuard } from './services/webhook-dedup.js';

export const COST_LEDGER_KEY = 'cost_ledger';
export const CIRCUIT_KEY = 'llm_circuit';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  if (!isValidTimezone(config.timezone)) {
    throw new Error(`Invalid APP_TIMEZONE: ${config.timezone}`);
  }
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is required');
  }

  const db = createDatabase(config.database);
  logger.info('Running database migrations...');
  await runMigrations(db);
  logger.info('Migrations complete');

  // Guard state survives restarts; the dedup window is short enough to stay in memory.
  const stateStore = new KnexStateStore(db);
  const ledgerWriter = new StateWriter(stateStore, COST_LEDGER_KEY, logger);
  const circuitWriter = new StateWriter(stateStore, CIRCUIT_KEY, logger);

  const costController = new CostController({
    ...config.budget,
    logger,
    onChange: (ledger) => ledgerWriter.write(ledger, new Date()),
  });
  const circuitBreaker = new CircuitBreaker({
    name: 'llm',
    maxFailures: config.guard.circuitFailureThreshold,
    resetTimeout: config.guard.circuitCooldownSeconds * 1000,
    classify: circuitOutcome,
    logger,
    onChange: (snapshot) => circuitWriter.write(snapshot, new Date()),
  });

  const savedLedger = await stateStore.load(COST_LEDGER_KEY, CostLedgerSchema);
  if (savedLedger) costController.restore(savedLedger);
  const savedCircuit = await stateStore.load(CIRCUIT_KEY, CircuitSnapshotSchema);
  if (savedCircuit) circuitBreaker.restore(savedCircuit);

  const repository = new KnexReminderRepository(db);
  const reminders = new ReminderService({
    repository,
    timezone: config.timezone,
    logger,
    preReminders: config.preReminders,
  });
  const guard = new InvocationGuard({
    client: new OpenAiLlmClient({ ...config.openai, apiKey }),
    rateLimiter: new SlidingWindowRateLimiter({
      limit: config.guard.rateLimitRequests,
      windowMs: config.guard.rateLimitWindowSeconds * 1000,
    }),
    circuitBreaker,
    costController,
    retry: {
      maxAttempts: config.guard.retryMaxAttempts,
      initialDelayMs: config.guard.retryInitialDelayMs,
      maxElapsedMs: config.guard.retryMaxElapsedMs,
    },
    estimatedCallUsd: config.budget.estimatedCallUsd,
    logger,
  });
  const pipeline = new ChatPipeline({
    dedup: new WebhookDedupGuard({
      horizonMs: config.dedup.horizonSeconds * 1000,
      maxEntries: config.dedup.maxEntries,
    }),
    guard,
    reminders,
    timezone: config.timezone,
    logger,
  });

  const sender = config.telegram.botToken ? new TelegramSender(config.telegram.botToken) : new LogSender(logger);
  if (!config.telegram.botToken) {
    logger.warn('TELEGRAM_BOT_TOKEN not set; replies and reminders are only logged');
  }

  const dispatcher = new ReminderDispatcher({
    repository,
    reminders,
    sender,
    logger,
    batchSize: config.scheduler.batchSize,
  });
  dispatcher.startScheduler(config.scheduler.intervalMs);

  const app = createApp({
    pipeline,
    sender,
    secret: config.telegram.webhookSecret,
    webhookPath: config.telegram.webhookPath,
    maxUpdateAgeSeconds: config.telegram.maxUpdateAgeSeconds,
    logger,
  });

  const { port, host } = config.server;
  const server = app.listen(port, host, () => {
    logger.info({ host, port, webhookPath: config.telegram.webhookPath }, 'Chat reminder service listening');
  });

  // Handle shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    server.close();
    await dispatcher.stopScheduler();
    await Promise.all([ledgerWriter.flush(), circuitWriter.flush()]);
    await closeDatabase(db);
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
