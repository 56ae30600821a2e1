import { z } from 'zod';

const configSchema = z.object({
  database: z.object({
    type: z.enum(['sqlite', 'postgres']).default('sqlite'),
    path: z.string().default('./data/reminders.db'),
    url: z.string().optional(),
  }),
  telegram: z.object({
    botToken: z.string().optional(),
    webhookSecret: z.string().default('dev-secret'),
    webhookPath: z.string().startsWith('/').default('/webhook/telegram'),
    maxUpdateAgeSeconds: z.number().int().positive().default(300),
  }),
  openai: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('gpt-4.1-mini'),
    timeoutMs: z.number().int().positive().default(15_000),
  }),
  budget: z.object({
    monthlyUsd: z.number().positive().default(10),
    inputCostPer1k: z.number().nonnegative().default(0.0003),
    outputCostPer1k: z.number().nonnegative().default(0.0012),
    estimatedCallUsd: z.number().nonnegative().default(0.001),
  }),
  guard: z.object({
    rateLimitRequests: z.number().int().positive().default(5),
    rateLimitWindowSeconds: z.number().int().positive().default(60),
    circuitFailureThreshold: z.number().int().positive().default(3),
    circuitCooldownSeconds: z.number().int().positive().default(60),
    retryMaxAttempts: z.number().int().min(1).max(5).default(3),
    retryInitialDelayMs: z.number().int().nonnegative().default(500),
    retryMaxElapsedMs: z.number().int().positive().default(30_000),
  }),
  dedup: z.object({
    horizonSeconds: z.number().int().positive().default(600),
    maxEntries: z.number().int().positive().default(10_000),
  }),
  scheduler: z.object({
    intervalMs: z.number().int().positive().default(30_000),
    batchSize: z.number().int().positive().default(100),
  }),
  preReminders: z.boolean().default(true),
  server: z.object({
    port: z.number().default(8000),
    host: z.string().default('0.0.0.0'),
  }),
  timezone: z.string().default('Europe/Moscow'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  prettyLogs: z.boolean().default(true),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function int(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : parseInt(value, 10);
}

function bool(value: string | undefined): boolean | undefined {
  return value === undefined || value === '' ? undefined : value === 'true' || value === '1';
}

function num(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : parseFloat(value);
}

export function loadConfig(env: Env = process.env): Config {
  const isProduction = env.NODE_ENV === 'production';
  const databaseType = isProduction ? (env.DATABASE_TYPE || 'sqlite') : 'sqlite';

  return configSchema.parse({
    database: {
      type: databaseType,
      path: env.DATABASE_PATH || undefined,
      url: databaseType === 'postgres' ? env.DATABASE_URL : undefined,
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET || undefined,
      webhookPath: env.TELEGRAM_WEBHOOK_PATH || undefined,
      maxUpdateAgeSeconds: int(env.WEBHOOK_MAX_UPDATE_AGE_SECONDS),
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL || undefined,
      timeoutMs: int(env.OPENAI_TIMEOUT_MS),
    },
    budget: {
      monthlyUsd: num(env.OPENAI_MONTHLY_BUDGET_USD),
      inputCostPer1k: num(env.OPENAI_INPUT_COST_PER_1K),
      outputCostPer1k: num(env.OPENAI_OUTPUT_COST_PER_1K),
      estimatedCallUsd: num(env.OPENAI_ESTIMATED_CALL_USD),
    },
    guard: {
      rateLimitRequests: int(env.CHAT_RATE_LIMIT_REQUESTS),
      rateLimitWindowSeconds: int(env.CHAT_RATE_LIMIT_WINDOW_SECONDS),
      circuitFailureThreshold: int(env.LLM_CIRCUIT_FAILURE_THRESHOLD),
      circuitCooldownSeconds: int(env.LLM_CIRCUIT_OPEN_SECONDS),
      retryMaxAttempts: int(env.LLM_RETRY_MAX_ATTEMPTS),
      retryInitialDelayMs: int(env.LLM_RETRY_INITIAL_DELAY_MS),
      retryMaxElapsedMs: int(env.LLM_RETRY_MAX_ELAPSED_MS),
    },
    dedup: {
      horizonSeconds: int(env.WEBHOOK_DEDUP_HORIZON_SECONDS),
      maxEntries: int(env.WEBHOOK_DEDUP_MAX_ENTRIES),
    },
    scheduler: {
      intervalMs: int(env.SCHEDULER_INTERVAL_MS),
      batchSize: int(env.SCHEDULER_BATCH_SIZE),
    },
    preReminders: bool(env.PRE_REMINDERS_ENABLED),
    server: {
      port: int(env.PORT),
      host: env.HOST || undefined,
    },
    timezone: env.APP_TIMEZONE || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    prettyLogs: !isProduction,
  });
}
