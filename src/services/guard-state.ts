import type { Knex } from 'knex';
import type { z } from 'zod';
import { StoreError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { jsonColumn } from '../db/models/columns.js';

/** Key/value persistence for guard state that must survive restarts. */
export interface StateStore {
  load<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null>;
  save(key: string, value: unknown, at: Date): Promise<void>;
}

export class KnexStateStore implements StateStore {
  constructor(private readonly db: Knex) {}

  async load<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let row: unknown;
    try {
      row = await this.db('guard_state').where('key', key).first('value');
    } catch (error) {
      throw new StoreError(`load ${key}`, error);
    }
    if (!row || typeof row !== 'object' || !('value' in row)) {
      return null;
    }
    const parsed = jsonColumn(schema).safeParse(row.value);
    return parsed.success ? parsed.data : null;
  }

  async save(key: string, value: unknown, at: Date): Promise<void> {
    try {
      await this.db('guard_state')
        .insert({ key, value: JSON.stringify(value), updated_at: at.toISOString() })
        .onConflict('key')
        .merge();
    } catch (error) {
      throw new StoreError(`save ${key}`, error);
    }
  }
}

/** Process-local store; used in tests and when nothing needs to survive a restart. */
export class MemoryStateStore implements StateStore {
  private readonly values = new Map<string, string>();

  async load<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const raw = this.values.get(key);
    if (raw === undefined) return null;
    const parsed = jsonColumn(schema).safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async save(key: string, value: unknown): Promise<void> {
    this.values.set(key, JSON.stringify(value));
  }
}

/**
 * Writes snapshots of one key in the order they were taken. Guards mutate
 * their state synchronously and hand the snapshot here, so a slow write can
 * never be overtaken by an older one.
 */
export class StateWriter {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: StateStore,
    private readonly key: string,
    private readonly logger: Logger
  ) {}

  write(value: unknown, at: Date): void {
    this.chain = this.chain
      .then(() => this.store.save(this.key, value, at))
      .catch((error: unknown) => {
        this.logger.error({ key: this.key, error: describeError(error) }, 'Failed to persist guard state');
      });
  }

  /** Resolves once every write queued so far has settled. */
  flush(): Promise<void> {
    return this.chain;
  }
}
