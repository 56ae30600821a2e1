import { z } from 'zod';

/** SQLite hands JSON columns back as text, PostgreSQL as parsed values. */
export function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === 'string' ? JSON.parse(value) : value), schema);
}
