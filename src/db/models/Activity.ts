import { z } from 'zod';
import { jsonColumn } from './columns.js';

export const ActivityAction = z.enum(['create', 'delete', 'fire']);
export type ActivityAction = z.infer<typeof ActivityAction>;

export const ActivitySchema = z.object({
  id: z.string(),
  chat_id: z.coerce.string(),
  action: ActivityAction,
  entity_ids: jsonColumn(z.array(z.string())),
  metadata: jsonColumn(z.record(z.unknown())),
  created_at: z.coerce.date(),
});

export type Activity = z.infer<typeof ActivitySchema>;

export interface CreateActivityInput {
  chat_id: string;
  action: ActivityAction;
  entity_ids: string[];
  metadata?: Record<string, unknown>;
}

export function parseActivityRow(row: unknown): Activity {
  return ActivitySchema.parse(row);
}
