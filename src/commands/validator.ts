import type { ZodError, ZodIssue } from 'zod';
import { Command } from './schema.js';
import { PermanentUpstreamError, ValidationError, type FieldIssue } from '../errors.js';

function ruleOf(issue: ZodIssue): string {
  if (issue.code === 'custom') {
    const rule: unknown = issue.params?.rule;
    if (typeof rule === 'string') {
      return rule;
    }
  }
  return issue.code;
}

export function toFieldIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    rule: ruleOf(issue),
    message: issue.message,
  }));
}

/**
 * Structural and cross-field validation of a raw command. Pure: no storage
 * or network access, so a command that passes is safe to execute.
 */
export function validateCommand(raw: unknown): Command {
  const parsed = Command.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(toFieldIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Decodes the model's text output. Output that is not a JSON object is a
 * malformed upstream response, not a user error.
 */
export function parseCommandJson(text: string): unknown {
  const trimmed = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');
  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch (error) {
    throw new PermanentUpstreamError('Model output is not valid JSON', { cause: error });
  }
  if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
    throw new PermanentUpstreamError('Model output is not a JSON object');
  }
  return payload;
}
