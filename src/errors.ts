/**
 * Error taxonomy shared by the command pipeline.
 *
 * Every error carries a stable `code` so the transport layer can choose the
 * user-facing message and HTTP status without inspecting messages.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_TIME_SPEC'
  | 'TRANSIENT_UPSTREAM'
  | 'PERMANENT_UPSTREAM'
  | 'BUDGET_EXCEEDED'
  | 'CIRCUIT_OPEN'
  | 'RATE_LIMITED'
  | 'STORE_ERROR'
  | 'ABORTED';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One failed rule on one field, e.g. `reminders.1.title` / `too_small`. */
export interface FieldIssue {
  path: string;
  rule: string;
  message: string;
}

export class ValidationError extends AppError {
  readonly code: ErrorCode = 'VALIDATION_ERROR';
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[], message?: string) {
    super(message ?? formatIssues(issues));
    this.issues = issues;
  }
}

export class InvalidTimeSpecError extends ValidationError {
  override readonly code: ErrorCode = 'INVALID_TIME_SPEC';

  constructor(issues: FieldIssue[]) {
    super(issues);
  }

  static at(path: string, message: string): InvalidTimeSpecError {
    return new InvalidTimeSpecError([{ path, rule: 'must_be_future', message }]);
  }
}

export type TransientReason = 'connection' | 'timeout' | 'throttled';

export class TransientUpstreamError extends AppError {
  readonly code: ErrorCode = 'TRANSIENT_UPSTREAM';

  constructor(
    readonly reason: TransientReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PermanentUpstreamError extends AppError {
  readonly code: ErrorCode = 'PERMANENT_UPSTREAM';
}

export class BudgetExceededError extends AppError {
  readonly code: ErrorCode = 'BUDGET_EXCEEDED';

  constructor(
    readonly period: string,
    message = `Monthly LLM budget exhausted for ${period}`
  ) {
    super(message);
  }
}

export class CircuitOpenError extends AppError {
  readonly code: ErrorCode = 'CIRCUIT_OPEN';

  constructor(
    readonly circuit: string,
    readonly retryAt: Date | null
  ) {
    super(`Circuit breaker "${circuit}" is open`);
  }
}

export class RateLimitedError extends AppError {
  readonly code: ErrorCode = 'RATE_LIMITED';

  constructor(
    readonly chatId: string,
    readonly retryAfterMs: number
  ) {
    super(`Chat ${chatId} exceeded its request rate`);
  }
}

export class StoreError extends AppError {
  readonly code: ErrorCode = 'STORE_ERROR';

  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`Store operation "${operation}" failed: ${describeError(cause)}`, { cause });
  }
}

/** The caller gave up (client disconnect, shutdown); nothing was recorded. */
export class AbortedError extends AppError {
  readonly code: ErrorCode = 'ABORTED';

  constructor(message = 'Operation aborted') {
    super(message);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatIssues(issues: FieldIssue[]): string {
  if (issues.length === 0) {
    return 'Invalid command';
  }
  return issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
}
