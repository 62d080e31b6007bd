/**
 * Error taxonomy shared by every service.
 *
 * Recoverable conditions travel as `Result` values across component
 * boundaries; the classes below are what ends up inside `err(...)` or, for
 * upstream failures, what adapters throw.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'UPSTREAM_UNAVAILABLE'
  | 'UPSTREAM_ERROR'
  | 'TOOL_BOUND_EXCEEDED'
  | 'VALIDATION';

export class SafehouseError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type NotFoundKind = 'persona' | 'conversation' | 'mission' | 'connection';

export class NotFoundError extends SafehouseError {
  readonly kind: NotFoundKind;
  readonly id: string;

  constructor(kind: NotFoundKind, id: string) {
    super('NOT_FOUND', `${kind} ${id} not found`);
    this.kind = kind;
    this.id = id;
  }
}

/** The backend could not be reached: network failure, timeout, open circuit. */
export class UpstreamUnavailableError extends SafehouseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_UNAVAILABLE', message, options);
  }
}

/** The backend answered, but with an error. */
export class UpstreamError extends SafehouseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_ERROR', message, options);
  }
}

export class ToolBoundExceededError extends SafehouseError {
  readonly limit: number;

  constructor(limit: number) {
    super('TOOL_BOUND_EXCEEDED', `tool call limit of ${limit} per turn exceeded`);
    this.limit = limit;
  }
}

export class ValidationError extends SafehouseError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }
}

export function isSafehouseError(err: unknown): err is SafehouseError {
  return err instanceof SafehouseError;
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type Result<T, E = SafehouseError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
