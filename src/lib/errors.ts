/**
 * Error classes for contact lookup runs.
 * Every error carries a stable code so logs and progress events can be filtered.
 */

export class LookupError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

// Per-address failures: the orchestrator maps these to ERROR and moves on

export class TokenNotFoundError extends LookupError {
  constructor(email: string) {
    super(`No recipient token rendered for ${email}`, 'TOKEN_NOT_FOUND', { email });
  }
}

export class CardTimeoutError extends LookupError {
  constructor(email: string, timeoutMs: number) {
    super(`Contact card for ${email} not visible after ${timeoutMs}ms`, 'CARD_TIMEOUT', {
      email,
      timeoutMs,
    });
  }
}

export class ExtractionError extends LookupError {
  constructor(email: string, cause?: unknown) {
    super(`Could not read the contact card for ${email}`, 'EXTRACTION_FAILED', { email }, cause);
  }
}

// Batch-level failure: every unresolved address of the batch becomes ERROR

export class SurfaceSetupError extends LookupError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SURFACE_SETUP_FAILED', undefined, cause);
  }
}

// Fatal preconditions: raised before any batch work

export class SessionInvalidError extends LookupError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'SESSION_INVALID', context, cause);
  }
}

export class ConfigInvalidError extends LookupError {
  public readonly fieldErrors: Record<string, string[]>;

  constructor(message: string, fieldErrors: Record<string, string[]> = {}) {
    super(message, 'CONFIG_INVALID', { fieldErrors });
    this.fieldErrors = fieldErrors;
  }
}

export function isLookupError(err: unknown): err is LookupError {
  return err instanceof LookupError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
