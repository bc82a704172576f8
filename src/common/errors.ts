export type ErrorKind =
  | 'ValidationError'
  | 'ProviderTransientError'
  | 'ProviderFatalError'
  | 'StoreError'
  | 'UnhandledError'
  | 'Cancelled';

/**
 * Base class for the failures the orchestrator knows how to classify.
 * Anything else that reaches an agent boundary is reported as `UnhandledError`.
 */
export abstract class ChatError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ChatError {
  readonly kind = 'ValidationError' as const;
}

/** Timeout, connection failure or rate limiting; safe to retry. */
export class ProviderTransientError extends ChatError {
  readonly kind = 'ProviderTransientError' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Authentication, bad request or malformed response; retrying cannot help. */
export class ProviderFatalError extends ChatError {
  readonly kind = 'ProviderFatalError' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class StoreError extends ChatError {
  readonly kind = 'StoreError' as const;
}

export class CancelledError extends ChatError {
  readonly kind = 'Cancelled' as const;
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof ChatError ? error.kind : 'UnhandledError';
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** HTTP statuses worth another attempt: timeouts, rate limits and server faults. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}
