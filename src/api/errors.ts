// ============================================================================
// Error Classifier
// ============================================================================
// Maps transport outcomes and HTTP statuses onto the closed set of error
// kinds the host sees. Every failure leaves an operation as an OperationError.
// ============================================================================

export type OperationErrorKind =
  | 'NotFound'
  | 'Unauthorized'
  | 'RateLimited'
  | 'RemoteFault'
  | 'Invalid'
  | 'Unreachable'
  | 'Configuration';

/** Finer-grained origin, kept for diagnostics only. */
export type OperationErrorCause = 'ValidationFailure' | 'Timeout' | 'Cancelled';

export interface OperationErrorOptions {
  status?: number;
  cause?: OperationErrorCause;
  /** Offending field path for validation failures */
  path?: string;
  retryAfterSeconds?: number;
}

export class OperationError extends Error {
  readonly kind: OperationErrorKind;
  readonly status?: number;
  readonly detail?: OperationErrorCause;
  readonly path?: string;
  readonly retryAfterSeconds?: number;

  constructor(kind: OperationErrorKind, message: string, options: OperationErrorOptions = {}) {
    super(message);
    this.name = 'OperationError';
    this.kind = kind;
    this.status = options.status;
    this.detail = options.cause;
    this.path = options.path;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }

  /** Structured payload returned to the host. */
  toPayload(): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      success: false,
      kind: this.kind,
      error: this.message,
    };
    if (this.status !== undefined) payload.status = this.status;
    if (this.detail) payload.cause = this.detail;
    if (this.path) payload.path = this.path;
    if (this.retryAfterSeconds !== undefined) payload.retry_after_seconds = this.retryAfterSeconds;
    return payload;
  }
}

export function invalid(message: string): OperationError {
  return new OperationError('Invalid', message);
}

// ============================================================================
// Status Classification
// ============================================================================

export function classifyStatus(status: number): OperationErrorKind {
  if (status === 401 || status === 403) return 'Unauthorized';
  if (status === 404) return 'NotFound';
  if (status === 429) return 'RateLimited';
  if (status === 400 || status === 422) return 'Invalid';
  return 'RemoteFault';
}

const STATUS_MESSAGES: Record<OperationErrorKind, string> = {
  Unauthorized: 'The Qualer API rejected the credential',
  NotFound: 'The requested record does not exist',
  RateLimited: 'The Qualer API is rate limiting requests; try again later',
  Invalid: 'The Qualer API rejected the request parameters',
  RemoteFault: 'The Qualer API failed to handle the request',
  Unreachable: 'The Qualer API could not be reached',
  Configuration: 'The Qualer client is not configured',
};

/**
 * Build the error for a non-2xx response. `subject` names what was asked for,
 * e.g. "Service order 42".
 */
export function errorForStatus(
  status: number,
  options: { subject?: string; remoteMessage?: string; retryAfter?: string | null } = {}
): OperationError {
  const kind = classifyStatus(status);
  let message = kind === 'NotFound' && options.subject
    ? `${options.subject} not found`
    : STATUS_MESSAGES[kind];

  if (options.remoteMessage) {
    message += `: ${truncate(options.remoteMessage, 200)}`;
  }

  const retryAfterSeconds = kind === 'RateLimited' ? parseRetryAfter(options.retryAfter) : undefined;
  return new OperationError(kind, `${message} (HTTP ${status})`, { status, retryAfterSeconds });
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.ceil(seconds);
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - Date.now()) / 1000));
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

// ============================================================================
// Transport Failure Classification
// ============================================================================

function errorName(err: unknown): string | undefined {
  if (err instanceof Error) return err.name;
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
    return err.name;
  }
  return undefined;
}

/**
 * Classify a failure thrown while sending a request. Already-classified
 * errors pass through unchanged.
 */
export function classifyTransportFailure(err: unknown, callerAborted = false): OperationError {
  if (err instanceof OperationError) return err;

  if (callerAborted) {
    return new OperationError('Unreachable', 'The request was cancelled before the Qualer API responded', {
      cause: 'Cancelled',
    });
  }

  const name = errorName(err);
  if (name === 'TimeoutError' || name === 'AbortError') {
    return new OperationError('Unreachable', 'The Qualer API did not respond in time', {
      cause: 'Timeout',
    });
  }

  return new OperationError('Unreachable', STATUS_MESSAGES.Unreachable);
}

/** Last-resort mapping for anything thrown inside an operation. */
export function toOperationError(err: unknown): OperationError {
  if (err instanceof OperationError) return err;
  return new OperationError('RemoteFault', 'Unexpected failure while handling the Qualer response');
}

/** Strip a secret from text that may have been echoed back by the remote. */
export function redact(text: string, secret: string): string {
  if (!secret) return text;
  return text.split(secret).join('[redacted]');
}
