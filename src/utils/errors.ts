/**
 * Typed failures raised by the feed engine. Each maps to a stable error
 * code so callers can decide between "retry", "restart pagination" and
 * "give up" without inspecting messages.
 */

import { AppError } from '../middleware/errorHandler.js';

/** A named index bucket was never published and has no fallback. */
export class BucketUnavailableError extends AppError {
  constructor(public readonly bucket: string, cause?: unknown) {
    super(503, 'BUCKET_UNAVAILABLE', `Index bucket unavailable: ${bucket}`, true, { bucket });
    if (cause !== undefined) this.cause = cause;
  }
}

/** The shared store behind plans or dedup state could not be reached. */
export class StoreUnavailableError extends AppError {
  constructor(code: string, public readonly operation: string, cause?: unknown) {
    super(503, code, `Shared store unavailable during ${operation}`, true, { operation });
    if (cause !== undefined) this.cause = cause;
  }
}

export class DedupStoreUnavailableError extends StoreUnavailableError {
  constructor(operation: string, cause?: unknown) {
    super('DEDUP_STORE_UNAVAILABLE', operation, cause);
  }
}

export class PlanStoreUnavailableError extends StoreUnavailableError {
  constructor(operation: string, cause?: unknown) {
    super('PLAN_STORE_UNAVAILABLE', operation, cause);
  }
}

export class InvalidCursorError extends AppError {
  constructor(reason: string) {
    super(400, 'INVALID_CURSOR', 'Invalid cursor, restart pagination without a cursor', false, {
      reason,
    });
  }
}

export class ExpiredSessionError extends AppError {
  constructor(public readonly sessionId: string) {
    super(410, 'EXPIRED_SESSION', 'Feed session expired, restart pagination without a cursor');
  }
}

export class SessionOwnershipError extends AppError {
  constructor() {
    super(403, 'SESSION_FORBIDDEN', 'Feed session belongs to another user');
  }
}

/** Lost the create race, and the winning plan disappeared before it could be read. */
export class PlanConflictError extends AppError {
  constructor(public readonly sessionId: string) {
    super(503, 'PLAN_CONFLICT', 'Feed plan could not be resolved, retry the request', true);
  }
}

export class DeadlineExceededError extends AppError {
  constructor(public readonly deadlineMs: number, operation = 'request') {
    super(504, 'DEADLINE_EXCEEDED', `${operation} exceeded ${deadlineMs}ms`, true);
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, label: string) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
