/**
 * Collaboration Core - Error Types
 *
 * Structured error codes shared by the session, document and protocol layers.
 * Recoverable failures are reported through `MutationResult`; `CollabError` is
 * only thrown for caller mistakes that have no boolean form (creating a
 * document without an active session).
 */

export type CollabErrorCode =
  | "ACCESS_DENIED"
  | "NOT_FOUND"
  | "NO_ACTIVE_SESSION"
  | "SESSION_CLOSED"
  | "INVALID_REQUEST";

/** All valid error codes */
export const VALID_ERROR_CODES: readonly CollabErrorCode[] = [
  "ACCESS_DENIED",
  "NOT_FOUND",
  "NO_ACTIVE_SESSION",
  "SESSION_CLOSED",
  "INVALID_REQUEST",
] as const;

type CollabErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export interface CollabErrorJSON {
  name: string;
  code: CollabErrorCode;
  message: string;
  context?: Record<string, unknown>;
}

export class CollabError extends Error {
  readonly code: CollabErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: CollabErrorCode, message: string, options: CollabErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CollabError";
    this.code = code;
    this.context = options.context;
  }

  toJSON(): CollabErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export function isCollabError(value: unknown): value is CollabError {
  return value instanceof CollabError;
}

/** Mutation result - success */
export type MutationSuccess<T> = {
  ok: true;
  value: T;
};

/** Mutation result - failure */
export type MutationFailure = {
  ok: false;
  error: CollabErrorCode;
};

/** Discriminated union for gated mutations */
export type MutationResult<T> = MutationSuccess<T> | MutationFailure;

export function succeed<T>(value: T): MutationSuccess<T> {
  return { ok: true, value };
}

export function fail(error: CollabErrorCode): MutationFailure {
  return { ok: false, error };
}
