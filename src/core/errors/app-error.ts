/**
 * Canonical application error: every failure in the system is expressed
 * as an AppError so HTTP, logging, and metrics layers have a single shape.
 */

export const ErrorCode = {
  // Client errors
  BAD_REQUEST: "bad_request",
  NOT_FOUND: "not_found",
  CONFLICT: "conflict",
  VALIDATION: "validation",
  INVALID_IDEMPOTENCY_KEY: "invalid_idempotency_key",
  IDEMPOTENCY_KEY_REUSED: "idempotency_key_reused",
  IDEMPOTENCY_KEY_IN_USE: "idempotency_key_in_use",
  SIGNATURE_INVALID: "signature_invalid",
  // Delivery outcomes: recorded on the delivery row, not returned to producers
  DELIVERY_FAILED: "delivery_failed",
  DELIVERY_EXHAUSTED: "delivery_exhausted",
  // Server errors
  INTERNAL: "internal",
  SERVICE_UNAVAILABLE: "service_unavailable",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  bad_request: 400,
  not_found: 404,
  conflict: 409,
  validation: 422,
  invalid_idempotency_key: 400,
  idempotency_key_reused: 422,
  idempotency_key_in_use: 409,
  signature_invalid: 400,
  delivery_failed: 502,
  delivery_exhausted: 502,
  internal: 500,
  service_unavailable: 503,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause === undefined ? { ...error, details } : { ...error, details, cause };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const badRequest = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.BAD_REQUEST, msg, details);

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const conflict = (msg: string): AppError => appError(ErrorCode.CONFLICT, msg);

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", details);

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);

export const serviceUnavailable = (msg: string): AppError =>
  appError(ErrorCode.SERVICE_UNAVAILABLE, msg);

// ── Idempotency ──

export const invalidIdempotencyKey = (msg: string): AppError =>
  appError(ErrorCode.INVALID_IDEMPOTENCY_KEY, msg);

/** Same key, different request fingerprint. Business logic never runs. */
export const idempotencyKeyReused = (): AppError =>
  appError(
    ErrorCode.IDEMPOTENCY_KEY_REUSED,
    "Idempotency key was already used with different request parameters",
  );

/** Another request holding the same key is still executing. */
export const idempotencyKeyInUse = (): AppError =>
  appError(
    ErrorCode.IDEMPOTENCY_KEY_IN_USE,
    "A request with this idempotency key is already in progress; retry later",
  );

// ── Signatures ──

export const SignatureFailure = {
  MISSING: "missing",
  MALFORMED: "malformed",
  MISMATCH: "mismatch",
  EXPIRED: "expired",
} as const;

export type SignatureFailure = (typeof SignatureFailure)[keyof typeof SignatureFailure];

export const signatureInvalid = (reason: SignatureFailure): AppError =>
  appError(ErrorCode.SIGNATURE_INVALID, "Webhook signature verification failed", { reason });

// ── Delivery ──

export const deliveryFailed = (
  message: string,
  details: { readonly status: number | null; readonly attempt: number },
  cause?: unknown,
): AppError => appError(ErrorCode.DELIVERY_FAILED, message, { ...details }, cause);

export const deliveryExhausted = (attempts: number): AppError =>
  appError(ErrorCode.DELIVERY_EXHAUSTED, `Delivery failed after ${attempts} attempts`, {
    attempts,
  });

/** Render an unknown thrown value as a log-friendly message. */
export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
