/**
 * Error taxonomy. Every class carries the HTTP status and machine code the error
 * middleware puts on the wire; none of them is process-fatal.
 */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, opts: { status: number; code: string; details?: Record<string, unknown> }) {
    super(message);
    this.name = new.target.name;
    this.status = opts.status;
    this.code = opts.code;
    this.details = opts.details;
  }
}

/** Malformed or out-of-range input the caller can correct. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, code = "VALIDATION_ERROR") {
    super(message, { status: 422, code, details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found", details?: Record<string, unknown>) {
    super(message, { status: 404, code: "NOT_FOUND", details });
  }
}

/** Date-range overlap or a lost write race. */
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { status: 409, code: "CONFLICT", details });
  }
}

/** Listing exists but is not bookable. */
export class UnavailableError extends AppError {
  constructor(message = "Listing is not available for booking", details?: Record<string, unknown>) {
    super(message, { status: 409, code: "LISTING_UNAVAILABLE", details });
  }
}

/** Cancellation window violated. */
export class PolicyError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { status: 403, code: "CANCELLATION_WINDOW_CLOSED", details });
  }
}

/** Payment processor unreachable or answered with an error. */
export class GatewayError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { status: 502, code: "GATEWAY_ERROR", details });
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super(message, { status: 403, code: "FORBIDDEN" });
  }
}
