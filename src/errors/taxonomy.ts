export enum ErrorCode {
  InvalidPayload = 'invalid_payload',
  InvalidQuote = 'invalid_quote',
  PositionNotFound = 'position_not_found',
  PositionBusy = 'position_busy',
  InvalidTransition = 'invalid_transition',
  StaleData = 'stale_data',
  SlippageExceeded = 'slippage_exceeded',
  PartialFillTimeout = 'partial_fill_timeout',
  LegMismatch = 'leg_mismatch',
  RiskLimitBreached = 'risk_limit_breached',
  PortUnavailable = 'port_unavailable',
  OrderRejected = 'order_rejected',
  InvariantViolation = 'invariant_violation',
  InternalError = 'internal_error',
}

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export class DomainError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly statusCode: number,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class StaleDataError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.StaleData, 503, message, details);
  }
}

export class SlippageExceededError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.SlippageExceeded, 409, message, details);
  }
}

export class PartialFillTimeoutError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.PartialFillTimeout, 504, message, details);
  }
}

/** One leg of a paired order filled while the other did not. */
export class LegMismatchError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.LegMismatch, 502, message, details);
  }
}

export class RiskLimitBreachedError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.RiskLimitBreached, 409, message, details);
  }
}

export class PortUnavailableError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.PortUnavailable, 503, message, details);
  }
}

export class OrderRejectedError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.OrderRejected, 502, message, details);
  }
}

/** Fatal: trading stops until an operator resumes it. */
export class InvariantViolationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.InvariantViolation, 500, message, details);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope => ({
  error: {
    code,
    message,
    ...(details ? { details } : {}),
  },
});

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const errorCodeOf = (error: unknown): ErrorCode =>
  (error instanceof DomainError ? error.code : ErrorCode.InternalError);
