export enum ErrorCode {
  InvalidPayload = 'invalid_payload',
  InvalidConfig = 'invalid_config',
  HedgeNotFound = 'hedge_not_found',
  AccountNotFound = 'account_not_found',
  PairNotFound = 'pair_not_found',
  InvalidHedgeState = 'invalid_hedge_state',
  ReservationFailed = 'reservation_failed',
  NetworkError = 'network_error',
  OrderRejected = 'order_rejected',
  OrderTimeout = 'order_timeout',
  UnwindFailed = 'unwind_failed',
  Internal = 'internal_error',
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

/** Fatal at startup. */
export class ConfigError extends DomainError {
  constructor(readonly issues: string[]) {
    super(ErrorCode.InvalidConfig, 500, `Invalid engine configuration: ${issues.join('; ')}`, { issues });
  }
}

/** Local to one admission attempt; the pair is retried on the next tick. */
export class ReservationError extends DomainError {
  constructor(readonly accountId: string, reason: string) {
    super(ErrorCode.ReservationFailed, 409, `Account ${accountId} cannot be reserved: ${reason}`, { accountId, reason });
  }
}

export class NetworkError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.NetworkError, 502, message, details);
  }
}

export class OrderRejectedError extends DomainError {
  constructor(readonly reason: string, details?: Record<string, unknown>) {
    super(ErrorCode.OrderRejected, 422, `Order rejected: ${reason}`, { reason, ...details });
  }
}

export class OrderTimeoutError extends DomainError {
  constructor(readonly orderRef: string, readonly pendingMs: number) {
    super(ErrorCode.OrderTimeout, 504, `Order ${orderRef} still pending after ${pendingMs}ms`, { orderRef, pendingMs });
  }
}

/** The account keeps an exposed position and is locked until an operator intervenes. */
export class UnwindFailedError extends DomainError {
  constructor(readonly hedgeId: string, readonly accountId: string, readonly attempts: number, reason: string) {
    super(
      ErrorCode.UnwindFailed,
      500,
      `Unwind of hedge ${hedgeId} failed for account ${accountId} after ${attempts} attempts: ${reason}`,
      { hedgeId, accountId, attempts, reason },
    );
  }
}

export interface ErrorEnvelope {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export const toErrorEnvelope = (error: unknown): { statusCode: number; body: ErrorEnvelope } => {
  if (error instanceof DomainError) {
    return {
      statusCode: error.statusCode,
      body: { error: error.code, message: error.message, details: error.details },
    };
  }

  return {
    statusCode: 500,
    body: { error: ErrorCode.Internal, message: error instanceof Error ? error.message : String(error) },
  };
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
