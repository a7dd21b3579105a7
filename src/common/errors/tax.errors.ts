/**
 * Base class for failures raised while replaying a symbol's history.
 *
 * These are returned inside neverthrow Results by the replay engine and
 * recorded against the symbol in the report; they never abort a whole run.
 */
export abstract class TaxDomainError extends Error {
  abstract readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }
}

/**
 * No historical rate exists for (date, currency) and no fallback applies.
 */
export class RateUnavailableError extends TaxDomainError {
  readonly code = 'RATE_UNAVAILABLE';

  constructor(date: string, currency: string, baseCurrency: string) {
    super(`No ${currency}/${baseCurrency} exchange rate available for ${date}`, { date, currency, baseCurrency });
  }
}

/**
 * Fee breakdown is unresolved while the fee policy requires it.
 */
export class FeeDataUnknownError extends TaxDomainError {
  readonly code = 'FEE_DATA_UNKNOWN';

  constructor(orderId: string) {
    super(`Fee data for order ${orderId} is unknown`, { orderId });
  }
}

export class InvalidOrderError extends TaxDomainError {
  readonly code = 'INVALID_ORDER';

  constructor(reason: string, orderId?: string) {
    super(orderId ? `Invalid order ${orderId}: ${reason}` : `Invalid order: ${reason}`, { orderId, reason });
  }
}

/**
 * Sell exceeds the long position while the oversell policy is `reject`.
 */
export class PositionPolicyViolationError extends TaxDomainError {
  readonly code = 'POSITION_POLICY_VIOLATION';

  constructor(symbol: string, held: string, requested: string) {
    super(`${symbol}: cannot sell ${requested}, only holding ${held}`, { symbol, held, requested });
  }
}

export type CostPoolError = InvalidOrderError | PositionPolicyViolationError;

export type SettlementError = RateUnavailableError | FeeDataUnknownError | InvalidOrderError;

export type ReplayError = CostPoolError | SettlementError;
