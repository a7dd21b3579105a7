import Decimal from 'decimal.js';
import { err, ok, Result } from 'neverthrow';
import {
  FeeDataUnknownError,
  InvalidOrderError,
  RateUnavailableError,
  SettlementError,
} from '../common/errors/tax.errors';
import { sum, ZERO } from '../common/utils/decimal.util';
import { Order, OrderSide } from '../orders/entities/order.entity';

// Synchronous view of rates resolved before the replay starts.
export type RateLookup = (date: string, currency: string) => Result<Decimal, RateUnavailableError>;

export interface SettlementResult {
  amount: Decimal;         // base currency: cost for a buy, proceeds for a sell
  unitPrice: Decimal;      // base currency, price × multiplier × rate
  rate: Decimal;
  multiplier: number;
  fees: Decimal;           // trade currency
  feesKnown: boolean;
}

export interface SettlementOptions {
  requireFees: boolean;
}

// <ticker><yyMMdd><C|P><strike>.<market>, e.g. AAPL260116C210000.US
const OPTION_SYMBOL = /^[A-Z]+\d{6}[CP]\d+\.[A-Z]+$/;

const OPTION_CONTRACT_SIZE = 100;

/** Contract size implied by the symbol: 100 for listed options, else 1. */
export function contractMultiplier(symbol: string): number {
  return OPTION_SYMBOL.test(symbol) ? OPTION_CONTRACT_SIZE : 1;
}

/**
 * Converts one order into a base-currency amount using the rate of its own
 * trade date. Buys add fees to the cost; sells deduct them from proceeds.
 */
export class SettlementCalculator {
  constructor(
    private readonly lookupRate: RateLookup,
    private readonly options: SettlementOptions,
  ) {}

  settle(order: Order): Result<SettlementResult, SettlementError> {
    switch (order.side) {
      case OrderSide.BUY:
        return this.settleBuy(order);
      case OrderSide.SELL:
        return this.settleSell(order);
      default:
        return err(new InvalidOrderError(`unknown side "${String(order.side)}"`, order.orderId));
    }
  }

  /** (gross + fees) × rate */
  settleBuy(order: Order): Result<SettlementResult, SettlementError> {
    return this.compute(order, (gross, fees) => gross.plus(fees));
  }

  /** (gross − fees) × rate */
  settleSell(order: Order): Result<SettlementResult, SettlementError> {
    return this.compute(order, (gross, fees) => gross.minus(fees));
  }

  private compute(
    order: Order,
    net: (gross: Decimal, fees: Decimal) => Decimal,
  ): Result<SettlementResult, SettlementError> {
    if (!order.quantity.isFinite() || order.quantity.lte(0)) {
      return err(new InvalidOrderError(`quantity must be positive, got ${order.quantity.toString()}`, order.orderId));
    }
    if (!order.price.isFinite() || order.price.lt(0)) {
      return err(new InvalidOrderError(`price cannot be negative, got ${order.price.toString()}`, order.orderId));
    }
    if (order.fees === undefined && this.options.requireFees) {
      return err(new FeeDataUnknownError(order.orderId));
    }

    const rateResult = this.lookupRate(order.tradeDate, order.currency);
    if (rateResult.isErr()) {
      return err(rateResult.error);
    }
    const rate = rateResult.value;

    const multiplier = contractMultiplier(order.symbol);
    const gross = order.quantity.times(order.price).times(multiplier);
    const fees = order.fees ? sum(order.fees.map((fee) => fee.amount)) : ZERO;

    return ok({
      amount: net(gross, fees).times(rate),
      unitPrice: order.price.times(multiplier).times(rate),
      rate,
      multiplier,
      fees,
      feesKnown: order.fees !== undefined,
    });
  }
}
