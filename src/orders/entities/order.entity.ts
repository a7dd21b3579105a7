import Decimal from 'decimal.js';

export enum OrderSide {
  BUY = 'buy',
  SELL = 'sell',
}

// One line of a broker fee breakdown, in the order's currency.
export interface FeeItem {
  name: string;
  amount: Decimal;
}

// Executed order as recorded from the broker. Immutable once stored.
// fees: undefined = not yet resolved, [] = known to be free.
export interface Order {
  id: string;                 // internal UUID
  orderId: string;            // broker order ID (idempotency key)
  symbol: string;             // AAPL.US, 700.HK, AAPL260116C210000.US
  side: OrderSide;
  quantity: Decimal;
  price: Decimal;             // per unit (per contract for options), trade currency
  currency: string;           // ISO code of price and fees
  fees?: FeeItem[];
  tradeDate: string;          // YYYY-MM-DD
  sequenceId: number;         // tie-break within a trade date
  createdAt?: Date;
}

/** Calendar year of a YYYY-MM-DD trade date. */
export function tradeYear(tradeDate: string): number {
  return Number(tradeDate.slice(0, 4));
}

/** Ascending (tradeDate, sequenceId); the order replay must follow. */
export function compareChronologically(a: Order, b: Order): number {
  if (a.tradeDate !== b.tradeDate) {
    return a.tradeDate < b.tradeDate ? -1 : 1;
  }
  return a.sequenceId - b.sequenceId;
}
