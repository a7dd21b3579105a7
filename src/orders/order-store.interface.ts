import { Order } from './entities/order.entity';

export const ORDER_STORE = Symbol('ORDER_STORE');

/**
 * Read contract the tax replay needs from order history.
 */
export interface OrderStore {
  /** Every order of `symbol` dated on or before `yearEnd`, ascending by (tradeDate, sequenceId). */
  ordersUntil(symbol: string, yearEnd: string): Promise<Order[]>;

  /**
   * Symbols that can realize a gain in `year`: a sell dated within `year`, or
   * any order dated within `year` on a symbol sold earlier (a possible short close).
   */
  symbolsWithSells(year: number): Promise<Set<string>>;
}
