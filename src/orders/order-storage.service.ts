import { Injectable } from '@nestjs/common';
import { compareChronologically, Order, OrderSide, tradeYear } from './entities/order.entity';
import { OrderStore } from './order-store.interface';

// In-memory order history with O(1) idempotency lookups.
// Orders are stored as recorded; readers get copies sorted for replay.
@Injectable()
export class OrderStorageService implements OrderStore {
  private orders: Order[] = [];
  private orderIdIndex: Map<string, Order> = new Map();
  private sequenceIds: Set<number> = new Set();
  private lastSequenceId = 0;

  /** Persists order and indexes by orderId for idempotency */
  saveOrder(order: Order): Order {
    this.orders.push(order);
    this.orderIdIndex.set(order.orderId, order);
    this.sequenceIds.add(order.sequenceId);
    this.lastSequenceId = Math.max(this.lastSequenceId, order.sequenceId);
    return order;
  }

  /** Next sequence number for an order arriving without one */
  nextSequenceId(): number {
    return this.lastSequenceId + 1;
  }

  isSequenceIdTaken(sequenceId: number): boolean {
    return this.sequenceIds.has(sequenceId);
  }

  /** O(1) lookup by broker orderId */
  findOrderByOrderId(orderId: string): Order | undefined {
    return this.orderIdIndex.get(orderId);
  }

  /** Returns all orders in replay order */
  getAllOrders(): Order[] {
    return [...this.orders].sort(compareChronologically);
  }

  getOrderCount(): number {
    return this.orders.length;
  }

  async ordersUntil(symbol: string, yearEnd: string): Promise<Order[]> {
    return this.orders
      .filter((order) => order.symbol === symbol && order.tradeDate <= yearEnd)
      .sort(compareChronologically);
  }

  async symbolsWithSells(year: number): Promise<Set<string>> {
    const symbols = new Set<string>();
    const soldBefore = new Set<string>();
    for (const order of this.getAllOrders()) {
      const orderYear = tradeYear(order.tradeDate);
      if (orderYear > year) {
        break;
      }
      if (orderYear === year && (order.side === OrderSide.SELL || soldBefore.has(order.symbol))) {
        symbols.add(order.symbol);
      }
      if (order.side === OrderSide.SELL) {
        soldBefore.add(order.symbol);
      }
    }
    return symbols;
  }

  /** Clears all orders - test harness only */
  clearAllData(): void {
    this.orders = [];
    this.orderIdIndex.clear();
    this.sequenceIds.clear();
    this.lastSequenceId = 0;
  }
}
