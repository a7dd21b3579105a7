import { BadRequestException, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Order, OrderSide } from './entities/order.entity';
import { CreateOrderDto } from './dto/create-order.dto';
import { OrderResponseDto } from './dto/order-response.dto';
import { OrderStorageService } from './order-storage.service';
import { toDecimal, toPlain } from '../common/utils/decimal.util';

// Order recording with Decimal.js precision.
// History is append-only; cost basis is always rebuilt from it by replay.
@Injectable()
export class OrdersService {
  constructor(private readonly storage: OrderStorageService) {}

  /**
   * Records an executed order.
   * Idempotent - duplicate orderId returns the existing record.
   */
  addOrder(createOrderDto: CreateOrderDto): { order: Order; duplicate: boolean } {
    const existingOrder = this.storage.findOrderByOrderId(createOrderDto.orderId);
    if (existingOrder) {
      return { order: existingOrder, duplicate: true };
    }

    const quantity = toDecimal(createOrderDto.quantity);
    const price = toDecimal(createOrderDto.price);
    if (!quantity.isFinite() || quantity.lte(0)) {
      throw new BadRequestException(`Quantity must be positive, got ${createOrderDto.quantity}`);
    }
    if (!price.isFinite() || price.lt(0)) {
      throw new BadRequestException(`Price cannot be negative, got ${createOrderDto.price}`);
    }

    const sequenceId = createOrderDto.sequenceId ?? this.storage.nextSequenceId();
    if (this.storage.isSequenceIdTaken(sequenceId)) {
      throw new BadRequestException(`Sequence id ${sequenceId} is already taken`);
    }

    const order: Order = {
      id: uuidv4(),
      orderId: createOrderDto.orderId,
      symbol: createOrderDto.symbol.trim().toUpperCase(),
      side: createOrderDto.side,
      quantity,
      price,
      currency: createOrderDto.currency,
      fees: createOrderDto.fees?.map((fee) => ({ name: fee.name, amount: toDecimal(fee.amount) })),
      tradeDate: createOrderDto.tradeDate,
      sequenceId,
      createdAt: new Date(),
    };

    return { order: this.storage.saveOrder(order), duplicate: false };
  }

  /**
   * Order history in replay order, optionally for one symbol.
   * `missingFees` keeps only orders whose fee breakdown is still unknown.
   */
  getOrders(symbol?: string, missingFees = false): Order[] {
    let orders = this.storage.getAllOrders();
    if (symbol) {
      const wanted = symbol.trim().toUpperCase();
      orders = orders.filter((order) => order.symbol === wanted);
    }
    if (missingFees) {
      orders = orders.filter((order) => order.fees === undefined);
    }
    return orders;
  }

  /** Count of buys and sells per calendar year */
  getStatus(): { total: number; byYear: Record<string, { buys: number; sells: number }> } {
    const byYear: Record<string, { buys: number; sells: number }> = {};
    const orders = this.storage.getAllOrders();
    for (const order of orders) {
      const year = order.tradeDate.slice(0, 4);
      const counts = byYear[year] ?? { buys: 0, sells: 0 };
      if (order.side === OrderSide.BUY) {
        counts.buys += 1;
      } else {
        counts.sells += 1;
      }
      byYear[year] = counts;
    }
    return { total: orders.length, byYear };
  }

  toResponse(order: Order): OrderResponseDto {
    return {
      id: order.id,
      orderId: order.orderId,
      symbol: order.symbol,
      side: order.side,
      quantity: toPlain(order.quantity),
      price: toPlain(order.price),
      currency: order.currency,
      fees: order.fees ? order.fees.map((fee) => ({ name: fee.name, amount: toPlain(fee.amount) })) : null,
      tradeDate: order.tradeDate,
      sequenceId: order.sequenceId,
      createdAt: order.createdAt?.toISOString(),
    };
  }

  /** Clears all orders - test harness only */
  clearAll(): void {
    this.storage.clearAllData();
  }
}
