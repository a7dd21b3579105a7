import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { OrdersService } from './orders.service';
import { CreateOrderDto } from './dto/create-order.dto';
import { OrderResponseDto, RecordOrderResponseDto } from './dto/order-response.dto';

@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  /**
   * Records an executed broker order.
   * Idempotent - duplicate orderId returns 201 with the existing record.
   *
   * POST /orders
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  addOrder(@Body() createOrderDto: CreateOrderDto): RecordOrderResponseDto {
    const { order, duplicate } = this.ordersService.addOrder(createOrderDto);
    return {
      ...this.ordersService.toResponse(order),
      message: duplicate ? 'Order already recorded (idempotent)' : 'Order recorded successfully',
      duplicate,
    };
  }

  /**
   * Returns order history in replay order.
   * `missingFees=true` lists the orders still waiting for a fee breakdown.
   *
   * GET /orders?symbol=AAPL.US&missingFees=true
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getOrders(@Query('symbol') symbol?: string, @Query('missingFees') missingFees?: string): OrderResponseDto[] {
    return this.ordersService
      .getOrders(symbol, missingFees === 'true')
      .map((order) => this.ordersService.toResponse(order));
  }

  /**
   * Order counts per year.
   *
   * GET /orders/status
   */
  @Get('status')
  @HttpCode(HttpStatus.OK)
  getStatus() {
    return this.ordersService.getStatus();
  }
}
