import { Module } from '@nestjs/common';
import { OrdersController } from './orders.controller';
import { OrdersService } from './orders.service';
import { OrderStorageService } from './order-storage.service';
import { ORDER_STORE } from './order-store.interface';

@Module({
  controllers: [OrdersController],
  providers: [
    OrderStorageService,
    OrdersService,
    { provide: ORDER_STORE, useExisting: OrderStorageService },
  ],
  exports: [OrdersService, ORDER_STORE],
})
export class OrdersModule {}
