import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { TypedConfigModule } from './config/config.module';
import { LoggerModule } from './logger/logger.module';
import { OrdersModule } from './orders/orders.module';
import { ExchangeRateModule } from './exchange-rate/exchange-rate.module';
import { TaxModule } from './tax/tax.module';

@Module({
  imports: [TypedConfigModule, LoggerModule, OrdersModule, ExchangeRateModule, TaxModule],
  controllers: [AppController],
})
export class AppModule {}
