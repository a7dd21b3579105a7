import { Module } from '@nestjs/common';
import { OrdersModule } from '../orders/orders.module';
import { ExchangeRateModule } from '../exchange-rate/exchange-rate.module';
import { TaxController } from './tax.controller';
import { TaxCalculatorService } from './tax-calculator.service';
import { ReportExportService } from './report-export.service';

@Module({
  imports: [OrdersModule, ExchangeRateModule], // ORDER_STORE and EXCHANGE_RATE_PROVIDER
  controllers: [TaxController],
  providers: [TaxCalculatorService, ReportExportService],
  exports: [TaxCalculatorService, ReportExportService],
})
export class TaxModule {}
