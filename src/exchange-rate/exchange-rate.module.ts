import { Module } from '@nestjs/common';
import { ExchangeRateController } from './exchange-rate.controller';
import { ExchangeRateService } from './exchange-rate.service';
import { EXCHANGE_RATE_PROVIDER } from './exchange-rate-provider.interface';

@Module({
  controllers: [ExchangeRateController],
  providers: [ExchangeRateService, { provide: EXCHANGE_RATE_PROVIDER, useExisting: ExchangeRateService }],
  exports: [ExchangeRateService, EXCHANGE_RATE_PROVIDER],
})
export class ExchangeRateModule {}
