import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ExchangeRateService } from './exchange-rate.service';
import { BulkRecordRatesDto, RecordRateDto } from './dto/record-rate.dto';
import { toPlain } from '../common/utils/decimal.util';

interface RateResponse {
  date: string;
  currency: string;
  rate: string;
}

@Controller('exchange-rates')
export class ExchangeRateController {
  constructor(private readonly exchangeRateService: ExchangeRateService) {}

  /**
   * Records one historical rate.
   *
   * POST /exchange-rates
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  recordRate(@Body() dto: RecordRateDto): RateResponse {
    try {
      const stored = this.exchangeRateService.saveRate(dto.date, dto.currency, dto.rate);
      return { date: stored.date, currency: stored.currency, rate: toPlain(stored.rate) };
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Records many historical rates; all-or-nothing.
   *
   * POST /exchange-rates/bulk
   */
  @Post('bulk')
  @HttpCode(HttpStatus.CREATED)
  recordRates(@Body() dto: BulkRecordRatesDto) {
    try {
      this.exchangeRateService.saveRates(dto.rates);
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
    return { message: 'Exchange rates recorded', count: dto.rates.length };
  }

  /**
   * Lists stored rates.
   *
   * GET /exchange-rates?currency=USD
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getRates(@Query('currency') currency?: string): RateResponse[] {
    return this.exchangeRateService.getAllRates(currency).map((entry) => ({
      date: entry.date,
      currency: entry.currency,
      rate: toPlain(entry.rate),
    }));
  }
}
