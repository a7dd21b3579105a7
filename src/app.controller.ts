import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { TAX_CONFIG, TaxConfiguration } from './config/config.schema';

@Controller()
export class AppController {
  constructor(@Inject(TAX_CONFIG) private readonly config: TaxConfiguration) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'capital-gains-replay',
      baseCurrency: this.config.baseCurrency,
      brokerConfigured: this.config.credentials !== undefined,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Capital Gains Replay API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        orders: '/orders',
        exchangeRates: '/exchange-rates',
        tax: '/tax/:year',
        summaryCsv: '/tax/:year/summary.csv',
        detailCsv: '/tax/:year/detail.csv',
      },
    };
  }
}
