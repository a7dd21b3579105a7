import { Test, TestingModule } from '@nestjs/testing';
import { TaxController } from './tax.controller';
import { TaxCalculatorService } from './tax-calculator.service';
import { ReportExportService } from './report-export.service';
import { OrderStorageService } from '../orders/order-storage.service';
import { OrdersService } from '../orders/orders.service';
import { ORDER_STORE } from '../orders/order-store.interface';
import { OrderSide } from '../orders/entities/order.entity';
import { ExchangeRateService } from '../exchange-rate/exchange-rate.service';
import { EXCHANGE_RATE_PROVIDER } from '../exchange-rate/exchange-rate-provider.interface';
import { TAX_CONFIG } from '../config/config.schema';
import { loadConfig } from '../config/config.module';
import { LoggerService } from '../logger/logger.service';

describe('TaxController', () => {
  let controller: TaxController;
  let ordersService: OrdersService;
  let rateService: ExchangeRateService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [TaxController],
      providers: [
        OrderStorageService,
        OrdersService,
        { provide: ORDER_STORE, useExisting: OrderStorageService },
        ExchangeRateService,
        { provide: EXCHANGE_RATE_PROVIDER, useExisting: ExchangeRateService },
        { provide: TAX_CONFIG, useValue: loadConfig({ NODE_ENV: 'test' }) },
        LoggerService,
        TaxCalculatorService,
        ReportExportService,
      ],
    }).compile();

    controller = module.get<TaxController>(TaxController);
    ordersService = module.get<OrdersService>(OrdersService);
    rateService = module.get<ExchangeRateService>(ExchangeRateService);

    rateService.saveRate('2024-01-10', 'USD', '7');
    rateService.saveRate('2024-06-10', 'USD', '7.5');
    ordersService.addOrder({
      orderId: 'order-1',
      symbol: 'aapl.us',
      side: OrderSide.BUY,
      quantity: '10',
      price: '100',
      currency: 'USD',
      fees: [{ name: 'commission', amount: '1' }],
      tradeDate: '2024-01-10',
    });
    ordersService.addOrder({
      orderId: 'order-2',
      symbol: 'AAPL.US',
      side: OrderSide.SELL,
      quantity: '4',
      price: '120',
      currency: 'USD',
      fees: [{ name: 'commission', amount: '1' }],
      tradeDate: '2024-06-10',
    });
  });

  afterEach(() => {
    ordersService.clearAll();
    rateService.clearAllRates();
  });

  describe('getReport', () => {
    it('should return the report with amounts rounded to cents', async () => {
      const report = await controller.getReport(2024);

      expect(report.year).toBe(2024);
      expect(report.baseCurrency).toBe('CNY');
      expect(report.status).toBe('complete');
      expect(report.symbols[0].symbol).toBe('AAPL.US');
      expect(report.totalProceeds).toBe('3592.50');
      expect(report.totalCost).toBe('2802.80');
      expect(report.netGainLoss).toBe('789.70');
      expect(report.taxDue).toBe('157.94');
      expect(report.symbols[0].openPosition).toEqual({ quantity: '6', totalCost: '4204.20', state: 'long' });
    });
  });

  describe('getSummaryCsv', () => {
    it('should return the summary table', async () => {
      const csv = await controller.getSummaryCsv(2024);

      expect(csv.split('\n')).toEqual([
        'Symbol,Closed Quantity,Proceeds (CNY),Cost (CNY),Gains (CNY),Losses (CNY),Net (CNY)',
        'AAPL.US,4,3592.50,2802.80,789.70,0.00,789.70',
        'TOTAL,,3592.50,2802.80,789.70,0.00,789.70',
        '',
      ]);
    });
  });

  describe('getDetailCsv', () => {
    it('should return one row per closing order', async () => {
      const csv = await controller.getDetailCsv(2024);

      expect(csv.split('\n')[1]).toBe('order-2,AAPL.US,2024-06-10,close-long,4,7.5,3592.50,2802.80,789.70');
    });
  });
});
