import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { ExchangeRateController } from './exchange-rate.controller';
import { ExchangeRateService } from './exchange-rate.service';
import { TAX_CONFIG } from '../config/config.schema';
import { loadConfig } from '../config/config.module';

describe('ExchangeRateController', () => {
  let controller: ExchangeRateController;
  let service: ExchangeRateService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ExchangeRateController],
      providers: [ExchangeRateService, { provide: TAX_CONFIG, useValue: loadConfig({ NODE_ENV: 'test' }) }],
    }).compile();

    controller = module.get<ExchangeRateController>(ExchangeRateController);
    service = module.get<ExchangeRateService>(ExchangeRateService);
  });

  afterEach(() => {
    service.clearAllRates();
  });

  describe('recordRate', () => {
    it('should store the rate and echo it back', () => {
      expect(controller.recordRate({ date: '2024-01-10', currency: 'USD', rate: '7.10' })).toEqual({
        date: '2024-01-10',
        currency: 'USD',
        rate: '7.1',
      });
    });

    it('should turn a non-positive rate into a bad request', () => {
      expect(() => controller.recordRate({ date: '2024-01-10', currency: 'USD', rate: '-7' })).toThrow(
        BadRequestException,
      );
    });
  });

  describe('recordRates', () => {
    it('should store a batch and report its size', () => {
      const result = controller.recordRates({
        rates: [
          { date: '2024-01-10', currency: 'USD', rate: '7.1' },
          { date: '2024-01-10', currency: 'HKD', rate: '0.91' },
        ],
      });

      expect(result).toEqual({ message: 'Exchange rates recorded', count: 2 });
      expect(controller.getRates().map((r) => r.currency)).toEqual(['HKD', 'USD']);
    });

    it('should reject the whole batch when one rate is invalid', () => {
      expect(() =>
        controller.recordRates({
          rates: [
            { date: '2024-01-10', currency: 'USD', rate: '7.1' },
            { date: '2024-01-11', currency: 'USD', rate: '0' },
          ],
        }),
      ).toThrow(BadRequestException);
      expect(controller.getRates()).toHaveLength(0);
    });
  });

  describe('getRates', () => {
    it('should filter by currency', () => {
      service.saveRate('2024-01-10', 'USD', '7.1');
      service.saveRate('2024-01-10', 'HKD', '0.91');

      expect(controller.getRates('USD')).toEqual([{ date: '2024-01-10', currency: 'USD', rate: '7.1' }]);
    });
  });
});
