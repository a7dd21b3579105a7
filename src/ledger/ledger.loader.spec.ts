import * as path from 'node:path';
import { importLedger, parseLedger, readLedgerFile } from './ledger.loader';
import { OrdersService } from '../orders/orders.service';
import { OrderStorageService } from '../orders/order-storage.service';
import { ExchangeRateService } from '../exchange-rate/exchange-rate.service';
import { loadConfig } from '../config/config.module';

const SAMPLE_LEDGER = path.join(__dirname, 'fixtures', 'sample-ledger.json');

describe('parseLedger', () => {
  it('should accept numeric quantities and default rates to empty', () => {
    const ledger = parseLedger({
      orders: [
        {
          orderId: 'order-1',
          symbol: 'AAPL.US',
          side: 'buy',
          quantity: 10,
          price: 100.5,
          currency: 'USD',
          tradeDate: '2024-01-10',
        },
      ],
    })._unsafeUnwrap();

    expect(ledger.orders[0].quantity).toBe('10');
    expect(ledger.orders[0].price).toBe('100.5');
    expect(ledger.orders[0].fees).toBeUndefined();
    expect(ledger.rates).toEqual([]);
  });

  it('should report the path of each invalid field', () => {
    const error = parseLedger({
      orders: [{ orderId: 'order-1', symbol: 'AAPL.US', side: 'hold', quantity: '1', price: '1', currency: 'USD', tradeDate: '2024-01-10' }],
    })._unsafeUnwrapErr();

    expect(error.message).toContain('  - orders.0.side: ');
  });

  it('should reject a document without orders', () => {
    expect(parseLedger({ rates: [] }).isErr()).toBe(true);
  });
});

describe('readLedgerFile', () => {
  it('should read and validate a ledger file', () => {
    const ledger = readLedgerFile(SAMPLE_LEDGER)._unsafeUnwrap();

    expect(ledger.orders.map((o) => o.orderId)).toEqual(['order-1', 'order-2']);
    expect(ledger.rates).toHaveLength(2);
  });

  it('should fail on a missing file', () => {
    const error = readLedgerFile(path.join(__dirname, 'fixtures', 'missing.json'))._unsafeUnwrapErr();

    expect(error.message).toContain('Failed to read ledger at');
  });
});

describe('importLedger', () => {
  let ordersService: OrdersService;
  let rateService: ExchangeRateService;

  beforeEach(() => {
    ordersService = new OrdersService(new OrderStorageService());
    rateService = new ExchangeRateService(loadConfig({ NODE_ENV: 'test' }));
  });

  it('should record rates and orders through the services', () => {
    const recorded = importLedger(readLedgerFile(SAMPLE_LEDGER)._unsafeUnwrap(), ordersService, rateService);

    expect(recorded).toBe(2);
    expect(rateService.getStoredRate('2024-06-10', 'USD')?.toString()).toBe('7.5');
    expect(ordersService.getOrders().map((o) => o.sequenceId)).toEqual([1, 2]);
  });

  it('should skip orders already recorded', () => {
    const ledger = readLedgerFile(SAMPLE_LEDGER)._unsafeUnwrap();
    importLedger(ledger, ordersService, rateService);

    expect(importLedger(ledger, ordersService, rateService)).toBe(0);
    expect(ordersService.getOrders()).toHaveLength(2);
  });
});
