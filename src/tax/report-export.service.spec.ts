import Decimal from 'decimal.js';
import { ReportExportService, toCsv } from './report-export.service';
import { TaxReport } from './entities/tax-report.entity';
import { ZERO } from '../common/utils/decimal.util';

describe('ReportExportService', () => {
  let service: ReportExportService;

  const emptyReport = (): TaxReport => ({
    year: 2024,
    baseCurrency: 'CNY',
    taxRate: new Decimal('0.2'),
    symbols: [],
    failures: [],
    warnings: [],
    totalProceeds: ZERO,
    totalCost: ZERO,
    totalGains: ZERO,
    totalLosses: ZERO,
    netGainLoss: ZERO,
    taxDue: ZERO,
    status: 'complete',
  });

  const reportWithOneSale = (): TaxReport => ({
    ...emptyReport(),
    symbols: [
      {
        symbol: 'AAPL.US',
        events: [
          {
            symbol: 'AAPL.US',
            orderId: 'ord-1',
            tradeDate: '2024-05-01',
            direction: 'close-long',
            quantityClosed: new Decimal(50),
            proceeds: new Decimal(10500),
            costBasis: new Decimal('5250.004'),
            gainLoss: new Decimal('5249.996'),
            rate: new Decimal('7.1'),
          },
        ],
        closedQuantity: new Decimal(50),
        totalProceeds: new Decimal(10500),
        totalCost: new Decimal('5250.004'),
        gains: new Decimal('5249.996'),
        losses: ZERO,
        gainLoss: new Decimal('5249.996'),
        openPosition: { quantity: new Decimal(150), totalCost: new Decimal(15750), state: 'long' },
      },
    ],
    totalProceeds: new Decimal(10500),
    totalCost: new Decimal('5250.004'),
    totalGains: new Decimal('5249.996'),
    netGainLoss: new Decimal('5249.996'),
    taxDue: new Decimal('1049.9992'),
  });

  beforeEach(() => {
    service = new ReportExportService();
  });

  describe('summaryCsv', () => {
    it('should write one row per symbol and a TOTAL row in base currency', () => {
      expect(service.summaryCsv(reportWithOneSale())).toBe(
        'Symbol,Closed Quantity,Proceeds (CNY),Cost (CNY),Gains (CNY),Losses (CNY),Net (CNY)\n' +
          'AAPL.US,50,10500.00,5250.00,5250.00,0.00,5250.00\n' +
          'TOTAL,,10500.00,5250.00,5250.00,0.00,5250.00\n',
      );
    });

    it('should still write the TOTAL row for an empty year', () => {
      expect(service.summaryCsv(emptyReport())).toBe(
        'Symbol,Closed Quantity,Proceeds (CNY),Cost (CNY),Gains (CNY),Losses (CNY),Net (CNY)\n' +
          'TOTAL,,0.00,0.00,0.00,0.00,0.00\n',
      );
    });
  });

  describe('detailCsv', () => {
    it('should write one row per taxable event', () => {
      expect(service.detailCsv(reportWithOneSale())).toBe(
        'Order ID,Symbol,Date,Direction,Quantity,Rate,Proceeds (CNY),Cost Basis (CNY),Gain/Loss (CNY)\n' +
          'ord-1,AAPL.US,2024-05-01,close-long,50,7.1,10500.00,5250.00,5250.00\n',
      );
    });

    it('should be empty when nothing was realized', () => {
      expect(service.detailCsv(emptyReport())).toBe('');
    });
  });

  describe('toCsv', () => {
    it('should quote cells holding separators or quotes', () => {
      expect(toCsv([{ a: 'x,y', b: 'say "hi"', c: 'plain' }])).toBe('a,b,c\n"x,y","say ""hi""",plain\n');
    });

    it('should take the columns from the first row', () => {
      expect(toCsv([{ a: '1', b: '2' }, { b: '4', a: '3' }])).toBe('a,b\n1,2\n3,4\n');
    });
  });
});
