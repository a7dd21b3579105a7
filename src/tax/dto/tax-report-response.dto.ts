import { TaxReport } from '../entities/tax-report.entity';
import { toMoney, toPlain } from '../../common/utils/decimal.util';

// Realized result of one closing order
export interface TaxEventDto {
  orderId: string;
  tradeDate: string;
  direction: string;
  quantityClosed: string;
  rate: string;
  proceeds: string;
  costBasis: string;
  gainLoss: string;
}

export interface SymbolTaxDto {
  symbol: string;
  closedQuantity: string;
  totalProceeds: string;
  totalCost: string;
  gains: string;
  losses: string;
  gainLoss: string;
  openPosition: { quantity: string; totalCost: string; state: string };
  events: TaxEventDto[];
}

// Complete report for one fiscal year, amounts rounded to cents
export interface TaxReportResponseDto {
  year: number;
  baseCurrency: string;
  taxRate: string;
  status: 'complete' | 'partial';
  symbols: SymbolTaxDto[];
  failures: { symbol: string; code: string; message: string }[];
  warnings: { symbol: string; code: string; message: string }[];
  totalProceeds: string;
  totalCost: string;
  totalGains: string;
  totalLosses: string;
  netGainLoss: string;
  taxDue: string;
}

export function toTaxReportResponse(report: TaxReport): TaxReportResponseDto {
  return {
    year: report.year,
    baseCurrency: report.baseCurrency,
    taxRate: toPlain(report.taxRate),
    status: report.status,
    symbols: report.symbols.map((s) => ({
      symbol: s.symbol,
      closedQuantity: toPlain(s.closedQuantity),
      totalProceeds: toMoney(s.totalProceeds),
      totalCost: toMoney(s.totalCost),
      gains: toMoney(s.gains),
      losses: toMoney(s.losses),
      gainLoss: toMoney(s.gainLoss),
      openPosition: {
        quantity: toPlain(s.openPosition.quantity),
        totalCost: toMoney(s.openPosition.totalCost),
        state: s.openPosition.state,
      },
      events: s.events.map((event) => ({
        orderId: event.orderId,
        tradeDate: event.tradeDate,
        direction: event.direction,
        quantityClosed: toPlain(event.quantityClosed),
        rate: toPlain(event.rate),
        proceeds: toMoney(event.proceeds),
        costBasis: toMoney(event.costBasis),
        gainLoss: toMoney(event.gainLoss),
      })),
    })),
    failures: report.failures.map((f) => ({ ...f })),
    warnings: report.warnings.map((w) => ({ ...w })),
    totalProceeds: toMoney(report.totalProceeds),
    totalCost: toMoney(report.totalCost),
    totalGains: toMoney(report.totalGains),
    totalLosses: toMoney(report.totalLosses),
    netGainLoss: toMoney(report.netGainLoss),
    taxDue: toMoney(report.taxDue),
  };
}
