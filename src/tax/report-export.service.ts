import { Injectable } from '@nestjs/common';
import { stringify } from 'csv-stringify/sync';
import { toMoney, toPlain } from '../common/utils/decimal.util';
import { TaxReport } from './entities/tax-report.entity';

export type ReportRow = Record<string, string>;

// Tabular rendering of a report for filing: one row per symbol plus TOTAL,
// and one detail row per taxable event.
@Injectable()
export class ReportExportService {
  summaryRows(report: TaxReport): ReportRow[] {
    const ccy = report.baseCurrency;
    const rows: ReportRow[] = report.symbols.map((s) => ({
      Symbol: s.symbol,
      'Closed Quantity': toPlain(s.closedQuantity),
      [`Proceeds (${ccy})`]: toMoney(s.totalProceeds),
      [`Cost (${ccy})`]: toMoney(s.totalCost),
      [`Gains (${ccy})`]: toMoney(s.gains),
      [`Losses (${ccy})`]: toMoney(s.losses),
      [`Net (${ccy})`]: toMoney(s.gainLoss),
    }));
    rows.push({
      Symbol: 'TOTAL',
      'Closed Quantity': '',
      [`Proceeds (${ccy})`]: toMoney(report.totalProceeds),
      [`Cost (${ccy})`]: toMoney(report.totalCost),
      [`Gains (${ccy})`]: toMoney(report.totalGains),
      [`Losses (${ccy})`]: toMoney(report.totalLosses),
      [`Net (${ccy})`]: toMoney(report.netGainLoss),
    });
    return rows;
  }

  detailRows(report: TaxReport): ReportRow[] {
    const ccy = report.baseCurrency;
    return report.symbols.flatMap((s) =>
      s.events.map((event) => ({
        'Order ID': event.orderId,
        Symbol: event.symbol,
        Date: event.tradeDate,
        Direction: event.direction,
        Quantity: toPlain(event.quantityClosed),
        Rate: toPlain(event.rate),
        [`Proceeds (${ccy})`]: toMoney(event.proceeds),
        [`Cost Basis (${ccy})`]: toMoney(event.costBasis),
        [`Gain/Loss (${ccy})`]: toMoney(event.gainLoss),
      })),
    );
  }

  summaryCsv(report: TaxReport): string {
    return toCsv(this.summaryRows(report));
  }

  detailCsv(report: TaxReport): string {
    return toCsv(this.detailRows(report));
  }
}

export function toCsv(rows: ReportRow[]): string {
  if (rows.length === 0) {
    return '';
  }
  return stringify(rows, { header: true, columns: Object.keys(rows[0]) });
}
