import Decimal from 'decimal.js';
import { TaxEvent } from './tax-event.entity';
import { PoolState } from '../cost-pool';

export type WarningCode = 'INCOMPLETE_HISTORY' | 'SHORT_OPENED_FROM_FLAT' | 'FEES_UNKNOWN';

export interface ReportWarning {
  symbol: string;
  code: WarningCode;
  message: string;
}

// Position left in the pool at year end; next year's replay rebuilds it.
export interface OpenPosition {
  quantity: Decimal;
  totalCost: Decimal;
  state: PoolState;
}

export interface SymbolTaxSummary {
  symbol: string;
  events: TaxEvent[];
  closedQuantity: Decimal;
  totalProceeds: Decimal;
  totalCost: Decimal;
  gains: Decimal;             // sum of positive events
  losses: Decimal;            // sum of negative events, as a positive amount
  gainLoss: Decimal;
  openPosition: OpenPosition;
}

export interface SymbolFailure {
  symbol: string;
  code: string;
  message: string;
}

export interface TaxReport {
  year: number;
  baseCurrency: string;
  taxRate: Decimal;
  symbols: SymbolTaxSummary[];
  failures: SymbolFailure[];
  warnings: ReportWarning[];
  totalProceeds: Decimal;
  totalCost: Decimal;
  totalGains: Decimal;
  totalLosses: Decimal;
  netGainLoss: Decimal;
  taxDue: Decimal;            // max(0, netGainLoss) × taxRate
  status: 'complete' | 'partial';
}
