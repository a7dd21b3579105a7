import Decimal from 'decimal.js';

export type CloseDirection = 'close-long' | 'close-short';

// Realized gain/loss of one closing order (or its closing portion),
// dated inside the fiscal year being calculated. Base currency throughout.
export interface TaxEvent {
  symbol: string;
  orderId: string;
  tradeDate: string;
  direction: CloseDirection;
  quantityClosed: Decimal;
  proceeds: Decimal;
  costBasis: Decimal;
  gainLoss: Decimal;          // proceeds − costBasis
  rate: Decimal;              // rate used to settle the closing order
}
