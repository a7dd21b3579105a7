import Decimal from 'decimal.js';
import { Result } from 'neverthrow';
import { RateUnavailableError } from '../common/errors/tax.errors';

export const EXCHANGE_RATE_PROVIDER = Symbol('EXCHANGE_RATE_PROVIDER');

/**
 * Historical conversion into the base reporting currency.
 * Units of base currency per one unit of `currency` on `date` (YYYY-MM-DD).
 */
export interface ExchangeRateProvider {
  rate(date: string, currency: string): Promise<Result<Decimal, RateUnavailableError>>;
}
