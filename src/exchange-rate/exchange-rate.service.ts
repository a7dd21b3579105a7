import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { err, ok, Result } from 'neverthrow';
import { RateUnavailableError } from '../common/errors/tax.errors';
import { toDecimal } from '../common/utils/decimal.util';
import { TAX_CONFIG, TaxConfiguration } from '../config/config.schema';
import { ExchangeRateProvider } from './exchange-rate-provider.interface';

export interface StoredRate {
  date: string;
  currency: string;
  rate: Decimal;
}

/**
 * Historical exchange rates into the base currency, keyed by (date, currency).
 * Rates are recorded through the API or the CLI ledger; nothing is fetched live.
 *
 * Lookup order: base currency (1), exact date, nearest stored date within
 * `rateLookbackDays` (earlier wins a tie), configured static fallback.
 */
@Injectable()
export class ExchangeRateService implements ExchangeRateProvider {
  private rates: Map<string, Decimal> = new Map();

  constructor(@Inject(TAX_CONFIG) private readonly config: TaxConfiguration) {}

  /**
   * Records the rate for one (date, currency) pair, replacing any previous value.
   * @throws Error if rate <= 0
   */
  saveRate(date: string, currency: string, rate: Decimal | string | number): StoredRate {
    const value = toDecimal(rate);
    if (!value.isFinite() || value.lte(0)) {
      throw new Error(`Rate must be positive, got ${value.toString()} for ${currency} on ${date}`);
    }
    const code = currency.toUpperCase();
    this.rates.set(this.key(date, code), value);
    return { date, currency: code, rate: value };
  }

  /**
   * Batch insert - validates all before applying.
   * @throws Error on first invalid rate
   */
  saveRates(entries: { date: string; currency: string; rate: Decimal | string | number }[]): void {
    entries.forEach(({ date, currency, rate }) => {
      const value = toDecimal(rate);
      if (!value.isFinite() || value.lte(0)) {
        throw new Error(`Rate must be positive, got ${value.toString()} for ${currency} on ${date}`);
      }
    });
    entries.forEach(({ date, currency, rate }) => this.saveRate(date, currency, rate));
  }

  /** Exact stored value, no fallback */
  getStoredRate(date: string, currency: string): Decimal | undefined {
    return this.rates.get(this.key(date, currency.toUpperCase()));
  }

  /** Stored rates sorted by currency then date, optionally for one currency */
  getAllRates(currency?: string): StoredRate[] {
    const wanted = currency?.toUpperCase();
    return Array.from(this.rates.entries())
      .map(([key, rate]) => {
        const [code, date] = key.split('|');
        return { date, currency: code, rate };
      })
      .filter((entry) => !wanted || entry.currency === wanted)
      .sort((a, b) => a.currency.localeCompare(b.currency) || a.date.localeCompare(b.date));
  }

  async rate(date: string, currency: string): Promise<Result<Decimal, RateUnavailableError>> {
    const code = currency.toUpperCase();
    if (code === this.config.baseCurrency) {
      return ok(new Decimal(1));
    }

    const exact = this.rates.get(this.key(date, code));
    if (exact) {
      return ok(exact);
    }

    for (let offset = 1; offset <= this.config.rateLookbackDays; offset++) {
      for (const direction of [-1, 1]) {
        const nearby = this.rates.get(this.key(shiftDate(date, offset * direction), code));
        if (nearby) {
          return ok(nearby);
        }
      }
    }

    const fallback = this.config.fallbackRates[code];
    if (fallback) {
      return ok(fallback);
    }

    return err(new RateUnavailableError(date, code, this.config.baseCurrency));
  }

  /** Removes every stored rate - test harness only */
  clearAllRates(): void {
    this.rates.clear();
  }

  private key(date: string, currency: string): string {
    return `${currency}|${date}`;
  }
}

/** Calendar arithmetic on YYYY-MM-DD strings in UTC. */
export function shiftDate(date: string, days: number): string {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}
