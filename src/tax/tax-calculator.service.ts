import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { err, ok, Result } from 'neverthrow';
import { InvalidOrderError, RateUnavailableError, ReplayError } from '../common/errors/tax.errors';
import { proportion, sum, ZERO } from '../common/utils/decimal.util';
import { TAX_CONFIG, TaxConfiguration } from '../config/config.schema';
import { EXCHANGE_RATE_PROVIDER, ExchangeRateProvider } from '../exchange-rate/exchange-rate-provider.interface';
import { Logger, LoggerService } from '../logger/logger.service';
import { compareChronologically, Order, OrderSide, tradeYear } from '../orders/entities/order.entity';
import { ORDER_STORE, OrderStore } from '../orders/order-store.interface';
import { CostPool } from './cost-pool';
import { TaxEvent } from './entities/tax-event.entity';
import { ReportWarning, SymbolFailure, SymbolTaxSummary, TaxReport } from './entities/tax-report.entity';
import { RateLookup, SettlementCalculator } from './settlement.calculator';

interface SymbolReplay {
  summary: SymbolTaxSummary;
  warnings: ReportWarning[];
}

/**
 * Replays each symbol's full order history through a fresh weighted-average
 * cost pool and keeps the realized gains/losses dated inside the target year.
 *
 * Every run starts from stored history; nothing carries over between runs.
 * Symbols replay independently, so one symbol failing only marks that symbol.
 */
@Injectable()
export class TaxCalculatorService {
  private readonly logger: Logger;

  constructor(
    @Inject(ORDER_STORE) private readonly orderStore: OrderStore,
    @Inject(EXCHANGE_RATE_PROVIDER) private readonly rateProvider: ExchangeRateProvider,
    @Inject(TAX_CONFIG) private readonly config: TaxConfiguration,
    loggerService: LoggerService,
  ) {
    this.logger = loggerService.getLogger('TaxCalculator');
  }

  async calculate(year: number): Promise<TaxReport> {
    const yearEnd = `${year}-12-31`;
    const symbols = Array.from(await this.orderStore.symbolsWithSells(year)).sort();
    this.logger.info({ year, symbols: symbols.length }, 'Calculating capital gains');

    const outcomes = await Promise.all(
      symbols.map(async (symbol) => {
        const history = await this.orderStore.ordersUntil(symbol, yearEnd);
        const lookup = await this.resolveRates(history);
        return { symbol, result: this.replaySymbol(symbol, history, year, lookup) };
      }),
    );

    const summaries: SymbolTaxSummary[] = [];
    const failures: SymbolFailure[] = [];
    const warnings: ReportWarning[] = [];

    for (const { symbol, result } of outcomes) {
      if (result.isErr()) {
        this.logger.warn({ symbol, code: result.error.code, details: result.error.details }, result.error.message);
        failures.push({ symbol, code: result.error.code, message: result.error.message });
        continue;
      }
      warnings.push(...result.value.warnings);
      if (result.value.summary.events.length > 0) {
        summaries.push(result.value.summary);
      }
    }

    const report = this.aggregate(year, summaries, failures, warnings);
    this.logger.info(
      {
        year,
        netGainLoss: report.netGainLoss.toFixed(),
        taxDue: report.taxDue.toFixed(),
        failed: failures.length,
      },
      'Capital gains calculated',
    );
    return report;
  }

  // Fetches every (date, currency) pair the history needs before the replay,
  // so the replay itself is synchronous and touches no collaborator.
  private async resolveRates(history: Order[]): Promise<RateLookup> {
    const key = (date: string, currency: string) => `${currency}|${date}`;
    const pairs = new Map<string, { date: string; currency: string }>();
    for (const order of history) {
      pairs.set(key(order.tradeDate, order.currency), { date: order.tradeDate, currency: order.currency });
    }

    const resolved = new Map<string, Result<Decimal, RateUnavailableError>>();
    await Promise.all(
      Array.from(pairs.entries()).map(async ([pairKey, { date, currency }]) => {
        resolved.set(pairKey, await this.rateProvider.rate(date, currency));
      }),
    );

    return (date, currency) =>
      resolved.get(key(date, currency)) ?? err(new RateUnavailableError(date, currency, this.config.baseCurrency));
  }

  private replaySymbol(
    symbol: string,
    orders: Order[],
    year: number,
    lookup: RateLookup,
  ): Result<SymbolReplay, ReplayError> {
    // The store hands history over in (tradeDate, sequenceId) order; the
    // replay checks that order rather than imposing its own.
    const seenSequenceIds = new Set<number>();
    for (const [index, order] of orders.entries()) {
      if (order.symbol !== symbol) {
        return err(new InvalidOrderError(`belongs to ${order.symbol}, not ${symbol}`, order.orderId));
      }
      if (seenSequenceIds.has(order.sequenceId)) {
        return err(new InvalidOrderError(`duplicate sequence id ${order.sequenceId}`, order.orderId));
      }
      const previous = index > 0 ? orders[index - 1] : undefined;
      if (previous && compareChronologically(previous, order) > 0) {
        return err(
          new InvalidOrderError(
            `out of sequence: ${order.tradeDate}#${order.sequenceId} follows ${previous.tradeDate}#${previous.sequenceId}`,
            order.orderId,
          ),
        );
      }
      if (tradeYear(order.tradeDate) > year) {
        return err(new InvalidOrderError(`dated ${order.tradeDate}, after the end of ${year}`, order.orderId));
      }
      seenSequenceIds.add(order.sequenceId);
    }

    const pool = new CostPool(symbol, this.config.oversellPolicy);
    const settlement = new SettlementCalculator(lookup, { requireFees: this.config.requireFees });
    const events: TaxEvent[] = [];
    let unknownFees = 0;
    let firstOversell: Order | undefined;

    for (const order of orders) {
      const settled = settlement.settle(order);
      if (settled.isErr()) {
        return err(settled.error);
      }
      const { amount, rate, feesKnown } = settled.value;
      const inYear = tradeYear(order.tradeDate) === year;
      if (!feesKnown && inYear) {
        unknownFees += 1;
      }

      if (order.side === OrderSide.BUY) {
        const fill = pool.buy(order.quantity, amount);
        if (fill.isErr()) {
          return err(fill.error);
        }
        if (fill.value && inYear) {
          const costBasis = proportion(amount, fill.value.quantityClosed, order.quantity);
          events.push({
            symbol,
            orderId: order.orderId,
            tradeDate: order.tradeDate,
            direction: 'close-short',
            quantityClosed: fill.value.quantityClosed,
            proceeds: fill.value.proceedsAtOpen,
            costBasis,
            gainLoss: fill.value.proceedsAtOpen.minus(costBasis),
            rate,
          });
        }
      } else {
        const fill = pool.sell(order.quantity, amount);
        if (fill.isErr()) {
          return err(fill.error);
        }
        if (fill.value && fill.value.openedQuantity.gt(0) && !firstOversell) {
          firstOversell = order;
        }
        if (fill.value && inYear) {
          const proceeds = proportion(amount, fill.value.quantityClosed, order.quantity);
          events.push({
            symbol,
            orderId: order.orderId,
            tradeDate: order.tradeDate,
            direction: 'close-long',
            quantityClosed: fill.value.quantityClosed,
            proceeds,
            costBasis: fill.value.costBasis,
            gainLoss: proceeds.minus(fill.value.costBasis),
            rate,
          });
        }
      }
    }

    const gainLosses = events.map((event) => event.gainLoss);
    const open = pool.snapshot();
    return ok({
      summary: {
        symbol,
        events,
        closedQuantity: sum(events.map((event) => event.quantityClosed)),
        totalProceeds: sum(events.map((event) => event.proceeds)),
        totalCost: sum(events.map((event) => event.costBasis)),
        gains: sum(gainLosses.filter((value) => value.gt(0))),
        losses: sum(gainLosses.filter((value) => value.lt(0))).negated(),
        gainLoss: sum(gainLosses),
        openPosition: { quantity: open.quantity, totalCost: open.totalCost, state: open.state },
      },
      warnings: this.historyWarnings(symbol, orders, firstOversell, unknownFees),
    });
  }

  private historyWarnings(
    symbol: string,
    orders: Order[],
    firstOversell: Order | undefined,
    unknownFees: number,
  ): ReportWarning[] {
    const warnings: ReportWarning[] = [];
    const first = orders[0];
    if (first && first.side === OrderSide.SELL) {
      warnings.push(
        this.config.ordersSince
          ? {
              symbol,
              code: 'INCOMPLETE_HISTORY',
              message: `History starts with a sell on ${first.tradeDate} and orders are only stored since ${this.config.ordersSince}; cost basis may be understated`,
            }
          : {
              symbol,
              code: 'SHORT_OPENED_FROM_FLAT',
              message: `History starts with a sell on ${first.tradeDate}, replayed as a short position`,
            },
      );
    }
    // Selling more than the long holds means buys before the cut-off are missing.
    if (firstOversell && this.config.ordersSince) {
      warnings.push({
        symbol,
        code: 'INCOMPLETE_HISTORY',
        message: `Sell on ${firstOversell.tradeDate} exceeds the long position and orders are only stored since ${this.config.ordersSince}; cost basis may be understated`,
      });
    }
    if (unknownFees > 0) {
      warnings.push({
        symbol,
        code: 'FEES_UNKNOWN',
        message: `${unknownFees} order(s) in the year have no fee data and were settled without fees`,
      });
    }
    return warnings;
  }

  private aggregate(
    year: number,
    symbols: SymbolTaxSummary[],
    failures: SymbolFailure[],
    warnings: ReportWarning[],
  ): TaxReport {
    const netGainLoss = sum(symbols.map((s) => s.gainLoss));
    const taxable = netGainLoss.gt(0) ? netGainLoss : ZERO;
    return {
      year,
      baseCurrency: this.config.baseCurrency,
      taxRate: this.config.taxRate,
      symbols,
      failures,
      warnings,
      totalProceeds: sum(symbols.map((s) => s.totalProceeds)),
      totalCost: sum(symbols.map((s) => s.totalCost)),
      totalGains: sum(symbols.map((s) => s.gains)),
      totalLosses: sum(symbols.map((s) => s.losses)),
      netGainLoss,
      taxDue: taxable.times(this.config.taxRate),
      status: failures.length > 0 ? 'partial' : 'complete',
    };
  }
}
