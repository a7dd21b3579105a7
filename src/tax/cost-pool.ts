import Decimal from 'decimal.js';
import { err, ok, Result } from 'neverthrow';
import { CostPoolError, InvalidOrderError, PositionPolicyViolationError } from '../common/errors/tax.errors';
import { proportion, ZERO } from '../common/utils/decimal.util';
import { OversellPolicy } from '../config/config.schema';

export type PoolState = 'flat' | 'long' | 'short';

// A sell that reduced a long position.
export interface LongCloseFill {
  quantityClosed: Decimal;
  costBasis: Decimal;           // average cost × quantityClosed
  openedQuantity: Decimal;      // remainder that opened a short
}

// A buy that reduced a short position.
export interface ShortCloseFill {
  quantityClosed: Decimal;
  proceedsAtOpen: Decimal;      // average short proceeds × quantityClosed
  openedQuantity: Decimal;      // remainder that opened a long
}

export interface CostPoolSnapshot {
  quantity: Decimal;
  totalCost: Decimal;
  averageCost: Decimal | undefined;
  state: PoolState;
}

/**
 * Weighted-average cost pool for one symbol, in reporting currency.
 *
 * `quantity` is signed (negative = short) and `totalCost` carries the same
 * sign: a long holds what was paid, a short holds (negated) what was received.
 * The average is always `totalCost / quantity` and is never stored.
 *
 * Flat pools hold exactly zero cost.
 */
export class CostPool {
  private quantity: Decimal = ZERO;
  private totalCost: Decimal = ZERO;

  constructor(
    readonly symbol: string,
    private readonly oversellPolicy: OversellPolicy = 'auto-short',
  ) {}

  get state(): PoolState {
    if (this.quantity.isZero()) return 'flat';
    return this.quantity.gt(0) ? 'long' : 'short';
  }

  /** Per-unit cost (long) or proceeds (short); undefined when flat. */
  averageCost(): Decimal | undefined {
    if (this.quantity.isZero()) {
      return undefined;
    }
    return this.totalCost.dividedBy(this.quantity);
  }

  snapshot(): CostPoolSnapshot {
    return {
      quantity: this.quantity,
      totalCost: this.totalCost,
      averageCost: this.averageCost(),
      state: this.state,
    };
  }

  /**
   * Applies a buy of `quantity` units that cost `settledCost` in total.
   *
   * Flat or long: extends the long, no fill.
   * Short: closes up to the short quantity at the average short proceeds; any
   * remainder opens a long with its proportional share of `settledCost`.
   */
  buy(quantity: Decimal, settledCost: Decimal): Result<ShortCloseFill | undefined, CostPoolError> {
    const invalid = this.validate(quantity, settledCost, false);
    if (invalid) {
      return err(invalid);
    }

    if (!this.quantity.lt(0)) {
      this.quantity = this.quantity.plus(quantity);
      this.totalCost = this.totalCost.plus(settledCost);
      return ok(undefined);
    }

    const closed = Decimal.min(quantity, this.quantity.negated());
    const proceedsAtOpen = this.removeShare(closed);

    const remainder = quantity.minus(closed);
    if (remainder.gt(0)) {
      this.quantity = remainder;
      this.totalCost = proportion(settledCost, remainder, quantity);
    }

    return ok({ quantityClosed: closed, proceedsAtOpen, openedQuantity: remainder });
  }

  /**
   * Applies a sell of `quantity` units that brought in `settledProceeds`.
   *
   * Flat or short: extends the short, no fill.
   * Long: closes up to the long quantity at the average cost; any remainder
   * opens a short with its proportional share of `settledProceeds`, unless the
   * oversell policy is `reject`.
   */
  sell(quantity: Decimal, settledProceeds: Decimal): Result<LongCloseFill | undefined, CostPoolError> {
    // Fees can exceed the gross of a near-worthless sale, so proceeds may be
    // negative, but only while closing a long: a short holds C ≤ 0.
    const invalid = this.validate(quantity, settledProceeds, true);
    if (invalid) {
      return err(invalid);
    }

    if (!this.quantity.gt(0)) {
      if (settledProceeds.lt(0)) {
        return err(this.negativeShortProceeds(settledProceeds));
      }
      this.quantity = this.quantity.minus(quantity);
      this.totalCost = this.totalCost.minus(settledProceeds);
      return ok(undefined);
    }

    if (quantity.greaterThan(this.quantity)) {
      if (this.oversellPolicy === 'reject') {
        return err(new PositionPolicyViolationError(this.symbol, this.quantity.toFixed(), quantity.toFixed()));
      }
      // The remainder opens a short with its share of the proceeds.
      if (settledProceeds.lt(0)) {
        return err(this.negativeShortProceeds(settledProceeds));
      }
    }

    const closed = Decimal.min(quantity, this.quantity);
    const costBasis = this.removeShare(closed);

    const remainder = quantity.minus(closed);
    if (remainder.gt(0)) {
      this.quantity = remainder.negated();
      this.totalCost = proportion(settledProceeds, remainder, quantity).negated();
    }

    return ok({ quantityClosed: closed, costBasis, openedQuantity: remainder });
  }

  // Takes `closed` units out at the current average and returns
  // (C / Q) × closed. A full close takes the whole cost so nothing is left behind.
  private removeShare(closed: Decimal): Decimal {
    const isLong = this.quantity.gt(0);
    const share = proportion(this.totalCost, closed, this.quantity.abs());
    this.quantity = isLong ? this.quantity.minus(closed) : this.quantity.plus(closed);
    this.totalCost = this.totalCost.minus(share);
    if (this.quantity.isZero()) {
      this.totalCost = ZERO;
    }
    return isLong ? share : share.negated();
  }

  private negativeShortProceeds(settledProceeds: Decimal): InvalidOrderError {
    return new InvalidOrderError(
      `settled proceeds cannot be negative when opening a short, got ${settledProceeds.toString()}`,
    );
  }

  private validate(quantity: Decimal, amount: Decimal, allowNegative: boolean): InvalidOrderError | undefined {
    if (!quantity.isFinite() || quantity.lte(0)) {
      return new InvalidOrderError(`quantity must be positive, got ${quantity.toString()}`);
    }
    if (!amount.isFinite()) {
      return new InvalidOrderError(`settled amount must be finite, got ${amount.toString()}`);
    }
    if (!allowNegative && amount.lt(0)) {
      return new InvalidOrderError(`settled amount cannot be negative, got ${amount.toString()}`);
    }
    return undefined;
  }
}
