import * as fs from 'node:fs';
import { err, ok, Result } from 'neverthrow';
import { z } from 'zod';
import { OrdersService } from '../orders/orders.service';
import { OrderSide } from '../orders/entities/order.entity';
import { ExchangeRateService } from '../exchange-rate/exchange-rate.service';
import { isDecimalString } from '../common/utils/decimal.util';

const decimalString = z.union([z.string(), z.number()]).transform(String).refine(isDecimalString, 'must be a decimal');
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');
const currencyCode = z.string().regex(/^[A-Z]{3}$/, 'must be a 3-letter ISO currency code');

const ledgerSchema = z.object({
  orders: z.array(
    z.object({
      orderId: z.string().min(1),
      symbol: z.string().min(1),
      side: z.nativeEnum(OrderSide),
      quantity: decimalString,
      price: decimalString,
      currency: currencyCode,
      fees: z.array(z.object({ name: z.string().min(1), amount: decimalString })).optional(),
      tradeDate: isoDate,
      sequenceId: z.number().int().positive().optional(),
    }),
  ),
  rates: z.array(z.object({ date: isoDate, currency: currencyCode, rate: decimalString })).default([]),
});

export type Ledger = z.infer<typeof ledgerSchema>;

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

/** Validates a ledger document: the orders and rates a calculation runs on. */
export function parseLedger(document: unknown): Result<Ledger, LedgerError> {
  const parsed = ledgerSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    return err(new LedgerError(`Invalid ledger:\n${issues}`));
  }
  return ok(parsed.data);
}

export function readLedgerFile(path: string): Result<Ledger, LedgerError> {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new LedgerError(`Failed to read ledger at ${path}: ${message}`));
  }
  return parseLedger(document);
}

/** Loads rates and then orders, in file order, through the regular services. */
export function importLedger(ledger: Ledger, orders: OrdersService, rates: ExchangeRateService): number {
  rates.saveRates(ledger.rates);
  let recorded = 0;
  for (const order of ledger.orders) {
    const { duplicate } = orders.addOrder(order);
    if (!duplicate) {
      recorded += 1;
    }
  }
  return recorded;
}
