import Decimal from 'decimal.js';
import { err, ok, Result } from 'neverthrow';
import { z } from 'zod';
import { isDecimalString, toDecimal } from '../common/utils/decimal.util';

export class ConfigValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Configuration validation failed with the following issues:\n${message}`);
    this.name = 'ConfigValidationError';
  }
}

export const TAX_CONFIG = Symbol('TAX_CONFIG');

export const OVERSELL_POLICIES = ['auto-short', 'reject'] as const;
export type OversellPolicy = (typeof OVERSELL_POLICIES)[number];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BrokerCredentials {
  appKey: string;
  appSecret: string;
  accessToken: string;
}

export interface TaxConfiguration {
  baseCurrency: string;
  taxRate: Decimal;
  oversellPolicy: OversellPolicy;
  requireFees: boolean;
  rateLookbackDays: number;
  fallbackRates: Record<string, Decimal>;
  ordersSince: string | undefined;
  credentials: BrokerCredentials | undefined;
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
}

const currencyCode = z.string().trim().toUpperCase().regex(/^[A-Z]{3}$/, 'must be a 3-letter ISO currency code');

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');

const decimalString = z.string().trim().refine(isDecimalString, 'must be a decimal number');

// "USD:7.2,HKD:0.92"
const fallbackRatesSchema = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const rates: Record<string, Decimal> = {};
    for (const pair of value.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
      const [currency, rate] = pair.split(':').map((part) => part.trim());
      if (!currency || !/^[A-Z]{3}$/i.test(currency) || !rate || !isDecimalString(rate) || toDecimal(rate).lte(0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid fallback rate entry "${pair}"` });
        return z.NEVER;
      }
      rates[currency.toUpperCase()] = toDecimal(rate);
    }
    return rates;
  });

const environmentSchema = z
  .object({
    BASE_CURRENCY: currencyCode.default('CNY'),
    TAX_RATE: decimalString
      .default('0.20')
      .refine((value) => toDecimal(value).gte(0) && toDecimal(value).lte(1), 'must be between 0 and 1'),
    OVERSELL_POLICY: z.enum(OVERSELL_POLICIES).default('auto-short'),
    REQUIRE_FEES: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),
    RATE_LOOKBACK_DAYS: z.coerce.number().int().min(0).max(31).default(0),
    FALLBACK_RATES: fallbackRatesSchema,
    ORDERS_SINCE: isoDate.optional(),
    BROKER_APP_KEY: z.string().min(1).optional(),
    BROKER_APP_SECRET: z.string().min(1).optional(),
    BROKER_ACCESS_TOKEN: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
  })
  .superRefine((env, ctx) => {
    const credentials = [env.BROKER_APP_KEY, env.BROKER_APP_SECRET, env.BROKER_ACCESS_TOKEN];
    const provided = credentials.filter((value) => value !== undefined).length;
    if (provided > 0 && provided < credentials.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'BROKER_APP_KEY, BROKER_APP_SECRET and BROKER_ACCESS_TOKEN must be set together',
        path: ['BROKER_APP_KEY'],
      });
    }
  });

function toConfiguration(env: z.infer<typeof environmentSchema>): TaxConfiguration {
  const credentials =
    env.BROKER_APP_KEY && env.BROKER_APP_SECRET && env.BROKER_ACCESS_TOKEN
      ? { appKey: env.BROKER_APP_KEY, appSecret: env.BROKER_APP_SECRET, accessToken: env.BROKER_ACCESS_TOKEN }
      : undefined;

  return {
    baseCurrency: env.BASE_CURRENCY,
    taxRate: toDecimal(env.TAX_RATE),
    oversellPolicy: env.OVERSELL_POLICY,
    requireFees: env.REQUIRE_FEES,
    rateLookbackDays: env.RATE_LOOKBACK_DAYS,
    fallbackRates: env.FALLBACK_RATES,
    ordersSince: env.ORDERS_SINCE,
    credentials,
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  };
}

export function validateConfig(env: Record<string, unknown>): Result<TaxConfiguration, ConfigValidationError> {
  const validationResult = environmentSchema.safeParse(env);
  if (!validationResult.success) {
    return err(new ConfigValidationError(validationResult.error.issues));
  }
  return ok(toConfiguration(validationResult.data));
}
