import { ConfigValidationError, validateConfig } from './config.schema';

describe('validateConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = validateConfig({})._unsafeUnwrap();

    expect(config.baseCurrency).toBe('CNY');
    expect(config.taxRate.toString()).toBe('0.2');
    expect(config.oversellPolicy).toBe('auto-short');
    expect(config.requireFees).toBe(false);
    expect(config.rateLookbackDays).toBe(0);
    expect(config.fallbackRates).toEqual({});
    expect(config.ordersSince).toBeUndefined();
    expect(config.credentials).toBeUndefined();
    expect(config.logLevel).toBe('info');
    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3000);
  });

  it('should parse every setting', () => {
    const config = validateConfig({
      BASE_CURRENCY: 'hkd',
      TAX_RATE: '0.15',
      OVERSELL_POLICY: 'reject',
      REQUIRE_FEES: 'true',
      RATE_LOOKBACK_DAYS: '5',
      FALLBACK_RATES: 'USD:7.8, cny:1.08',
      ORDERS_SINCE: '2021-01-01',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
      PORT: '8080',
    })._unsafeUnwrap();

    expect(config.baseCurrency).toBe('HKD');
    expect(config.taxRate.toString()).toBe('0.15');
    expect(config.oversellPolicy).toBe('reject');
    expect(config.requireFees).toBe(true);
    expect(config.rateLookbackDays).toBe(5);
    expect(Object.keys(config.fallbackRates)).toEqual(['USD', 'CNY']);
    expect(config.fallbackRates.CNY.toString()).toBe('1.08');
    expect(config.ordersSince).toBe('2021-01-01');
    expect(config.logLevel).toBe('debug');
    expect(config.port).toBe(8080);
  });

  it('should group broker credentials when all three are set', () => {
    const config = validateConfig({
      BROKER_APP_KEY: 'test-key',
      BROKER_APP_SECRET: 'test-secret',
      BROKER_ACCESS_TOKEN: 'test-token',
    })._unsafeUnwrap();

    expect(config.credentials).toEqual({ appKey: 'test-key', appSecret: 'test-secret', accessToken: 'test-token' });
  });

  it('should reject a partial set of broker credentials', () => {
    const error = validateConfig({ BROKER_APP_KEY: 'test-key' })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error.issues[0].path).toEqual(['BROKER_APP_KEY']);
  });

  it('should reject a tax rate above 1', () => {
    const error = validateConfig({ TAX_RATE: '1.5' })._unsafeUnwrapErr();

    expect(error.message).toContain('TAX_RATE: must be between 0 and 1');
  });

  it('should reject an unknown oversell policy', () => {
    expect(validateConfig({ OVERSELL_POLICY: 'fifo' }).isErr()).toBe(true);
  });

  it('should reject a malformed fallback rate', () => {
    const error = validateConfig({ FALLBACK_RATES: 'USD=7.2' })._unsafeUnwrapErr();

    expect(error.message).toContain('invalid fallback rate entry "USD=7.2"');
  });

  it('should reject a non-positive fallback rate', () => {
    expect(validateConfig({ FALLBACK_RATES: 'USD:0' }).isErr()).toBe(true);
  });
});
