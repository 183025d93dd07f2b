import { describe, expect, it } from 'vitest';
import { loadConfig, parseSymbols } from '../src/config';
import { ConfigError } from '../src/errors';

const baseEnv = {
  EXCHANGE_API_KEY: 'test-key',
  EXCHANGE_API_SECRET: 'test-secret',
  SYMBOLS: 'BTC/USDT',
};

describe('parseSymbols', () => {
  it('trims, upper-cases and drops duplicates in order', () => {
    expect(parseSymbols(' btc/usdt, ETH/USDT ,btc/usdt,,')).toEqual(['BTC/USDT', 'ETH/USDT']);
    expect(parseSymbols(undefined)).toEqual([]);
  });
});

describe('loadConfig', () => {
  it('fills defaults around the required keys', () => {
    const config = loadConfig(baseEnv);
    expect(config.exchange).toEqual({
      id: 'bybit',
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      sandbox: false,
      retry: { attempts: 3, delayMs: 500, backoffFactor: 2 },
    });
    expect(config.sizing).toEqual({ mode: 'risk', riskLevel: 3 });
    expect(config.symbols).toEqual(['BTC/USDT']);
    expect(config.quoteCurrency).toBe('USDT');
    expect(config.logMultiplier).toBe(1.5);
    expect(config.priceDecimals).toBe(6);
    expect(config.tickIntervalMs).toBe(10_000);
    expect(config.orphanThreshold).toBe(3);
    expect(config.breaker).toEqual({ failureThreshold: 5, baseDelayMs: 5_000, maxDelayMs: 120_000, suspendMs: 300_000 });
    expect(config.metricsPort).toBeNull();
    expect(config.telegram).toBeNull();
    expect(config.logLevel).toBe('info');
  });

  it('requires exchange credentials', () => {
    expect(() => loadConfig({ SYMBOLS: 'BTC/USDT', EXCHANGE_API_KEY: 'test-key' })).toThrow(
      'EXCHANGE_API_KEY and EXCHANGE_API_SECRET are required'
    );
  });

  it('requires at least one well-formed symbol', () => {
    expect(() => loadConfig({ ...baseEnv, SYMBOLS: ' , ' })).toThrow('SYMBOLS must list at least one trading pair');
    expect(() => loadConfig({ ...baseEnv, SYMBOLS: 'BTCUSDT' })).toThrow('symbol "BTCUSDT" must look like BASE/QUOTE');
  });

  it('rejects a partial explicit sizing triple', () => {
    expect(() => loadConfig({ ...baseEnv, GRID_LEVELS: '10' })).toThrow(
      'invalid configuration: GRID_LEVELS: GRID_LEVELS, GRID_SPREAD and LEVEL_AMOUNT must be set together'
    );
  });

  it('switches to explicit sizing when the triple is complete', () => {
    const config = loadConfig({ ...baseEnv, GRID_LEVELS: '10', GRID_SPREAD: '0.002', LEVEL_AMOUNT: '25' });
    expect(config.sizing).toEqual({ mode: 'explicit', levelCount: 10, spread: 0.002, levelNotional: 25 });
  });

  it('rejects non-numeric values and too short an interval', () => {
    expect(() => loadConfig({ ...baseEnv, RISK_LEVEL: 'high' })).toThrow(
      'invalid configuration: RISK_LEVEL: expected a number, got "high"'
    );
    expect(() => loadConfig({ ...baseEnv, TICK_INTERVAL_MS: '500' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, ORPHAN_THRESHOLD: '0' })).toThrow('ORPHAN_THRESHOLD must be a positive integer');
  });

  it('enables telegram alerts only with both token and chat id', () => {
    expect(loadConfig({ ...baseEnv, TELEGRAM_TOKEN: 'test-token' }).telegram).toBeNull();
    expect(loadConfig({ ...baseEnv, TELEGRAM_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '42' }).telegram).toEqual({
      token: 'test-token',
      chatId: '42',
    });
  });

  it('returns a deeply frozen object', () => {
    const config = loadConfig({ ...baseEnv, EXCHANGE_SANDBOX: 'true', EXCHANGE_ID: 'Binance' });
    expect(config.exchange.sandbox).toBe(true);
    expect(config.exchange.id).toBe('binance');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.exchange.retry)).toBe(true);
    expect(Object.isFrozen(config.symbols)).toBe(true);
  });
});
