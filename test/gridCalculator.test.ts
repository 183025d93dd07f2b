import { describe, expect, it } from 'vitest';
import { RISK_PROFILES, resolveGridConfig } from '../src/config/riskProfiles';
import { ConfigError } from '../src/errors';
import { buildGrid, levelDistance, levelPrice, roundPrice } from '../src/strategies/grid/gridCalculator';
import type { GridConfig } from '../src/strategies/types';

const baseConfig: GridConfig = {
  symbols: ['BTC/USDT'],
  levelCount: 3,
  spread: 0.01,
  levelNotional: 50,
  logMultiplier: 2,
  priceDecimals: 6,
};

describe('gridCalculator', () => {
  it('builds the logarithmic ladder around the reference price', () => {
    const grid = buildGrid('BTC/USDT', 1000, baseConfig);
    expect(grid).toHaveLength(6);
    expect(grid.filter((level) => level.side === 'buy').map((level) => level.price)).toEqual([990, 980, 960]);
    expect(grid.filter((level) => level.side === 'sell').map((level) => level.price)).toEqual([1010, 1020, 1040]);
  });

  it('orders levels by index with buy before sell and starts them pending', () => {
    const grid = buildGrid('BTC/USDT', 1000, baseConfig);
    expect(grid.map((level) => `${level.levelIndex}:${level.side}`)).toEqual([
      '0:buy',
      '0:sell',
      '1:buy',
      '1:sell',
      '2:buy',
      '2:sell',
    ]);
    for (const level of grid) {
      expect(level.status).toBe('pending');
      expect(level.orderRef).toBeNull();
      expect(level.pinned).toBe(false);
      expect(level.baseAmount).toBeCloseTo(0.05, 12);
    }
  });

  it('keeps buy prices decreasing and sell prices increasing', () => {
    const grid = buildGrid('ETH/USDT', 2345.67, { ...baseConfig, levelCount: 12, spread: 0.001, logMultiplier: 1.5 });
    const buys = grid.filter((level) => level.side === 'buy').map((level) => level.price);
    const sells = grid.filter((level) => level.side === 'sell').map((level) => level.price);
    for (let i = 1; i < buys.length; i += 1) {
      expect(buys[i]).toBeLessThan(buys[i - 1]);
      expect(sells[i]).toBeGreaterThan(sells[i - 1]);
    }
    expect(Math.max(...buys)).toBeLessThan(2345.67);
    expect(Math.min(...sells)).toBeGreaterThan(2345.67);
  });

  it('computes the geometric distance per level', () => {
    expect(levelDistance({ spread: 0.001, logMultiplier: 1.5 }, 0)).toBeCloseTo(0.001, 12);
    expect(levelDistance({ spread: 0.001, logMultiplier: 1.5 }, 2)).toBeCloseTo(0.00225, 12);
  });

  it('spaces levels evenly when the multiplier is exactly one', () => {
    const grid = buildGrid('BTC/USDT', 1000, { ...baseConfig, logMultiplier: 1 });
    expect(grid.filter((level) => level.side === 'buy').map((level) => level.price)).toEqual([990, 980, 970]);
    expect(grid.filter((level) => level.side === 'sell').map((level) => level.price)).toEqual([1010, 1020, 1030]);
  });

  it('rounds prices to the configured decimals', () => {
    expect(roundPrice(1.23456789, 4)).toBe(1.2346);
    expect(levelPrice('sell', 33.333, 0.001, 2)).toBe(33.37);
  });

  it('rejects a multiplier below one', () => {
    expect(() => buildGrid('BTC/USDT', 1000, { ...baseConfig, logMultiplier: 0.5 })).toThrow(ConfigError);
  });

  it('rejects a non-positive or non-finite reference price', () => {
    expect(() => buildGrid('BTC/USDT', 0, baseConfig)).toThrow(ConfigError);
    expect(() => buildGrid('BTC/USDT', Number.NaN, baseConfig)).toThrow(ConfigError);
  });

  it('rejects a ladder whose levels collapse after rounding', () => {
    const coarse = { ...baseConfig, spread: 0.001, logMultiplier: 1.01, priceDecimals: 2 };
    expect(() => buildGrid('XRP/USDT', 1, coarse)).toThrow(/collapse/);
  });

  it('keeps buy levels that fall to zero or below', () => {
    const wide = { ...baseConfig, levelCount: 2, spread: 0.5, logMultiplier: 2 };
    const grid = buildGrid('BTC/USDT', 1000, wide);
    expect(grid.map((level) => [level.side, level.price])).toEqual([
      ['buy', 500],
      ['sell', 1500],
      ['buy', 0],
      ['sell', 2000],
    ]);
  });

  it('builds a full ladder for every risk profile at the default multiplier', () => {
    for (const profile of RISK_PROFILES) {
      const config = resolveGridConfig({ riskLevel: profile.id, totalDeposit: 1000, symbols: ['BTC/USDT'] });
      const grid = buildGrid('BTC/USDT', 30000, config);
      expect(grid).toHaveLength(2 * profile.levelCount);
      const unplaceable = grid.filter((level) => level.price <= 0).map((level) => `${level.levelIndex}:${level.side}`);
      expect(unplaceable).toEqual(profile.id === 5 ? ['19:buy'] : []);
    }
  });
});
