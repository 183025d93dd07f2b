import { ConfigError } from '../../errors';
import { compareLevels, GridConfig, GridLevel, OrderSide } from '../types';

type LadderParams = Pick<GridConfig, 'spread' | 'logMultiplier'>;

export function roundPrice(value: number, decimals: number) {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Fractional offset of level `levelIndex` from the reference price.
 * Geometric (spread * m^i) so levels cluster near the price and thin out
 * toward the extremes; a multiplier of exactly 1 falls back to even spacing.
 */
export function levelDistance(params: LadderParams, levelIndex: number) {
  if (params.logMultiplier < 1) {
    throw new ConfigError(`logMultiplier must be >= 1, got ${params.logMultiplier}`);
  }
  if (params.logMultiplier === 1) {
    return params.spread * (levelIndex + 1);
  }
  return params.spread * Math.pow(params.logMultiplier, levelIndex);
}

export function levelPrice(side: OrderSide, referencePrice: number, distance: number, decimals: number) {
  const raw = side === 'buy' ? referencePrice * (1 - distance) : referencePrice * (1 + distance);
  return roundPrice(raw, decimals);
}

export function priceForLevel(
  config: Pick<GridConfig, 'spread' | 'logMultiplier' | 'priceDecimals'>,
  side: OrderSide,
  levelIndex: number,
  referencePrice: number
) {
  return levelPrice(side, referencePrice, levelDistance(config, levelIndex), config.priceDecimals);
}

function assertReferencePrice(symbol: string, referencePrice: number) {
  if (!Number.isFinite(referencePrice) || referencePrice <= 0) {
    throw new ConfigError(`reference price for ${symbol} must be positive, got ${referencePrice}`);
  }
}

// Deep buy levels may fall to zero or below; they are kept and never placed.
function assertLadder(symbol: string, buys: number[], sells: number[]) {
  for (let i = 1; i < buys.length; i += 1) {
    if (!(buys[i] < buys[i - 1])) {
      throw new ConfigError(`${symbol}: buy levels ${i - 1} and ${i} collapse to ${buys[i]}; raise priceDecimals`);
    }
    if (!(sells[i] > sells[i - 1])) {
      throw new ConfigError(`${symbol}: sell levels ${i - 1} and ${i} collapse to ${sells[i]}; raise priceDecimals`);
    }
  }
}

/**
 * Builds the full ladder for one symbol: `levelCount` buys below and
 * `levelCount` sells above the reference price, all pending with no order.
 */
export function buildGrid(symbol: string, referencePrice: number, config: GridConfig): GridLevel[] {
  assertReferencePrice(symbol, referencePrice);
  const baseAmount = config.levelNotional / referencePrice;
  const buys: number[] = [];
  const sells: number[] = [];
  for (let i = 0; i < config.levelCount; i += 1) {
    buys.push(priceForLevel(config, 'buy', i, referencePrice));
    sells.push(priceForLevel(config, 'sell', i, referencePrice));
  }
  assertLadder(symbol, buys, sells);

  const levels: GridLevel[] = [];
  for (let i = 0; i < config.levelCount; i += 1) {
    levels.push(
      { symbol, levelIndex: i, side: 'buy', price: buys[i], baseAmount, orderRef: null, status: 'pending', pinned: false },
      { symbol, levelIndex: i, side: 'sell', price: sells[i], baseAmount, orderRef: null, status: 'pending', pinned: false }
    );
  }
  return levels.sort(compareLevels);
}
