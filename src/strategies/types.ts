export type OrderSide = 'buy' | 'sell';

export type LevelStatus = 'pending' | 'active' | 'filled' | 'cancelled';

export const LEVEL_STATUSES: readonly LevelStatus[] = ['pending', 'active', 'filled', 'cancelled'];

export function oppositeSide(side: OrderSide): OrderSide {
  return side === 'buy' ? 'sell' : 'buy';
}

export function isOrderSide(value: unknown): value is OrderSide {
  return value === 'buy' || value === 'sell';
}

export function isLevelStatus(value: unknown): value is LevelStatus {
  return LEVEL_STATUSES.some((status) => status === value);
}

export interface RiskProfile {
  id: number;
  depositPercent: number;
  levelCount: number;
  spread: number;
  label: string;
}

export interface GridConfig {
  /** Processing order of symbols within a tick. */
  symbols: readonly string[];
  levelCount: number;
  /** Fractional distance of the nearest level, e.g. 0.001 = 0.1%. */
  spread: number;
  /** Quote-currency amount committed per level. */
  levelNotional: number;
  logMultiplier: number;
  priceDecimals: number;
}

export interface LevelKey {
  symbol: string;
  levelIndex: number;
  side: OrderSide;
}

export interface GridLevel extends LevelKey {
  price: number;
  baseAmount: number;
  orderRef: string | null;
  status: LevelStatus;
  /** A pending level whose price survives repricing (deferred mirror order). */
  pinned: boolean;
  updatedAt?: Date;
}

export function levelKey({ symbol, levelIndex, side }: LevelKey) {
  return `${symbol}#${levelIndex}#${side}`;
}

export function describeLevel(level: LevelKey) {
  return { symbol: level.symbol, levelIndex: level.levelIndex, side: level.side };
}

/** Ledger order: level index, then buy before sell. */
export function compareLevels(a: LevelKey, b: LevelKey) {
  if (a.levelIndex !== b.levelIndex) return a.levelIndex - b.levelIndex;
  if (a.side === b.side) return 0;
  return a.side === 'buy' ? -1 : 1;
}

export function splitSymbol(symbol: string) {
  const [base, quote] = symbol.split('/');
  return { base: base ?? symbol, quote: quote ?? '' };
}
