import { ConfigError } from '../errors';
import type { GridConfig, RiskProfile } from '../strategies/types';

export const RISK_PROFILES: readonly RiskProfile[] = Object.freeze([
  { id: 1, depositPercent: 60, levelCount: 8, spread: 0.002, label: 'conservative' },
  { id: 2, depositPercent: 70, levelCount: 10, spread: 0.0015, label: 'moderate' },
  { id: 3, depositPercent: 80, levelCount: 12, spread: 0.001, label: 'active' },
  { id: 4, depositPercent: 90, levelCount: 15, spread: 0.0008, label: 'aggressive' },
  { id: 5, depositPercent: 95, levelCount: 20, spread: 0.0005, label: 'extreme' },
]);

export const DEFAULT_LOG_MULTIPLIER = 1.5;
export const DEFAULT_PRICE_DECIMALS = 6;

export function resolveRiskProfile(selector: number): RiskProfile {
  const profile = RISK_PROFILES.find((candidate) => candidate.id === selector);
  if (!profile) {
    const ids = RISK_PROFILES.map((candidate) => candidate.id);
    throw new ConfigError(
      `risk level must be between ${Math.min(...ids)} and ${Math.max(...ids)}, got ${selector}`
    );
  }
  return profile;
}

export interface LadderShape {
  logMultiplier?: number;
  priceDecimals?: number;
}

export interface RiskSizingInput extends LadderShape {
  riskLevel: number;
  totalDeposit: number;
  symbols: readonly string[];
}

export interface ExplicitSizingInput extends LadderShape {
  symbols: readonly string[];
  levelCount: number;
  spread: number;
  levelNotional: number;
}

export function validateGridConfig(config: GridConfig): Readonly<GridConfig> {
  if (config.symbols.length === 0) {
    throw new ConfigError('at least one symbol is required');
  }
  if (!Number.isInteger(config.levelCount) || config.levelCount <= 0) {
    throw new ConfigError(`levelCount must be a positive integer, got ${config.levelCount}`);
  }
  if (!Number.isFinite(config.spread) || config.spread <= 0) {
    throw new ConfigError(`spread must be positive, got ${config.spread}`);
  }
  if (!Number.isFinite(config.levelNotional) || config.levelNotional <= 0) {
    throw new ConfigError(`levelNotional must be positive, got ${config.levelNotional}`);
  }
  if (!Number.isFinite(config.logMultiplier) || config.logMultiplier < 1) {
    throw new ConfigError(`logMultiplier must be >= 1, got ${config.logMultiplier}`);
  }
  if (!Number.isInteger(config.priceDecimals) || config.priceDecimals < 0 || config.priceDecimals > 12) {
    throw new ConfigError(`priceDecimals must be an integer in [0, 12], got ${config.priceDecimals}`);
  }
  return Object.freeze({ ...config, symbols: Object.freeze([...config.symbols]) });
}

/**
 * Derives grid parameters from a risk selector and the observed deposit:
 * levelNotional = deposit * depositPercent / 100 / symbolCount / levelCount.
 */
export function resolveGridConfig(input: RiskSizingInput): Readonly<GridConfig> {
  const profile = resolveRiskProfile(input.riskLevel);
  const symbolCount = input.symbols.length;
  if (symbolCount === 0) {
    throw new ConfigError('cannot size a grid without symbols');
  }
  if (!Number.isFinite(input.totalDeposit) || input.totalDeposit <= 0) {
    throw new ConfigError(`total deposit must be positive, got ${input.totalDeposit}`);
  }
  const levelNotional = (input.totalDeposit * profile.depositPercent) / 100 / symbolCount / profile.levelCount;
  return validateGridConfig({
    symbols: input.symbols,
    levelCount: profile.levelCount,
    spread: profile.spread,
    levelNotional,
    logMultiplier: input.logMultiplier ?? DEFAULT_LOG_MULTIPLIER,
    priceDecimals: input.priceDecimals ?? DEFAULT_PRICE_DECIMALS,
  });
}

export function buildExplicitGridConfig(input: ExplicitSizingInput): Readonly<GridConfig> {
  return validateGridConfig({
    symbols: input.symbols,
    levelCount: input.levelCount,
    spread: input.spread,
    levelNotional: input.levelNotional,
    logMultiplier: input.logMultiplier ?? DEFAULT_LOG_MULTIPLIER,
    priceDecimals: input.priceDecimals ?? DEFAULT_PRICE_DECIMALS,
  });
}

export interface AllocationSummary {
  tradingDeposit: number;
  depositPerPair: number;
  levelNotional: number;
  levelCount: number;
  spreadPct: number;
}

export function describeAllocation(config: GridConfig, totalDeposit: number, profile?: RiskProfile): AllocationSummary {
  const pairs = config.symbols.length;
  const depositPerPair = config.levelNotional * config.levelCount;
  const tradingDeposit = profile ? (totalDeposit * profile.depositPercent) / 100 : depositPerPair * pairs;
  return {
    tradingDeposit,
    depositPerPair,
    levelNotional: config.levelNotional,
    levelCount: config.levelCount,
    spreadPct: config.spread * 100,
  };
}
