import type { BreakerSettings } from '../config';
import { symbolSuspendedGauge } from '../telemetry/metrics';
import { logger } from '../utils/logger';
import { backoffDelay } from '../utils/retry';

export type BreakerState = 'closed' | 'backoff' | 'suspended';

export interface SymbolBreakerStatus {
  state: BreakerState;
  failures: number;
  /** Epoch ms before which the symbol is skipped; 0 when closed. */
  retryAt: number;
}

interface SymbolState {
  failures: number;
  retryAt: number;
}

export const DEFAULT_BREAKER_SETTINGS: BreakerSettings = {
  failureThreshold: 5,
  baseDelayMs: 5_000,
  maxDelayMs: 120_000,
  suspendMs: 300_000,
};

/**
 * Per-symbol breaker. Each consecutive failure pushes the next attempt out by
 * min(base * 2^(n-1), max); at the threshold the symbol is suspended for
 * suspendMs and then tried again. One success closes it.
 */
export class SymbolCircuitBreaker {
  private states = new Map<string, SymbolState>();

  constructor(
    private settings: BreakerSettings = DEFAULT_BREAKER_SETTINGS,
    private now: () => number = Date.now
  ) {}

  allows(symbol: string) {
    const state = this.states.get(symbol);
    if (!state) return true;
    return this.now() >= state.retryAt;
  }

  status(symbol: string): SymbolBreakerStatus {
    const state = this.states.get(symbol);
    if (!state || state.failures === 0) {
      return { state: 'closed', failures: 0, retryAt: 0 };
    }
    return {
      state: state.failures >= this.settings.failureThreshold ? 'suspended' : 'backoff',
      failures: state.failures,
      retryAt: state.retryAt,
    };
  }

  recordSuccess(symbol: string) {
    const state = this.states.get(symbol);
    if (!state) return;
    this.states.delete(symbol);
    symbolSuspendedGauge.labels(symbol).set(0);
    if (state.failures >= this.settings.failureThreshold) {
      logger.info('symbol_resumed', { event: 'symbol_resumed', symbol, failures: state.failures });
    }
  }

  recordFailure(symbol: string, reason: string): SymbolBreakerStatus {
    const state = this.states.get(symbol) ?? { failures: 0, retryAt: 0 };
    state.failures += 1;
    const suspended = state.failures >= this.settings.failureThreshold;
    const delay = suspended
      ? this.settings.suspendMs
      : backoffDelay(state.failures, this.settings.baseDelayMs, this.settings.maxDelayMs);
    state.retryAt = this.now() + delay;
    this.states.set(symbol, state);

    if (suspended) {
      symbolSuspendedGauge.labels(symbol).set(1);
      logger.warn('symbol_suspended', {
        event: 'symbol_suspended',
        symbol,
        failures: state.failures,
        suspendMs: delay,
        reason,
      });
    } else {
      logger.warn('symbol_backoff', {
        event: 'symbol_backoff',
        symbol,
        failures: state.failures,
        delayMs: delay,
        reason,
      });
    }
    return this.status(symbol);
  }
}
