import { ConfigError, GridError, MarketDataError, OrderNotFoundError, OrderRejectedError } from '../../errors';
import type { ExchangeGateway, PlacedOrder, PlacedOrderStatus } from '../../exchanges/types';
import type { GridFillsRepository } from '../../db/gridFillsRepo';
import type { GridLevelsRepository } from '../../db/gridLevelsRepo';
import { SymbolCircuitBreaker } from '../../guard/circuitBreaker';
import { AlertSink, silentAlerts } from '../../alerts/telegram';
import {
  activeLevelsGauge,
  fillCounter,
  gatewayErrorCounter,
  ordersPlacedCounter,
  ordersSkippedCounter,
} from '../../telemetry/metrics';
import { errorMessage } from '../../utils/formatError';
import { logger } from '../../utils/logger';
import { compareLevels, describeLevel, GridConfig, GridLevel, levelKey, oppositeSide } from '../types';
import { BalanceGuard } from './balanceGuard';
import { buildGrid, priceForLevel } from './gridCalculator';
import { hasMirror, placeMirror } from './mirrorOrders';

export interface GridSupervisorDeps {
  gateway: ExchangeGateway;
  ledger: GridLevelsRepository;
  fills: GridFillsRepository;
  config: GridConfig;
  breaker?: SymbolCircuitBreaker;
  alerts?: AlertSink;
  /** Consecutive not-found answers before an active level is given up as cancelled. */
  orphanThreshold?: number;
}

export interface SymbolTickReport {
  symbol: string;
  status: 'ok' | 'skipped' | 'suspended';
  lastPrice: number | null;
  filled: number;
  cancelled: number;
  regenerated: number;
  placed: number;
  skipped: number;
  mirrors: number;
  gatewayErrors: number;
}

export interface TickReport {
  symbols: SymbolTickReport[];
}

export interface UntrackedOrder {
  symbol: string;
  orderId: string;
  side: string;
  price: number;
}

function emptyReport(symbol: string, status: SymbolTickReport['status']): SymbolTickReport {
  return {
    symbol,
    status,
    lastPrice: null,
    filled: 0,
    cancelled: 0,
    regenerated: 0,
    placed: 0,
    skipped: 0,
    mirrors: 0,
    gatewayErrors: 0,
  };
}

function rethrowFatal(error: unknown) {
  if (error instanceof GridError && error.fatal) throw error;
}

function errorCode(error: unknown) {
  return error instanceof GridError ? error.code : 'unknown';
}

const isWorking = (level: GridLevel) => level.status === 'active' && level.orderRef !== null;

/**
 * Drives each configured symbol's grid through pending → active → filled or
 * cancelled and back to pending. The ledger is written first; the in-memory
 * grid only changes after the write resolves.
 */
export class GridSupervisor {
  private grids = new Map<string, GridLevel[]>();
  private notFoundCounts = new Map<string, number>();
  private readonly guard: BalanceGuard;
  private readonly breaker: SymbolCircuitBreaker;
  private readonly alerts: AlertSink;
  private readonly orphanThreshold: number;

  constructor(private deps: GridSupervisorDeps) {
    this.guard = new BalanceGuard(deps.gateway);
    this.breaker = deps.breaker ?? new SymbolCircuitBreaker();
    this.alerts = deps.alerts ?? silentAlerts;
    this.orphanThreshold = deps.orphanThreshold ?? 3;
  }

  get config() {
    return this.deps.config;
  }

  getGrid(symbol: string): GridLevel[] {
    return (this.grids.get(symbol) ?? []).map((level) => ({ ...level }));
  }

  async initialize() {
    const loaded = await this.deps.ledger.loadGrids();
    for (const symbol of this.config.symbols) {
      const stored = loaded.get(symbol) ?? [];
      const working = stored.filter((level) => level.levelIndex < this.config.levelCount);
      if (working.length < stored.length) {
        logger.warn('levels_out_of_range', {
          event: 'levels_out_of_range',
          symbol,
          ignored: stored.length - working.length,
          levelCount: this.config.levelCount,
        });
      }
      this.grids.set(symbol, working);
      logger.info('grid_loaded', {
        event: 'grid_loaded',
        symbol,
        levels: working.length,
        active: working.filter(isWorking).length,
      });
    }
    for (const [symbol, grid] of loaded) {
      if (!this.config.symbols.includes(symbol)) {
        logger.warn('grid_not_configured', { event: 'grid_not_configured', symbol, levels: grid.length });
      }
    }

    for (const symbol of this.config.symbols) {
      if (this.isComplete(symbol)) continue;
      try {
        const ticker = await this.deps.gateway.getTicker(symbol);
        await this.ensureGrid(symbol, ticker.last);
      } catch (error) {
        rethrowFatal(error);
        // retried on the first tick that gets a price
        this.recordGatewayFailure(symbol, error, 'initialize');
      }
    }
  }

  /**
   * Lists resting exchange orders on configured symbols that no level
   * references, e.g. an order placed just before a crash.
   */
  async findUntrackedOrders(): Promise<UntrackedOrder[]> {
    const untracked: UntrackedOrder[] = [];
    for (const symbol of this.config.symbols) {
      const known = new Set(this.getGrid(symbol).map((level) => level.orderRef));
      let orders: PlacedOrder[];
      try {
        orders = await this.deps.gateway.getOpenOrders(symbol);
      } catch (error) {
        rethrowFatal(error);
        logger.warn('untracked_scan_failed', { event: 'untracked_scan_failed', symbol, error: errorMessage(error) });
        continue;
      }
      for (const order of orders) {
        if (order.status !== 'open' || known.has(order.orderId)) continue;
        untracked.push({ symbol, orderId: order.orderId, side: order.side, price: order.price });
        logger.warn('untracked_exchange_order', {
          event: 'untracked_exchange_order',
          symbol,
          orderId: order.orderId,
          side: order.side,
          price: order.price,
          qty: order.qty,
        });
      }
    }
    return untracked;
  }

  async tick(): Promise<TickReport> {
    const symbols: SymbolTickReport[] = [];
    for (const symbol of this.config.symbols) {
      if (!this.breaker.allows(symbol)) {
        const status = this.breaker.status(symbol);
        logger.debug('symbol_skipped_breaker', {
          event: 'symbol_skipped_breaker',
          symbol,
          state: status.state,
          retryAt: new Date(status.retryAt).toISOString(),
        });
        symbols.push(emptyReport(symbol, 'suspended'));
        continue;
      }
      symbols.push(await this.tickSymbol(symbol));
    }
    return { symbols };
  }

  private async tickSymbol(symbol: string): Promise<SymbolTickReport> {
    const report = emptyReport(symbol, 'ok');
    let last: number;
    try {
      const ticker = await this.deps.gateway.getTicker(symbol);
      last = ticker.last;
    } catch (error) {
      rethrowFatal(error);
      this.recordGatewayFailure(symbol, error, 'ticker');
      report.status = 'skipped';
      report.gatewayErrors += 1;
      return report;
    }
    report.lastPrice = last;

    if (!this.isComplete(symbol)) {
      try {
        await this.ensureGrid(symbol, last);
      } catch (error) {
        // the ladder may collapse at this price only; other symbols keep running
        if (!(error instanceof ConfigError)) throw error;
        this.recordGatewayFailure(symbol, error, 'build_grid');
        report.status = 'skipped';
        return report;
      }
    }
    await this.syncWithExchange(symbol, report);
    await this.regenerate(symbol, last, report);
    await this.placePending(symbol, last, report);

    this.breaker.recordSuccess(symbol);
    const grid = this.grids.get(symbol) ?? [];
    activeLevelsGauge.labels(symbol).set(grid.filter(isWorking).length);
    logger.info('symbol_tick_complete', { event: 'symbol_tick_complete', ...report });
    return report;
  }

  /** Creates the identities missing from a symbol's grid at the current price. */
  private async ensureGrid(symbol: string, referencePrice: number) {
    const grid = this.grids.get(symbol) ?? [];
    const present = new Set(grid.map(levelKey));
    const fresh = buildGrid(symbol, referencePrice, this.config);
    let created = 0;
    for (const level of fresh) {
      if (present.has(levelKey(level))) continue;
      const stored = await this.deps.ledger.upsertLevel(level);
      grid.push(stored);
      created += 1;
    }
    grid.sort(compareLevels);
    this.grids.set(symbol, grid);
    logger.info(present.size === 0 ? 'grid_created' : 'grid_extended', {
      event: present.size === 0 ? 'grid_created' : 'grid_extended',
      symbol,
      referencePrice,
      created,
      levels: grid.length,
    });
    const unplaceable = fresh.filter((level) => !(level.price > 0)).length;
    if (unplaceable > 0) {
      logger.warn('levels_unplaceable', { event: 'levels_unplaceable', symbol, referencePrice, unplaceable });
    }
  }

  private isComplete(symbol: string) {
    return (this.grids.get(symbol) ?? []).length >= 2 * this.config.levelCount;
  }

  /**
   * Reclassifies every working level from the venue's answer. Fills are all
   * recorded before any mirror is placed, so a mirror never cancels a slot
   * whose own fill has not been seen yet. A level still `filled` at the start
   * of a tick was interrupted before its mirror and is mirrored again.
   */
  private async syncWithExchange(symbol: string, report: SymbolTickReport) {
    const grid = this.grids.get(symbol) ?? [];
    const working = grid.filter(isWorking);
    const fills: GridLevel[] = [];
    for (const level of grid.filter((entry) => entry.status === 'filled')) {
      if (hasMirror(level, this.find(symbol, level.levelIndex, oppositeSide(level.side)), this.config)) continue;
      logger.warn('mirror_resumed', { event: 'mirror_resumed', ...describeLevel(level), orderRef: level.orderRef });
      fills.push(level);
    }
    for (const level of working) {
      const orderRef = level.orderRef;
      if (orderRef === null) continue;
      let status: PlacedOrderStatus;
      try {
        status = await this.deps.gateway.getOrderStatus(orderRef, symbol);
      } catch (error) {
        rethrowFatal(error);
        if (error instanceof OrderNotFoundError) {
          await this.handleMissingOrder(level, report);
        } else {
          this.noteLevelError(level, error, 'order_status', report);
        }
        continue;
      }
      this.notFoundCounts.delete(levelKey(level));
      if (status === 'filled') {
        fills.push(await this.recordFill(level, report));
      } else if (status === 'cancelled') {
        await this.deps.ledger.updateStatus(symbol, level.levelIndex, level.side, 'cancelled');
        this.apply({ ...level, status: 'cancelled' });
        report.cancelled += 1;
        logger.info('level_cancelled', { event: 'level_cancelled', ...describeLevel(level), orderRef });
      }
    }
    for (const filled of fills) {
      await this.mirrorFill(filled, report);
    }
  }

  private async handleMissingOrder(level: GridLevel, report: SymbolTickReport) {
    const key = levelKey(level);
    const misses = (this.notFoundCounts.get(key) ?? 0) + 1;
    gatewayErrorCounter.labels(level.symbol, 'order_not_found').inc();
    if (misses < this.orphanThreshold) {
      this.notFoundCounts.set(key, misses);
      logger.warn('order_not_found', {
        event: 'order_not_found',
        ...describeLevel(level),
        orderRef: level.orderRef,
        misses,
        threshold: this.orphanThreshold,
      });
      return;
    }
    await this.deps.ledger.updateStatus(level.symbol, level.levelIndex, level.side, 'cancelled');
    this.notFoundCounts.delete(key);
    this.apply({ ...level, status: 'cancelled' });
    report.cancelled += 1;
    logger.warn('level_orphaned', {
      event: 'level_orphaned',
      ...describeLevel(level),
      orderRef: level.orderRef,
      misses,
    });
  }

  private async recordFill(level: GridLevel, report: SymbolTickReport): Promise<GridLevel> {
    await this.deps.ledger.updateStatus(level.symbol, level.levelIndex, level.side, 'filled');
    const filled: GridLevel = { ...level, status: 'filled' };
    this.apply(filled);
    await this.deps.fills.recordFill({
      symbol: level.symbol,
      levelIndex: level.levelIndex,
      side: level.side,
      price: level.price,
      amount: level.baseAmount,
      orderRef: level.orderRef,
    });
    report.filled += 1;
    fillCounter.labels(level.symbol, level.side).inc();
    logger.info('level_filled', {
      event: 'level_filled',
      ...describeLevel(level),
      price: level.price,
      amount: level.baseAmount,
      orderRef: level.orderRef,
    });
    await this.alerts.send(
      `Filled ${level.side.toUpperCase()} ${level.baseAmount} ${level.symbol} @ ${level.price} (level ${level.levelIndex})`
    );
    return filled;
  }

  private async mirrorFill(filled: GridLevel, report: SymbolTickReport) {
    const slot = this.find(filled.symbol, filled.levelIndex, oppositeSide(filled.side));
    const outcome = await placeMirror(
      { gateway: this.deps.gateway, guard: this.guard, ledger: this.deps.ledger },
      filled,
      this.config,
      slot
    );
    if (outcome.outcome === 'blocked') {
      report.skipped += 1;
      return;
    }
    if (slot) {
      this.notFoundCounts.delete(levelKey(slot));
    }
    this.apply(outcome.level);
    if (outcome.outcome === 'placed') {
      report.mirrors += 1;
    } else {
      report.skipped += 1;
    }
  }

  private async regenerate(symbol: string, last: number, report: SymbolTickReport) {
    const grid = this.grids.get(symbol) ?? [];
    for (const level of grid.filter((entry) => !isWorking(entry))) {
      const price = level.pinned ? level.price : priceForLevel(this.config, level.side, level.levelIndex, last);
      if (level.status === 'pending' && level.orderRef === null && level.price === price) continue;
      await this.deps.ledger.updateOrder(symbol, level.levelIndex, level.side, price, null, 'pending', level.pinned);
      this.apply({ ...level, price, orderRef: null, status: 'pending' });
      if (level.status !== 'pending') {
        report.regenerated += 1;
        logger.info('level_regenerated', {
          event: 'level_regenerated',
          ...describeLevel(level),
          from: level.status,
          price,
        });
      }
    }
  }

  private async placePending(symbol: string, last: number, report: SymbolTickReport) {
    const candidates = (this.grids.get(symbol) ?? [])
      .filter((level) => level.status === 'pending')
      .sort((a, b) => Math.abs(a.price - last) - Math.abs(b.price - last) || compareLevels(a, b));

    for (const level of candidates) {
      if (!(level.price > 0) || !(level.baseAmount > 0)) {
        this.skip(level, 'invalid_order', report, { price: level.price, amount: level.baseAmount });
        continue;
      }
      try {
        const verdict = await this.guard.check({
          symbol,
          side: level.side,
          qty: level.baseAmount,
          price: level.price,
        });
        if (verdict.verdict === 'insufficient') {
          this.skip(level, 'insufficient_balance', report, {
            currency: verdict.currency,
            required: verdict.required,
            available: verdict.available,
            shortfall: verdict.shortfall,
          });
          continue;
        }
      } catch (error) {
        rethrowFatal(error);
        this.noteLevelError(level, error, 'balance_check', report);
        report.skipped += 1;
        continue;
      }

      let orderId: string;
      try {
        const ack = await this.deps.gateway.placeLimitOrder(symbol, level.side, level.baseAmount, level.price);
        orderId = ack.orderId;
      } catch (error) {
        rethrowFatal(error);
        if (error instanceof OrderRejectedError) {
          this.skip(level, 'rejected', report, { error: error.reason });
        } else {
          this.noteLevelError(level, error, 'place_order', report);
          report.skipped += 1;
        }
        continue;
      }

      await this.deps.ledger.updateOrder(symbol, level.levelIndex, level.side, level.price, orderId, 'active', false);
      this.apply({ ...level, orderRef: orderId, status: 'active', pinned: false });
      report.placed += 1;
      ordersPlacedCounter.labels(symbol, level.side, 'grid').inc();
      logger.info('order_placed', {
        event: 'order_placed',
        ...describeLevel(level),
        price: level.price,
        amount: level.baseAmount,
        orderRef: orderId,
      });
    }
  }

  private skip(level: GridLevel, reason: string, report: SymbolTickReport, meta: Record<string, unknown> = {}) {
    report.skipped += 1;
    ordersSkippedCounter.labels(level.symbol, level.side, reason).inc();
    const entry = { event: 'level_skipped', ...describeLevel(level), reason, ...meta };
    if (reason === 'rejected') {
      logger.warn('level_skipped', entry);
    } else {
      logger.info('level_skipped', entry);
    }
  }

  private noteLevelError(level: GridLevel, error: unknown, operation: string, report: SymbolTickReport) {
    report.gatewayErrors += 1;
    gatewayErrorCounter.labels(level.symbol, errorCode(error)).inc();
    logger.warn('level_gateway_error', {
      event: 'level_gateway_error',
      ...describeLevel(level),
      operation,
      code: errorCode(error),
      error: errorMessage(error),
    });
  }

  private recordGatewayFailure(symbol: string, error: unknown, operation: string) {
    gatewayErrorCounter.labels(symbol, errorCode(error)).inc();
    const event = error instanceof MarketDataError ? 'market_data_unavailable' : 'symbol_gateway_error';
    logger.warn(event, {
      event,
      symbol,
      operation,
      error: errorMessage(error),
    });
    this.breaker.recordFailure(symbol, errorMessage(error));
  }

  private find(symbol: string, levelIndex: number, side: GridLevel['side']) {
    return (this.grids.get(symbol) ?? []).find((level) => level.levelIndex === levelIndex && level.side === side);
  }

  private apply(level: GridLevel) {
    const grid = this.grids.get(level.symbol) ?? [];
    const key = levelKey(level);
    const index = grid.findIndex((entry) => levelKey(entry) === key);
    if (index === -1) {
      grid.push(level);
      grid.sort(compareLevels);
    } else {
      grid[index] = level;
    }
    this.grids.set(level.symbol, grid);
  }
}
