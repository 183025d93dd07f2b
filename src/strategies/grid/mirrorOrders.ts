import { GridError, OrderNotFoundError, OrderRejectedError } from '../../errors';
import type { ExchangeGateway } from '../../exchanges/types';
import type { GridLevelsRepository } from '../../db/gridLevelsRepo';
import { ordersPlacedCounter, ordersSkippedCounter } from '../../telemetry/metrics';
import { errorMessage } from '../../utils/formatError';
import { logger } from '../../utils/logger';
import { describeLevel, GridConfig, GridLevel, oppositeSide, OrderSide } from '../types';
import type { BalanceGuard } from './balanceGuard';
import { levelPrice, levelDistance } from './gridCalculator';

export interface MirrorOrder {
  symbol: string;
  levelIndex: number;
  side: OrderSide;
  price: number;
  baseAmount: number;
}

export type MirrorOutcome =
  | { outcome: 'placed'; level: GridLevel }
  | { outcome: 'deferred'; level: GridLevel; reason: string }
  | { outcome: 'blocked'; reason: string };

export interface MirrorDeps {
  gateway: ExchangeGateway;
  guard: BalanceGuard;
  ledger: GridLevelsRepository;
}

/**
 * Opposite-side order at the same index, offset from the fill price by that
 * index's distance. Amount is carried over unchanged.
 */
export function computeMirror(
  filled: GridLevel,
  config: Pick<GridConfig, 'spread' | 'logMultiplier' | 'priceDecimals'>
): MirrorOrder {
  const side = oppositeSide(filled.side);
  const distance = levelDistance(config, filled.levelIndex);
  return {
    symbol: filled.symbol,
    levelIndex: filled.levelIndex,
    side,
    price: levelPrice(side, filled.price, distance, config.priceDecimals),
    baseAmount: filled.baseAmount,
  };
}

function rethrowFatal(error: unknown) {
  if (error instanceof GridError && error.fatal) throw error;
}

/** Venue answer for an order the cancel call no longer found: only a confirmed cancel frees the slot. */
async function confirmSlotGone(deps: MirrorDeps, slot: GridLevel, orderRef: string): Promise<string | null> {
  try {
    const status = await deps.gateway.getOrderStatus(orderRef, slot.symbol);
    if (status === 'cancelled') return null;
    return status === 'filled' ? `slot order ${orderRef} filled` : `slot order ${orderRef} still ${status}`;
  } catch (error) {
    rethrowFatal(error);
    return `slot order ${orderRef} unconfirmed: ${errorMessage(error)}`;
  }
}

async function freeSlot(deps: MirrorDeps, slot: GridLevel | undefined): Promise<string | null> {
  if (!slot || slot.status !== 'active' || !slot.orderRef) return null;
  const orderRef = slot.orderRef;
  try {
    await deps.gateway.cancelOrder(orderRef, slot.symbol);
    logger.info('mirror_slot_cancelled', {
      event: 'mirror_slot_cancelled',
      ...describeLevel(slot),
      orderRef,
    });
    return null;
  } catch (error) {
    rethrowFatal(error);
    if (error instanceof OrderNotFoundError) return confirmSlotGone(deps, slot, orderRef);
    return errorMessage(error);
  }
}

/**
 * True when the slot already carries this fill's mirror, placed or parked.
 * Used to resume fills whose mirror was interrupted.
 */
export function hasMirror(
  filled: GridLevel,
  slot: GridLevel | undefined,
  config: Pick<GridConfig, 'spread' | 'logMultiplier' | 'priceDecimals'>
) {
  if (!slot) return false;
  const mirror = computeMirror(filled, config);
  return slot.price === mirror.price && (slot.status === 'active' || slot.pinned);
}

/**
 * Places the mirror of a filled level. A live order in the target slot is
 * cancelled first; if the venue no longer knows it, the slot is only reused
 * once the order is confirmed cancelled. When funds are short or the venue
 * refuses, the slot is parked as pending and pinned to the mirror price so
 * later ticks retry it.
 */
export async function placeMirror(
  deps: MirrorDeps,
  filled: GridLevel,
  config: Pick<GridConfig, 'spread' | 'logMultiplier' | 'priceDecimals'>,
  slot?: GridLevel
): Promise<MirrorOutcome> {
  const mirror = computeMirror(filled, config);
  const identity = { symbol: mirror.symbol, levelIndex: mirror.levelIndex, side: mirror.side };

  if (!(mirror.price > 0)) {
    ordersSkippedCounter.labels(mirror.symbol, mirror.side, 'invalid_order').inc();
    logger.info('mirror_invalid_price', { event: 'mirror_invalid_price', ...identity, price: mirror.price });
    return { outcome: 'blocked', reason: 'invalid_order' };
  }

  const cancelFailure = await freeSlot(deps, slot);
  if (cancelFailure !== null) {
    // the slot still holds a resting order on this index and side
    logger.warn('mirror_blocked', {
      event: 'mirror_blocked',
      ...identity,
      orderRef: slot?.orderRef,
      reason: cancelFailure,
    });
    return { outcome: 'blocked', reason: cancelFailure };
  }

  const defer = async (reason: string): Promise<MirrorOutcome> => {
    ordersSkippedCounter.labels(mirror.symbol, mirror.side, reason).inc();
    const level = await deps.ledger.upsertLevel(
      { ...identity, price: mirror.price, baseAmount: mirror.baseAmount, orderRef: null, status: 'pending', pinned: true },
      { preserveOrder: true }
    );
    logger.warn('mirror_deferred', { event: 'mirror_deferred', ...identity, price: mirror.price, reason });
    return { outcome: 'deferred', level, reason };
  };

  let verdictReason: string | null = null;
  try {
    const verdict = await deps.guard.check({
      symbol: mirror.symbol,
      side: mirror.side,
      qty: mirror.baseAmount,
      price: mirror.price,
    });
    if (verdict.verdict === 'insufficient') {
      logger.info('mirror_insufficient_balance', {
        event: 'mirror_insufficient_balance',
        ...identity,
        currency: verdict.currency,
        required: verdict.required,
        available: verdict.available,
        shortfall: verdict.shortfall,
      });
      verdictReason = 'insufficient_balance';
    }
  } catch (error) {
    rethrowFatal(error);
    logger.warn('mirror_balance_unavailable', { event: 'mirror_balance_unavailable', ...identity, error: errorMessage(error) });
    verdictReason = 'balance_unavailable';
  }
  if (verdictReason !== null) {
    return defer(verdictReason);
  }

  let orderId: string;
  try {
    const ack = await deps.gateway.placeLimitOrder(mirror.symbol, mirror.side, mirror.baseAmount, mirror.price);
    orderId = ack.orderId;
  } catch (error) {
    rethrowFatal(error);
    if (error instanceof OrderRejectedError) {
      logger.warn('mirror_rejected', { event: 'mirror_rejected', ...identity, reason: error.reason });
      return defer('rejected');
    }
    logger.warn('mirror_place_failed', { event: 'mirror_place_failed', ...identity, error: errorMessage(error) });
    return defer('gateway_error');
  }

  const level = await deps.ledger.upsertLevel(
    { ...identity, price: mirror.price, baseAmount: mirror.baseAmount, orderRef: orderId, status: 'active', pinned: false },
    { preserveOrder: true }
  );
  ordersPlacedCounter.labels(mirror.symbol, mirror.side, 'mirror').inc();
  logger.info('mirror_placed', {
    event: 'mirror_placed',
    ...identity,
    price: mirror.price,
    amount: mirror.baseAmount,
    orderRef: orderId,
    filledPrice: filled.price,
  });
  return { outcome: 'placed', level };
}
