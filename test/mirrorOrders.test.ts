import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Pool } from 'pg';
import { GridLevelsRepository } from '../src/db/gridLevelsRepo';
import { MarketDataError, OrderRejectedError } from '../src/errors';
import { BalanceGuard } from '../src/strategies/grid/balanceGuard';
import { computeMirror, hasMirror, placeMirror } from '../src/strategies/grid/mirrorOrders';
import type { GridLevel } from '../src/strategies/types';
import { createMigratedPool } from './helpers/db';
import { FakeGateway } from './helpers/fakeGateway';

const ladder = { spread: 0.001, logMultiplier: 1.5, priceDecimals: 6 };

function filledBuy(overrides: Partial<GridLevel> = {}): GridLevel {
  return {
    symbol: 'BTC/USDT',
    levelIndex: 2,
    side: 'buy',
    price: 100,
    baseAmount: 0.5,
    orderRef: 'ord-filled',
    status: 'filled',
    pinned: false,
    ...overrides,
  };
}

describe('computeMirror', () => {
  it('mirrors a filled buy into a sell one level distance above the fill', () => {
    expect(computeMirror(filledBuy(), ladder)).toEqual({
      symbol: 'BTC/USDT',
      levelIndex: 2,
      side: 'sell',
      price: 100.225,
      baseAmount: 0.5,
    });
  });

  it('mirrors a filled sell into a buy below the fill', () => {
    const mirror = computeMirror(filledBuy({ side: 'sell', levelIndex: 0, price: 200 }), {
      spread: 0.01,
      logMultiplier: 2,
      priceDecimals: 6,
    });
    expect(mirror.side).toBe('buy');
    expect(mirror.price).toBe(198);
  });
});

describe('placeMirror', () => {
  let pool: Pool;
  let ledger: GridLevelsRepository;
  let gateway: FakeGateway;

  beforeEach(async () => {
    ({ pool } = await createMigratedPool());
    ledger = new GridLevelsRepository(pool);
    gateway = new FakeGateway().setBalance('BTC', 1).setBalance('USDT', 1000);
  });

  afterEach(async () => {
    await pool.end();
  });

  const deps = () => ({ gateway, guard: new BalanceGuard(gateway), ledger });

  it('places the mirror and records it as active', async () => {
    const outcome = await placeMirror(deps(), filledBuy(), ladder);
    expect(outcome.outcome).toBe('placed');
    expect(gateway.placed).toEqual([
      { orderId: 'ord-1', symbol: 'BTC/USDT', side: 'sell', qty: 0.5, price: 100.225, status: 'open' },
    ]);
    const stored = (await ledger.loadGrids()).get('BTC/USDT') ?? [];
    expect(stored).toHaveLength(1);
    expect(stored[0]).toMatchObject({
      levelIndex: 2,
      side: 'sell',
      price: 100.225,
      baseAmount: 0.5,
      orderRef: 'ord-1',
      status: 'active',
      pinned: false,
    });
  });

  it('cancels a live order sitting in the target slot first', async () => {
    const live = await gateway.placeLimitOrder('BTC/USDT', 'sell', 0.5, 101);
    const slot: GridLevel = filledBuy({ side: 'sell', price: 101, orderRef: live.orderId, status: 'active' });
    await ledger.upsertLevel(slot, { preserveOrder: true });

    const outcome = await placeMirror(deps(), filledBuy(), ladder, slot);

    expect(gateway.cancelled).toEqual(['ord-1']);
    expect(outcome.outcome).toBe('placed');
    if (outcome.outcome === 'placed') {
      expect(outcome.level.orderRef).toBe('ord-2');
    }
  });

  it('parks the slot as pinned pending when the base balance is short', async () => {
    gateway.setBalance('BTC', 0.1);
    const outcome = await placeMirror(deps(), filledBuy(), ladder);

    expect(outcome).toMatchObject({ outcome: 'deferred', reason: 'insufficient_balance' });
    expect(gateway.placed).toHaveLength(0);
    const stored = (await ledger.loadGrids()).get('BTC/USDT') ?? [];
    expect(stored[0]).toMatchObject({ side: 'sell', price: 100.225, status: 'pending', orderRef: null, pinned: true });
  });

  it('parks the slot when the venue rejects the order', async () => {
    gateway.failNextPlacement(new OrderRejectedError('BTC/USDT', 'post-only would cross'));
    const outcome = await placeMirror(deps(), filledBuy(), ladder);
    expect(outcome).toMatchObject({ outcome: 'deferred', reason: 'rejected' });
  });

  async function liveSlot() {
    const live = await gateway.placeLimitOrder('BTC/USDT', 'sell', 0.5, 101);
    const slot: GridLevel = filledBuy({ side: 'sell', price: 101, orderRef: live.orderId, status: 'active' });
    await ledger.upsertLevel(slot, { preserveOrder: true });
    return slot;
  }

  it('leaves the slot and its order alone when the cancel fails', async () => {
    const slot = await liveSlot();
    vi.spyOn(gateway, 'cancelOrder').mockRejectedValueOnce(new MarketDataError('BTC/USDT', 'timeout'));

    const outcome = await placeMirror(deps(), filledBuy(), ladder, slot);

    expect(outcome.outcome).toBe('blocked');
    expect(gateway.placed.map((order) => order.orderId)).toEqual(['ord-1']);
    const stored = (await ledger.loadGrids()).get('BTC/USDT') ?? [];
    expect(stored).toHaveLength(1);
    expect(stored[0]).toMatchObject({ side: 'sell', price: 101, status: 'active', orderRef: 'ord-1', pinned: false });
  });

  it('does not reuse a slot whose order filled before it could be cancelled', async () => {
    const slot = await liveSlot();
    gateway.fill('ord-1');

    const outcome = await placeMirror(deps(), filledBuy(), ladder, slot);

    expect(outcome).toEqual({ outcome: 'blocked', reason: 'slot order ord-1 filled' });
    expect(gateway.placed).toHaveLength(1);
    expect(((await ledger.loadGrids()).get('BTC/USDT') ?? [])[0]).toMatchObject({ status: 'active', orderRef: 'ord-1' });
  });

  it('blocks when the venue cannot confirm what happened to the slot order', async () => {
    const slot = await liveSlot();
    gateway.fill('ord-1');
    gateway.statusErrors.set('ord-1', new MarketDataError('BTC/USDT', 'timeout'));

    const outcome = await placeMirror(deps(), filledBuy(), ladder, slot);

    expect(outcome).toMatchObject({ outcome: 'blocked' });
    if (outcome.outcome === 'blocked') {
      expect(outcome.reason.startsWith('slot order ord-1 unconfirmed:')).toBe(true);
    }
    expect(gateway.placed).toHaveLength(1);
  });

  it('reuses a slot whose order was already cancelled on the venue', async () => {
    const slot = await liveSlot();
    gateway.cancelExternally('ord-1');

    const outcome = await placeMirror(deps(), filledBuy(), ladder, slot);

    expect(outcome.outcome).toBe('placed');
    expect(gateway.placed.map((order) => `${order.orderId}:${order.side}@${order.price}`)).toEqual([
      'ord-1:sell@101',
      'ord-2:sell@100.225',
    ]);
  });

  it('skips a mirror whose price is not positive', async () => {
    const wide = { spread: 0.5, logMultiplier: 2, priceDecimals: 6 };
    const outcome = await placeMirror(deps(), filledBuy({ side: 'sell' }), wide);

    expect(outcome).toEqual({ outcome: 'blocked', reason: 'invalid_order' });
    expect(gateway.placed).toHaveLength(0);
    expect((await ledger.loadGrids()).size).toBe(0);
  });
});

describe('hasMirror', () => {
  it('recognizes a slot already holding the mirror of a fill', () => {
    const placed = filledBuy({ side: 'sell', price: 100.225, orderRef: 'ord-9', status: 'active' });
    const parked = filledBuy({ side: 'sell', price: 100.225, orderRef: null, status: 'pending', pinned: true });
    const regenerated = filledBuy({ side: 'sell', price: 100.225, orderRef: null, status: 'pending' });

    expect(hasMirror(filledBuy(), placed, ladder)).toBe(true);
    expect(hasMirror(filledBuy(), parked, ladder)).toBe(true);
    expect(hasMirror(filledBuy(), regenerated, ladder)).toBe(false);
    expect(hasMirror(filledBuy(), undefined, ladder)).toBe(false);
  });
});
