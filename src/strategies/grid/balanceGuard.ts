import type { ExchangeGateway, PlacedOrder } from '../../exchanges/types';
import { OrderSide, splitSymbol } from '../types';

export interface OrderCandidate {
  symbol: string;
  side: OrderSide;
  qty: number;
  price: number;
}

export type BalanceVerdict =
  | { verdict: 'sufficient'; currency: string; required: number; available: number }
  | { verdict: 'insufficient'; currency: string; required: number; available: number; shortfall: number };

function reservedQuote(orders: PlacedOrder[], quote: string) {
  let total = 0;
  for (const order of orders) {
    if (order.status !== 'open' || order.side !== 'buy') continue;
    if (splitSymbol(order.symbol).quote !== quote) continue;
    total += order.qty * order.price;
  }
  return total;
}

function reservedBase(orders: PlacedOrder[], symbol: string) {
  let total = 0;
  for (const order of orders) {
    if (order.status !== 'open' || order.side !== 'sell' || order.symbol !== symbol) continue;
    total += order.qty;
  }
  return total;
}

/**
 * Answers whether a candidate order fits in uncommitted capital. Free balance
 * is always netted against resting orders; nothing is cached between checks.
 */
export class BalanceGuard {
  constructor(private gateway: ExchangeGateway) {}

  async check(candidate: OrderCandidate): Promise<BalanceVerdict> {
    const { base, quote } = splitSymbol(candidate.symbol);
    let currency: string;
    let required: number;
    let available: number;

    if (candidate.side === 'buy') {
      currency = quote;
      required = candidate.qty * candidate.price;
      const free = await this.gateway.getFreeBalance(quote);
      const orders = await this.gateway.getOpenOrders();
      available = free - reservedQuote(orders, quote);
    } else {
      currency = base;
      required = candidate.qty;
      const free = await this.gateway.getFreeBalance(base);
      const orders = await this.gateway.getOpenOrders(candidate.symbol);
      available = free - reservedBase(orders, candidate.symbol);
    }

    if (available >= required) {
      return { verdict: 'sufficient', currency, required, available };
    }
    return { verdict: 'insufficient', currency, required, available, shortfall: required - available };
  }
}
