import { MarketDataError, OrderNotFoundError, OrderRejectedError } from '../../src/errors';
import type {
  ExchangeGateway,
  OrderAck,
  PlacedOrder,
  PlacedOrderStatus,
  TickerSnapshot,
} from '../../src/exchanges/types';
import type { OrderSide } from '../../src/strategies/types';

/** In-memory venue: orders rest until a test fills, cancels or forgets them. */
export class FakeGateway implements ExchangeGateway {
  readonly id = 'fake';
  readonly prices = new Map<string, number>();
  readonly balances = new Map<string, number>();
  readonly orders = new Map<string, PlacedOrder>();
  readonly placed: PlacedOrder[] = [];
  readonly cancelled: string[] = [];
  readonly tickerErrors = new Map<string, Error>();
  readonly statusErrors = new Map<string, Error>();
  private placeErrors: Error[] = [];
  private seq = 0;

  setPrice(symbol: string, price: number) {
    this.prices.set(symbol, price);
    return this;
  }

  setBalance(currency: string, amount: number) {
    this.balances.set(currency, amount);
    return this;
  }

  failNextPlacement(error: Error = new OrderRejectedError('any', 'price out of band')) {
    this.placeErrors.push(error);
  }

  fill(orderId: string) {
    this.setStatus(orderId, 'filled');
  }

  cancelExternally(orderId: string) {
    this.setStatus(orderId, 'cancelled');
  }

  /** The venue stops knowing the order. */
  forget(orderId: string) {
    this.orders.delete(orderId);
  }

  /** Adds a resting order the grid did not place. */
  seedOpenOrder(order: Omit<PlacedOrder, 'orderId' | 'status'>) {
    this.seq += 1;
    const placed: PlacedOrder = { ...order, orderId: `ext-${this.seq}`, status: 'open' };
    this.orders.set(placed.orderId, placed);
    return placed;
  }

  async getTicker(symbol: string): Promise<TickerSnapshot> {
    const error = this.tickerErrors.get(symbol);
    if (error) throw error;
    const last = this.prices.get(symbol);
    if (last === undefined) {
      throw new MarketDataError(symbol, 'unknown symbol');
    }
    return { bid: last, ask: last, last, volume: null };
  }

  async getFreeBalance(currency: string): Promise<number> {
    return this.balances.get(currency) ?? 0;
  }

  async getOpenOrders(symbol?: string): Promise<PlacedOrder[]> {
    return [...this.orders.values()]
      .filter((order) => order.status === 'open' && (symbol === undefined || order.symbol === symbol))
      .map((order) => ({ ...order }));
  }

  async placeLimitOrder(symbol: string, side: OrderSide, qty: number, price: number): Promise<OrderAck> {
    const error = this.placeErrors.shift();
    if (error) throw error;
    this.seq += 1;
    const order: PlacedOrder = { orderId: `ord-${this.seq}`, symbol, side, qty, price, status: 'open' };
    this.orders.set(order.orderId, order);
    this.placed.push({ ...order });
    return { orderId: order.orderId };
  }

  async getOrderStatus(orderId: string, symbol: string): Promise<PlacedOrderStatus> {
    const error = this.statusErrors.get(orderId);
    if (error) throw error;
    const order = this.orders.get(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId, symbol);
    }
    return order.status;
  }

  async cancelOrder(orderId: string, symbol: string): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order || order.status !== 'open') {
      throw new OrderNotFoundError(orderId, symbol);
    }
    order.status = 'cancelled';
    this.cancelled.push(orderId);
  }

  openOrders() {
    return [...this.orders.values()].filter((order) => order.status === 'open');
  }

  private setStatus(orderId: string, status: PlacedOrderStatus) {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`unknown order ${orderId}`);
    order.status = status;
  }
}
