import type { OrderSide } from '../strategies/types';

export interface TickerSnapshot {
  bid: number | null;
  ask: number | null;
  last: number;
  volume: number | null;
}

export type PlacedOrderStatus = 'open' | 'filled' | 'cancelled';

export interface PlacedOrder {
  orderId: string;
  symbol: string;
  side: OrderSide;
  qty: number;
  price: number;
  status: PlacedOrderStatus;
}

export interface OrderAck {
  orderId: string;
}

/**
 * Everything the grid engine needs from a venue. Implementations raise
 * MarketDataError, OrderRejectedError and OrderNotFoundError from ../errors.
 */
export interface ExchangeGateway {
  readonly id: string;
  getTicker(symbol: string): Promise<TickerSnapshot>;
  getFreeBalance(currency: string): Promise<number>;
  getOpenOrders(symbol?: string): Promise<PlacedOrder[]>;
  placeLimitOrder(symbol: string, side: OrderSide, qty: number, price: number): Promise<OrderAck>;
  getOrderStatus(orderId: string, symbol: string): Promise<PlacedOrderStatus>;
  cancelOrder(orderId: string, symbol: string): Promise<void>;
}
