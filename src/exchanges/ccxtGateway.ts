import {
  AuthenticationError,
  BadRequest,
  BadSymbol,
  InsufficientFunds,
  InvalidOrder,
  NetworkError,
  OrderNotFound,
  PermissionDenied,
} from 'ccxt';
import { z } from 'zod';
import { MarketDataError, OrderNotFoundError, OrderRejectedError } from '../errors';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';
import { retry, RetryOptions } from '../utils/retry';
import type { OrderSide } from '../strategies/types';
import type { ExchangeGateway, OrderAck, PlacedOrder, PlacedOrderStatus, TickerSnapshot } from './types';

const nullableNumber = z.number().finite().nullish().transform((value) => value ?? null);

const TickerSchema = z.object({
  last: z.number().finite().positive(),
  bid: nullableNumber,
  ask: nullableNumber,
  baseVolume: nullableNumber,
});

const BalancesSchema = z.record(z.unknown());

const BalanceEntrySchema = z.object({
  free: z.number().finite(),
});

const OrderStatusSchema = z.enum(['open', 'closed', 'canceled', 'cancelled', 'expired', 'rejected']);

const OrderSchema = z.object({
  id: z.string().min(1),
  symbol: z.string().min(1),
  side: z.enum(['buy', 'sell']),
  amount: z.number().finite(),
  price: z.number().finite(),
  status: OrderStatusSchema,
});

const OrderAckSchema = z.object({
  id: z.string().min(1),
});

export function normalizeOrderStatus(status: z.infer<typeof OrderStatusSchema>): PlacedOrderStatus {
  switch (status) {
    case 'open':
      return 'open';
    case 'closed':
      return 'filled';
    default:
      return 'cancelled';
  }
}

function isTransient(error: unknown) {
  return error instanceof NetworkError;
}

function isVenueRejection(error: unknown) {
  // OrderNotFound extends InvalidOrder in ccxt, so callers check it first
  return (
    error instanceof InsufficientFunds ||
    error instanceof InvalidOrder ||
    error instanceof BadSymbol ||
    error instanceof BadRequest ||
    error instanceof PermissionDenied ||
    error instanceof AuthenticationError
  );
}

/** The slice of a ccxt Exchange the gateway calls. */
export interface CcxtExchangeLike {
  readonly id?: string;
  loadMarkets(): Promise<unknown>;
  fetchTicker(symbol: string): Promise<unknown>;
  fetchBalance(): Promise<unknown>;
  fetchOpenOrders(symbol?: string): Promise<unknown[]>;
  createOrder(symbol: string, type: 'limit', side: OrderSide, amount: number, price: number): Promise<unknown>;
  fetchOrder(id: string, symbol: string, params?: Record<string, unknown>): Promise<unknown>;
  cancelOrder(id: string, symbol: string): Promise<unknown>;
  amountToPrecision(symbol: string, amount: number): string;
  priceToPrecision(symbol: string, price: number): string;
}

export interface CcxtGatewayOptions {
  retry?: Pick<RetryOptions, 'attempts' | 'delayMs' | 'backoffFactor' | 'maxDelayMs'>;
}

/**
 * ExchangeGateway over a ccxt Exchange. Every response is validated; a missing
 * field is a MarketDataError, never a silent default.
 */
export class CcxtGateway implements ExchangeGateway {
  readonly id: string;
  private connected = false;

  constructor(
    private readonly exchange: CcxtExchangeLike,
    private readonly options: CcxtGatewayOptions = {}
  ) {
    this.id = exchange.id ?? 'ccxt';
  }

  async connect() {
    if (this.connected) return;
    await this.read('load_markets', () => this.exchange.loadMarkets());
    this.connected = true;
  }

  async getTicker(symbol: string): Promise<TickerSnapshot> {
    let raw: unknown;
    try {
      raw = await this.read('fetch_ticker', () => this.exchange.fetchTicker(symbol));
    } catch (error) {
      throw new MarketDataError(symbol, `ticker unavailable: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = TickerSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MarketDataError(symbol, `malformed ticker: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return {
      bid: parsed.data.bid,
      ask: parsed.data.ask,
      last: parsed.data.last,
      volume: parsed.data.baseVolume,
    };
  }

  async getFreeBalance(currency: string): Promise<number> {
    let raw: unknown;
    try {
      raw = await this.read('fetch_balance', () => this.exchange.fetchBalance());
    } catch (error) {
      throw new MarketDataError(currency, `balance unavailable: ${errorMessage(error)}`, { cause: error });
    }
    const parsedBalances = BalancesSchema.safeParse(raw);
    if (!parsedBalances.success) {
      throw new MarketDataError(currency, 'balance response is not an object');
    }
    const balances = parsedBalances.data;
    // venues omit currencies the account has never held
    if (!(currency in balances)) return 0;
    const parsed = BalanceEntrySchema.safeParse(balances[currency]);
    if (!parsed.success) {
      throw new MarketDataError(currency, 'balance entry has no numeric free amount');
    }
    return parsed.data.free;
  }

  async getOpenOrders(symbol?: string): Promise<PlacedOrder[]> {
    let raw: unknown[];
    try {
      raw = await this.read('fetch_open_orders', () => this.exchange.fetchOpenOrders(symbol));
    } catch (error) {
      throw new MarketDataError(symbol ?? 'account', `open orders unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const orders: PlacedOrder[] = [];
    for (const entry of raw) {
      const parsed = OrderSchema.safeParse(entry);
      if (!parsed.success) {
        // e.g. a market or conditional order placed by hand
        logger.warn('open_order_skipped', {
          event: 'open_order_skipped',
          symbol: symbol ?? 'account',
          reason: parsed.error.issues[0]?.message ?? 'invalid',
        });
        continue;
      }
      orders.push({
        orderId: parsed.data.id,
        symbol: parsed.data.symbol,
        side: parsed.data.side,
        qty: parsed.data.amount,
        price: parsed.data.price,
        status: normalizeOrderStatus(parsed.data.status),
      });
    }
    return orders;
  }

  async placeLimitOrder(symbol: string, side: OrderSide, qty: number, price: number): Promise<OrderAck> {
    let raw: unknown;
    try {
      const amount = Number(this.exchange.amountToPrecision(symbol, qty));
      const limitPrice = Number(this.exchange.priceToPrecision(symbol, price));
      raw = await this.exchange.createOrder(symbol, 'limit', side, amount, limitPrice);
    } catch (error) {
      if (isVenueRejection(error)) {
        throw new OrderRejectedError(symbol, errorMessage(error), { cause: error });
      }
      throw error;
    }
    const parsed = OrderAckSchema.safeParse(raw);
    if (!parsed.success) {
      // the venue accepted something; without an id the order cannot be tracked
      throw new MarketDataError(symbol, 'order acknowledgement carried no order id');
    }
    return { orderId: parsed.data.id };
  }

  async getOrderStatus(orderId: string, symbol: string): Promise<PlacedOrderStatus> {
    const params = this.exchange.id === 'bybit' ? { acknowledged: true } : {};
    let raw: unknown;
    try {
      raw = await this.read('fetch_order', () => this.exchange.fetchOrder(orderId, symbol, params));
    } catch (error) {
      if (error instanceof OrderNotFound) {
        throw new OrderNotFoundError(orderId, symbol, { cause: error });
      }
      throw error;
    }
    const parsed = OrderSchema.pick({ status: true }).safeParse(raw);
    if (!parsed.success) {
      throw new MarketDataError(symbol, `order ${orderId} has an unknown status`);
    }
    return normalizeOrderStatus(parsed.data.status);
  }

  async cancelOrder(orderId: string, symbol: string): Promise<void> {
    try {
      await this.exchange.cancelOrder(orderId, symbol);
    } catch (error) {
      if (error instanceof OrderNotFound) {
        throw new OrderNotFoundError(orderId, symbol, { cause: error });
      }
      throw error;
    }
  }

  private read<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const settings = this.options.retry ?? {};
    return retry(call, {
      ...settings,
      shouldRetry: isTransient,
      onRetry: (error, attempt) => {
        logger.warn('exchange_call_retry', {
          event: 'exchange_call_retry',
          exchange: this.id,
          operation,
          attempt,
          error: errorMessage(error),
        });
      },
    });
  }
}
