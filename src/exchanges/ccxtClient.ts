import ccxt, { Exchange } from 'ccxt';
import { ConfigError } from '../errors';

export interface ExchangeConnectionOptions {
  exchangeId: string;
  apiKey: string;
  apiSecret: string;
  sandbox?: boolean;
}

type ExchangeFactory = (settings: Record<string, unknown>) => Exchange;

const EXCHANGE_FACTORIES: Record<string, ExchangeFactory> = {
  bybit: (settings) => new ccxt.bybit(settings),
  binance: (settings) => new ccxt.binance(settings),
  okx: (settings) => new ccxt.okx(settings),
  kucoin: (settings) => new ccxt.kucoin(settings),
  gateio: (settings) => new ccxt.gateio(settings),
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

export function getExchange(options: ExchangeConnectionOptions): Exchange {
  const factory = EXCHANGE_FACTORIES[options.exchangeId];
  if (!factory) {
    throw new ConfigError(
      `exchange ${options.exchangeId} is not supported (expected one of ${SUPPORTED_EXCHANGES.join(', ')})`
    );
  }
  const exchange = factory({
    apiKey: options.apiKey,
    secret: options.apiSecret,
    enableRateLimit: true,
    options: {
      defaultType: 'spot',
      adjustForTimeDifference: true,
      warnOnFetchOpenOrdersWithoutSymbol: false,
    },
  });
  if (options.sandbox) {
    exchange.setSandboxMode(true);
  }
  return exchange;
}
