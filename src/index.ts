import { AppConfig, loadConfigFromDotenv } from './config';
import { buildExplicitGridConfig, describeAllocation, resolveGridConfig, resolveRiskProfile } from './config/riskProfiles';
import { createAlertSink } from './alerts/telegram';
import { getPool, closePool } from './db/pool';
import { runMigrations } from './db/migrations';
import { GridLevelsRepository } from './db/gridLevelsRepo';
import { GridFillsRepository } from './db/gridFillsRepo';
import { getExchange } from './exchanges/ccxtClient';
import { CcxtGateway } from './exchanges/ccxtGateway';
import type { ExchangeGateway } from './exchanges/types';
import { SymbolCircuitBreaker } from './guard/circuitBreaker';
import { killSwitch } from './guard/killSwitch';
import { GridSupervisor } from './strategies/grid/gridSupervisor';
import type { GridConfig, RiskProfile } from './strategies/types';
import { startMetricsServer, stopMetricsServer } from './telemetry/metrics';
import { errorMessage, formatError } from './utils/formatError';
import { logger, setLogContext, setLogIngestionWebhook, setLogLevel } from './utils/logger';
import { GridRunner } from './workers/gridRunner';

export interface ResolvedSizing {
  grid: Readonly<GridConfig>;
  profile: RiskProfile | null;
  totalDeposit: number | null;
}

/**
 * Turns the sizing section of the config into a GridConfig. Risk-based sizing
 * reads the free quote balance once at startup.
 */
export async function resolveSizing(
  config: Pick<AppConfig, 'sizing' | 'symbols' | 'quoteCurrency' | 'logMultiplier' | 'priceDecimals'>,
  gateway: Pick<ExchangeGateway, 'getFreeBalance'>
): Promise<ResolvedSizing> {
  const ladder = { logMultiplier: config.logMultiplier, priceDecimals: config.priceDecimals };
  if (config.sizing.mode === 'explicit') {
    return {
      grid: buildExplicitGridConfig({
        symbols: config.symbols,
        levelCount: config.sizing.levelCount,
        spread: config.sizing.spread,
        levelNotional: config.sizing.levelNotional,
        ...ladder,
      }),
      profile: null,
      totalDeposit: null,
    };
  }
  const profile = resolveRiskProfile(config.sizing.riskLevel);
  const totalDeposit = await gateway.getFreeBalance(config.quoteCurrency);
  return {
    grid: resolveGridConfig({ riskLevel: profile.id, totalDeposit, symbols: config.symbols, ...ladder }),
    profile,
    totalDeposit,
  };
}

async function main() {
  const config = loadConfigFromDotenv();
  setLogLevel(config.logLevel);
  setLogIngestionWebhook(config.logIngestWebhook);
  setLogContext({ service: 'log-grid-engine', exchange: config.exchange.id });
  const alerts = createAlertSink(config.telegram);

  if (config.metricsPort !== null) {
    startMetricsServer(config.metricsPort);
  }

  const pool = getPool(config.pgUrl);
  const shutdown = (signal: string) => {
    killSwitch.activate(`received ${signal}`);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await runMigrations(pool);

    const gateway = new CcxtGateway(
      getExchange({
        exchangeId: config.exchange.id,
        apiKey: config.exchange.apiKey,
        apiSecret: config.exchange.apiSecret,
        sandbox: config.exchange.sandbox,
      }),
      { retry: config.exchange.retry }
    );
    await gateway.connect();

    const sizing = await resolveSizing(config, gateway);
    const allocation = describeAllocation(sizing.grid, sizing.totalDeposit ?? 0, sizing.profile ?? undefined);
    logger.info('allocation_report', {
      event: 'allocation_report',
      profile: sizing.profile?.label ?? 'explicit',
      quoteCurrency: config.quoteCurrency,
      totalDeposit: sizing.totalDeposit ?? undefined,
      symbols: sizing.grid.symbols,
      logMultiplier: sizing.grid.logMultiplier,
      ...allocation,
    });

    const supervisor = new GridSupervisor({
      gateway,
      ledger: new GridLevelsRepository(pool),
      fills: new GridFillsRepository(pool),
      config: sizing.grid,
      breaker: new SymbolCircuitBreaker(config.breaker),
      alerts,
      orphanThreshold: config.orphanThreshold,
    });
    await supervisor.initialize();
    await supervisor.findUntrackedOrders();

    await alerts.send(`Grid engine started on ${config.exchange.id}: ${sizing.grid.symbols.join(', ')}`);
    const summary = await new GridRunner(supervisor, { intervalMs: config.tickIntervalMs }).run();
    await alerts.send(`Grid engine stopped after ${summary.ticks} ticks: ${summary.reason}`);
  } catch (error) {
    logger.error('engine_fatal', { event: 'engine_fatal', error: formatError(error) });
    await alerts.send(`Grid engine halted: ${errorMessage(error)}`);
    throw error;
  } finally {
    await stopMetricsServer().catch((error) => {
      logger.warn('metrics_server_close_failed', { event: 'metrics_server_close_failed', error: errorMessage(error) });
    });
    await closePool().catch((error) => {
      logger.warn('close_pool_failed', { event: 'close_pool_failed', error: errorMessage(error) });
    });
  }
}

if (require.main === module) {
  main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
