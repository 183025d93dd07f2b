import http from 'http';
import { Counter, Gauge, register } from 'prom-client';
import { logger } from '../utils/logger';

const metricsRegistered: { server: http.Server | null } = { server: null };

export const ordersPlacedCounter = new Counter({
  name: 'grid_orders_placed_total',
  help: 'Limit orders placed by the grid, including mirror orders',
  labelNames: ['symbol', 'side', 'kind'] as const,
});

export const ordersSkippedCounter = new Counter({
  name: 'grid_orders_skipped_total',
  help: 'Candidate orders not placed this tick, by reason',
  labelNames: ['symbol', 'side', 'reason'] as const,
});

export const fillCounter = new Counter({
  name: 'grid_fills_total',
  help: 'Observed fills by side',
  labelNames: ['symbol', 'side'] as const,
});

export const gatewayErrorCounter = new Counter({
  name: 'grid_gateway_errors_total',
  help: 'Exchange gateway failures by error code',
  labelNames: ['symbol', 'code'] as const,
});

export const activeLevelsGauge = new Gauge({
  name: 'grid_active_levels',
  help: 'Levels with a resting order after the last tick',
  labelNames: ['symbol'] as const,
});

export const symbolSuspendedGauge = new Gauge({
  name: 'grid_symbol_suspended',
  help: 'Circuit breaker suspension per symbol (1=suspended, 0=trading)',
  labelNames: ['symbol'] as const,
});

export function startMetricsServer(port: number) {
  if (metricsRegistered.server) return metricsRegistered.server;
  const server = http.createServer(async (req, res) => {
    if (req.url === '/metrics') {
      try {
        const metrics = await register.metrics();
        res.writeHead(200, { 'Content-Type': register.contentType });
        res.end(metrics);
      } catch (err) {
        res.writeHead(500);
        res.end(String(err));
      }
    } else {
      res.writeHead(404);
      res.end('Not found');
    }
  });
  server.listen(port, () => {
    logger.info('metrics_server_listening', { event: 'metrics_server_listening', port });
  });
  metricsRegistered.server = server;
  return server;
}

export function stopMetricsServer() {
  const server = metricsRegistered.server;
  metricsRegistered.server = null;
  if (!server) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export function resetMetrics() {
  ordersPlacedCounter.reset();
  ordersSkippedCounter.reset();
  fillCounter.reset();
  gatewayErrorCounter.reset();
  activeLevelsGauge.reset();
  symbolSuspendedGauge.reset();
}
