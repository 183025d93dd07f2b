#!/usr/bin/env node

import dotenv from 'dotenv';
import { ConfigError } from '../errors';
import { getPool, closePool } from '../db/pool';
import { runMigrations } from '../db/migrations';
import { GridLevelsRepository } from '../db/gridLevelsRepo';
import { GridFillsRepository } from '../db/gridFillsRepo';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';

type FlagMap = Record<string, string | boolean>;

export function parseFlags(tokens: string[]): FlagMap {
  const flags: FlagMap = {};
  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];
    if (!token.startsWith('--')) continue;
    const eqIdx = token.indexOf('=');
    if (eqIdx > -1) {
      flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
    } else {
      const key = token.slice(2);
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        flags[key] = next;
        i += 1;
      } else {
        flags[key] = true;
      }
    }
  }
  return flags;
}

export interface LedgerCliDeps {
  levels: GridLevelsRepository;
  fills: GridFillsRepository;
  print: (line: string) => void;
}

const USAGE = [
  'Usage: ledger-cli <command> [options]',
  '',
  'Commands:',
  '  stats                          level counts per status and fill totals per symbol',
  '  reset --yes [--symbol BTC/USDT] delete grid levels and fills (all symbols unless --symbol)',
];

async function printStats(deps: LedgerCliDeps) {
  const counts = await deps.levels.countBySymbol();
  const fills = await deps.fills.summarize();
  if (counts.length === 0) {
    deps.print('ledger is empty');
  }
  for (const entry of counts) {
    deps.print(
      `${entry.symbol}: ${entry.total} levels (pending ${entry.pending}, active ${entry.active}, filled ${entry.filled}, cancelled ${entry.cancelled})`
    );
  }
  for (const summary of fills) {
    deps.print(`${summary.symbol} ${summary.side}: ${summary.fills} fills, volume ${summary.volume}, notional ${summary.notional}`);
  }
}

async function reset(deps: LedgerCliDeps, flags: FlagMap) {
  if (flags.yes !== true) {
    throw new Error('reset deletes ledger rows; pass --yes to confirm');
  }
  const symbol = typeof flags.symbol === 'string' ? flags.symbol.toUpperCase() : undefined;
  const levels = await deps.levels.clear(symbol);
  const fills = await deps.fills.clear(symbol);
  logger.warn('ledger_reset', { event: 'ledger_reset', symbol: symbol ?? 'all', levels, fills });
  deps.print(`removed ${levels} levels and ${fills} fills${symbol ? ` for ${symbol}` : ''}`);
}

export async function runLedgerCommand(argv: string[], deps: LedgerCliDeps) {
  const [command, ...rest] = argv;
  const flags = parseFlags(rest);
  switch (command) {
    case 'stats':
      await printStats(deps);
      break;
    case 'reset':
      await reset(deps, flags);
      break;
    default:
      USAGE.forEach((line) => deps.print(line));
      throw new Error(command ? `Unknown command: ${command}` : 'No command given');
  }
}

async function main() {
  dotenv.config();
  const pgUrl = process.env.PG_URL;
  if (!pgUrl) {
    throw new ConfigError('PG_URL is required');
  }
  const pool = getPool(pgUrl);
  try {
    await runMigrations(pool);
    await runLedgerCommand(process.argv.slice(2), {
      levels: new GridLevelsRepository(pool),
      fills: new GridFillsRepository(pool),
      // eslint-disable-next-line no-console
      print: (line) => console.log(line),
    });
  } finally {
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
