import axios from 'axios';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function serializeMeta(meta: LogMeta) {
  if (!meta) return {};
  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    if (value instanceof Error) {
      serialized[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'object' && value !== null) {
      serialized[key] = JSON.parse(
        JSON.stringify(value, (_key, val: unknown) => {
          if (val instanceof Error) {
            return { name: val.name, message: val.message, stack: val.stack };
          }
          return val;
        })
      );
    } else {
      serialized[key] = value;
    }
  }
  return serialized;
}

let ingestionWebhook: string | null = null;
let ingestionFailureReported = false;
let baseMeta: Record<string, unknown> = {};
let minLevel: LogLevel = 'info';

function emit(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    msg,
    ...baseMeta,
    ...serializeMeta(meta),
  };
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else if (level === 'debug') {
    console.debug(line);
  } else {
    console.log(line);
  }

  if (ingestionWebhook) {
    axios.post(ingestionWebhook, entry, { timeout: 2000 }).catch((error: unknown) => {
      // report once; a dead webhook must not flood stderr on every line
      if (ingestionFailureReported) return;
      ingestionFailureReported = true;
      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: 'error',
          msg: 'log_ingestion_failed',
          error: error instanceof Error ? error.message : String(error),
        })
      );
    });
  }
}

export const logger = {
  debug(msg: string, meta?: LogMeta) {
    emit('debug', msg, meta);
  },
  info(msg: string, meta?: LogMeta) {
    emit('info', msg, meta);
  },
  warn(msg: string, meta?: LogMeta) {
    emit('warn', msg, meta);
  },
  error(msg: string, meta?: LogMeta) {
    emit('error', msg, meta);
  },
};

export function setLogLevel(level: LogLevel) {
  minLevel = level;
}

export function setLogIngestionWebhook(url: string | null) {
  ingestionWebhook = url;
  ingestionFailureReported = false;
}

export function setLogContext(meta: Record<string, unknown>) {
  baseMeta = { ...meta };
}

export function clearLogContext() {
  baseMeta = {};
}
