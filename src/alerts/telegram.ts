import axios from 'axios';
import { logger } from '../utils/logger';
import { formatError } from '../utils/formatError';
import { retry } from '../utils/retry';

const SEND_TIMEOUT_MS = 5_000;

export interface AlertSink {
  send(message: string): Promise<void>;
}

export interface TelegramSettings {
  token: string;
  chatId: string;
}

export class TelegramAlerts implements AlertSink {
  constructor(private settings: TelegramSettings) {}

  /** Delivery failures are logged, never thrown: alerts must not stop trading. */
  async send(message: string) {
    const url = `https://api.telegram.org/bot${this.settings.token}/sendMessage`;
    const payload = { chat_id: this.settings.chatId, text: message };
    await retry(() => axios.post(url, payload, { timeout: SEND_TIMEOUT_MS }), {
      attempts: 3,
      delayMs: 500,
      backoffFactor: 2,
      onRetry: (error, attempt) => {
        logger.warn('telegram_send_retry', {
          event: 'telegram_send_retry',
          attempt,
          error: formatError(error),
          chatId: this.settings.chatId,
        });
      },
    }).catch((error) => {
      logger.warn('telegram_send_failed', {
        event: 'telegram_send_failed',
        error: formatError(error),
        chatId: this.settings.chatId,
      });
    });
  }
}

export const silentAlerts: AlertSink = {
  async send() {},
};

export function createAlertSink(settings: TelegramSettings | null): AlertSink {
  return settings ? new TelegramAlerts(settings) : silentAlerts;
}
