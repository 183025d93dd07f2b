import { logger } from '../utils/logger';

type StopListener = (reason: string) => void;

/**
 * Cooperative stop signal. The runner checks it before each tick; activation
 * wakes any sleeper waiting between ticks.
 */
export class KillSwitch {
  private active = false;
  private reason: string | null = null;
  private listeners = new Set<StopListener>();

  isActive() {
    return this.active;
  }

  getReason() {
    return this.reason;
  }

  activate(reason: string) {
    if (this.active) return;
    this.active = true;
    this.reason = reason;
    logger.warn('kill_switch_activated', { event: 'kill_switch_activated', reason });
    for (const listener of [...this.listeners]) {
      listener(reason);
    }
  }

  reset() {
    this.active = false;
    this.reason = null;
  }

  /** Returns an unsubscribe function. */
  onActivate(listener: StopListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export const killSwitch = new KillSwitch();
