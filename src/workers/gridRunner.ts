import ms from 'ms';
import { isGridError } from '../errors';
import { KillSwitch, killSwitch as defaultKillSwitch } from '../guard/killSwitch';
import { errorMessage, formatError } from '../utils/formatError';
import { logger } from '../utils/logger';

export interface Tickable {
  tick(): Promise<unknown>;
}

export interface GridRunnerOptions {
  intervalMs: number;
  killSwitch?: KillSwitch;
  /** Stop after this many ticks; unbounded when omitted. */
  maxTicks?: number;
}

export interface RunSummary {
  ticks: number;
  reason: string;
}

/**
 * Fixed-interval loop over one Tickable. A tick always finishes before the
 * next starts; the interval is measured start to start and an overrunning
 * tick is followed immediately by the next.
 */
export class GridRunner {
  private readonly killSwitch: KillSwitch;

  constructor(
    private target: Tickable,
    private options: GridRunnerOptions
  ) {
    this.killSwitch = options.killSwitch ?? defaultKillSwitch;
  }

  async run(): Promise<RunSummary> {
    let ticks = 0;
    logger.info('runner_started', {
      event: 'runner_started',
      interval: ms(this.options.intervalMs),
      maxTicks: this.options.maxTicks,
    });

    while (!this.killSwitch.isActive()) {
      if (this.options.maxTicks !== undefined && ticks >= this.options.maxTicks) {
        return this.finish(ticks, 'max_ticks');
      }
      const startedAt = Date.now();
      try {
        await this.target.tick();
      } catch (error) {
        if (isGridError(error) && error.fatal) {
          logger.error('runner_fatal', { event: 'runner_fatal', ticks, error: formatError(error) });
          throw error;
        }
        logger.error('tick_failed', { event: 'tick_failed', tick: ticks + 1, error: errorMessage(error) });
      }
      ticks += 1;

      const elapsed = Date.now() - startedAt;
      if (elapsed > this.options.intervalMs) {
        logger.warn('tick_overrun', {
          event: 'tick_overrun',
          tick: ticks,
          elapsed: ms(elapsed),
          interval: ms(this.options.intervalMs),
        });
        continue;
      }
      if (this.options.maxTicks !== undefined && ticks >= this.options.maxTicks) continue;
      await this.pause(this.options.intervalMs - elapsed);
    }
    return this.finish(ticks, this.killSwitch.getReason() ?? 'stopped');
  }

  /** Sleeps for `delayMs` unless the kill switch fires first. */
  private pause(delayMs: number) {
    if (this.killSwitch.isActive()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const timer = setTimeout(done, delayMs);
      const unsubscribe = this.killSwitch.onActivate(done);
      function done() {
        clearTimeout(timer);
        unsubscribe();
        resolve();
      }
    });
  }

  private finish(ticks: number, reason: string): RunSummary {
    logger.info('runner_stopped', { event: 'runner_stopped', ticks, reason });
    return { ticks, reason };
  }
}
