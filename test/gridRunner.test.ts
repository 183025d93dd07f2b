import { describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../src/errors';
import { KillSwitch } from '../src/guard/killSwitch';
import { GridRunner } from '../src/workers/gridRunner';

describe('GridRunner', () => {
  it('stops after maxTicks', async () => {
    const tick = vi.fn().mockResolvedValue(undefined);
    const runner = new GridRunner({ tick }, { intervalMs: 1, maxTicks: 3, killSwitch: new KillSwitch() });

    await expect(runner.run()).resolves.toEqual({ ticks: 3, reason: 'max_ticks' });
    expect(tick).toHaveBeenCalledTimes(3);
  });

  it('finishes the current tick and stops when the kill switch fires mid-tick', async () => {
    const killSwitch = new KillSwitch();
    const tick = vi.fn(async () => {
      killSwitch.activate('operator');
    });
    const runner = new GridRunner({ tick }, { intervalMs: 60_000, killSwitch });

    await expect(runner.run()).resolves.toEqual({ ticks: 1, reason: 'operator' });
    expect(tick).toHaveBeenCalledTimes(1);
  });

  it('wakes from the pause between ticks when the kill switch fires', async () => {
    const killSwitch = new KillSwitch();
    const tick = vi.fn().mockResolvedValue(undefined);
    const runner = new GridRunner({ tick }, { intervalMs: 60_000, killSwitch });

    const timer = setTimeout(() => killSwitch.activate('SIGTERM'), 5);
    const summary = await runner.run();
    clearTimeout(timer);

    expect(summary).toEqual({ ticks: 1, reason: 'SIGTERM' });
  });

  it('does not tick when the kill switch is already active', async () => {
    const killSwitch = new KillSwitch();
    killSwitch.activate('maintenance');
    const tick = vi.fn().mockResolvedValue(undefined);

    await expect(new GridRunner({ tick }, { intervalMs: 1, killSwitch }).run()).resolves.toEqual({
      ticks: 0,
      reason: 'maintenance',
    });
    expect(tick).not.toHaveBeenCalled();
  });

  it('rethrows fatal errors', async () => {
    const tick = vi.fn().mockRejectedValue(new ConfigError('bad sizing'));
    const runner = new GridRunner({ tick }, { intervalMs: 1, maxTicks: 5, killSwitch: new KillSwitch() });

    await expect(runner.run()).rejects.toThrow('bad sizing');
    expect(tick).toHaveBeenCalledTimes(1);
  });

  it('logs a failed tick and keeps running', async () => {
    const tick = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValue(undefined);
    const runner = new GridRunner({ tick }, { intervalMs: 1, maxTicks: 2, killSwitch: new KillSwitch() });

    await expect(runner.run()).resolves.toEqual({ ticks: 2, reason: 'max_ticks' });
    expect(tick).toHaveBeenCalledTimes(2);
  });
});
