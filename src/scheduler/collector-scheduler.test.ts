import { describe, it, expect, vi, beforeEach } from 'vitest';

const { validate, schedule, stop } = vi.hoisted(() => ({
  validate: vi.fn(),
  schedule: vi.fn(),
  stop: vi.fn(),
}));

vi.mock('node-cron', () => ({
  default: { validate, schedule },
}));

import { CollectorScheduler } from './collector-scheduler.js';

/** The tick callback handed to cron.schedule. */
function scheduledTick(): () => void {
  const tick: unknown = schedule.mock.calls[0]?.[1];
  if (typeof tick !== 'function') throw new Error('cron.schedule was not called');
  return () => tick();
}

describe('CollectorScheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    validate.mockReturnValue(true);
    schedule.mockReturnValue({ stop });
  });

  it('schedules the job on the expression', () => {
    const scheduler = new CollectorScheduler('*/15 * * * *', vi.fn().mockResolvedValue(undefined));
    scheduler.start();

    expect(validate).toHaveBeenCalledWith('*/15 * * * *');
    expect(schedule).toHaveBeenCalledWith('*/15 * * * *', expect.any(Function));
  });

  it('rejects an invalid expression', () => {
    validate.mockReturnValue(false);
    const scheduler = new CollectorScheduler('every minute', vi.fn());

    expect(() => scheduler.start()).toThrow('Invalid cron expression: "every minute"');
    expect(schedule).not.toHaveBeenCalled();
  });

  it('refuses to start twice', () => {
    const scheduler = new CollectorScheduler('* * * * *', vi.fn());
    scheduler.start();

    expect(() => scheduler.start()).toThrow('Scheduler already started');
  });

  it('stops the cron task', () => {
    const scheduler = new CollectorScheduler('* * * * *', vi.fn());
    scheduler.start();
    scheduler.stop();
    scheduler.stop();

    expect(stop).toHaveBeenCalledTimes(1);
  });

  it('runs the job on each tick', async () => {
    const job = vi.fn().mockResolvedValue(undefined);
    const scheduler = new CollectorScheduler('* * * * *', job);
    scheduler.start();

    scheduledTick()();
    await vi.waitFor(() => expect(job).toHaveBeenCalledTimes(1));
  });

  it('skips a tick while the previous run is in flight', async () => {
    let finish: () => void = () => undefined;
    const job = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new CollectorScheduler('* * * * *', job);

    const first = scheduler.runNow();
    expect(scheduler.isRunning).toBe(true);
    await expect(scheduler.runNow()).resolves.toBe(false);

    finish();
    await expect(first).resolves.toBe(true);
    expect(scheduler.isRunning).toBe(false);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it('keeps going after a failed run', async () => {
    const job = vi.fn().mockRejectedValueOnce(new Error('influx down')).mockResolvedValue(undefined);
    const scheduler = new CollectorScheduler('* * * * *', job);

    await expect(scheduler.runNow()).resolves.toBe(true);
    await expect(scheduler.runNow()).resolves.toBe(true);
    expect(job).toHaveBeenCalledTimes(2);
  });
});
