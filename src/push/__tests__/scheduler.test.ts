import { describe, it, expect, vi, beforeEach } from 'vitest';

const cronMock = vi.hoisted(() => {
  const stop = vi.fn();
  return {
    stop,
    validate: vi.fn<(expression: string) => boolean>(),
    schedule: vi.fn((_expression: string, _fn: () => void, _options?: { timezone?: string }) => ({ stop })),
  };
});

vi.mock('node-cron', () => ({
  default: { validate: cronMock.validate, schedule: cronMock.schedule },
}));

import { startScheduler, stopScheduler } from '../scheduler.js';
import { ConfigSchema } from '../../shared/config.js';
import { RunInProgressError } from '../../shared/errors.js';
import type { RunReport } from '../../engine/pipeline.js';

function scheduleConfig(overrides: Record<string, unknown> = {}) {
  return ConfigSchema.parse({ schedule: { enabled: true, ...overrides } }).schedule;
}

beforeEach(() => {
  stopScheduler();
  vi.clearAllMocks();
  cronMock.validate.mockReturnValue(true);
});

describe('startScheduler', () => {
  it('does nothing when disabled', () => {
    const trigger = vi.fn<() => Promise<RunReport>>();

    expect(startScheduler(scheduleConfig({ enabled: false }), trigger)).toBe(false);
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it('refuses an invalid cron expression', () => {
    cronMock.validate.mockReturnValue(false);

    expect(startScheduler(scheduleConfig({ run_cron: 'every day' }), vi.fn())).toBe(false);
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it('schedules the trigger with the configured timezone', () => {
    const trigger = vi.fn<() => Promise<RunReport>>();

    expect(startScheduler(scheduleConfig({ timezone: 'Europe/Berlin' }), trigger)).toBe(true);

    const call = cronMock.schedule.mock.calls[0];
    expect(call?.[0]).toBe('0 8 * * *');
    expect(call?.[2]).toEqual({ timezone: 'Europe/Berlin' });
  });

  it('fires the trigger and tolerates a run already in progress', async () => {
    const trigger = vi.fn<() => Promise<RunReport>>().mockRejectedValue(new RunInProgressError('run-1'));
    startScheduler(scheduleConfig(), trigger);

    const tick = cronMock.schedule.mock.calls[0]?.[1];
    tick?.();
    await vi.waitFor(() => expect(trigger).toHaveBeenCalledOnce());
    expect(cronMock.schedule.mock.calls[0]?.[2]).toBeUndefined();
  });

  it('stops the scheduled task', () => {
    startScheduler(scheduleConfig(), vi.fn());
    stopScheduler();

    expect(cronMock.stop).toHaveBeenCalledOnce();
  });
});
