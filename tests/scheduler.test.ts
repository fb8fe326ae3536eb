import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, SyncScheduler, hoursToMs, type SyncTarget } from '../src/scheduler.js';
import type { TriggerResult } from '../src/syncOrchestrator.js';
import type { SyncTrigger } from '../src/types.js';

class RecordingTarget implements SyncTarget {
  readonly calls: SyncTrigger[] = [];
  busy = false;

  trigger(source: SyncTrigger): TriggerResult {
    this.calls.push(source);
    if (this.busy) {
      return { accepted: false, reason: 'already-running', runningSince: '2026-03-01T10:00:00.000Z' };
    }
    return { accepted: true, runId: `run-${this.calls.length}` };
  }
}

describe('SyncScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('converts hours to milliseconds', () => {
    expect(hoursToMs(6)).toBe(21_600_000);
    expect(hoursToMs(0.5)).toBe(1_800_000);
  });

  it('syncs on startup and then every interval', () => {
    const target = new RecordingTarget();
    const scheduler = new SyncScheduler(target, { intervalMs: 1000 });

    scheduler.start();
    expect(target.calls).toEqual(['startup']);

    vi.advanceTimersByTime(2500);
    expect(target.calls).toEqual(['startup', 'scheduled', 'scheduled']);

    scheduler.stop();
    vi.advanceTimersByTime(5000);
    expect(target.calls).toHaveLength(3);
    expect(scheduler.running).toBe(false);
  });

  it('keeps ticking when a run is still active', () => {
    const target = new RecordingTarget();
    const scheduler = new SyncScheduler(target, { intervalMs: 1000 });
    scheduler.start();
    target.busy = true;

    vi.advanceTimersByTime(1000);
    target.busy = false;
    vi.advanceTimersByTime(1000);

    expect(target.calls).toEqual(['startup', 'scheduled', 'scheduled']);
    scheduler.stop();
  });

  it('refuses intervals the timer cannot hold', () => {
    const target = new RecordingTarget();
    expect(() => new SyncScheduler(target, { intervalMs: hoursToMs(1000) })).toThrow(
      `Sync interval must be 1-${MAX_TIMER_DELAY_MS} ms (got 3600000000)`
    );
    expect(() => new SyncScheduler(target, { intervalMs: 0 })).toThrow(RangeError);
    expect(target.calls).toEqual([]);
  });

  it('ignores a second start', () => {
    const target = new RecordingTarget();
    const scheduler = new SyncScheduler(target, { intervalMs: 1000 });
    scheduler.start();
    scheduler.start();
    vi.advanceTimersByTime(1000);
    expect(target.calls).toEqual(['startup', 'scheduled']);
    scheduler.stop();
  });
});
