import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, scheduleTimeout } from './timers.ts';

describe('scheduleTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fire once after a short delay', () => {
    const fired = vi.fn();
    scheduleTimeout(fired, 50);
    vi.advanceTimersByTime(49);
    expect(fired).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(fired).toHaveBeenCalledTimes(1);
  });

  it('should wait out delays past the 32-bit limit', () => {
    const fired = vi.fn();
    const delay = 40_000 * 60_000;
    scheduleTimeout(fired, delay);

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
    expect(fired).not.toHaveBeenCalled();
    vi.advanceTimersByTime(delay - MAX_TIMER_DELAY_MS - 1);
    expect(fired).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(fired).toHaveBeenCalledTimes(1);
  });

  it('should not fire once cancelled, even after re-arming', () => {
    const fired = vi.fn();
    const handle = scheduleTimeout(fired, MAX_TIMER_DELAY_MS + 10);
    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
    handle.cancel();
    vi.advanceTimersByTime(10);
    expect(fired).not.toHaveBeenCalled();
  });
});
