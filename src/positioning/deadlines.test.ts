import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DeadlineManager } from './deadlines';

const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

describe('DeadlineManager', () => {
  let deadlines: DeadlineManager;

  beforeEach(() => {
    vi.useFakeTimers();
    deadlines = new DeadlineManager();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once after the duration', () => {
    const onFire = vi.fn();
    const handle = deadlines.schedule(1_000, onFire);

    vi.advanceTimersByTime(999);
    expect(onFire).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(handle.fired).toBe(true);
    expect(handle.cancelled).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('never fires after cancel', () => {
    const onFire = vi.fn();
    const handle = deadlines.schedule(500, onFire);
    deadlines.cancel(handle);

    vi.advanceTimersByTime(10_000);
    expect(onFire).not.toHaveBeenCalled();
    expect(handle.cancelled).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('cancel is idempotent', () => {
    const handle = deadlines.schedule(500, vi.fn());
    deadlines.cancel(handle);
    deadlines.cancel(handle);
    expect(handle.cancelled).toBe(true);
    expect(handle.fired).toBe(false);
  });

  it('cancel after firing leaves the handle fired', () => {
    const handle = deadlines.schedule(100, vi.fn());
    vi.advanceTimersByTime(100);
    deadlines.cancel(handle);
    expect(handle.fired).toBe(true);
    expect(handle.cancelled).toBe(false);
  });

  it('cancelAll disarms every handle', () => {
    const onFire = vi.fn();
    deadlines.schedule(100, onFire);
    deadlines.schedule(200, onFire);
    expect(vi.getTimerCount()).toBe(2);

    deadlines.cancelAll();
    vi.advanceTimersByTime(1_000);
    expect(onFire).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  describe('durations beyond the timer limit', () => {
    it('waits the full duration', () => {
      const onFire = vi.fn();
      deadlines.schedule(THIRTY_DAYS_MS, onFire);

      vi.advanceTimersByTime(50);
      expect(onFire).not.toHaveBeenCalled();

      vi.advanceTimersByTime(THIRTY_DAYS_MS - 51);
      expect(onFire).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(onFire).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('can be cancelled after re-arming', () => {
      const onFire = vi.fn();
      const handle = deadlines.schedule(THIRTY_DAYS_MS, onFire);

      vi.advanceTimersByTime(2_147_483_647);
      expect(vi.getTimerCount()).toBe(1);

      deadlines.cancel(handle);
      vi.advanceTimersByTime(THIRTY_DAYS_MS);
      expect(onFire).not.toHaveBeenCalled();
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
