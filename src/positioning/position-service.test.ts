import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PositionService } from './position-service';
import { MockLocationProvider } from './providers/mock-provider';
import { SimulatedLocationProvider } from './providers/simulated-provider';
import { ConfigError } from './config';
import type { PositionSample } from '@/types';

function makeSample(horizontalAccuracy: number, latitude: number = 52.37): PositionSample {
  return {
    coordinate: { latitude, longitude: 4.89 },
    horizontalAccuracy,
    altitude: null,
    speed: null,
    course: null,
    timestamp: Date.now(),
  };
}

describe('PositionService', () => {
  let provider: MockLocationProvider;
  let service: PositionService;

  beforeEach(() => {
    vi.useFakeTimers();
    provider = new MockLocationProvider();
    service = new PositionService({ provider });
  });

  afterEach(() => {
    service.dispose();
    vi.useRealTimers();
  });

  describe('one-shot fixes', () => {
    it('uses the configured accuracy by default', async () => {
      const fix = service.requestOneFix();
      expect(provider.accuracyHint).toBe(10);

      provider.pushSample(makeSample(9));
      await expect(fix).resolves.toMatchObject({ horizontalAccuracy: 9 });
    });

    it('uses the configured timeout by default', async () => {
      const fix = service.currentLocation(100);
      vi.advanceTimersByTime(29_999);
      expect(service.pendingCount).toBe(1);

      vi.advanceTimersByTime(1);
      await expect(fix).rejects.toMatchObject({ kind: 'timedOut', message: 'Timed out' });
    });

    it('honours a custom default timeout', async () => {
      service.dispose();
      service = new PositionService({ provider, config: { defaultTimeoutMs: 1_000 } });

      const fix = service.requestOneFix(50);
      vi.advanceTimersByTime(1_000);
      await expect(fix).rejects.toMatchObject({ kind: 'timedOut' });
    });

    it('calls back with the result', async () => {
      const callback = vi.fn();
      service.requestOneFixWithCallback(100, 5_000, callback);
      provider.pushSample(makeSample(40));
      await Promise.resolve();

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback.mock.calls[0][0]).toMatchObject({ ok: true });
    });

    it('cancels pending fixes', async () => {
      const fix = service.requestOneFix(5, 5_000);
      service.cancelAllPending();
      await expect(fix).rejects.toMatchObject({ kind: 'cancelled' });
      expect(service.providerState).toBe('idle');
    });

    it('remembers the last location', () => {
      expect(service.lastLocation).toBeNull();
      provider.pushSample(makeSample(70));
      expect(service.lastLocation?.horizontalAccuracy).toBe(70);
    });
  });

  describe('continuous tracking', () => {
    it('keeps low-power on between startUpdating and stopUpdating', () => {
      expect(service.isUpdatingLocation).toBe(false);

      service.startUpdating();
      expect(service.providerState).toBe('lowPower');
      expect(service.isUpdatingLocation).toBe(true);

      service.stopUpdating();
      expect(service.providerState).toBe('idle');
    });

    it('does not report one-shot fixes as location updating', () => {
      void service.requestOneFix(50, 5_000).catch(() => undefined);
      expect(service.providerState).toBe('active');
      expect(service.isUpdatingLocation).toBe(false);

      service.startUpdating();
      expect(service.isUpdatingLocation).toBe(true);
    });

    it('delivers samples to subscribers and idles after the last one leaves', () => {
      const listener = vi.fn();
      const unsubscribe = service.subscribe(listener);
      expect(service.providerState).toBe('lowPower');

      provider.pushSample(makeSample(120));
      expect(listener).toHaveBeenCalledTimes(1);

      unsubscribe();
      expect(service.providerState).toBe('idle');
    });

    it('returns to low-power after a fix while tracking', async () => {
      service.startUpdating();
      const fix = service.requestOneFix(50, 5_000);
      expect(service.providerState).toBe('active');

      provider.pushSample(makeSample(20));
      await fix;
      expect(service.providerState).toBe('lowPower');
    });

    it('tracks in active mode when configured', () => {
      service.dispose();
      service = new PositionService({ provider, config: { trackingMode: 'active' } });

      service.startUpdating();
      expect(service.providerState).toBe('active');
      expect(provider.accuracyHint).toBe(100);
    });

    it('applies the configured distance filter', () => {
      service.dispose();
      service = new PositionService({ provider, config: { distanceFilter: 500 } });
      const listener = vi.fn();
      service.subscribe(listener);

      provider.pushSample(makeSample(30, 52.37));
      provider.pushSample(makeSample(30, 52.371));
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe('events and authorization', () => {
    it('forwards provider errors to error observers', () => {
      const onError = vi.fn();
      service.onError(onError);
      const error = new Error('location services crashed');

      provider.pushError(error);
      expect(onError).toHaveBeenCalledWith(error);
    });

    it('forwards authorization changes', () => {
      const onChange = vi.fn();
      service.onAuthorizationChange(onChange);

      provider.setAuthorization('restricted');
      expect(onChange).toHaveBeenCalledWith('restricted');
      expect(service.authorizationStatus).toBe('restricted');
    });

    it('requests authorization from the provider', async () => {
      service.dispose();
      provider = new MockLocationProvider('notDetermined');
      service = new PositionService({ provider });

      await expect(service.requestAuthorization('whenInUse')).resolves.toBe('allowedWhenInUse');
      expect(service.authorizationStatus).toBe('allowedWhenInUse');
    });
  });

  it('rejects invalid configuration', () => {
    expect(() => new PositionService({ provider, config: { trackingAccuracy: -1 } })).toThrow(ConfigError);
  });

  it('cancels pending fixes and idles on dispose', async () => {
    service.startUpdating();
    const fix = service.requestOneFix(10, 5_000);

    service.dispose();
    await expect(fix).rejects.toMatchObject({ kind: 'cancelled' });
    expect(service.providerState).toBe('idle');
    expect(provider.isLowPowerOn).toBe(false);
  });

  it('gets a fix from the simulated provider once accuracy converges', async () => {
    service.dispose();
    service = new PositionService({ provider: new SimulatedLocationProvider() });

    const fix = service.requestOneFix(10, 30_000);
    await vi.advanceTimersByTimeAsync(4_000);
    expect(service.pendingCount).toBe(1);

    await vi.advanceTimersByTimeAsync(1_000);
    await expect(fix).resolves.toMatchObject({ horizontalAccuracy: 5 });
    expect(service.providerState).toBe('idle');
    expect(vi.getTimerCount()).toBe(0);
  });
});
