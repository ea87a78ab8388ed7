import { describe, it, expect } from 'vitest';
import { parseConfig, loadConfigFromEnv, ConfigError } from './config';

describe('parseConfig', () => {
  it('fills every default', () => {
    expect(parseConfig()).toEqual({
      defaultTimeoutMs: 30_000,
      defaultDesiredAccuracy: 10,
      trackingMode: 'lowPower',
      trackingAccuracy: 100,
      distanceFilter: 0,
      timeFilterMs: 0,
      lowPowerMaximumAgeMs: 60_000,
    });
  });

  it('keeps explicit values', () => {
    const config = parseConfig({ trackingMode: 'active', maximumSampleAgeMs: 5_000 });
    expect(config.trackingMode).toBe('active');
    expect(config.maximumSampleAgeMs).toBe(5_000);
  });

  it('rejects a non-positive timeout', () => {
    expect(() => parseConfig({ defaultTimeoutMs: 0 })).toThrow(ConfigError);
  });

  it('lists the offending path in the issues', () => {
    try {
      parseConfig({ distanceFilter: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues[0].path).toEqual(['distanceFilter']);
        expect(err.message.startsWith('Invalid positioning config: distanceFilter: ')).toBe(true);
      }
    }
  });
});

describe('loadConfigFromEnv', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(parseConfig());
  });

  it('coerces numeric variables and trims the tracking mode', () => {
    const config = loadConfigFromEnv({
      POSITIONING_DEFAULT_TIMEOUT_MS: '5000',
      POSITIONING_TRACKING_MODE: ' active ',
      POSITIONING_MAXIMUM_SAMPLE_AGE_MS: '1500',
    });
    expect(config.defaultTimeoutMs).toBe(5_000);
    expect(config.trackingMode).toBe('active');
    expect(config.maximumSampleAgeMs).toBe(1_500);
  });

  it('skips empty variables', () => {
    const config = loadConfigFromEnv({ POSITIONING_DISTANCE_FILTER: '  ' });
    expect(config.distanceFilter).toBe(0);
  });

  it('rejects a non-numeric value', () => {
    expect(() => loadConfigFromEnv({ POSITIONING_TRACKING_ACCURACY: 'abc' })).toThrow(ConfigError);
  });

  it('rejects an unknown tracking mode', () => {
    expect(() => loadConfigFromEnv({ POSITIONING_TRACKING_MODE: 'turbo' })).toThrow(ConfigError);
  });
});
