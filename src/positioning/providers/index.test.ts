import { describe, it, expect } from 'vitest';
import { createLocationProvider, GeolocationProvider, SimulatedLocationProvider } from './index';
import type { GeolocationLike } from './geolocation-provider';

const geolocation: GeolocationLike = {
  getCurrentPosition: () => undefined,
  watchPosition: () => 1,
  clearWatch: () => undefined,
};

describe('createLocationProvider', () => {
  it('uses the Geolocation API when one is given', () => {
    expect(createLocationProvider({ geolocation })).toBeInstanceOf(GeolocationProvider);
  });

  it('falls back to the simulated provider', () => {
    expect(createLocationProvider()).toBeInstanceOf(SimulatedLocationProvider);
    expect(createLocationProvider({ geolocation: null })).toBeInstanceOf(SimulatedLocationProvider);
  });
});
