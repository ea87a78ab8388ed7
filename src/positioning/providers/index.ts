export type {
  LocationProvider,
  SampleCallback,
  ProviderErrorCallback,
  AuthorizationCallback,
  Unsubscribe,
} from './types';
export { GeolocationProvider, GeolocationProviderError } from './geolocation-provider';
export type { GeolocationLike, GeolocationProviderOptions } from './geolocation-provider';
export { SimulatedLocationProvider } from './simulated-provider';
export type { SimulatedProviderOptions } from './simulated-provider';
export { MockLocationProvider } from './mock-provider';

import type { LocationProvider } from './types';
import type { Logger } from '@/utils/logger';
import { GeolocationProvider, type GeolocationLike } from './geolocation-provider';
import { SimulatedLocationProvider } from './simulated-provider';

export interface CreateProviderOptions {
  /** navigator.geolocation or a compatible object */
  geolocation?: GeolocationLike | null;
  lowPowerMaximumAgeMs?: number;
  logger?: Logger;
}

/**
 * Factory: geolocation-backed provider when a Geolocation object is
 * available, simulated provider otherwise.
 */
export function createLocationProvider(options: CreateProviderOptions = {}): LocationProvider {
  if (options.geolocation) {
    return new GeolocationProvider(options.geolocation, {
      lowPowerMaximumAgeMs: options.lowPowerMaximumAgeMs,
      logger: options.logger,
    });
  }
  return new SimulatedLocationProvider();
}
