import type { AuthorizationLevel, AuthorizationStatus, PositionSample } from '@/types';
import { createLogger, type Logger } from '@/utils/logger';
import type {
  LocationProvider,
  SampleCallback,
  ProviderErrorCallback,
  AuthorizationCallback,
  Unsubscribe,
} from './types';
import { CallbackSet } from './callbacks';

/** Subset of GeolocationCoordinates the adapter reads */
export interface GeolocationCoordinatesLike {
  latitude: number;
  longitude: number;
  accuracy: number;
  altitude: number | null;
  heading: number | null;
  speed: number | null;
}

export interface GeolocationPositionLike {
  coords: GeolocationCoordinatesLike;
  timestamp: number;
}

export interface GeolocationPositionErrorLike {
  code: number;
  message: string;
}

export interface GeolocationOptionsLike {
  enableHighAccuracy?: boolean;
  maximumAge?: number;
  timeout?: number;
}

/** W3C Geolocation shape (navigator.geolocation or a compatible polyfill) */
export interface GeolocationLike {
  getCurrentPosition(
    success: (position: GeolocationPositionLike) => void,
    error?: (error: GeolocationPositionErrorLike) => void,
    options?: GeolocationOptionsLike,
  ): void;
  watchPosition(
    success: (position: GeolocationPositionLike) => void,
    error?: (error: GeolocationPositionErrorLike) => void,
    options?: GeolocationOptionsLike,
  ): number;
  clearWatch(watchId: number): void;
}

// GeolocationPositionError codes
const PERMISSION_DENIED = 1;
const POSITION_UNAVAILABLE = 2;
const TIMEOUT = 3;

export class GeolocationProviderError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message || `Geolocation error ${code}`);
    this.name = 'GeolocationProviderError';
    this.code = code;
  }
}

export interface GeolocationProviderOptions {
  /** maximumAge for low-power watches */
  lowPowerMaximumAgeMs?: number;
  /** timeout for the authorization probe */
  probeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Provider over the W3C Geolocation API.
 *
 * Low-power and active modes are separate watches: low-power asks for cached,
 * network-grade positions, active asks for high accuracy with no caching.
 * The API has no accuracy knob beyond enableHighAccuracy, so the accuracy
 * hint is informational only.
 */
export class GeolocationProvider implements LocationProvider {
  private readonly geolocation: GeolocationLike;
  private readonly lowPowerMaximumAgeMs: number;
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sampleCbs = new CallbackSet<PositionSample>();
  private readonly errorCbs = new CallbackSet<Error>();
  private readonly authorizationCbs = new CallbackSet<AuthorizationStatus>();
  private lowPowerWatchId: number | null = null;
  private activeWatchId: number | null = null;
  private authorization: AuthorizationStatus = 'notDetermined';

  constructor(geolocation: GeolocationLike | null | undefined, options: GeolocationProviderOptions = {}) {
    this.geolocation = geolocation ?? unavailableGeolocation;
    this.lowPowerMaximumAgeMs = options.lowPowerMaximumAgeMs ?? 60_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 10_000;
    this.logger = createLogger('GeolocationProvider', options.logger);
    if (!geolocation) this.authorization = 'notAvailable';
  }

  startLowPower(): void {
    if (this.lowPowerWatchId !== null) return;
    this.lowPowerWatchId = this.watch({
      enableHighAccuracy: false,
      maximumAge: this.lowPowerMaximumAgeMs,
    });
  }

  stopLowPower(): void {
    if (this.lowPowerWatchId === null) return;
    this.geolocation.clearWatch(this.lowPowerWatchId);
    this.lowPowerWatchId = null;
  }

  startActive(accuracyHint: number): void {
    if (this.activeWatchId !== null) return;
    this.logger.debug({ accuracyHint }, 'Starting high-accuracy watch');
    this.activeWatchId = this.watch({ enableHighAccuracy: true, maximumAge: 0 });
  }

  stopActive(): void {
    if (this.activeWatchId === null) return;
    this.geolocation.clearWatch(this.activeWatchId);
    this.activeWatchId = null;
  }

  currentAuthorization(): AuthorizationStatus {
    return this.authorization;
  }

  /**
   * The W3C API prompts on first use, so authorization is requested by
   * probing for a single position.
   */
  async requestAuthorization(_level: AuthorizationLevel): Promise<AuthorizationStatus> {
    if (this.authorization === 'notAvailable') return this.authorization;

    try {
      await new Promise<GeolocationPositionLike>((resolve, reject) => {
        this.geolocation.getCurrentPosition(resolve, reject, {
          enableHighAccuracy: false,
          timeout: this.probeTimeoutMs,
        });
      });
      this.updateAuthorization('allowedWhenInUse');
    } catch (error) {
      if (isPositionError(error) && error.code === PERMISSION_DENIED) {
        this.updateAuthorization('denied');
      } else {
        this.logger.warn({ err: error }, 'Authorization probe failed without a permission answer');
      }
    }
    return this.authorization;
  }

  onSample(cb: SampleCallback): Unsubscribe {
    return this.sampleCbs.add(cb);
  }

  onError(cb: ProviderErrorCallback): Unsubscribe {
    return this.errorCbs.add(cb);
  }

  onAuthorizationChange(cb: AuthorizationCallback): Unsubscribe {
    return this.authorizationCbs.add(cb);
  }

  private watch(options: GeolocationOptionsLike): number {
    return this.geolocation.watchPosition(
      (position) => this.handlePosition(position),
      (error) => this.handleError(error),
      options,
    );
  }

  private handlePosition(position: GeolocationPositionLike): void {
    if (this.authorization === 'notDetermined') {
      this.updateAuthorization('allowedWhenInUse');
    }
    this.sampleCbs.emit(toSample(position));
  }

  private handleError(error: GeolocationPositionErrorLike): void {
    switch (error.code) {
      case PERMISSION_DENIED:
        this.updateAuthorization('denied');
        return;
      case TIMEOUT:
        // watches have no timeout set; a platform timeout is transient
        this.logger.debug({ message: error.message }, 'Geolocation watch timed out');
        return;
      case POSITION_UNAVAILABLE:
      default:
        this.errorCbs.emit(new GeolocationProviderError(error.code, error.message));
    }
  }

  private updateAuthorization(status: AuthorizationStatus): void {
    if (this.authorization === status) return;
    this.authorization = status;
    this.authorizationCbs.emit(status);
  }
}

export function toSample(position: GeolocationPositionLike): PositionSample {
  const { coords } = position;
  return {
    coordinate: { latitude: coords.latitude, longitude: coords.longitude },
    horizontalAccuracy: coords.accuracy,
    altitude: coords.altitude,
    speed: coords.speed,
    course: coords.heading,
    timestamp: position.timestamp,
  };
}

function isPositionError(value: unknown): value is GeolocationPositionErrorLike {
  return typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'number';
}

const unavailableGeolocation: GeolocationLike = {
  getCurrentPosition(_success, error) {
    error?.({ code: POSITION_UNAVAILABLE, message: 'Geolocation not available' });
  },
  watchPosition(_success, error) {
    error?.({ code: POSITION_UNAVAILABLE, message: 'Geolocation not available' });
    return -1;
  },
  clearWatch: () => undefined,
};
