import type { AuthorizationLevel, AuthorizationStatus, Coordinate, PositionSample } from '@/types';
import type {
  LocationProvider,
  SampleCallback,
  ProviderErrorCallback,
  AuthorizationCallback,
  Unsubscribe,
} from './types';
import { CallbackSet } from './callbacks';

export interface SimulatedProviderOptions {
  /** Waypoints visited in order, then in reverse */
  route?: Coordinate[];
  /** Tick interval while active */
  activeIntervalMs?: number;
  /** Tick interval while only low-power is on */
  lowPowerIntervalMs?: number;
  /** Accuracy of the first active tick; halves every tick after */
  initialAccuracy?: number;
  /** Accuracy floor reached while active */
  bestAccuracy?: number;
  /** Accuracy reported by low-power ticks */
  lowPowerAccuracy?: number;
  authorization?: AuthorizationStatus;
}

// A short loop around a harbour front
const DEFAULT_ROUTE: Coordinate[] = [
  { latitude: 51.50722, longitude: -0.12750 },
  { latitude: 51.50761, longitude: -0.12698 },
  { latitude: 51.50803, longitude: -0.12640 },
  { latitude: 51.50790, longitude: -0.12571 },
  { latitude: 51.50744, longitude: -0.12533 },
];

/**
 * Timer-driven provider that walks a route.
 * Accuracy converges from coarse to fine while active, the way a real
 * receiver does after a cold start.
 */
export class SimulatedLocationProvider implements LocationProvider {
  private readonly route: Coordinate[];
  private readonly activeIntervalMs: number;
  private readonly lowPowerIntervalMs: number;
  private readonly initialAccuracy: number;
  private readonly bestAccuracy: number;
  private readonly lowPowerAccuracy: number;
  private readonly sampleCbs = new CallbackSet<PositionSample>();
  private readonly errorCbs = new CallbackSet<Error>();
  private readonly authorizationCbs = new CallbackSet<AuthorizationStatus>();
  private authorization: AuthorizationStatus;
  private lowPowerTimer: ReturnType<typeof setInterval> | null = null;
  private activeTimer: ReturnType<typeof setInterval> | null = null;
  private routeIdx = 0;
  private direction: 1 | -1 = 1;
  private currentAccuracy: number;

  constructor(options: SimulatedProviderOptions = {}) {
    this.route = options.route && options.route.length > 0 ? options.route : DEFAULT_ROUTE;
    this.activeIntervalMs = options.activeIntervalMs ?? 1_000;
    this.lowPowerIntervalMs = options.lowPowerIntervalMs ?? 10_000;
    this.initialAccuracy = options.initialAccuracy ?? 80;
    this.bestAccuracy = options.bestAccuracy ?? 5;
    this.lowPowerAccuracy = options.lowPowerAccuracy ?? 500;
    this.authorization = options.authorization ?? 'allowedWhenInUse';
    this.currentAccuracy = this.initialAccuracy;
  }

  startLowPower(): void {
    if (this.lowPowerTimer !== null) return;
    this.lowPowerTimer = setInterval(() => this.tick(this.lowPowerAccuracy), this.lowPowerIntervalMs);
  }

  stopLowPower(): void {
    if (this.lowPowerTimer === null) return;
    clearInterval(this.lowPowerTimer);
    this.lowPowerTimer = null;
  }

  startActive(_accuracyHint: number): void {
    if (this.activeTimer !== null) return;
    this.currentAccuracy = this.initialAccuracy;
    this.activeTimer = setInterval(() => {
      this.tick(this.currentAccuracy);
      this.currentAccuracy = Math.max(this.bestAccuracy, this.currentAccuracy / 2);
    }, this.activeIntervalMs);
  }

  stopActive(): void {
    if (this.activeTimer === null) return;
    clearInterval(this.activeTimer);
    this.activeTimer = null;
  }

  currentAuthorization(): AuthorizationStatus {
    return this.authorization;
  }

  async requestAuthorization(level: AuthorizationLevel): Promise<AuthorizationStatus> {
    if (this.authorization === 'notDetermined') {
      this.setAuthorization(level === 'always' ? 'allowedAlways' : 'allowedWhenInUse');
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

  /** Change authorization as if the user edited it in settings */
  setAuthorization(status: AuthorizationStatus): void {
    if (this.authorization === status) return;
    this.authorization = status;
    if (status === 'denied' || status === 'restricted' || status === 'notAvailable') {
      this.stopActive();
      this.stopLowPower();
    }
    this.authorizationCbs.emit(status);
  }

  private tick(accuracy: number): void {
    const coordinate = this.route[this.routeIdx];
    this.advance();
    this.sampleCbs.emit({
      coordinate: { ...coordinate },
      horizontalAccuracy: accuracy,
      altitude: null,
      speed: null,
      course: null,
      timestamp: Date.now(),
    });
  }

  private advance(): void {
    if (this.route.length < 2) return;
    if (this.direction === 1 && this.routeIdx + 1 >= this.route.length) this.direction = -1;
    else if (this.direction === -1 && this.routeIdx === 0) this.direction = 1;
    this.routeIdx += this.direction;
  }
}
