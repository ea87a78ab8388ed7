import type { AuthorizationLevel, AuthorizationStatus, PositionSample } from '@/types';
import type {
  LocationProvider,
  SampleCallback,
  ProviderErrorCallback,
  AuthorizationCallback,
  Unsubscribe,
} from './types';
import { CallbackSet } from './callbacks';

/** Power call recorded by the mock, in order */
export type ProviderCall =
  | { kind: 'startLowPower' }
  | { kind: 'stopLowPower' }
  | { kind: 'startActive'; accuracyHint: number }
  | { kind: 'stopActive' };

/**
 * Mock location provider for unit tests.
 * Lets you push samples, errors and authorization changes programmatically.
 */
export class MockLocationProvider implements LocationProvider {
  private readonly sampleCbs = new CallbackSet<PositionSample>();
  private readonly errorCbs = new CallbackSet<Error>();
  private readonly authorizationCbs = new CallbackSet<AuthorizationStatus>();
  private _lowPower = false;
  private _active = false;
  private _accuracyHint: number | null = null;

  authorization: AuthorizationStatus;

  /** Status requestAuthorization() switches to */
  grantOnRequest: AuthorizationStatus = 'allowedWhenInUse';

  readonly calls: ProviderCall[] = [];

  constructor(authorization: AuthorizationStatus = 'allowedWhenInUse') {
    this.authorization = authorization;
  }

  startLowPower(): void {
    this.calls.push({ kind: 'startLowPower' });
    this._lowPower = true;
  }

  stopLowPower(): void {
    this.calls.push({ kind: 'stopLowPower' });
    this._lowPower = false;
  }

  startActive(accuracyHint: number): void {
    this.calls.push({ kind: 'startActive', accuracyHint });
    this._active = true;
    this._accuracyHint = accuracyHint;
  }

  stopActive(): void {
    this.calls.push({ kind: 'stopActive' });
    this._active = false;
    this._accuracyHint = null;
  }

  currentAuthorization(): AuthorizationStatus {
    return this.authorization;
  }

  async requestAuthorization(_level: AuthorizationLevel): Promise<AuthorizationStatus> {
    if (this.authorization === 'notDetermined') {
      this.setAuthorization(this.grantOnRequest);
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

  get isLowPowerOn(): boolean {
    return this._lowPower;
  }

  get isActiveOn(): boolean {
    return this._active;
  }

  get accuracyHint(): number | null {
    return this._accuracyHint;
  }

  /** Number of registered sample listeners */
  get listenerCount(): number {
    return this.sampleCbs.size;
  }

  /** Simulate receiving a position sample */
  pushSample(sample: PositionSample): void {
    this.sampleCbs.emit(sample);
  }

  /** Simulate a provider failure */
  pushError(error: Error): void {
    this.errorCbs.emit(error);
  }

  /** Simulate the user changing authorization in settings */
  setAuthorization(status: AuthorizationStatus): void {
    this.authorization = status;
    this.authorizationCbs.emit(status);
  }

  clearCalls(): void {
    this.calls.length = 0;
  }
}
