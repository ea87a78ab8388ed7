import type { AuthorizationLevel, AuthorizationStatus, PositionSample } from '@/types';

/** Callback invoked on each new position sample */
export type SampleCallback = (sample: PositionSample) => void;

/** Callback invoked when the provider fails */
export type ProviderErrorCallback = (error: Error) => void;

/** Callback invoked when platform authorization changes */
export type AuthorizationCallback = (status: AuthorizationStatus) => void;

/** Removes a registered callback */
export type Unsubscribe = () => void;

/**
 * Platform location provider consumed by the scheduler.
 * Start/stop calls are idempotent; callbacks may arrive from any context.
 */
export interface LocationProvider {
  /** Coarse, infrequent updates (significant-change monitoring) */
  startLowPower(): void;
  stopLowPower(): void;

  /** High-rate updates aiming for accuracyHint meters */
  startActive(accuracyHint: number): void;
  stopActive(): void;

  currentAuthorization(): AuthorizationStatus;

  /** Ask the platform for authorization. Resolves with the resulting status. */
  requestAuthorization(level: AuthorizationLevel): Promise<AuthorizationStatus>;

  onSample(cb: SampleCallback): Unsubscribe;
  onError(cb: ProviderErrorCallback): Unsubscribe;
  onAuthorizationChange(cb: AuthorizationCallback): Unsubscribe;
}
