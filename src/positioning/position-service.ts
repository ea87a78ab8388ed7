/**
 * PositionService: application-facing positioning API.
 *
 * Wires a LocationProvider to a FixScheduler and a TrackingBroadcaster:
 *   provider  --samples/errors/authorization-->  scheduler
 *   scheduler --accepted samples, events------>  broadcaster --> subscribers
 *   broadcaster --demand changes-------------->  scheduler.refreshPowerState()
 *
 * Usage:
 *   const position = new PositionService({ provider });
 *   const fix = await position.requestOneFix(ACCURACY.hundredMeters, 10_000);
 */

import type { AuthorizationLevel, AuthorizationStatus, PositionSample, ProviderState } from '@/types';
import { createLogger, type Logger } from '@/utils/logger';
import type { LocationProvider } from './providers/types';
import { parseConfig, type PositioningConfig, type PositioningConfigInput } from './config';
import { FixScheduler, type FixCallback } from './scheduler';
import {
  TrackingBroadcaster,
  type SampleListener,
  type ErrorListener,
  type AuthorizationListener,
} from './broadcaster';

export interface PositionServiceOptions {
  provider: LocationProvider;
  config?: PositioningConfigInput;
  logger?: Logger;
}

export class PositionService {
  readonly config: PositioningConfig;
  private readonly provider: LocationProvider;
  private readonly scheduler: FixScheduler;
  private readonly broadcaster: TrackingBroadcaster;
  private readonly logger: Logger;
  private readonly stopDemandWatch: () => void;

  constructor(options: PositionServiceOptions) {
    this.config = parseConfig(options.config);
    this.provider = options.provider;
    this.logger = createLogger('PositionService', options.logger);

    this.broadcaster = new TrackingBroadcaster({
      distanceFilter: this.config.distanceFilter,
      timeFilterMs: this.config.timeFilterMs,
      logger: options.logger,
    });
    this.scheduler = new FixScheduler({
      provider: this.provider,
      config: this.config,
      demand: this.broadcaster,
      sink: this.broadcaster,
      logger: options.logger,
    });
    this.stopDemandWatch = this.broadcaster.onDemandChange(() => this.scheduler.refreshPowerState());
  }

  // ---- One-shot fixes ----

  /** Resolve with the first sample strictly better than desiredAccuracy meters */
  requestOneFix(
    desiredAccuracy: number = this.config.defaultDesiredAccuracy,
    timeoutMs: number = this.config.defaultTimeoutMs,
  ): Promise<PositionSample> {
    return this.scheduler.submit(desiredAccuracy, timeoutMs);
  }

  requestOneFixWithCallback(desiredAccuracy: number, timeoutMs: number, callback: FixCallback): void {
    this.scheduler.submitWithCallback(desiredAccuracy, timeoutMs, callback);
  }

  /** Current location at the given accuracy, with the default timeout */
  currentLocation(desiredAccuracy: number = this.config.defaultDesiredAccuracy): Promise<PositionSample> {
    return this.requestOneFix(desiredAccuracy, this.config.defaultTimeoutMs);
  }

  cancelAllPending(): void {
    this.scheduler.cancelAll();
  }

  // ---- Continuous tracking ----

  /** Keep the provider running for continuous updates until stopUpdating() */
  startUpdating(): void {
    this.broadcaster.setPinned(true);
  }

  stopUpdating(): void {
    this.broadcaster.setPinned(false);
  }

  /** true between startUpdating() and stopUpdating(); one-shot fixes do not count */
  get isUpdatingLocation(): boolean {
    return this.broadcaster.isPinned;
  }

  subscribe(listener: SampleListener): () => void {
    return this.broadcaster.subscribe(listener);
  }

  onError(listener: ErrorListener): () => void {
    return this.broadcaster.onErrorEvent(listener);
  }

  onAuthorizationChange(listener: AuthorizationListener): () => void {
    return this.broadcaster.onAuthorizationEvent(listener);
  }

  // ---- Authorization ----

  get authorizationStatus(): AuthorizationStatus {
    return this.provider.currentAuthorization();
  }

  requestAuthorization(level: AuthorizationLevel): Promise<AuthorizationStatus> {
    this.logger.info({ level }, 'Requesting location authorization');
    return this.provider.requestAuthorization(level);
  }

  // ---- State ----

  get lastLocation(): PositionSample | null {
    return this.scheduler.lastSample;
  }

  get providerState(): ProviderState {
    return this.scheduler.providerState;
  }

  get pendingCount(): number {
    return this.scheduler.pendingCount;
  }

  dispose(): void {
    this.stopDemandWatch();
    this.scheduler.dispose();
    this.logger.debug('PositionService disposed');
  }
}
