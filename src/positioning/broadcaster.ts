/**
 * TrackingBroadcaster
 *
 * Downstream end of the scheduler's event sink. Owns the continuous-tracking
 * subscriber list plus error and authorization observers, and tells the
 * scheduler whether continuous demand exists.
 *
 * - Samples pass the distance and time filters before fan-out; the filters
 *   start over once the last subscriber leaves
 * - A throwing listener is logged and skipped; the rest still receive the event
 * - onDemandChange fires only when hasContinuousDemand() flips
 */

import type { AuthorizationStatus, PositionSample } from '@/types';
import { createLogger, type Logger } from '@/utils/logger';
import type { ContinuousDemand, SchedulerEventSink } from './scheduler';
import { haversineDistance } from './geo-math';

export type SampleListener = (sample: PositionSample) => void;
export type ErrorListener = (error: Error) => void;
export type AuthorizationListener = (status: AuthorizationStatus) => void;

export interface BroadcasterOptions {
  /** Meters a device must move before listeners get another sample */
  distanceFilter?: number;
  /** Milliseconds that must pass before listeners get another sample */
  timeFilterMs?: number;
  logger?: Logger;
}

export class TrackingBroadcaster implements SchedulerEventSink, ContinuousDemand {
  private readonly sampleListeners = new Set<SampleListener>();
  private readonly errorListeners = new Set<ErrorListener>();
  private readonly authorizationListeners = new Set<AuthorizationListener>();
  private readonly demandCallbacks = new Set<() => void>();
  private readonly logger: Logger;
  private readonly distanceFilter: number;
  private readonly timeFilterMs: number;
  private pinned = false;
  private lastDelivered: PositionSample | null = null;

  constructor(options: BroadcasterOptions = {}) {
    this.distanceFilter = options.distanceFilter ?? 0;
    this.timeFilterMs = options.timeFilterMs ?? 0;
    this.logger = createLogger('TrackingBroadcaster', options.logger);
  }

  // ---- Subscriptions ----

  /** Register a continuous-tracking listener; counts toward demand */
  subscribe(listener: SampleListener): () => void {
    const before = this.hasContinuousDemand();
    this.sampleListeners.add(listener);
    this.notifyDemandIfChanged(before);
    return () => {
      const wasDemanding = this.hasContinuousDemand();
      if (this.sampleListeners.delete(listener)) {
        if (this.sampleListeners.size === 0) this.lastDelivered = null;
        this.notifyDemandIfChanged(wasDemanding);
      }
    };
  }

  /** Keep continuous demand on with or without listeners */
  setPinned(on: boolean): void {
    const before = this.hasContinuousDemand();
    this.pinned = on;
    this.notifyDemandIfChanged(before);
  }

  get isPinned(): boolean {
    return this.pinned;
  }

  onErrorEvent(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  onAuthorizationEvent(listener: AuthorizationListener): () => void {
    this.authorizationListeners.add(listener);
    return () => {
      this.authorizationListeners.delete(listener);
    };
  }

  /** Called whenever hasContinuousDemand() changes value */
  onDemandChange(callback: () => void): () => void {
    this.demandCallbacks.add(callback);
    return () => {
      this.demandCallbacks.delete(callback);
    };
  }

  hasContinuousDemand(): boolean {
    return this.pinned || this.sampleListeners.size > 0;
  }

  // ---- SchedulerEventSink ----

  publishSample(sample: PositionSample): void {
    if (this.sampleListeners.size === 0) return;
    if (!this.passesFilters(sample)) return;

    this.lastDelivered = sample;
    this.fanOut(this.sampleListeners, sample, 'sample');
  }

  publishError(error: Error): void {
    this.fanOut(this.errorListeners, error, 'error');
  }

  publishAuthorization(status: AuthorizationStatus): void {
    this.fanOut(this.authorizationListeners, status, 'authorization');
  }

  // ---- Internal ----

  private passesFilters(sample: PositionSample): boolean {
    const prev = this.lastDelivered;
    if (!prev) return true;

    if (this.timeFilterMs > 0 && sample.timestamp - prev.timestamp < this.timeFilterMs) {
      return false;
    }

    if (this.distanceFilter > 0) {
      const moved = haversineDistance(prev.coordinate, sample.coordinate);
      if (moved < this.distanceFilter) return false;
    }

    return true;
  }

  private fanOut<T>(listeners: Set<(value: T) => void>, value: T, event: string): void {
    for (const listener of [...listeners]) {
      try {
        listener(value);
      } catch (error) {
        this.logger.error({ err: error, event }, 'Tracking listener threw');
      }
    }
  }

  private notifyDemandIfChanged(before: boolean): void {
    const after = this.hasContinuousDemand();
    if (before === after) return;

    this.logger.debug({ continuousDemand: after }, 'Continuous demand changed');
    for (const callback of [...this.demandCallbacks]) {
      callback();
    }
  }
}
