/**
 * FixScheduler
 *
 * Coordinator for one-shot position fixes over a shared sample stream.
 *
 * - Every input (submit, cancel, sample, deadline, authorization, provider
 *   error, demand refresh) runs as one turn on a TurnQueue
 * - A request settles once: first of sample / deadline / cancellation wins
 * - Result sinks and event-sink notifications are deferred until the queue
 *   drains, so caller code never runs inside a turn
 * - Provider power follows demand:
 *     forbidden authorization      -> idle
 *     any pending one-shot request -> active (low-power kept underneath)
 *     continuous demand only       -> config.trackingMode
 *     nothing                      -> idle
 *
 * State machine: idle <-> lowPower <-> active
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AuthorizationStatus,
  FixRequestStatus,
  PositionSample,
  ProviderState,
} from '@/types';
import { createLogger, getErrorMessage, type Logger } from '@/utils/logger';
import type { LocationProvider, Unsubscribe } from './providers/types';
import { parseConfig, type PositioningConfig } from './config';
import { DeadlineManager } from './deadlines';
import { PositionError } from './errors';
import { RequestRegistry, type FixRequest, type FixResult, type FixResultSink } from './registry';
import { TurnQueue } from './turn-queue';

/** Receives samples and state changes for continuous-tracking consumers */
export interface SchedulerEventSink {
  publishSample(sample: PositionSample): void;
  publishError(error: Error): void;
  publishAuthorization(status: AuthorizationStatus): void;
}

/** Answers whether continuous tracking currently needs the provider */
export interface ContinuousDemand {
  hasContinuousDemand(): boolean;
}

export interface FixSchedulerOptions {
  provider: LocationProvider;
  config?: PositioningConfig;
  demand?: ContinuousDemand;
  sink?: SchedulerEventSink;
  logger?: Logger;
}

export type FixCallback = (result: FixResult) => void;

const FORBIDDING_STATUSES: ReadonlySet<AuthorizationStatus> = new Set<AuthorizationStatus>([
  'denied',
  'restricted',
  'notAvailable',
]);

/** True when the platform will not hand out locations at this status */
export function forbidsLocation(status: AuthorizationStatus): boolean {
  return FORBIDDING_STATUSES.has(status);
}

/**
 * A sample satisfies a threshold only when it reports a fix (> 0) strictly
 * better than the threshold.
 */
export function satisfiesAccuracy(sample: PositionSample, desiredAccuracy: number): boolean {
  return sample.horizontalAccuracy > 0 && sample.horizontalAccuracy < desiredAccuracy;
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive finite number, got ${value}`);
  }
}

function freezeSample(sample: PositionSample): PositionSample {
  return Object.freeze({ ...sample, coordinate: Object.freeze({ ...sample.coordinate }) });
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(getErrorMessage(value));
}

export class FixScheduler {
  private readonly provider: LocationProvider;
  private readonly config: PositioningConfig;
  private readonly demand: ContinuousDemand | null;
  private readonly sink: SchedulerEventSink | null;
  private readonly logger: Logger;
  private readonly registry = new RequestRegistry();
  private readonly deadlines = new DeadlineManager();
  private readonly turns: TurnQueue;
  private readonly detach: Unsubscribe[];

  private lowPowerOn = false;
  private activeOn = false;
  private activeHint: number | null = null;
  private latest: PositionSample | null = null;
  private authorizationStatus: AuthorizationStatus;
  private disposed = false;

  constructor(options: FixSchedulerOptions) {
    this.provider = options.provider;
    this.config = options.config ?? parseConfig();
    this.demand = options.demand ?? null;
    this.sink = options.sink ?? null;
    this.logger = createLogger('FixScheduler', options.logger);
    this.turns = new TurnQueue((error) =>
      this.logger.error({ err: error }, 'Scheduler job threw'),
    );
    this.authorizationStatus = this.provider.currentAuthorization();

    this.detach = [
      this.provider.onSample((sample) => this.onSample(sample)),
      this.provider.onError((error) => this.onProviderError(error)),
      this.provider.onAuthorizationChange((status) => this.onAuthorizationChanged(status)),
    ];
  }

  // ---- Queries ----

  get providerState(): ProviderState {
    if (this.activeOn) return 'active';
    return this.lowPowerOn ? 'lowPower' : 'idle';
  }

  get pendingCount(): number {
    return this.registry.size;
  }

  get lastSample(): PositionSample | null {
    return this.latest;
  }

  get authorization(): AuthorizationStatus {
    return this.authorizationStatus;
  }

  /** Accuracy hint last handed to startActive, null when not active */
  get activeAccuracyHint(): number | null {
    return this.activeOn ? this.activeHint : null;
  }

  // ---- Submission ----

  /**
   * Request one fix strictly better than desiredAccuracy (meters).
   * Rejects with a PositionError on timeout, restriction, cancellation or
   * provider failure.
   */
  submit(desiredAccuracy: number, timeoutMs: number): Promise<PositionSample> {
    assertPositive('desiredAccuracy', desiredAccuracy);
    assertPositive('timeoutMs', timeoutMs);

    return new Promise<PositionSample>((resolve, reject) => {
      this.enqueue(desiredAccuracy, timeoutMs, (result) => {
        if (result.ok) resolve(result.sample);
        else reject(result.error);
      });
    });
  }

  /** Callback form of submit(); the callback runs once, asynchronously */
  submitWithCallback(desiredAccuracy: number, timeoutMs: number, callback: FixCallback): void {
    assertPositive('desiredAccuracy', desiredAccuracy);
    assertPositive('timeoutMs', timeoutMs);

    this.enqueue(desiredAccuracy, timeoutMs, (result) => {
      queueMicrotask(() => {
        try {
          callback(result);
        } catch (error) {
          this.logger.error({ err: error }, 'Fix callback threw');
        }
      });
    });
  }

  /** Settle every pending request with reason (cancelled by default) */
  cancelAll(reason: PositionError = PositionError.cancelled()): void {
    this.turns.run(() => this.cancelAllInTurn(reason));
  }

  // ---- Provider inputs ----

  onSample(sample: PositionSample): void {
    this.turns.run(() => {
      if (this.disposed) return;

      const frozen = freezeSample(sample);
      this.latest = frozen;

      let completed = 0;
      for (const request of this.registry.allPending()) {
        if (satisfiesAccuracy(frozen, request.desiredAccuracy)) {
          this.settle(request, 'completed', { ok: true, sample: frozen });
          completed++;
        }
      }

      if (completed > 0) {
        this.logger.debug(
          { accuracy: frozen.horizontalAccuracy, completed, remaining: this.registry.size },
          'Sample resolved fix requests',
        );
      }

      this.applyPowerState();
      if (this.sink) {
        const sink = this.sink;
        this.turns.defer(() => sink.publishSample(frozen));
      }
    });
  }

  onDeadline(requestId: string): void {
    this.turns.run(() => {
      const request = this.registry.get(requestId);
      if (!request) return; // already settled by a sample or a cancellation

      this.logger.info(
        { requestId, desiredAccuracy: request.desiredAccuracy },
        'Fix request timed out',
      );
      this.settle(request, 'expired', { ok: false, error: PositionError.timedOut() });
      this.applyPowerState();
    });
  }

  onAuthorizationChanged(status: AuthorizationStatus): void {
    this.turns.run(() => {
      const previous = this.authorizationStatus;
      this.authorizationStatus = status;
      this.logger.info({ previous, status }, 'Location authorization changed');

      if (forbidsLocation(status)) {
        this.cancelAllInTurn(PositionError.restricted());
      } else {
        this.applyPowerState();
      }

      if (this.sink) {
        const sink = this.sink;
        this.turns.defer(() => sink.publishAuthorization(status));
      }
    });
  }

  onProviderError(error: Error): void {
    this.turns.run(() => {
      this.logger.warn({ err: error, pending: this.registry.size }, 'Location provider failed');
      this.cancelAllInTurn(PositionError.providerFailure(error));

      if (this.sink) {
        const sink = this.sink;
        this.turns.defer(() => sink.publishError(error));
      }
    });
  }

  /** Re-evaluate power after continuous demand changed */
  refreshPowerState(): void {
    this.turns.run(() => this.applyPowerState());
  }

  /** Cancel everything, stop the provider and stop listening to it */
  dispose(): void {
    this.turns.run(() => {
      if (this.disposed) return;
      this.disposed = true;
      this.cancelAllInTurn(PositionError.cancelled());
      this.deadlines.cancelAll();
      for (const unsubscribe of this.detach) unsubscribe();
      this.logger.debug('FixScheduler disposed');
    });
  }

  // ---- Turn internals ----

  private enqueue(desiredAccuracy: number, timeoutMs: number, sink: FixResultSink): void {
    this.turns.run(() => {
      if (this.disposed) {
        this.deliver(sink, { ok: false, error: PositionError.cancelled() });
        return;
      }

      this.authorizationStatus = this.provider.currentAuthorization();
      if (forbidsLocation(this.authorizationStatus)) {
        this.logger.info(
          { desiredAccuracy, authorization: this.authorizationStatus },
          'Fix request refused: location not authorized',
        );
        this.deliver(sink, { ok: false, error: PositionError.restricted() });
        return;
      }

      const cached = this.latest;
      if (cached && satisfiesAccuracy(cached, desiredAccuracy) && this.isFresh(cached)) {
        this.logger.debug(
          { desiredAccuracy, accuracy: cached.horizontalAccuracy },
          'Fix request satisfied from last sample',
        );
        this.deliver(sink, { ok: true, sample: cached });
        return;
      }

      const request: FixRequest = {
        id: uuidv4(),
        desiredAccuracy,
        deadline: Date.now() + timeoutMs,
        status: 'pending',
        resultSink: sink,
        deadlineHandle: null,
      };
      this.registry.add(request);
      request.deadlineHandle = this.deadlines.schedule(timeoutMs, () => this.onDeadline(request.id));

      this.logger.debug(
        { requestId: request.id, desiredAccuracy, timeoutMs, pending: this.registry.size },
        'Fix request submitted',
      );
      this.applyPowerState();
    });
  }

  private cancelAllInTurn(reason: PositionError): void {
    const pending = this.registry.allPending();
    for (const request of pending) {
      this.settle(request, 'cancelled', { ok: false, error: reason });
    }
    if (pending.length > 0) {
      this.logger.info({ count: pending.length, reason: reason.kind }, 'Cancelled pending fix requests');
    }
    this.applyPowerState();
  }

  /** Resolve-and-remove; a request that already left pending is ignored */
  private settle(
    request: FixRequest,
    status: Exclude<FixRequestStatus, 'pending'>,
    result: FixResult,
  ): void {
    if (request.status !== 'pending') return;

    request.status = status;
    this.registry.remove(request.id);
    if (request.deadlineHandle) {
      this.deadlines.cancel(request.deadlineHandle);
      request.deadlineHandle = null;
    }
    this.deliver(request.resultSink, result);
  }

  private deliver(sink: FixResultSink, result: FixResult): void {
    this.turns.defer(() => sink(result));
  }

  private isFresh(sample: PositionSample): boolean {
    const maxAge = this.config.maximumSampleAgeMs;
    if (maxAge === undefined) return true;
    return Date.now() - sample.timestamp <= maxAge;
  }

  private targetState(): ProviderState {
    if (this.disposed || forbidsLocation(this.authorizationStatus)) return 'idle';
    if (!this.registry.isEmpty()) return 'active';
    if (this.demand?.hasContinuousDemand()) return this.config.trackingMode;
    return 'idle';
  }

  /** Strictest pending threshold, or the tracking accuracy when none is pending */
  private targetHint(): number {
    let strictest = Infinity;
    for (const request of this.registry.allPending()) {
      strictest = Math.min(strictest, request.desiredAccuracy);
    }
    return Number.isFinite(strictest) ? strictest : this.config.trackingAccuracy;
  }

  private applyPowerState(): void {
    const target = this.targetState();
    try {
      this.transitionTo(target);
    } catch (error) {
      const failure = toError(error);
      this.logger.error({ err: failure, target }, 'Provider rejected power transition');

      for (const request of this.registry.allPending()) {
        this.settle(request, 'cancelled', { ok: false, error: PositionError.providerFailure(failure) });
      }
      if (this.sink) {
        const sink = this.sink;
        this.turns.defer(() => sink.publishError(failure));
      }

      try {
        this.transitionTo(this.targetState());
      } catch (retryError) {
        this.logger.error({ err: retryError }, 'Provider did not settle after a failed transition');
      }
    }
  }

  private transitionTo(target: ProviderState): void {
    const from = this.providerState;
    const wantLowPower = target !== 'idle';
    const wantActive = target === 'active';

    if (wantLowPower && !this.lowPowerOn) {
      this.provider.startLowPower();
      this.lowPowerOn = true;
    }

    if (wantActive) {
      const hint = this.targetHint();
      if (!this.activeOn || hint !== this.activeHint) {
        this.provider.startActive(hint);
        this.activeOn = true;
        this.activeHint = hint;
      }
    } else if (this.activeOn) {
      this.provider.stopActive();
      this.activeOn = false;
      this.activeHint = null;
    }

    if (!wantLowPower && this.lowPowerOn) {
      this.provider.stopLowPower();
      this.lowPowerOn = false;
    }

    const to = this.providerState;
    if (from !== to) {
      this.logger.info({ from, to, pending: this.registry.size }, 'Provider power state changed');
    }
  }
}
