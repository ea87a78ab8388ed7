export { PositionService } from './position-service';
export type { PositionServiceOptions } from './position-service';
export { FixScheduler, forbidsLocation, satisfiesAccuracy } from './scheduler';
export type {
  FixSchedulerOptions,
  FixCallback,
  SchedulerEventSink,
  ContinuousDemand,
} from './scheduler';
export { TrackingBroadcaster } from './broadcaster';
export type {
  BroadcasterOptions,
  SampleListener,
  ErrorListener,
  AuthorizationListener,
} from './broadcaster';
export { RequestRegistry } from './registry';
export type { FixRequest, FixResult, FixResultSink } from './registry';
export { DeadlineManager } from './deadlines';
export type { DeadlineHandle } from './deadlines';
export { TurnQueue } from './turn-queue';
export { PositionError, DuplicateRequestIdError, isPositionError } from './errors';
export type { PositionErrorKind } from './errors';
export {
  PositioningConfigSchema,
  ConfigError,
  parseConfig,
  loadConfigFromEnv,
} from './config';
export type { PositioningConfig, PositioningConfigInput } from './config';
export { haversineDistance } from './geo-math';
export * from './providers';
