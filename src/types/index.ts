export type {
  Coordinate,
  PositionSample,
  ProviderState,
  TrackingMode,
  AuthorizationStatus,
  AuthorizationLevel,
  FixRequestStatus,
} from './position';
