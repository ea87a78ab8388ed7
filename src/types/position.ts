/** Latitude/longitude pair in decimal degrees */
export interface Coordinate {
  latitude: number;
  longitude: number;
}

/** A single position reading from the provider */
export interface PositionSample {
  coordinate: Coordinate;
  horizontalAccuracy: number; // meters; <= 0 means no fix yet
  altitude: number | null;    // meters, null when unknown
  speed: number | null;       // m/s, null when unknown
  course: number | null;      // degrees from true north, null when unknown
  timestamp: number;          // epoch ms
}

/** Provider power modes driven by the scheduler */
export type ProviderState = 'idle' | 'lowPower' | 'active';

/** Power mode kept while only continuous tracking demand remains */
export type TrackingMode = 'lowPower' | 'active';

/** Platform authorization for location use */
export type AuthorizationStatus =
  | 'notDetermined'
  | 'notAvailable'
  | 'restricted'
  | 'denied'
  | 'allowedWhenInUse'
  | 'allowedAlways';

/** Authorization level an application can ask the platform for */
export type AuthorizationLevel = 'whenInUse' | 'always';

/** One-shot request lifecycle; never leaves a terminal state */
export type FixRequestStatus = 'pending' | 'completed' | 'expired' | 'cancelled';
