/**
 * Horizontal accuracy thresholds in meters.
 * Smaller is stricter; a sample must report strictly better than the
 * threshold to satisfy a request.
 */
export const ACCURACY = {
  best: 5,
  nearestTenMeters: 10,
  hundredMeters: 100,
  kilometer: 1_000,
  threeKilometers: 3_000,
} as const;

/** Lifespan of a one-shot request when the caller gives none */
export const DEFAULT_FIX_TIMEOUT_MS = 30_000;

/** Accuracy hint used when only continuous tracking keeps the provider active */
export const DEFAULT_TRACKING_ACCURACY = ACCURACY.hundredMeters;
