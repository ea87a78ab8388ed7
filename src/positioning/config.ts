import { z } from 'zod';
import { ACCURACY, DEFAULT_FIX_TIMEOUT_MS, DEFAULT_TRACKING_ACCURACY } from '@/constants';

export const PositioningConfigSchema = z.object({
  /** Lifespan of a one-shot request when the caller gives no timeout */
  defaultTimeoutMs: z.number().positive().finite().default(DEFAULT_FIX_TIMEOUT_MS),
  /** Threshold used by currentLocation() and requestOneFix() without arguments */
  defaultDesiredAccuracy: z.number().positive().finite().default(ACCURACY.nearestTenMeters),
  /** Power mode kept while only continuous tracking demand remains */
  trackingMode: z.enum(['lowPower', 'active']).default('lowPower'),
  /** Accuracy hint for active mode when no one-shot request is pending */
  trackingAccuracy: z.number().positive().finite().default(DEFAULT_TRACKING_ACCURACY),
  /** Oldest cached sample allowed to satisfy a new request; unset = any age */
  maximumSampleAgeMs: z.number().positive().optional(),
  /** Meters a device must move before subscribers get another sample */
  distanceFilter: z.number().nonnegative().default(0),
  /** Milliseconds that must pass before subscribers get another sample */
  timeFilterMs: z.number().nonnegative().default(0),
  /** maximumAge handed to watchPosition in low-power mode */
  lowPowerMaximumAgeMs: z.number().nonnegative().default(60_000),
});

export type PositioningConfig = z.infer<typeof PositioningConfigSchema>;
export type PositioningConfigInput = z.input<typeof PositioningConfigSchema>;

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const summary = issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    super(`Invalid positioning config: ${summary}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Validate programmatic options and fill defaults.
 */
export function parseConfig(input: PositioningConfigInput = {}): PositioningConfig {
  return validateConfig(input);
}

function validateConfig(input: unknown): PositioningConfig {
  const result = PositioningConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

const ENV_KEYS: Record<keyof PositioningConfig, string> = {
  defaultTimeoutMs: 'POSITIONING_DEFAULT_TIMEOUT_MS',
  defaultDesiredAccuracy: 'POSITIONING_DEFAULT_DESIRED_ACCURACY',
  trackingMode: 'POSITIONING_TRACKING_MODE',
  trackingAccuracy: 'POSITIONING_TRACKING_ACCURACY',
  maximumSampleAgeMs: 'POSITIONING_MAXIMUM_SAMPLE_AGE_MS',
  distanceFilter: 'POSITIONING_DISTANCE_FILTER',
  timeFilterMs: 'POSITIONING_TIME_FILTER_MS',
  lowPowerMaximumAgeMs: 'POSITIONING_LOW_POWER_MAXIMUM_AGE_MS',
};

const EnvNumber = z.coerce.number();

/**
 * Build config from POSITIONING_* environment variables.
 * Unset or empty variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PositioningConfig {
  const input: Record<string, unknown> = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName];
    if (raw === undefined || raw.trim() === '') continue;

    if (key === 'trackingMode') {
      input[key] = raw.trim();
      continue;
    }

    const parsed = EnvNumber.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(parsed.error.issues.map(issue => ({ ...issue, path: [key] })));
    }
    input[key] = parsed.data;
  }

  return validateConfig(input);
}
