/**
 * Position Scheduler demo
 * Requests one fix from the simulated provider and prints it.
 *
 *   LOG_PRETTY=true npm start
 */

import 'dotenv/config';
import { ACCURACY } from '@/constants';
import { loadConfigFromEnv, ConfigError } from '@/positioning/config';
import { isPositionError } from '@/positioning/errors';
import { PositionService } from '@/positioning/position-service';
import { SimulatedLocationProvider } from '@/positioning/providers/simulated-provider';
import { createLogger, getErrorMessage } from '@/utils/logger';

const log = createLogger('demo');

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const service = new PositionService({
    provider: new SimulatedLocationProvider(),
    config,
  });

  const stopTracking = service.subscribe((sample) => {
    log.debug({ accuracy: sample.horizontalAccuracy }, 'Tracking sample');
  });

  try {
    const started = Date.now();
    const fix = await service.requestOneFix(ACCURACY.nearestTenMeters);
    log.info(
      {
        latitude: fix.coordinate.latitude,
        longitude: fix.coordinate.longitude,
        accuracy: fix.horizontalAccuracy,
        elapsedMs: Date.now() - started,
      },
      'Got a fix',
    );
  } catch (err) {
    if (isPositionError(err)) {
      log.warn({ kind: err.kind }, `No fix: ${err.description}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    stopTracking();
    service.dispose();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.error({ issues: err.issues }, err.message);
  } else {
    log.error({ err }, `Demo failed: ${getErrorMessage(err)}`);
  }
  process.exitCode = 1;
});
