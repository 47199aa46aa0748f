import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Playback Service entry point. Builds the container and keeps the process
 * alive until a shutdown signal; the command layer drives it in-process.
 */

import {
  createLogger,
  registerGlobalErrorHandlers,
  registerPhasedShutdownHook,
  serializeError,
  setupGracefulShutdown,
} from '@mixdeck/platform-core';
import { loadPlaybackConfig, SERVICE_NAME } from './config/service-config';
import { createPlaybackContainer, registerPlaybackShutdownHooks } from './infrastructure/ServiceFactory';

registerGlobalErrorHandlers(SERVICE_NAME);

const logger = createLogger(SERVICE_NAME);

const HEARTBEAT_INTERVAL_MS = 60000;

async function main(): Promise<void> {
  const serviceConfig = loadPlaybackConfig();
  logger.info('🚀 Starting Playback Service...', { dataDir: serviceConfig.dataDir, phase: 'initialization' });

  const container = await createPlaybackContainer(serviceConfig);
  registerPlaybackShutdownHooks(container);

  const heartbeat = setInterval(() => {
    logger.debug('Playback Service heartbeat', {
      sessions: container.registry.size,
      fetchesInFlight: container.coordinator.inFlightCount,
    });
  }, HEARTBEAT_INTERVAL_MS);
  registerPhasedShutdownHook('drain', async () => clearInterval(heartbeat), 'heartbeat');

  setupGracefulShutdown(serviceConfig.shutdownTimeoutMs);

  logger.info('Playback Service started', { sounds: (await container.service.listSounds()).length });
}

main().catch(error => {
  logger.error('Playback Service failed to start', { error: serializeError(error) });
  process.exit(1);
});
