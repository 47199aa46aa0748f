/**
 * Wires the playback service from configuration. Collaborators can be
 * replaced through `overrides`, which is how tests run without external tools.
 */

import fs from 'fs';
import { KeyedMutex, createRedisCache, registerPhasedShutdownHook, type ICache } from '@mixdeck/platform-core';
import { getLogger, SERVICE_NAME, type PlaybackServiceConfig } from '../config/service-config';
import type { IMetadataStore, ISourceFetcher, ITranscoder } from '../domains/sources';
import { PlaybackQueue } from '../domains/playback-queue';
import {
  FetchCoordinator,
  LoggingAnnouncer,
  MetadataService,
  PlaybackDriver,
  PlaybackService,
  Preloader,
  SessionRegistry,
  SfxLibrary,
  type PlaybackAnnouncer,
} from '../application/services';
import { PcmCacheStore } from './cache/PcmCacheStore';
import { FileMetadataStore, RedisMetadataStore } from './metadata';
import { FfmpegTranscoder, LocalFileFetcher, RoutingFetcher, YtDlpFetcher } from './fetchers';

const logger = getLogger('playback-service-factory');

export interface PlaybackServiceOverrides {
  fetcher?: ISourceFetcher;
  transcoder?: ITranscoder;
  metadataStore?: IMetadataStore;
  announcer?: PlaybackAnnouncer;
  random?: () => number;
}

export interface PlaybackContainer {
  config: Readonly<PlaybackServiceConfig>;
  service: PlaybackService;
  registry: SessionRegistry;
  queue: PlaybackQueue;
  cache: PcmCacheStore;
  coordinator: FetchCoordinator;
  driver: PlaybackDriver;
  redis?: ICache;
}

function createFetcher(config: Readonly<PlaybackServiceConfig>): ISourceFetcher {
  if (config.cookieFile && !fs.existsSync(config.cookieFile)) {
    logger.warn('Cookie file does not exist, downloads run unauthenticated', { cookieFile: config.cookieFile });
  }
  const cookieFile = config.cookieFile && fs.existsSync(config.cookieFile) ? config.cookieFile : undefined;
  return new RoutingFetcher(new YtDlpFetcher({ timeoutMs: config.fetchTimeoutMs, cookieFile }), new LocalFileFetcher());
}

export async function createPlaybackContainer(
  config: Readonly<PlaybackServiceConfig>,
  overrides: PlaybackServiceOverrides = {}
): Promise<PlaybackContainer> {
  const cache = new PcmCacheStore(config.cacheDir);
  await cache.init();
  await cache.cleanupTemp();

  let redis: ICache | undefined;
  let metadataStore = overrides.metadataStore;
  if (!metadataStore) {
    if (config.metadataStore === 'redis') {
      redis = createRedisCache({ serviceName: SERVICE_NAME, keyPrefix: config.redisKeyPrefix, url: config.redisUrl });
      metadataStore = new RedisMetadataStore(redis);
    } else {
      metadataStore = new FileMetadataStore(config.cacheDir);
    }
  }

  const fetcher = overrides.fetcher ?? createFetcher(config);
  const transcoder = overrides.transcoder ?? new FfmpegTranscoder(config.fetchTimeoutMs);
  const format = { sampleRate: config.audio.sampleRate, channels: config.audio.channels };

  const queue = new PlaybackQueue();
  const registry = new SessionRegistry(config.audio);
  const sessionLocks = new KeyedMutex();
  const coordinator = new FetchCoordinator(cache, fetcher, transcoder, config.fetchConcurrency);
  const metadata = new MetadataService(metadataStore, fetcher);
  const preloader = new Preloader(queue, coordinator, format, config.queueLookahead);
  const driver = new PlaybackDriver({
    registry,
    queue,
    coordinator,
    preloader,
    metadata,
    announcer: overrides.announcer ?? new LoggingAnnouncer(),
    sessionLocks,
    format,
  });
  const service = new PlaybackService({
    registry,
    queue,
    driver,
    coordinator,
    metadata,
    fetcher,
    sfxLibrary: new SfxLibrary(config.sfxDir),
    sessionLocks,
    format,
    random: overrides.random,
  });

  logger.info('Playback service ready', {
    cacheDir: config.cacheDir,
    sampleRate: format.sampleRate,
    channels: format.channels,
    metadataStore: redis ? 'redis' : 'file',
  });

  return { config, service, registry, queue, cache, coordinator, driver, redis };
}

/** Register the container's teardown with the platform shutdown phases. */
export function registerPlaybackShutdownHooks(container: PlaybackContainer): void {
  registerPhasedShutdownHook('schedulers', async () => {
    container.service.sfxJobs.stopAll();
  }, 'sfx-jobs');
  registerPhasedShutdownHook('queues', () => container.service.shutdown(), 'playback-sessions');
  const { redis } = container;
  if (redis) {
    registerPhasedShutdownHook('connections', () => redis.disconnect(), 'redis');
  }
  registerPhasedShutdownHook('default', () => container.cache.cleanupTemp(), 'temp-downloads');
}
