/**
 * Playback Service - public exports for the command layer
 */

export * from './application/errors';
export * from './application/services';
export * from './domains/audio-mixing';
export * from './domains/playback-queue';
export * from './domains/sources';
export { PcmCacheStore, type TempPaths } from './infrastructure/cache/PcmCacheStore';
export { FileMetadataStore, RedisMetadataStore } from './infrastructure/metadata';
export { FfmpegTranscoder, LocalFileFetcher, RoutingFetcher, YtDlpFetcher } from './infrastructure/fetchers';
export {
  createPlaybackContainer,
  registerPlaybackShutdownHooks,
  type PlaybackContainer,
  type PlaybackServiceOverrides,
} from './infrastructure/ServiceFactory';
export { loadPlaybackConfig, SERVICE_NAME, type AudioFormat, type PlaybackServiceConfig } from './config/service-config';
