export { FetchCoordinator } from './FetchCoordinator';
export { MetadataService } from './MetadataService';
export { Preloader, type PreloadResult } from './Preloader';
export { SessionRegistry, type SessionHandle, type SessionCreatedListener } from './SessionRegistry';
export {
  LoggingAnnouncer,
  nowPlayingMessage,
  GENERIC_NOW_PLAYING,
  QUEUE_FINISHED_MESSAGE,
  type PlaybackAnnouncer,
} from './PlaybackAnnouncer';
export { PlaybackDriver, type PlaybackDriverDeps } from './PlaybackDriver';
export { SfxLibrary } from './SfxLibrary';
export { SfxJobScheduler, type SfxJob, type PlaySoundFn } from './SfxJobScheduler';
export {
  PlaybackService,
  type PlaybackServiceDeps,
  type PlayOptions,
  type PlayResult,
  type QueueEntryView,
  type SessionStatus,
} from './PlaybackService';
