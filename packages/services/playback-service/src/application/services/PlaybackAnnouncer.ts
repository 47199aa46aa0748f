import type { TrackMetadata } from '../../domains/sources';
import { getLogger } from '../../config/service-config';

const logger = getLogger('playback-service-announcer');

export const GENERIC_NOW_PLAYING = 'Now playing next track';
export const QUEUE_FINISHED_MESSAGE = '😮‍💨 Finished playing queue!';

export function nowPlayingMessage(metadata: TrackMetadata | null): string {
  if (!metadata) return GENERIC_NOW_PLAYING;
  return `▶️ Now playing **[${metadata.title}](${metadata.url})** (${metadata.runtimeDisplay})`;
}

/** Where the driver reports playback progress, e.g. a chat channel. */
export interface PlaybackAnnouncer {
  nowPlaying(sessionId: string, metadata: TrackMetadata | null): void | Promise<void>;
  queueFinished(sessionId: string): void | Promise<void>;
}

export class LoggingAnnouncer implements PlaybackAnnouncer {
  nowPlaying(sessionId: string, metadata: TrackMetadata | null): void {
    logger.info(nowPlayingMessage(metadata), { sessionId });
  }

  queueFinished(sessionId: string): void {
    logger.info(QUEUE_FINISHED_MESSAGE, { sessionId });
  }
}
