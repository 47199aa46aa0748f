import { KeyedMutex, serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import type { PcmFormat } from '../../domains/sources';
import type { PlaybackQueue } from '../../domains/playback-queue';
import type { FetchCoordinator } from './FetchCoordinator';

const logger = getLogger('playback-service-preloader');

export interface PreloadResult {
  cached: string[];
  removed: string[];
}

/**
 * Keeps the entries behind the queue head cache-ready. A source that fails to
 * fetch is taken out of the queue and the window is re-read, so the entries
 * behind it are still attempted.
 */
export class Preloader {
  private readonly runs = new KeyedMutex();

  constructor(
    private readonly queue: PlaybackQueue,
    private readonly coordinator: FetchCoordinator,
    private readonly format: PcmFormat,
    private readonly defaultLookahead = 3
  ) {}

  run(sessionId: string, lookahead = this.defaultLookahead): Promise<PreloadResult> {
    return this.runs.runExclusive(sessionId, () => this.preload(sessionId, lookahead));
  }

  private async preload(sessionId: string, lookahead: number): Promise<PreloadResult> {
    const result: PreloadResult = { cached: [], removed: [] };
    let position = 1;

    while (position <= lookahead) {
      const entries = this.queue.list(sessionId);
      if (position >= entries.length) break;
      const sourceId = entries[position];

      try {
        await this.coordinator.ensureCached(sourceId, this.format.sampleRate, this.format.channels);
        result.cached.push(sourceId);
        position++;
      } catch (error) {
        logger.warn('Preload failed, removing entry from queue', { sessionId, sourceId, error: serializeError(error) });
        if (this.queue.removeEntry(sessionId, sourceId)) {
          result.removed.push(sourceId);
        } else {
          position++;
        }
      }
    }

    if (result.cached.length > 0 || result.removed.length > 0) {
      logger.debug('Preload finished', { sessionId, cached: result.cached.length, removed: result.removed.length });
    }
    return result;
  }
}
