/**
 * FetchCoordinator
 *
 * Populates the PCM cache. At most one fetch per cache key runs at a time
 * across all sessions: concurrent callers for the same key wait on the key's
 * lock and then take the cache-hit path. Fetch and transcode run through a
 * bounded pool.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import { KeyedMutex, serializeError, toError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { PlaybackError, isPlaybackError, PlaybackErrorCode } from '../errors';
import type { ISourceFetcher, ITranscoder, PcmFormat } from '../../domains/sources';
import type { PcmCacheStore, TempPaths } from '../../infrastructure/cache/PcmCacheStore';

const logger = getLogger('playback-service-fetch-coordinator');

export class FetchCoordinator {
  private readonly locks = new KeyedMutex();
  private readonly pool: LimitFunction;
  private inFlight = 0;

  constructor(
    private readonly cache: PcmCacheStore,
    private readonly fetcher: ISourceFetcher,
    private readonly transcoder: ITranscoder,
    concurrency = 4
  ) {
    this.pool = pLimit(concurrency);
  }

  /** Fetches currently downloading or transcoding. */
  get inFlightCount(): number {
    return this.inFlight;
  }

  async ensureCached(sourceId: string, sampleRate: number, channels: number): Promise<string> {
    const key = this.cache.keyFor(sourceId, sampleRate, channels);
    if (await this.cache.has(key)) {
      return this.cache.pathFor(key);
    }

    return this.locks.runExclusive(key, async () => {
      if (await this.cache.has(key)) {
        logger.debug('Cache filled while waiting for lock', { sourceId, key });
        return this.cache.pathFor(key);
      }
      return this.populate(sourceId, key, { sampleRate, channels });
    });
  }

  /**
   * Ensure the source is cached and decode it. A corrupt cache entry is
   * evicted and fetched again once.
   */
  async loadSamples(sourceId: string, sampleRate: number, channels: number): Promise<Int16Array> {
    const key = this.cache.keyFor(sourceId, sampleRate, channels);
    await this.ensureCached(sourceId, sampleRate, channels);
    try {
      return await this.cache.readSamples(key);
    } catch (error) {
      if (!isPlaybackError(error, PlaybackErrorCode.CACHE_CORRUPTION)) throw error;

      logger.warn('Cached audio corrupt, fetching again', { sourceId, key, error: serializeError(error) });
      await this.locks.runExclusive(key, () => this.cache.remove(key));
      await this.ensureCached(sourceId, sampleRate, channels);
      return this.cache.readSamples(key);
    }
  }

  async evict(sourceId: string, sampleRate: number, channels: number): Promise<boolean> {
    const key = this.cache.keyFor(sourceId, sampleRate, channels);
    return this.locks.runExclusive(key, () => this.cache.remove(key));
  }

  private async populate(sourceId: string, key: string, format: PcmFormat): Promise<string> {
    const startedAt = Date.now();
    let temp: TempPaths | undefined;
    this.inFlight++;

    try {
      temp = await this.cache.tempPaths(key);
      const { download, pcm } = temp;
      await this.pool(() => this.fetcher.fetch(sourceId, download));
      await this.pool(() => this.transcoder.transcode(download, pcm, format));
      const finalPath = await this.cache.commit(pcm, key);
      logger.info('Cached source', { sourceId, key, durationMs: Date.now() - startedAt });
      return finalPath;
    } catch (error) {
      logger.error('Failed to fetch source', { sourceId, key, error: serializeError(error) });
      throw PlaybackError.sourceUnavailable(sourceId, toError(error));
    } finally {
      this.inFlight--;
      if (temp) {
        await this.cache.discard(temp.download, temp.pcm);
      }
    }
  }
}
