import { KeyedMutex, serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { buildTrackMetadata, type IMetadataStore, type ISourceFetcher, type TrackMetadata } from '../../domains/sources';

const logger = getLogger('playback-service-metadata');

/**
 * Title and runtime lookups, cached independently of the PCM cache.
 * Concurrent lookups of one source share a single fetcher call.
 */
export class MetadataService {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: IMetadataStore,
    private readonly fetcher: ISourceFetcher
  ) {}

  async getMetadata(sourceId: string): Promise<TrackMetadata> {
    const stored = await this.store.get(sourceId);
    if (stored) return stored;

    return this.locks.runExclusive(sourceId, async () => {
      const raced = await this.store.get(sourceId);
      if (raced) return raced;

      const info = await this.fetcher.fetchMetadata(sourceId);
      const record = buildTrackMetadata(info.url || sourceId, info.title, info.durationSeconds);
      await this.store.put(sourceId, record);
      logger.debug('Stored metadata', { sourceId, title: record.title });
      return record;
    });
  }

  /** Warm the metadata cache in the background. */
  prefetch(sourceId: string): Promise<void> {
    return this.getMetadata(sourceId).then(
      () => undefined,
      error => {
        logger.warn('Metadata prefetch failed', { sourceId, error: serializeError(error) });
      }
    );
  }

  peek(sourceId: string): Promise<TrackMetadata | null> {
    return this.store.get(sourceId);
  }

  remove(sourceId: string): Promise<boolean> {
    return this.store.remove(sourceId);
  }
}
