import { serializeError, type ICache } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { trackMetadataSchema, type IMetadataStore, type TrackMetadata } from '../../domains/sources';

const logger = getLogger('playback-service-redis-metadata');

const KEY_NAMESPACE = 'metadata:';

export class RedisMetadataStore implements IMetadataStore {
  constructor(private readonly cache: ICache) {}

  async get(sourceId: string): Promise<TrackMetadata | null> {
    const raw = await this.cache.get(this.keyFor(sourceId));
    if (raw === null) return null;

    try {
      const parsed = trackMetadataSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      logger.warn('Discarding invalid metadata record', { sourceId, issues: parsed.error.issues.length });
    } catch (error) {
      logger.warn('Metadata record is not valid JSON', { sourceId, error: serializeError(error) });
    }
    return null;
  }

  async put(sourceId: string, record: TrackMetadata): Promise<void> {
    const stored = await this.cache.set(this.keyFor(sourceId), JSON.stringify(record));
    if (!stored) {
      logger.warn('Metadata record was not stored', { sourceId });
    }
  }

  async remove(sourceId: string): Promise<boolean> {
    return this.cache.del(this.keyFor(sourceId));
  }

  private keyFor(sourceId: string): string {
    return `${KEY_NAMESPACE}${sourceId}`;
  }
}
