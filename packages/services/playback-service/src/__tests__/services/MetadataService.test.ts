import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeSourceFetcher, InMemoryCache, loggedMessages } from '@mixdeck/test-utils';

const { mockLogger } = await vi.hoisted(async () => {
  const { createMockLogger } = await import('@mixdeck/test-utils');
  return { mockLogger: createMockLogger() };
});

vi.mock('../../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../../config/service-config')>()),
  getLogger: () => mockLogger,
}));

import { MetadataService } from '../../application/services/MetadataService';
import { RedisMetadataStore } from '../../infrastructure/metadata';

const SOURCE = 'https://example.com/song-a';

describe('MetadataService', () => {
  let fetcher: FakeSourceFetcher;
  let store: RedisMetadataStore;
  let service: MetadataService;

  beforeEach(() => {
    vi.clearAllMocks();
    fetcher = new FakeSourceFetcher();
    store = new RedisMetadataStore(new InMemoryCache());
    service = new MetadataService(store, fetcher);
  });

  describe('Happy path', () => {
    it('should fetch once and serve later lookups from the store', async () => {
      fetcher.define(SOURCE, { title: 'Song A', durationSeconds: 125 });

      const first = await service.getMetadata(SOURCE);
      const second = await service.getMetadata(SOURCE);

      expect(first).toEqual({ url: SOURCE, title: 'Song A', runtimeSeconds: 125, runtimeDisplay: '2:05' });
      expect(second).toEqual(first);
      expect(fetcher.metadataCalls).toEqual([SOURCE]);
    });

    it('should share one fetch between concurrent lookups', async () => {
      fetcher.define(SOURCE, { title: 'Song A', durationSeconds: 10 });

      await Promise.all([service.getMetadata(SOURCE), service.getMetadata(SOURCE)]);

      expect(fetcher.metadataCalls).toEqual([SOURCE]);
    });

    it('should fall back to the url when the source has no title', async () => {
      fetcher.define(SOURCE, {});

      expect(await service.getMetadata(SOURCE)).toEqual({ url: SOURCE, title: SOURCE, runtimeSeconds: 0, runtimeDisplay: '0:00' });
    });

    it('should peek without fetching', async () => {
      fetcher.define(SOURCE, { title: 'Song A' });

      expect(await service.peek(SOURCE)).toBeNull();
      await service.prefetch(SOURCE);

      expect(await service.peek(SOURCE)).toMatchObject({ title: 'Song A' });
      expect(fetcher.metadataCalls).toEqual([SOURCE]);
    });

    it('should forget removed records', async () => {
      fetcher.define(SOURCE, { title: 'Song A' });
      await service.getMetadata(SOURCE);

      expect(await service.remove(SOURCE)).toBe(true);
      expect(await service.peek(SOURCE)).toBeNull();
    });
  });

  describe('Service failures', () => {
    it('should propagate fetch failures from getMetadata', async () => {
      fetcher.define(SOURCE, { metadataFail: new Error('lookup failed') });

      await expect(service.getMetadata(SOURCE)).rejects.toThrow('lookup failed');
      expect(await service.peek(SOURCE)).toBeNull();
    });

    it('should log prefetch failures instead of rejecting', async () => {
      fetcher.define(SOURCE, { metadataFail: new Error('lookup failed') });

      await expect(service.prefetch(SOURCE)).resolves.toBeUndefined();
      expect(loggedMessages(mockLogger, 'warn')).toEqual(['Metadata prefetch failed']);
    });
  });
});
