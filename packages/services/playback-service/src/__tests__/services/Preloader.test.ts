import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FakeSourceFetcher, FakeTranscoder, createTempDir, pcmBytes, removeTempDir } from '@mixdeck/test-utils';

const { mockLogger } = await vi.hoisted(async () => {
  const { createMockLogger } = await import('@mixdeck/test-utils');
  return { mockLogger: createMockLogger() };
});

vi.mock('../../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../../config/service-config')>()),
  getLogger: () => mockLogger,
}));

import { Preloader } from '../../application/services/Preloader';
import { FetchCoordinator } from '../../application/services/FetchCoordinator';
import { PcmCacheStore } from '../../infrastructure/cache/PcmCacheStore';
import { PlaybackQueue } from '../../domains/playback-queue';

const FORMAT = { sampleRate: 8000, channels: 1 };

describe('Preloader', () => {
  let root: string;
  let fetcher: FakeSourceFetcher;
  let queue: PlaybackQueue;
  let preloader: Preloader;

  beforeEach(async () => {
    vi.clearAllMocks();
    root = await createTempDir();
    const store = new PcmCacheStore(root);
    await store.init();
    fetcher = new FakeSourceFetcher()
      .define('head', { data: pcmBytes(1) })
      .define('a', { data: pcmBytes(2) })
      .define('b', { data: pcmBytes(3) })
      .define('c', { data: pcmBytes(4) })
      .define('bad', { fail: new Error('gone') });
    queue = new PlaybackQueue();
    preloader = new Preloader(queue, new FetchCoordinator(store, fetcher, new FakeTranscoder()), FORMAT);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should cache the entries behind the head', async () => {
    queue.enqueue('s1', ['head', 'a', 'b']);

    expect(await preloader.run('s1')).toEqual({ cached: ['a', 'b'], removed: [] });
    expect(fetcher.fetchCalls).toEqual(['a', 'b']);
  });

  it('should stop at the lookahead', async () => {
    queue.enqueue('s1', ['head', 'a', 'b', 'c']);

    expect(await preloader.run('s1', 1)).toEqual({ cached: ['a'], removed: [] });
  });

  it('should remove failing entries and keep walking the window', async () => {
    queue.enqueue('s1', ['head', 'a', 'bad', 'c']);

    const result = await preloader.run('s1', 3);

    expect(result).toEqual({ cached: ['a', 'c'], removed: ['bad'] });
    expect(queue.list('s1')).toEqual(['head', 'a', 'c']);
    expect(fetcher.fetchCalls).toEqual(['a', 'bad', 'c']);
    expect(mockLogger.warn).toHaveBeenCalledWith('Preload failed, removing entry from queue', expect.objectContaining({ sourceId: 'bad' }));
  });

  it('should pull later entries into the window after a removal', async () => {
    queue.enqueue('s1', ['head', 'bad', 'a', 'b']);

    expect(await preloader.run('s1', 2)).toEqual({ cached: ['a', 'b'], removed: ['bad'] });
    expect(queue.list('s1')).toEqual(['head', 'a', 'b']);
  });

  it('should do nothing without a queue or a lookahead', async () => {
    queue.enqueue('s1', ['head', 'a']);

    expect(await preloader.run('missing')).toEqual({ cached: [], removed: [] });
    expect(await preloader.run('s1', 0)).toEqual({ cached: [], removed: [] });
    expect(fetcher.fetchCalls).toEqual([]);
  });
});
