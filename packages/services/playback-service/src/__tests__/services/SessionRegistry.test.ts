import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockLogger } = await vi.hoisted(async () => {
  const { createMockLogger } = await import('@mixdeck/test-utils');
  return { mockLogger: createMockLogger() };
});

vi.mock('../../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../../config/service-config')>()),
  getLogger: () => mockLogger,
}));

import { SessionRegistry } from '../../application/services/SessionRegistry';
import { PlaybackErrorCode } from '../../application/errors';

const FORMAT = { sampleRate: 100, channels: 1, frameDurationMs: 20 };

describe('SessionRegistry', () => {
  let registry: SessionRegistry;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    registry = new SessionRegistry(FORMAT);
  });

  afterEach(() => {
    registry.teardownAll();
    vi.useRealTimers();
  });

  it('should create one mixer per session', () => {
    const first = registry.getOrCreate('s1');
    const second = registry.getOrCreate('s1');

    expect(second).toBe(first);
    expect(first.mixer.sessionId).toBe('s1');
    expect(first.pump).toBeUndefined();
    expect(registry.sessions()).toEqual(['s1']);
  });

  it('should notify listeners once per created session', () => {
    const listener = vi.fn();
    const unsubscribe = registry.onSessionCreated(listener);

    registry.getOrCreate('s1');
    registry.getOrCreate('s1');
    unsubscribe();
    registry.getOrCreate('s2');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].sessionId).toBe('s1');
  });

  it('should still create the session when a listener throws', () => {
    registry.onSessionCreated(() => {
      throw new Error('listener broke');
    });

    expect(registry.getOrCreate('s1').sessionId).toBe('s1');
    expect(mockLogger.error).toHaveBeenCalledWith('Session created listener failed', expect.objectContaining({ sessionId: 's1' }));
  });

  it('should start a frame pump for a sink, also on a later call', () => {
    const write = vi.fn();
    registry.getOrCreate('s1');

    const handle = registry.getOrCreate('s1', { write });
    vi.advanceTimersByTime(40);

    expect(handle.pump?.running).toBe(true);
    expect(write).toHaveBeenCalledTimes(2);
  });

  it('should stop the pump and silence the mixer on teardown', () => {
    const handle = registry.getOrCreate('s1', { write: vi.fn() });
    handle.mixer.enqueueMusic(Int16Array.from([1, 2, 3]));

    expect(registry.teardown('s1')).toBe(true);

    expect(handle.pump?.running).toBe(false);
    expect(handle.mixer.streamCount).toBe(0);
    expect(handle.mixer.isPaused).toBe(true);
    expect(registry.has('s1')).toBe(false);
    expect(registry.teardown('s1')).toBe(false);
  });

  it('should reject lookups of unknown sessions', () => {
    expect(registry.get('missing')).toBeUndefined();
    expect(() => registry.require('missing')).toThrow(expect.objectContaining({ code: PlaybackErrorCode.SESSION_NOT_FOUND }));
  });

  it('should tear down every session', () => {
    registry.getOrCreate('s1');
    registry.getOrCreate('s2');

    expect(registry.teardownAll()).toBe(2);
    expect(registry.size).toBe(0);
  });
});
