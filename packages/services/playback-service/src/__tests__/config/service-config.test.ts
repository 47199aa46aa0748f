import path from 'path';
import { describe, it, expect } from 'vitest';
import { DomainErrorCode } from '@mixdeck/platform-core';
import { loadPlaybackConfig } from '../../config/service-config';

describe('loadPlaybackConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadPlaybackConfig({});
    const dataDir = path.resolve('persistent');

    expect(config).toEqual({
      dataDir,
      cacheDir: path.join(dataDir, 'audio_cache'),
      sfxDir: path.join(dataDir, 'sfx'),
      cookieFile: undefined,
      audio: { sampleRate: 48000, channels: 2, frameDurationMs: 20 },
      queueLookahead: 3,
      fetchConcurrency: 4,
      fetchTimeoutMs: 300000,
      metadataStore: 'file',
      redisUrl: undefined,
      redisKeyPrefix: 'mixdeck:',
      shutdownTimeoutMs: 10000,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.audio)).toBe(true);
  });

  it('should read overrides and treat empty strings as unset', () => {
    const config = loadPlaybackConfig({
      PERSISTENT_DATA_DIR: '/srv/mixdeck',
      MIXDECK_SFX_DIR: '/srv/sounds',
      MIXDECK_COOKIE_FILE: '/srv/cookies.txt',
      AUDIO_SAMPLE_RATE: '44100',
      AUDIO_CHANNELS: '1',
      QUEUE_LOOKAHEAD: '0',
      FETCH_CONCURRENCY: '',
    });

    expect(config).toMatchObject({
      dataDir: '/srv/mixdeck',
      cacheDir: '/srv/mixdeck/audio_cache',
      sfxDir: '/srv/sounds',
      cookieFile: '/srv/cookies.txt',
      audio: { sampleRate: 44100, channels: 1, frameDurationMs: 20 },
      queueLookahead: 0,
      fetchConcurrency: 4,
    });
  });

  it('should accept a redis metadata store with a url', () => {
    const config = loadPlaybackConfig({ METADATA_STORE: 'redis', REDIS_URL: 'redis://localhost:6379', REDIS_KEY_PREFIX: 'test:' });

    expect(config).toMatchObject({ metadataStore: 'redis', redisUrl: 'redis://localhost:6379', redisKeyPrefix: 'test:' });
  });

  it('should name every invalid variable', () => {
    expect(() => loadPlaybackConfig({ AUDIO_SAMPLE_RATE: 'fast', QUEUE_LOOKAHEAD: '-1' })).toThrow(
      expect.objectContaining({
        message: 'Invalid playback configuration: AUDIO_SAMPLE_RATE, QUEUE_LOOKAHEAD',
        code: DomainErrorCode.VALIDATION_ERROR,
        statusCode: 500,
      })
    );
  });

  it('should enforce ranges', () => {
    expect(() => loadPlaybackConfig({ AUDIO_CHANNELS: '9' })).toThrow('Invalid playback configuration: AUDIO_CHANNELS');
    expect(() => loadPlaybackConfig({ AUDIO_SAMPLE_RATE: '4000' })).toThrow('Invalid playback configuration: AUDIO_SAMPLE_RATE');
    expect(() => loadPlaybackConfig({ METADATA_STORE: 'memcached' })).toThrow('Invalid playback configuration: METADATA_STORE');
  });

  it('should require a redis url for the redis store', () => {
    expect(() => loadPlaybackConfig({ METADATA_STORE: 'redis' })).toThrow('Invalid playback configuration: REDIS_URL');
    expect(() => loadPlaybackConfig({ METADATA_STORE: 'redis', REDIS_URL: 'not a url' })).toThrow(
      'Invalid playback configuration: REDIS_URL'
    );
  });
});
