import path from 'path';
import { z } from 'zod';
import { DomainError, DomainErrorCode, getLogger as getPlatformLogger, type EnvSource } from '@mixdeck/platform-core';

export const SERVICE_NAME = 'playback-service';

export function getLogger(module: string) {
  return getPlatformLogger(module);
}

const intFrom = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? fallback : Number(value)))
    .pipe(z.number().int().min(min));

const envSchema = z.object({
  PERSISTENT_DATA_DIR: z.string().min(1).default('persistent'),
  MIXDECK_COOKIE_FILE: z.string().min(1).optional(),
  MIXDECK_SFX_DIR: z.string().min(1).optional(),
  AUDIO_SAMPLE_RATE: intFrom(48000, 8000),
  AUDIO_CHANNELS: intFrom(2, 1).pipe(z.number().max(8)),
  AUDIO_FRAME_MS: intFrom(20, 1),
  QUEUE_LOOKAHEAD: intFrom(3, 0),
  FETCH_CONCURRENCY: intFrom(4, 1),
  FETCH_TIMEOUT_MS: intFrom(300000, 1000),
  METADATA_STORE: z.enum(['file', 'redis']).default('file'),
  REDIS_URL: z.string().url().optional(),
  REDIS_KEY_PREFIX: z.string().default('mixdeck:'),
  SHUTDOWN_TIMEOUT_MS: intFrom(10000, 1),
});

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  frameDurationMs: number;
}

export interface PlaybackServiceConfig {
  dataDir: string;
  cacheDir: string;
  sfxDir: string;
  cookieFile?: string;
  audio: AudioFormat;
  queueLookahead: number;
  fetchConcurrency: number;
  fetchTimeoutMs: number;
  metadataStore: 'file' | 'redis';
  redisUrl?: string;
  redisKeyPrefix: string;
  shutdownTimeoutMs: number;
}

/**
 * Parse the process environment into a frozen service configuration.
 * Relative directories resolve against the working directory.
 */
export function loadPlaybackConfig(env: EnvSource = process.env): Readonly<PlaybackServiceConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    throw new DomainError(
      `Invalid playback configuration: ${keys.join(', ')}`,
      500,
      undefined,
      DomainErrorCode.VALIDATION_ERROR,
      { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
    );
  }

  const values = parsed.data;
  if (values.METADATA_STORE === 'redis' && !values.REDIS_URL) {
    throw new DomainError(
      'Invalid playback configuration: REDIS_URL',
      500,
      undefined,
      DomainErrorCode.VALIDATION_ERROR,
      { issues: ['REDIS_URL: required when METADATA_STORE is redis'] }
    );
  }

  const dataDir = path.resolve(values.PERSISTENT_DATA_DIR);
  return Object.freeze({
    dataDir,
    cacheDir: path.join(dataDir, 'audio_cache'),
    sfxDir: values.MIXDECK_SFX_DIR ? path.resolve(values.MIXDECK_SFX_DIR) : path.join(dataDir, 'sfx'),
    cookieFile: values.MIXDECK_COOKIE_FILE ? path.resolve(values.MIXDECK_COOKIE_FILE) : undefined,
    audio: Object.freeze({
      sampleRate: values.AUDIO_SAMPLE_RATE,
      channels: values.AUDIO_CHANNELS,
      frameDurationMs: values.AUDIO_FRAME_MS,
    }),
    queueLookahead: values.QUEUE_LOOKAHEAD,
    fetchConcurrency: values.FETCH_CONCURRENCY,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    metadataStore: values.METADATA_STORE,
    redisUrl: values.REDIS_URL,
    redisKeyPrefix: values.REDIS_KEY_PREFIX,
    shutdownTimeoutMs: values.SHUTDOWN_TIMEOUT_MS,
  });
}
