/**
 * Redis-backed key/value cache with a per-service key prefix.
 *
 * @example
 * const cache = createRedisCache({ serviceName: 'playback-service', keyPrefix: 'mixdeck:' });
 */

import { Redis } from 'ioredis';
import { createLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

export interface RedisCacheConfig {
  serviceName: string;
  keyPrefix: string;
  url?: string;
  maxRetriesPerRequest?: number;
  lazyConnect?: boolean;
}

export interface ICache {
  get(key: string): Promise<string | null>;
  /** Without `ttlSeconds` the value does not expire. */
  set(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  del(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  keys(pattern: string): Promise<string[]>;
  ping(): Promise<boolean>;
  isReady(): boolean;
  disconnect(): Promise<void>;
}

export class RedisCache implements ICache {
  private readonly client: Redis;
  private isConnected = false;
  private readonly keyPrefix: string;
  private readonly logger;

  constructor(config: RedisCacheConfig) {
    this.keyPrefix = config.keyPrefix;
    this.logger = createLogger(`${config.serviceName}-redis`);

    const options = {
      maxRetriesPerRequest: config.maxRetriesPerRequest ?? 3,
      enableReadyCheck: true,
      lazyConnect: config.lazyConnect ?? true,
    };
    const url = config.url ?? process.env.REDIS_URL;
    this.client = url ? new Redis(url, options) : new Redis(options);

    this.client.on('connect', () => {
      this.logger.info('Connected to Redis server');
      this.isConnected = true;
    });

    this.client.on('error', (err: Error) => {
      this.logger.error('Redis connection error', { error: err.message });
      this.isConnected = false;
    });

    this.client.on('close', () => {
      this.logger.info('Redis connection closed');
      this.isConnected = false;
    });
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(this.prefixKey(key));
    } catch (error) {
      this.logger.error('Get error', { key, error: serializeError(error) });
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const prefixedKey = this.prefixKey(key);
    try {
      const result =
        ttlSeconds !== undefined
          ? await this.client.setex(prefixedKey, ttlSeconds, value)
          : await this.client.set(prefixedKey, value);
      return result === 'OK';
    } catch (error) {
      this.logger.error('Set error', { key, error: serializeError(error) });
      return false;
    }
  }

  async del(key: string): Promise<boolean> {
    try {
      const result = await this.client.del(this.prefixKey(key));
      return result === 1;
    } catch (error) {
      this.logger.error('Delete error', { key, error: serializeError(error) });
      return false;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const result = await this.client.exists(this.prefixKey(key));
      return result === 1;
    } catch (error) {
      this.logger.error('Exists error', { key, error: serializeError(error) });
      return false;
    }
  }

  async keys(pattern: string): Promise<string[]> {
    try {
      const keys = await this.client.keys(this.prefixKey(pattern));
      return keys.map(k => k.slice(this.keyPrefix.length));
    } catch (error) {
      this.logger.error('Keys error', { error: serializeError(error) });
      return [];
    }
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch (error) {
      this.logger.error('Ping error', { error: serializeError(error) });
      return false;
    }
  }

  isReady(): boolean {
    return this.isConnected && this.client.status === 'ready';
  }

  async disconnect(): Promise<void> {
    try {
      await this.client.quit();
      this.logger.info('Redis connection closed gracefully');
    } catch (error) {
      this.logger.error('Disconnect error', { error: serializeError(error) });
      this.client.disconnect();
    }
  }
}

export function createRedisCache(config: RedisCacheConfig): RedisCache {
  return new RedisCache(config);
}
