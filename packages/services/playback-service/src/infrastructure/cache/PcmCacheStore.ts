/**
 * PCM Cache Store
 *
 * On-disk store of decoded s16le PCM keyed by (source id, sample rate,
 * channels). Finished entries live in `cached/`; in-progress files live in
 * `downloading/` and only reach `cached/` through an atomic rename, so a file
 * under its final path is always complete.
 */

import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { serializeError, toError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { PlaybackError } from '../../application/errors';
import { getVideoId, isFileSource, FILE_SCHEME } from '../../domains/sources';
import { SAMPLE_WIDTH_BYTES, pcmToSamples } from '../../domains/audio-mixing';
import { isNotFound } from '../fs-errors';

const logger = getLogger('playback-service-pcm-cache');

const PCM_EXTENSION = '.pcm';

export interface TempPaths {
  download: string;
  pcm: string;
}

function digest(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

function sanitize(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, '_').slice(0, 48) || 'sound';
}

export class PcmCacheStore {
  readonly cachedDir: string;
  readonly tempDir: string;

  constructor(rootDir: string) {
    this.cachedDir = path.join(path.resolve(rootDir), 'cached');
    this.tempDir = path.join(path.resolve(rootDir), 'downloading');
  }

  async init(): Promise<void> {
    await fs.mkdir(this.cachedDir, { recursive: true });
    await fs.mkdir(this.tempDir, { recursive: true });
  }

  keyFor(sourceId: string, sampleRate: number, channels: number): string {
    return `${this.baseFor(sourceId)}_${sampleRate}Hz_${channels}ch`;
  }

  pathFor(key: string): string {
    return path.join(this.cachedDir, `${key}${PCM_EXTENSION}`);
  }

  /** A key is cached when its final file exists and is non-empty. */
  async has(key: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.pathFor(key));
      return stats.isFile() && stats.size > 0;
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn('Cache stat failed', { key, error: serializeError(error) });
      }
      return false;
    }
  }

  /** Unique temp paths for one population attempt; creates the temp dir. */
  async tempPaths(key: string): Promise<TempPaths> {
    await fs.mkdir(this.tempDir, { recursive: true });
    const suffix = uuidv4();
    return {
      download: path.join(this.tempDir, `${key}.${suffix}.download.part`),
      pcm: path.join(this.tempDir, `${key}.${suffix}.pcm.part`),
    };
  }

  async commit(tempPcmPath: string, key: string): Promise<string> {
    const finalPath = this.pathFor(key);
    await fs.mkdir(this.cachedDir, { recursive: true });
    await fs.rename(tempPcmPath, finalPath);
    logger.debug('Committed cache entry', { key });
    return finalPath;
  }

  async write(key: string, data: Buffer): Promise<string> {
    const { pcm } = await this.tempPaths(key);
    try {
      await fs.writeFile(pcm, data);
      return await this.commit(pcm, key);
    } finally {
      await this.discard(pcm);
    }
  }

  async readSamples(key: string): Promise<Int16Array> {
    let data: Buffer;
    try {
      data = await fs.readFile(this.pathFor(key));
    } catch (error) {
      throw PlaybackError.cacheCorruption(key, 'file could not be read', toError(error));
    }

    if (data.length === 0) {
      throw PlaybackError.cacheCorruption(key, 'file is empty');
    }
    if (data.length % SAMPLE_WIDTH_BYTES !== 0) {
      throw PlaybackError.cacheCorruption(key, `odd byte length ${data.length}`);
    }
    return pcmToSamples(data);
  }

  async remove(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(key));
      logger.info('Removed cached audio', { key });
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        logger.warn('Attempted to remove non-existent cache entry', { key });
        return false;
      }
      throw error;
    }
  }

  /** Delete temp files; missing files are fine. */
  async discard(...paths: string[]): Promise<void> {
    await Promise.all(
      paths.map(async filePath => {
        try {
          await fs.unlink(filePath);
        } catch (error) {
          if (!isNotFound(error)) {
            logger.warn('Failed to remove temp file', { filePath, error: serializeError(error) });
          }
        }
      })
    );
  }

  async cleanupTemp(): Promise<void> {
    await fs.rm(this.tempDir, { recursive: true, force: true });
    await fs.mkdir(this.tempDir, { recursive: true });
  }

  async listKeys(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.cachedDir);
      return entries.filter(name => name.endsWith(PCM_EXTENSION)).map(name => name.slice(0, -PCM_EXTENSION.length));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  private baseFor(sourceId: string): string {
    const videoId = getVideoId(sourceId);
    if (videoId) return videoId;

    if (isFileSource(sourceId)) {
      const filePath = sourceId.slice(FILE_SCHEME.length);
      const name = path.basename(filePath, path.extname(filePath));
      return `${sanitize(name)}-${digest(sourceId).slice(0, 8)}`;
    }

    return digest(sourceId).slice(0, 16);
  }
}
