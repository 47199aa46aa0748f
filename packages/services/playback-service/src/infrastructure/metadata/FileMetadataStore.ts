import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { trackMetadataSchema, type IMetadataStore, type TrackMetadata } from '../../domains/sources';
import { isNotFound } from '../fs-errors';

const logger = getLogger('playback-service-file-metadata');

/**
 * One JSON document per source under `<rootDir>/metadata`. Unreadable or
 * invalid documents count as absent.
 */
export class FileMetadataStore implements IMetadataStore {
  private readonly dir: string;

  constructor(rootDir: string) {
    this.dir = path.join(path.resolve(rootDir), 'metadata');
  }

  async get(sourceId: string): Promise<TrackMetadata | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(sourceId), 'utf8');
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn('Metadata read failed', { sourceId, error: serializeError(error) });
      }
      return null;
    }

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
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.fileFor(sourceId);
    const temp = `${target}.${uuidv4()}.tmp`;
    await fs.writeFile(temp, JSON.stringify(record), 'utf8');
    await fs.rename(temp, target);
  }

  async remove(sourceId: string): Promise<boolean> {
    try {
      await fs.unlink(this.fileFor(sourceId));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private fileFor(sourceId: string): string {
    const name = crypto.createHash('sha256').update(sourceId).digest('hex').slice(0, 32);
    return path.join(this.dir, `${name}.json`);
  }
}
