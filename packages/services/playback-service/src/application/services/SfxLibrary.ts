import fs from 'fs/promises';
import path from 'path';
import { getLogger } from '../../config/service-config';
import { fileSource } from '../../domains/sources';
import { isNotFound } from '../../infrastructure/fs-errors';
import { PlaybackError } from '../errors';

const logger = getLogger('playback-service-sfx-library');

const AUDIO_EXTENSIONS = new Set(['.mp3', '.wav', '.ogg', '.opus', '.flac', '.m4a', '.aac', '.webm']);

/** Sound effect files in one directory, addressed by file name. */
export class SfxLibrary {
  constructor(readonly dir: string) {}

  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.dir, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile() && AUDIO_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) {
        logger.warn('Sound effect directory missing', { dir: this.dir });
        return [];
      }
      throw error;
    }
  }

  /** Resolve a file name, with or without extension, to a `file:` source id. */
  async resolve(sound: string): Promise<string> {
    const files = await this.list();
    const match = files.find(file => file === sound) ?? files.find(file => path.basename(file, path.extname(file)) === sound);
    if (!match) {
      throw PlaybackError.soundNotFound(sound);
    }
    return fileSource(path.join(this.dir, match));
  }

  async random(pick: () => number = Math.random): Promise<string> {
    const files = await this.list();
    if (files.length === 0) {
      throw PlaybackError.soundNotFound('any sound effect');
    }
    const index = Math.min(Math.floor(pick() * files.length), files.length - 1);
    return files[index];
  }
}
