import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { parseSourceId, type ISourceFetcher, type SourceMetadata } from '../../domains/sources';
import { PlaybackError } from '../../application/errors';
import { runCommand } from '../process/run-command';

const logger = getLogger('playback-service-local-file-fetcher');

const probeSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
});

/** Serves `file:` sources from the local filesystem. */
export class LocalFileFetcher implements ISourceFetcher {
  constructor(
    private readonly probeTimeoutMs = 30000,
    private readonly ffprobeBinary = 'ffprobe'
  ) {}

  async fetch(sourceId: string, destPath: string): Promise<void> {
    await fs.copyFile(this.filePath(sourceId), destPath);
  }

  async fetchMetadata(sourceId: string): Promise<SourceMetadata> {
    const filePath = this.filePath(sourceId);
    return {
      url: sourceId,
      title: path.basename(filePath, path.extname(filePath)),
      durationSeconds: await this.probeDuration(filePath),
    };
  }

  async expandPlaylist(url: string): Promise<string[]> {
    return [url];
  }

  private async probeDuration(filePath: string): Promise<number | undefined> {
    try {
      const { stdout } = await runCommand(
        this.ffprobeBinary,
        ['-v', 'quiet', '-print_format', 'json', '-show_format', filePath],
        { timeoutMs: this.probeTimeoutMs }
      );
      const parsed = probeSchema.safeParse(JSON.parse(stdout));
      const duration = parsed.success ? Number(parsed.data.format?.duration) : NaN;
      return Number.isFinite(duration) ? Math.round(duration) : undefined;
    } catch (error) {
      logger.debug('Duration probe failed', { filePath, error: errorMessage(error) });
      return undefined;
    }
  }

  private filePath(sourceId: string): string {
    const ref = parseSourceId(sourceId);
    if (ref.kind !== 'file') {
      throw PlaybackError.invalidSource(sourceId, 'not a file source');
    }
    return ref.path;
  }
}
