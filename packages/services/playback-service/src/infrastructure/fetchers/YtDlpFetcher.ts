/**
 * Remote media fetcher backed by the yt-dlp CLI.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { DomainError, DomainErrorCode, toError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { parseSourceId, type ISourceFetcher, type SourceMetadata } from '../../domains/sources';
import { PlaybackError } from '../../application/errors';
import { runCommand } from '../process/run-command';

const logger = getLogger('playback-service-ytdlp-fetcher');

const infoSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nullish(),
});

const playlistSchema = z.object({
  entries: z
    .array(
      z
        .object({
          id: z.string().nullish(),
          url: z.string().nullish(),
        })
        .nullable()
    )
    .default([]),
});

export interface YtDlpFetcherOptions {
  timeoutMs: number;
  cookieFile?: string;
  binary?: string;
}

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new DomainError(`yt-dlp returned unreadable ${what}`, 502, toError(error), DomainErrorCode.EXTERNAL_SERVICE_ERROR);
  }
}

export class YtDlpFetcher implements ISourceFetcher {
  private readonly binary: string;

  constructor(private readonly options: YtDlpFetcherOptions) {
    this.binary = options.binary ?? 'yt-dlp';
  }

  async fetch(sourceId: string, destPath: string): Promise<void> {
    const url = this.mediaUrl(sourceId);
    logger.info('Downloading audio', { url });

    await runCommand(
      this.binary,
      [
        '--format',
        'bestaudio/best',
        '--no-playlist',
        '--no-progress',
        '--quiet',
        '--no-warnings',
        '--no-part',
        '--output',
        destPath,
        ...this.cookieArgs(),
        '--',
        url,
      ],
      { timeoutMs: this.options.timeoutMs }
    );

    try {
      await fs.access(destPath);
    } catch (error) {
      throw new DomainError(`yt-dlp produced no file for ${url}`, 502, toError(error), DomainErrorCode.EXTERNAL_SERVICE_ERROR);
    }
  }

  async fetchMetadata(sourceId: string): Promise<SourceMetadata> {
    const url = this.mediaUrl(sourceId);
    const { stdout } = await runCommand(
      this.binary,
      ['--dump-single-json', '--skip-download', '--no-playlist', '--no-warnings', ...this.cookieArgs(), '--', url],
      { timeoutMs: this.options.timeoutMs }
    );

    const info = infoSchema.parse(parseJson(stdout, 'metadata'));
    return {
      url: sourceId,
      title: info.title ?? undefined,
      durationSeconds: info.duration ?? undefined,
    };
  }

  async expandPlaylist(url: string): Promise<string[]> {
    const { stdout } = await runCommand(
      this.binary,
      ['--flat-playlist', '--dump-single-json', '--no-warnings', ...this.cookieArgs(), '--', url],
      { timeoutMs: this.options.timeoutMs }
    );

    const playlist = playlistSchema.parse(parseJson(stdout, 'playlist'));
    const urls: string[] = [];
    for (const entry of playlist.entries) {
      if (entry?.url) {
        urls.push(entry.url);
      } else if (entry?.id) {
        urls.push(`https://www.youtube.com/watch?v=${entry.id}`);
      }
    }
    logger.info('Expanded playlist', { url, entries: urls.length });
    return urls;
  }

  private mediaUrl(sourceId: string): string {
    const ref = parseSourceId(sourceId);
    if (ref.kind !== 'media') {
      throw PlaybackError.invalidSource(sourceId, 'not a media URL');
    }
    return ref.url;
  }

  private cookieArgs(): string[] {
    return this.options.cookieFile ? ['--cookies', this.options.cookieFile] : [];
  }
}
