import fs from 'fs/promises';

export interface FakeSource {
  /** Bytes written as the "download"; the fake transcoder copies them through. */
  data?: Buffer;
  title?: string;
  durationSeconds?: number;
  fail?: Error;
  metadataFail?: Error;
  /** Fetch waits on this before writing. */
  gate?: Promise<void>;
  playlist?: string[];
}

/** In-process fetcher with scripted sources and recorded calls. */
export class FakeSourceFetcher {
  readonly fetchCalls: string[] = [];
  readonly metadataCalls: string[] = [];
  readonly playlistCalls: string[] = [];
  private readonly sources = new Map<string, FakeSource>();

  define(sourceId: string, source: FakeSource): this {
    this.sources.set(sourceId, source);
    return this;
  }

  async fetch(sourceId: string, destPath: string): Promise<void> {
    this.fetchCalls.push(sourceId);
    const source = this.sources.get(sourceId);
    if (source?.gate) await source.gate;
    if (!source) throw new Error(`unknown source ${sourceId}`);
    if (source.fail) throw source.fail;
    await fs.writeFile(destPath, source.data ?? Buffer.alloc(0));
  }

  async fetchMetadata(sourceId: string): Promise<{ url: string; title?: string; durationSeconds?: number }> {
    this.metadataCalls.push(sourceId);
    const source = this.sources.get(sourceId);
    if (!source) throw new Error(`unknown source ${sourceId}`);
    if (source.metadataFail) throw source.metadataFail;
    return { url: sourceId, title: source.title, durationSeconds: source.durationSeconds };
  }

  async expandPlaylist(url: string): Promise<string[]> {
    this.playlistCalls.push(url);
    const playlist = this.sources.get(url)?.playlist;
    if (!playlist) throw new Error(`unknown playlist ${url}`);
    return [...playlist];
  }
}

export interface TranscodeCall {
  inputPath: string;
  outputPath: string;
  format: { sampleRate: number; channels: number };
}

/** Copies the downloaded file through unchanged. */
export class FakeTranscoder {
  readonly calls: TranscodeCall[] = [];
  failWith: Error | null = null;

  async transcode(inputPath: string, outputPath: string, format: { sampleRate: number; channels: number }): Promise<void> {
    this.calls.push({ inputPath, outputPath, format });
    if (this.failWith) throw this.failWith;
    await fs.copyFile(inputPath, outputPath);
  }
}
