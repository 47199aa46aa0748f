/** What a fetcher learns about a source without downloading it. */
export interface SourceMetadata {
  url: string;
  title?: string;
  durationSeconds?: number;
}

/**
 * External capability that turns a source id into an audio file on disk.
 * The container format of the downloaded file is up to the fetcher.
 */
export interface ISourceFetcher {
  fetch(sourceId: string, destPath: string): Promise<void>;
  fetchMetadata(sourceId: string): Promise<SourceMetadata>;
  /** Resolve a playlist link into the ordered source ids it contains. */
  expandPlaylist(url: string): Promise<string[]>;
}
