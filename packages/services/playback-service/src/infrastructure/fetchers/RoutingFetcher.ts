import { isFileSource, type ISourceFetcher, type SourceMetadata } from '../../domains/sources';

/** Sends `file:` sources to one fetcher and everything else to another. */
export class RoutingFetcher implements ISourceFetcher {
  constructor(
    private readonly media: ISourceFetcher,
    private readonly files: ISourceFetcher
  ) {}

  fetch(sourceId: string, destPath: string): Promise<void> {
    return this.route(sourceId).fetch(sourceId, destPath);
  }

  fetchMetadata(sourceId: string): Promise<SourceMetadata> {
    return this.route(sourceId).fetchMetadata(sourceId);
  }

  expandPlaylist(url: string): Promise<string[]> {
    return this.route(url).expandPlaylist(url);
  }

  private route(sourceId: string): ISourceFetcher {
    return isFileSource(sourceId) ? this.files : this.media;
  }
}
