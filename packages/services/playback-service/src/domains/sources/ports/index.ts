export type { ISourceFetcher, SourceMetadata } from './ISourceFetcher';
export type { ITranscoder, PcmFormat } from './ITranscoder';
export type { IMetadataStore } from './IMetadataStore';
