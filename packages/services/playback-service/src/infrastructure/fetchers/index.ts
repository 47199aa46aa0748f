export { YtDlpFetcher, type YtDlpFetcherOptions } from './YtDlpFetcher';
export { LocalFileFetcher } from './LocalFileFetcher';
export { RoutingFetcher } from './RoutingFetcher';
export { FfmpegTranscoder } from './FfmpegTranscoder';
