export interface PcmFormat {
  sampleRate: number;
  channels: number;
}

/** Decodes any input the fetcher produced into raw s16le PCM. */
export interface ITranscoder {
  transcode(inputPath: string, outputPath: string, format: PcmFormat): Promise<void>;
}
