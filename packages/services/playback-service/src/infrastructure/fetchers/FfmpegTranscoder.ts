import type { ITranscoder, PcmFormat } from '../../domains/sources';
import { runCommand } from '../process/run-command';

/** Decodes anything ffmpeg reads into headerless interleaved s16le PCM. */
export class FfmpegTranscoder implements ITranscoder {
  constructor(
    private readonly timeoutMs: number,
    private readonly binary = 'ffmpeg'
  ) {}

  async transcode(inputPath: string, outputPath: string, format: PcmFormat): Promise<void> {
    await runCommand(
      this.binary,
      [
        '-nostdin',
        '-y',
        '-loglevel',
        'error',
        '-i',
        inputPath,
        '-f',
        's16le',
        '-acodec',
        'pcm_s16le',
        '-ac',
        String(format.channels),
        '-ar',
        String(format.sampleRate),
        outputPath,
      ],
      { timeoutMs: this.timeoutMs }
    );
  }
}
