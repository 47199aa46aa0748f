import { serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import type { Mixer } from './Mixer';

const logger = getLogger('playback-service-frame-pump');

/** Downstream real-time consumer of mixed frames. */
export interface AudioSink {
  write(frame: Buffer): void | Promise<void>;
}

/**
 * Pulls one frame from the mixer per frame duration and hands it to the sink.
 * Sink failures are logged; the pump keeps running.
 */
export class FramePump {
  private timer: NodeJS.Timeout | null = null;
  private framesWritten = 0;
  private sinkErrors = 0;

  constructor(
    private readonly mixer: Mixer,
    private readonly sink: AudioSink
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.mixer.format.frameDurationMs);
    logger.debug('Frame pump started', { sessionId: this.mixer.sessionId, intervalMs: this.mixer.format.frameDurationMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.debug('Frame pump stopped', { sessionId: this.mixer.sessionId, framesWritten: this.framesWritten });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get stats(): { framesWritten: number; sinkErrors: number } {
    return { framesWritten: this.framesWritten, sinkErrors: this.sinkErrors };
  }

  tick(): void {
    const frame = this.mixer.read();
    try {
      const pending = this.sink.write(frame);
      this.framesWritten++;
      if (pending instanceof Promise) {
        pending.catch(error => this.recordSinkError(error));
      }
    } catch (error) {
      this.recordSinkError(error);
    }
  }

  private recordSinkError(error: unknown): void {
    this.sinkErrors++;
    logger.warn('Audio sink write failed', { sessionId: this.mixer.sessionId, error: serializeError(error) });
  }
}
