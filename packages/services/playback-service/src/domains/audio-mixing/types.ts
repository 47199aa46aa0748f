export const SAMPLE_WIDTH_BYTES = 2;
export const SAMPLE_MIN = -32768;
export const SAMPLE_MAX = 32767;

export interface MixerFormat {
  sampleRate: number;
  channels: number;
  frameDurationMs: number;
}

export type TrackKind = 'music' | 'sfx';

export type TrackFinishReason = 'completed' | 'skipped';

export interface TrackHooks {
  sourceId?: string;
  onBeforePlay?: () => void;
  onAfterPlay?: () => void;
}

/**
 * One in-flight audio item with its own read cursor.
 * Invariant: 0 <= position <= samples.length.
 */
export interface Track {
  readonly id: string;
  readonly kind: TrackKind;
  readonly sourceId?: string;
  readonly samples: Int16Array;
  position: number;
  started: boolean;
  readonly onBeforePlay?: () => void;
  readonly onAfterPlay?: () => void;
}

export interface TrackFinishedEvent {
  sessionId: string;
  trackId: string;
  kind: TrackKind;
  sourceId?: string;
  reason: TrackFinishReason;
}

export function frameSamplesFor(format: MixerFormat): number {
  return Math.round((format.sampleRate * format.channels * format.frameDurationMs) / 1000);
}

/** Decode little-endian signed 16-bit PCM bytes. */
export function pcmToSamples(data: Buffer): Int16Array {
  const count = Math.floor(data.length / SAMPLE_WIDTH_BYTES);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = data.readInt16LE(i * SAMPLE_WIDTH_BYTES);
  }
  return samples;
}

export function samplesToPcm(samples: ArrayLike<number>): Buffer {
  const data = Buffer.alloc(samples.length * SAMPLE_WIDTH_BYTES);
  for (let i = 0; i < samples.length; i++) {
    data.writeInt16LE(samples[i], i * SAMPLE_WIDTH_BYTES);
  }
  return data;
}
