/**
 * Mixer
 *
 * Per-session real-time mixer. Holds the active music and sound-effect tracks
 * and produces one fixed-size PCM frame per `read()` call by summing every
 * active track into a 32-bit accumulator and clipping to 16 bits.
 *
 * All methods are synchronous and never perform I/O, so on the single event
 * loop `read()` and every mutation are mutually exclusive. Fully consumed or
 * skipped tracks fire `onAfterPlay` once and are announced through the
 * `trackFinished` event.
 */

import { EventEmitter } from 'events';
import { serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import {
  SAMPLE_MAX,
  SAMPLE_MIN,
  SAMPLE_WIDTH_BYTES,
  frameSamplesFor,
  type MixerFormat,
  type Track,
  type TrackFinishReason,
  type TrackFinishedEvent,
  type TrackHooks,
  type TrackKind,
} from './types';

const logger = getLogger('playback-service-mixer');

export const TRACK_FINISHED = 'trackFinished';

export class Mixer extends EventEmitter {
  readonly frameSamples: number;
  readonly frameBytes: number;

  private readonly musicTracks: Track[] = [];
  private readonly sfxTracks: Track[] = [];
  private paused = false;
  private trackCounter = 0;
  private readonly accumulator: Int32Array;
  private readonly silence: Buffer;

  constructor(
    readonly sessionId: string,
    readonly format: MixerFormat
  ) {
    super();
    this.frameSamples = frameSamplesFor(format);
    this.frameBytes = this.frameSamples * SAMPLE_WIDTH_BYTES;
    this.accumulator = new Int32Array(this.frameSamples);
    this.silence = Buffer.alloc(this.frameBytes);
  }

  /**
   * Produce the next frame. Returns the shared silent frame while paused;
   * callers must not modify it.
   */
  read(): Buffer {
    if (this.paused) {
      return this.silence;
    }

    const accumulator = this.accumulator;
    accumulator.fill(0);
    const exhausted: Track[] = [];

    for (const track of [...this.musicTracks, ...this.sfxTracks]) {
      if (!track.started) {
        track.started = true;
        this.invokeHook(track, 'onBeforePlay');
      }

      const end = Math.min(track.position + this.frameSamples, track.samples.length);
      for (let i = track.position, j = 0; i < end; i++, j++) {
        accumulator[j] += track.samples[i];
      }
      track.position = end;

      if (track.position >= track.samples.length) {
        exhausted.push(track);
      }
    }

    const frame = Buffer.allocUnsafe(this.frameBytes);
    for (let i = 0; i < this.frameSamples; i++) {
      const value = accumulator[i];
      frame.writeInt16LE(value > SAMPLE_MAX ? SAMPLE_MAX : value < SAMPLE_MIN ? SAMPLE_MIN : value, i * SAMPLE_WIDTH_BYTES);
    }

    for (const track of exhausted) {
      this.finish(track, 'completed');
    }

    return frame;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  enqueueMusic(samples: Int16Array, hooks: TrackHooks = {}): string {
    return this.enqueue('music', samples, hooks);
  }

  enqueueSfx(samples: Int16Array, hooks: TrackHooks = {}): string {
    return this.enqueue('sfx', samples, hooks);
  }

  /**
   * Force every active music track to its end. Completion hooks fire before
   * this returns, so the skipped audio never reaches another frame.
   */
  skipCurrent(): number {
    const skipped = [...this.musicTracks];
    for (const track of skipped) {
      track.position = track.samples.length;
      this.finish(track, 'skipped');
    }
    return skipped.length;
  }

  /** Drop music tracks without firing hooks or events. */
  clearMusic(): void {
    this.musicTracks.length = 0;
  }

  clearSfx(): void {
    this.sfxTracks.length = 0;
  }

  clearAll(): void {
    this.clearMusic();
    this.clearSfx();
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isPlaying(): boolean {
    return !this.paused && this.streamCount > 0;
  }

  get musicCount(): number {
    return this.musicTracks.length;
  }

  get sfxCount(): number {
    return this.sfxTracks.length;
  }

  get streamCount(): number {
    return this.musicTracks.length + this.sfxTracks.length;
  }

  /** Source id of the oldest active music track, if any. */
  get currentSourceId(): string | undefined {
    return this.musicTracks[0]?.sourceId;
  }

  onTrackFinished(listener: (event: TrackFinishedEvent) => void): () => void {
    this.on(TRACK_FINISHED, listener);
    return () => {
      this.off(TRACK_FINISHED, listener);
    };
  }

  private enqueue(kind: TrackKind, samples: Int16Array, hooks: TrackHooks): string {
    const track: Track = {
      id: `${kind}-${++this.trackCounter}`,
      kind,
      sourceId: hooks.sourceId,
      samples,
      position: 0,
      started: false,
      onBeforePlay: hooks.onBeforePlay,
      onAfterPlay: hooks.onAfterPlay,
    };
    this.collectionFor(kind).push(track);
    this.resume();
    logger.debug('Track queued', { sessionId: this.sessionId, trackId: track.id, kind, samples: samples.length });
    return track.id;
  }

  private finish(track: Track, reason: TrackFinishReason): void {
    const tracks = this.collectionFor(track.kind);
    const index = tracks.indexOf(track);
    if (index === -1) {
      return;
    }
    tracks.splice(index, 1);

    this.invokeHook(track, 'onAfterPlay');

    const event: TrackFinishedEvent = {
      sessionId: this.sessionId,
      trackId: track.id,
      kind: track.kind,
      sourceId: track.sourceId,
      reason,
    };
    try {
      this.emit(TRACK_FINISHED, event);
    } catch (error) {
      logger.error('trackFinished listener failed', { sessionId: this.sessionId, trackId: track.id, error: serializeError(error) });
    }
  }

  private invokeHook(track: Track, hook: 'onBeforePlay' | 'onAfterPlay'): void {
    const callback = track[hook];
    if (!callback) return;
    try {
      callback();
    } catch (error) {
      logger.error(`${hook} hook failed`, { sessionId: this.sessionId, trackId: track.id, error: serializeError(error) });
    }
  }

  private collectionFor(kind: TrackKind): Track[] {
    return kind === 'music' ? this.musicTracks : this.sfxTracks;
  }
}
