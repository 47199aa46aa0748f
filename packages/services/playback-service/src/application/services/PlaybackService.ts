/**
 * PlaybackService
 *
 * Entry point for the command layer: queueing, transport controls, queue
 * inspection and sound effects for a session.
 */

import { z } from 'zod';
import { KeyedMutex, serializeError, toError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import type { AudioSink } from '../../domains/audio-mixing';
import type { PlaybackQueue } from '../../domains/playback-queue';
import { isMediaUrl, isPlaylistUrl, parseSourceId, type ISourceFetcher, type PcmFormat, type TrackMetadata } from '../../domains/sources';
import { PlaybackError, PlaybackErrorCode, isPlaybackError } from '../errors';
import type { FetchCoordinator } from './FetchCoordinator';
import type { MetadataService } from './MetadataService';
import type { PlaybackDriver } from './PlaybackDriver';
import type { SessionRegistry } from './SessionRegistry';
import type { SfxLibrary } from './SfxLibrary';
import { SfxJobScheduler, type SfxJob } from './SfxJobScheduler';

const logger = getLogger('playback-service');

const sourceIdsSchema = z.array(z.string().trim().min(1)).min(1);

export interface PlayOptions {
  toFront?: boolean;
  /** Attach a real-time sink when the session is created by this call. */
  sink?: AudioSink;
}

export interface PlayResult {
  added: string[];
  queueLength: number;
  started: boolean;
}

export interface QueueEntryView {
  position: number;
  sourceId: string;
  metadata: TrackMetadata | null;
}

export interface SessionStatus {
  sessionId: string;
  active: boolean;
  playing: boolean;
  paused: boolean;
  musicTracks: number;
  sfxTracks: number;
  queueLength: number;
  currentSourceId?: string;
  sfxJobs: number;
}

export interface PlaybackServiceDeps {
  registry: SessionRegistry;
  queue: PlaybackQueue;
  driver: PlaybackDriver;
  coordinator: FetchCoordinator;
  metadata: MetadataService;
  fetcher: ISourceFetcher;
  sfxLibrary: SfxLibrary;
  sessionLocks: KeyedMutex;
  format: PcmFormat;
  random?: () => number;
}

export class PlaybackService {
  readonly sfxJobs: SfxJobScheduler;
  private readonly enqueueLocks = new KeyedMutex();

  constructor(private readonly deps: PlaybackServiceDeps) {
    this.sfxJobs = new SfxJobScheduler(async (sessionId, sound) => {
      await this.playSfx(sessionId, sound);
    }, deps.random);
  }

  /** Create the session (and its frame pump when a sink is given) ahead of playback. */
  connect(sessionId: string, sink?: AudioSink): void {
    this.deps.registry.getOrCreate(sessionId, sink);
  }

  /**
   * Queue sources for a session. Calls for one session are applied in the
   * order they were made. Starts playback when the queue was empty.
   */
  async play(sessionId: string, sourceIds: string[], options: PlayOptions = {}): Promise<PlayResult> {
    const ids = this.validateSourceIds(sourceIds);
    const { registry, queue, sessionLocks, driver, metadata } = this.deps;
    registry.getOrCreate(sessionId, options.sink);

    const { added, enqueued } = await this.enqueueLocks.runExclusive(sessionId, async () => {
      const expanded = await this.expand(ids);
      const result = await sessionLocks.runExclusive(sessionId, () => queue.enqueue(sessionId, expanded, options.toFront ?? false));
      return { added: expanded, enqueued: result };
    });

    logger.info('Queued sources', { sessionId, count: added.length, toFront: options.toFront ?? false, queueLength: enqueued.length });
    added.forEach(sourceId => void metadata.prefetch(sourceId));

    if (!enqueued.wasEmpty) {
      return { added, queueLength: enqueued.length, started: false };
    }

    let started: boolean;
    try {
      started = await driver.startCycle(sessionId);
    } catch (error) {
      if (isPlaybackError(error, PlaybackErrorCode.SOURCE_UNAVAILABLE)) throw error;
      throw PlaybackError.sourceUnavailable(added[0], toError(error));
    }
    return { added, queueLength: enqueued.length, started };
  }

  /** Skip the playing track; the driver then moves to the next entry. */
  skip(sessionId: string): number {
    return this.deps.registry.require(sessionId).mixer.skipCurrent();
  }

  pause(sessionId: string): void {
    this.deps.registry.require(sessionId).mixer.pause();
  }

  resume(sessionId: string): void {
    this.deps.registry.require(sessionId).mixer.resume();
  }

  /** Silence music and forget the queue. No "next track" follows. */
  async stop(sessionId: string): Promise<void> {
    const { mixer } = this.deps.registry.require(sessionId);
    await this.deps.sessionLocks.runExclusive(sessionId, () => {
      this.deps.driver.cancelCycle(sessionId);
      mixer.clearMusic();
      mixer.pause();
      this.deps.queue.drop(sessionId);
    });
    logger.info('Playback stopped', { sessionId });
  }

  /** Remove every pending entry, keeping the one playing. */
  clearQueue(sessionId: string): Promise<number> {
    return this.deps.sessionLocks.runExclusive(sessionId, () => {
      if (!this.deps.queue.has(sessionId)) {
        throw PlaybackError.queueNotFound(sessionId);
      }
      return this.deps.queue.clearPending(sessionId);
    });
  }

  listQueue(sessionId: string): string[] {
    return this.deps.queue.list(sessionId);
  }

  /** Queue entries with whatever metadata is already cached. */
  async describeQueue(sessionId: string): Promise<QueueEntryView[]> {
    const entries = this.deps.queue.list(sessionId);
    const metadata = await Promise.all(entries.map(sourceId => this.deps.metadata.peek(sourceId)));
    return entries.map((sourceId, position) => ({ position, sourceId, metadata: metadata[position] }));
  }

  async nowPlaying(sessionId: string): Promise<QueueEntryView | null> {
    const head = this.deps.queue.currentHead(sessionId);
    if (head === undefined) return null;
    return { position: 0, sourceId: head, metadata: await this.deps.metadata.peek(head) };
  }

  remove(sessionId: string, target: string | number): Promise<string> {
    return this.deps.sessionLocks.runExclusive(sessionId, () => this.deps.queue.prune(sessionId, target));
  }

  listSounds(): Promise<string[]> {
    return this.deps.sfxLibrary.list();
  }

  /** Mix a sound effect over whatever is playing. Returns the track id. */
  async playSfx(sessionId: string, sound: string): Promise<string> {
    const { registry, sfxLibrary, coordinator, format } = this.deps;
    const handle = registry.require(sessionId);
    const sourceId = await sfxLibrary.resolve(sound);
    const samples = await coordinator.loadSamples(sourceId, format.sampleRate, format.channels);
    return handle.mixer.enqueueSfx(samples, { sourceId });
  }

  async playRandomSfx(sessionId: string): Promise<string> {
    const sound = await this.deps.sfxLibrary.random(this.deps.random);
    return this.playSfx(sessionId, sound);
  }

  stopSfx(sessionId: string): void {
    this.deps.registry.require(sessionId).mixer.clearSfx();
  }

  async addSfxJob(sessionId: string, sound: string, minIntervalSec: number, maxIntervalSec: number): Promise<string> {
    this.deps.registry.require(sessionId);
    await this.deps.sfxLibrary.resolve(sound);
    return this.sfxJobs.addJob(sessionId, sound, minIntervalSec, maxIntervalSec);
  }

  removeSfxJob(jobId: string): void {
    this.sfxJobs.removeJob(jobId);
  }

  listSfxJobs(sessionId?: string): SfxJob[] {
    return this.sfxJobs.listJobs(sessionId);
  }

  /** Drop cached audio and metadata for a source. */
  async evict(sourceId: string): Promise<boolean> {
    const { coordinator, metadata, format } = this.deps;
    const [pcmRemoved, metadataRemoved] = await Promise.all([
      coordinator.evict(sourceId, format.sampleRate, format.channels),
      metadata.remove(sourceId),
    ]);
    return pcmRemoved || metadataRemoved;
  }

  /** Tear the session down when its connection goes away. */
  async disconnect(sessionId: string): Promise<boolean> {
    return this.deps.sessionLocks.runExclusive(sessionId, () => {
      this.deps.driver.cancelCycle(sessionId);
      this.deps.queue.drop(sessionId);
      const jobs = this.sfxJobs.removeSessionJobs(sessionId);
      const removed = this.deps.registry.teardown(sessionId);
      logger.info('Session disconnected', { sessionId, removed, jobs });
      return removed;
    });
  }

  status(sessionId: string): SessionStatus {
    const handle = this.deps.registry.get(sessionId);
    const queueLength = this.deps.queue.length(sessionId);
    const sfxJobs = this.sfxJobs.listJobs(sessionId).length;
    if (!handle) {
      return { sessionId, active: false, playing: false, paused: false, musicTracks: 0, sfxTracks: 0, queueLength, sfxJobs };
    }
    const { mixer } = handle;
    return {
      sessionId,
      active: true,
      playing: mixer.isPlaying,
      paused: mixer.isPaused,
      musicTracks: mixer.musicCount,
      sfxTracks: mixer.sfxCount,
      queueLength,
      currentSourceId: this.deps.queue.currentHead(sessionId),
      sfxJobs,
    };
  }

  /** Stop jobs, tear down every session and wait for background work. */
  async shutdown(): Promise<void> {
    const jobs = this.sfxJobs.stopAll();
    const sessions = this.deps.registry.sessions();
    sessions.forEach(sessionId => {
      this.deps.driver.cancelCycle(sessionId);
      this.deps.queue.drop(sessionId);
    });
    this.deps.registry.teardownAll();
    await this.deps.driver.idle();
    logger.info('Playback service shut down', { jobs, sessions: sessions.length });
  }

  private validateSourceIds(sourceIds: string[]): string[] {
    const parsed = sourceIdsSchema.safeParse(sourceIds);
    if (!parsed.success) {
      throw PlaybackError.invalidSource(String(sourceIds), parsed.error.issues[0]?.message ?? 'invalid source list');
    }
    for (const sourceId of parsed.data) {
      const ref = parseSourceId(sourceId);
      // Local files reach the mixer only through the sound library.
      if (ref.kind !== 'media' || !(isMediaUrl(sourceId) || isPlaylistUrl(sourceId))) {
        throw PlaybackError.invalidSource(sourceId, 'expected a YouTube video or playlist link');
      }
    }
    return parsed.data;
  }

  private async expand(sourceIds: string[]): Promise<string[]> {
    const expanded: string[] = [];
    for (const sourceId of sourceIds) {
      if (!isPlaylistUrl(sourceId)) {
        expanded.push(sourceId);
        continue;
      }

      let entries: string[];
      try {
        entries = await this.deps.fetcher.expandPlaylist(sourceId);
      } catch (error) {
        logger.error('Playlist expansion failed', { sourceId, error: serializeError(error) });
        throw PlaybackError.sourceUnavailable(sourceId, toError(error));
      }
      if (entries.length === 0) {
        throw PlaybackError.invalidSource(sourceId, 'playlist has no entries');
      }
      expanded.push(...entries);
    }
    return expanded;
  }
}
