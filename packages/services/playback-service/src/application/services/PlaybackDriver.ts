/**
 * PlaybackDriver
 *
 * Owns queue mutation once playback has started. For a session it loads the
 * queue head, hands the samples to the mixer and kicks off preloading; when
 * the mixer reports a finished music track it advances the queue and starts
 * the next cycle. The session lock is held to read the head and to commit it,
 * never across the download, so commands stay responsive while audio loads.
 *
 * A failed cycle drops the session's queue instead of retrying.
 */

import { KeyedMutex, runWithContext, serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import type { Mixer, TrackFinishedEvent } from '../../domains/audio-mixing';
import type { PlaybackQueue } from '../../domains/playback-queue';
import type { PcmFormat } from '../../domains/sources';
import type { FetchCoordinator } from './FetchCoordinator';
import type { MetadataService } from './MetadataService';
import type { Preloader } from './Preloader';
import type { SessionRegistry } from './SessionRegistry';
import type { PlaybackAnnouncer } from './PlaybackAnnouncer';

const logger = getLogger('playback-service-driver');

export interface PlaybackDriverDeps {
  registry: SessionRegistry;
  queue: PlaybackQueue;
  coordinator: FetchCoordinator;
  preloader: Preloader;
  metadata: MetadataService;
  announcer: PlaybackAnnouncer;
  sessionLocks: KeyedMutex;
  format: PcmFormat;
}

export class PlaybackDriver {
  private readonly attached = new WeakSet<Mixer>();
  private readonly background = new Set<Promise<unknown>>();
  /** Latest cycle per session; an older cycle finding a newer one here is stale. */
  private readonly cycles = new Map<string, number>();
  private cycleSeq = 0;

  constructor(private readonly deps: PlaybackDriverDeps) {
    deps.registry.onSessionCreated(handle => this.attach(handle.mixer));
  }

  /**
   * Play the current queue head. Resolves to whether a track reached the
   * mixer; rejects with the load failure after the session's queue has been
   * dropped.
   */
  startCycle(sessionId: string): Promise<boolean> {
    return runWithContext({ sessionId }, () => this.playHead(sessionId));
  }

  /** Forget the session's in-flight cycle so its download is never played. */
  cancelCycle(sessionId: string): void {
    this.cycles.delete(sessionId);
  }

  /** Resolves once every background preload and announcement has settled. */
  async idle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }

  get pendingTasks(): number {
    return this.background.size;
  }

  private attach(mixer: Mixer): void {
    if (this.attached.has(mixer)) return;
    this.attached.add(mixer);
    mixer.onTrackFinished(event => this.handleTrackFinished(event));
  }

  private async playHead(sessionId: string): Promise<boolean> {
    const { queue, registry, coordinator, format, sessionLocks } = this.deps;
    const head = await sessionLocks.runExclusive(sessionId, () => queue.currentHead(sessionId));
    const handle = registry.get(sessionId);
    if (head === undefined || !handle) return false;

    const cycle = ++this.cycleSeq;
    this.cycles.set(sessionId, cycle);
    this.attach(handle.mixer);

    let samples: Int16Array;
    try {
      samples = await coordinator.loadSamples(head, format.sampleRate, format.channels);
    } catch (error) {
      const cleared = await sessionLocks.runExclusive(sessionId, () => {
        const current = this.endCycle(sessionId, cycle, head);
        if (current) queue.drop(sessionId);
        return current;
      });
      if (cleared) {
        logger.error('Playback cycle failed, queue cleared', { sessionId, sourceId: head, error: serializeError(error) });
      } else {
        logger.warn('Superseded playback cycle failed', { sessionId, sourceId: head, error: serializeError(error) });
      }
      throw error;
    }

    const started = await sessionLocks.runExclusive(sessionId, () => {
      if (!this.endCycle(sessionId, cycle, head) || registry.get(sessionId) !== handle) {
        logger.info('Queue changed while loading, not playing stale head', { sessionId, sourceId: head });
        return false;
      }
      handle.mixer.enqueueMusic(samples, {
        sourceId: head,
        onBeforePlay: () => this.announceNowPlaying(sessionId, head),
      });
      logger.info('Playing queue head', { sessionId, sourceId: head, remaining: queue.length(sessionId) - 1 });
      return true;
    });
    if (!started) return false;

    this.track(
      this.deps.preloader.run(sessionId).catch(error => {
        logger.warn('Background preload failed', { sessionId, error: serializeError(error) });
      })
    );
    return true;
  }

  /** Close a cycle; true when it is still the latest one and its head is unchanged. */
  private endCycle(sessionId: string, cycle: number, head: string): boolean {
    if (this.cycles.get(sessionId) !== cycle) return false;
    this.cycles.delete(sessionId);
    return this.deps.queue.currentHead(sessionId) === head;
  }

  private handleTrackFinished(event: TrackFinishedEvent): void {
    if (event.kind !== 'music') return;
    const { sessionId } = event;

    const task = runWithContext({ sessionId }, async () => {
      const hasNext = await this.deps.sessionLocks.runExclusive(sessionId, () => this.advance(event));
      if (hasNext) await this.playHead(sessionId);
    }).catch(error => {
      logger.error('Could not continue playback', { sessionId, error: serializeError(error) });
    });
    this.track(task);
  }

  /** Advance past the finished head; true when another entry is waiting. */
  private async advance(event: TrackFinishedEvent): Promise<boolean> {
    const { queue } = this.deps;
    if (queue.currentHead(event.sessionId) !== event.sourceId) {
      logger.debug('Finished track is not the queue head, ignoring', { sessionId: event.sessionId, sourceId: event.sourceId });
      return false;
    }

    const next = queue.advance(event.sessionId);
    if (next === undefined) {
      await this.deps.announcer.queueFinished(event.sessionId);
      return false;
    }
    return true;
  }

  private announceNowPlaying(sessionId: string, sourceId: string): void {
    const task = this.deps.metadata
      .getMetadata(sourceId)
      .catch(error => {
        logger.warn('Metadata lookup failed, using generic announcement', { sessionId, sourceId, error: serializeError(error) });
        return null;
      })
      .then(metadata => this.deps.announcer.nowPlaying(sessionId, metadata))
      .catch(error => {
        logger.warn('Now playing announcement failed', { sessionId, error: serializeError(error) });
      });
    this.track(task);
  }

  private track(task: Promise<unknown>): void {
    this.background.add(task);
    void task.finally(() => this.background.delete(task));
  }
}
