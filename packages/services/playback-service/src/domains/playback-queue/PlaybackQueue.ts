/**
 * PlaybackQueue
 *
 * Per-session ordered list of source ids. Index 0 is the entry currently
 * playing: it stays in place while more entries are queued behind it and is
 * removed only by `advance()` when its playback completes.
 */

import { PlaybackError } from '../../application/errors';

export interface EnqueueResult {
  /** True when the session had no queue before this call. */
  wasEmpty: boolean;
  length: number;
}

export class PlaybackQueue {
  private readonly queues = new Map<string, string[]>();

  enqueue(sessionId: string, sourceIds: readonly string[], toFront = false): EnqueueResult {
    const queue = this.queues.get(sessionId);

    if (!queue || queue.length === 0) {
      if (sourceIds.length > 0) {
        this.queues.set(sessionId, [...sourceIds]);
      }
      return { wasEmpty: true, length: sourceIds.length };
    }

    if (toFront) {
      queue.splice(1, 0, ...sourceIds);
    } else {
      queue.push(...sourceIds);
    }
    return { wasEmpty: false, length: queue.length };
  }

  /**
   * Pop the finished head. Returns the new head, or undefined once the queue
   * is exhausted, at which point the session entry is gone.
   */
  advance(sessionId: string): string | undefined {
    const queue = this.queues.get(sessionId);
    if (!queue) return undefined;

    queue.shift();
    if (queue.length === 0) {
      this.queues.delete(sessionId);
      return undefined;
    }
    return queue[0];
  }

  list(sessionId: string): string[] {
    return [...(this.queues.get(sessionId) ?? [])];
  }

  currentHead(sessionId: string): string | undefined {
    return this.queues.get(sessionId)?.[0];
  }

  has(sessionId: string): boolean {
    return this.queues.has(sessionId);
  }

  length(sessionId: string): number {
    return this.queues.get(sessionId)?.length ?? 0;
  }

  sessions(): string[] {
    return [...this.queues.keys()];
  }

  /**
   * Remove one pending entry by source id (first match after the head) or by
   * index. The head can only leave the queue through skip.
   */
  prune(sessionId: string, target: string | number): string {
    const queue = this.queues.get(sessionId);
    if (!queue) {
      throw PlaybackError.queueNotFound(sessionId);
    }

    let index: number;
    if (typeof target === 'number') {
      if (target === 0) throw PlaybackError.cannotPruneHead(sessionId);
      index = Number.isInteger(target) && target > 0 && target < queue.length ? target : -1;
    } else {
      index = queue.indexOf(target, 1);
      if (index === -1 && queue[0] === target) throw PlaybackError.cannotPruneHead(sessionId);
    }

    if (index === -1) {
      throw PlaybackError.queueEntryNotFound(sessionId, target);
    }
    const [removed] = queue.splice(index, 1);
    return removed;
  }

  /** Remove the first pending (non-head) entry matching `sourceId`. */
  removeEntry(sessionId: string, sourceId: string): boolean {
    const queue = this.queues.get(sessionId);
    if (!queue) return false;
    const index = queue.indexOf(sourceId, 1);
    if (index === -1) return false;
    queue.splice(index, 1);
    return true;
  }

  /** Keep only the head. Returns the number of entries removed. */
  clearPending(sessionId: string): number {
    const queue = this.queues.get(sessionId);
    if (!queue) return 0;
    return queue.splice(1).length;
  }

  drop(sessionId: string): boolean {
    return this.queues.delete(sessionId);
  }
}
