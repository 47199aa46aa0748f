import { describe, it, expect, beforeEach } from 'vitest';
import { PlaybackQueue } from '../../domains/playback-queue/PlaybackQueue';
import { PlaybackErrorCode } from '../../application/errors';

describe('PlaybackQueue', () => {
  let queue: PlaybackQueue;

  beforeEach(() => {
    queue = new PlaybackQueue();
  });

  describe('enqueue', () => {
    it('should report an empty queue and set its contents', () => {
      expect(queue.enqueue('s1', ['a', 'b'])).toEqual({ wasEmpty: true, length: 2 });
      expect(queue.list('s1')).toEqual(['a', 'b']);
      expect(queue.currentHead('s1')).toBe('a');
    });

    it('should append behind existing entries', () => {
      queue.enqueue('s1', ['h', 'a']);

      expect(queue.enqueue('s1', ['b', 'c'])).toEqual({ wasEmpty: false, length: 4 });
      expect(queue.list('s1')).toEqual(['h', 'a', 'b', 'c']);
    });

    it('should insert right after the head when queued to the front', () => {
      queue.enqueue('s1', ['h', 'a', 'b']);

      queue.enqueue('s1', ['x', 'y'], true);

      expect(queue.list('s1')).toEqual(['h', 'x', 'y', 'a', 'b']);
    });

    it('should not create a queue for an empty list', () => {
      expect(queue.enqueue('s1', [])).toEqual({ wasEmpty: true, length: 0 });
      expect(queue.has('s1')).toBe(false);
    });

    it('should keep sessions independent', () => {
      queue.enqueue('s1', ['a']);
      queue.enqueue('s2', ['b']);

      expect(queue.sessions()).toEqual(['s1', 's2']);
      expect(queue.list('s2')).toEqual(['b']);
    });
  });

  describe('advance', () => {
    it('should pop the head and return the next one', () => {
      queue.enqueue('s1', ['h', 'a']);

      expect(queue.advance('s1')).toBe('a');
      expect(queue.list('s1')).toEqual(['a']);
    });

    it('should delete the session entry once exhausted', () => {
      queue.enqueue('s1', ['h']);

      expect(queue.advance('s1')).toBeUndefined();
      expect(queue.has('s1')).toBe(false);
      expect(queue.length('s1')).toBe(0);
    });

    it('should return a copy from list', () => {
      queue.enqueue('s1', ['h']);
      queue.list('s1').push('mutated');

      expect(queue.list('s1')).toEqual(['h']);
    });
  });

  describe('prune', () => {
    beforeEach(() => {
      queue.enqueue('s1', ['a', 'b', 'a', 'c']);
    });

    it('should remove an entry by index', () => {
      expect(queue.prune('s1', 3)).toBe('c');
      expect(queue.list('s1')).toEqual(['a', 'b', 'a']);
    });

    it('should remove the first match after the head by id', () => {
      expect(queue.prune('s1', 'a')).toBe('a');
      expect(queue.list('s1')).toEqual(['a', 'b', 'c']);
    });

    it('should refuse to remove the head by index', () => {
      expect(() => queue.prune('s1', 0)).toThrow(expect.objectContaining({ code: PlaybackErrorCode.CANNOT_PRUNE_HEAD, statusCode: 409 }));
      expect(queue.length('s1')).toBe(4);
    });

    it('should refuse to remove an id that only matches the head', () => {
      queue.enqueue('s2', ['solo', 'other']);

      expect(() => queue.prune('s2', 'solo')).toThrow(expect.objectContaining({ code: PlaybackErrorCode.CANNOT_PRUNE_HEAD }));
    });

    it('should reject unknown entries and indexes', () => {
      expect(() => queue.prune('s1', 'zzz')).toThrow(expect.objectContaining({ code: PlaybackErrorCode.QUEUE_ENTRY_NOT_FOUND }));
      expect(() => queue.prune('s1', 4)).toThrow(expect.objectContaining({ code: PlaybackErrorCode.QUEUE_ENTRY_NOT_FOUND }));
      expect(() => queue.prune('s1', -1)).toThrow(expect.objectContaining({ code: PlaybackErrorCode.QUEUE_ENTRY_NOT_FOUND }));
      expect(() => queue.prune('s1', 1.5)).toThrow(expect.objectContaining({ code: PlaybackErrorCode.QUEUE_ENTRY_NOT_FOUND }));
    });

    it('should reject a session without a queue', () => {
      expect(() => queue.prune('missing', 1)).toThrow(expect.objectContaining({ code: PlaybackErrorCode.QUEUE_NOT_FOUND, statusCode: 404 }));
    });
  });

  describe('maintenance', () => {
    it('should remove a pending entry but never the head', () => {
      queue.enqueue('s1', ['a', 'b', 'a']);

      expect(queue.removeEntry('s1', 'a')).toBe(true);
      expect(queue.list('s1')).toEqual(['a', 'b']);
      expect(queue.removeEntry('s1', 'a')).toBe(false);
      expect(queue.removeEntry('missing', 'a')).toBe(false);
    });

    it('should clear pending entries and keep the head', () => {
      queue.enqueue('s1', ['a', 'b', 'c']);

      expect(queue.clearPending('s1')).toBe(2);
      expect(queue.list('s1')).toEqual(['a']);
      expect(queue.clearPending('missing')).toBe(0);
    });

    it('should drop a session queue', () => {
      queue.enqueue('s1', ['a']);

      expect(queue.drop('s1')).toBe(true);
      expect(queue.drop('s1')).toBe(false);
      expect(queue.list('s1')).toEqual([]);
    });
  });
});
