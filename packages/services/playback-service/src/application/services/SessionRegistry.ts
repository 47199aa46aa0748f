/**
 * SessionRegistry
 *
 * Maps a session handle to exactly one Mixer, created on first use and kept
 * until teardown. Lookups and inserts are synchronous, so two callers can
 * never create two mixers for one session.
 */

import { serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { FramePump, Mixer, type AudioSink, type MixerFormat } from '../../domains/audio-mixing';
import { PlaybackError } from '../errors';

const logger = getLogger('playback-service-session-registry');

export interface SessionHandle {
  sessionId: string;
  mixer: Mixer;
  pump?: FramePump;
  createdAt: Date;
}

export type SessionCreatedListener = (handle: SessionHandle) => void;

export class SessionRegistry {
  private readonly handles = new Map<string, SessionHandle>();
  private readonly createdListeners = new Set<SessionCreatedListener>();

  constructor(private readonly format: MixerFormat) {}

  /**
   * Return the session's handle, creating it when absent. A sink passed for a
   * session that has no pump yet gets one attached and started.
   */
  getOrCreate(sessionId: string, sink?: AudioSink): SessionHandle {
    const existing = this.handles.get(sessionId);
    if (existing) {
      if (sink && !existing.pump) {
        existing.pump = new FramePump(existing.mixer, sink);
        existing.pump.start();
      }
      return existing;
    }

    const mixer = new Mixer(sessionId, this.format);
    const handle: SessionHandle = { sessionId, mixer, createdAt: new Date() };
    if (sink) {
      handle.pump = new FramePump(mixer, sink);
      handle.pump.start();
    }
    this.handles.set(sessionId, handle);
    logger.info('Session created', { sessionId, withSink: Boolean(sink) });

    for (const listener of this.createdListeners) {
      try {
        listener(handle);
      } catch (error) {
        logger.error('Session created listener failed', { sessionId, error: serializeError(error) });
      }
    }
    return handle;
  }

  get(sessionId: string): SessionHandle | undefined {
    return this.handles.get(sessionId);
  }

  require(sessionId: string): SessionHandle {
    const handle = this.handles.get(sessionId);
    if (!handle) {
      throw PlaybackError.sessionNotFound(sessionId);
    }
    return handle;
  }

  has(sessionId: string): boolean {
    return this.handles.has(sessionId);
  }

  sessions(): string[] {
    return [...this.handles.keys()];
  }

  get size(): number {
    return this.handles.size;
  }

  onSessionCreated(listener: SessionCreatedListener): () => void {
    this.createdListeners.add(listener);
    return () => {
      this.createdListeners.delete(listener);
    };
  }

  /** Stop the pump, silence the mixer and forget the session. */
  teardown(sessionId: string): boolean {
    const handle = this.handles.get(sessionId);
    if (!handle) return false;

    handle.pump?.stop();
    handle.mixer.clearAll();
    handle.mixer.pause();
    handle.mixer.removeAllListeners();
    this.handles.delete(sessionId);
    logger.info('Session torn down', { sessionId });
    return true;
  }

  teardownAll(): number {
    const sessionIds = this.sessions();
    for (const sessionId of sessionIds) {
      this.teardown(sessionId);
    }
    return sessionIds.length;
  }
}
