import { DomainErrorCode, createDomainServiceError } from '@mixdeck/platform-core';

const PlaybackDomainCodes = {
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  CACHE_CORRUPTION: 'CACHE_CORRUPTION',
  QUEUE_NOT_FOUND: 'QUEUE_NOT_FOUND',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  CANNOT_PRUNE_HEAD: 'CANNOT_PRUNE_HEAD',
  QUEUE_ENTRY_NOT_FOUND: 'QUEUE_ENTRY_NOT_FOUND',
  SOUND_NOT_FOUND: 'SOUND_NOT_FOUND',
  INVALID_SOURCE: 'INVALID_SOURCE',
  SFX_JOB_NOT_FOUND: 'SFX_JOB_NOT_FOUND',
  INVALID_SFX_INTERVAL: 'INVALID_SFX_INTERVAL',
} as const;

export const PlaybackErrorCode = { ...DomainErrorCode, ...PlaybackDomainCodes } as const;
export type PlaybackErrorCodeType = (typeof PlaybackErrorCode)[keyof typeof PlaybackErrorCode];

const PlaybackErrorBase = createDomainServiceError('Playback', PlaybackErrorCode);

export class PlaybackError extends PlaybackErrorBase {
  static sourceUnavailable(sourceId: string, cause?: Error) {
    return new PlaybackError(`Source could not be fetched: ${sourceId}`, 502, PlaybackErrorCode.SOURCE_UNAVAILABLE, cause);
  }

  static cacheCorruption(key: string, reason: string, cause?: Error) {
    return new PlaybackError(`Cached audio unreadable for ${key}: ${reason}`, 500, PlaybackErrorCode.CACHE_CORRUPTION, cause);
  }

  static queueNotFound(sessionId: string) {
    return new PlaybackError(`No queue for session: ${sessionId}`, 404, PlaybackErrorCode.QUEUE_NOT_FOUND);
  }

  static sessionNotFound(sessionId: string) {
    return new PlaybackError(`No active session: ${sessionId}`, 404, PlaybackErrorCode.SESSION_NOT_FOUND);
  }

  static cannotPruneHead(sessionId: string) {
    return new PlaybackError(
      `Cannot remove the currently playing entry of session ${sessionId}; skip it instead`,
      409,
      PlaybackErrorCode.CANNOT_PRUNE_HEAD
    );
  }

  static queueEntryNotFound(sessionId: string, target: string | number) {
    return new PlaybackError(`Queue entry not found in session ${sessionId}: ${target}`, 404, PlaybackErrorCode.QUEUE_ENTRY_NOT_FOUND);
  }

  static soundNotFound(sound: string) {
    return new PlaybackError(`Sound effect not found: ${sound}`, 404, PlaybackErrorCode.SOUND_NOT_FOUND);
  }

  static invalidSource(sourceId: string, reason: string) {
    return new PlaybackError(`Invalid source "${sourceId}": ${reason}`, 400, PlaybackErrorCode.INVALID_SOURCE);
  }

  static sfxJobNotFound(jobId: string) {
    return new PlaybackError(`Sound effect job not found: ${jobId}`, 404, PlaybackErrorCode.SFX_JOB_NOT_FOUND);
  }

  static invalidSfxInterval(minSeconds: number, maxSeconds: number) {
    return new PlaybackError(
      `Invalid sound effect interval: min ${minSeconds}s, max ${maxSeconds}s (need 0 < min <= max)`,
      400,
      PlaybackErrorCode.INVALID_SFX_INTERVAL
    );
  }
}

export function isPlaybackError(error: unknown, code?: PlaybackErrorCodeType): error is PlaybackError {
  return error instanceof PlaybackError && (code === undefined || error.code === code);
}
