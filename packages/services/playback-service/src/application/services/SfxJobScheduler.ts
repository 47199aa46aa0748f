/**
 * SfxJobScheduler
 *
 * Plays a sound effect into a session over and over, waiting a random delay
 * between `minIntervalSec` and `maxIntervalSec` before each play. Jobs live in
 * memory only. A failing play is counted and the job keeps going.
 */

import { v4 as uuidv4 } from 'uuid';
import { serializeError } from '@mixdeck/platform-core';
import { getLogger } from '../../config/service-config';
import { PlaybackError } from '../errors';

const logger = getLogger('playback-service-sfx-scheduler');

export interface SfxJob {
  id: string;
  sessionId: string;
  sound: string;
  minIntervalSec: number;
  maxIntervalSec: number;
  runCount: number;
  errorCount: number;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
}

export type PlaySoundFn = (sessionId: string, sound: string) => Promise<void>;

interface ScheduledJob {
  job: SfxJob;
  timer: NodeJS.Timeout | null;
}

export class SfxJobScheduler {
  private readonly jobs = new Map<string, ScheduledJob>();

  constructor(
    private readonly playSound: PlaySoundFn,
    private readonly random: () => number = Math.random
  ) {}

  addJob(sessionId: string, sound: string, minIntervalSec: number, maxIntervalSec: number): string {
    if (
      !Number.isFinite(minIntervalSec) ||
      !Number.isFinite(maxIntervalSec) ||
      minIntervalSec <= 0 ||
      minIntervalSec > maxIntervalSec
    ) {
      throw PlaybackError.invalidSfxInterval(minIntervalSec, maxIntervalSec);
    }

    const job: SfxJob = {
      id: uuidv4(),
      sessionId,
      sound,
      minIntervalSec,
      maxIntervalSec,
      runCount: 0,
      errorCount: 0,
      lastRunAt: null,
      nextRunAt: null,
    };
    const entry: ScheduledJob = { job, timer: null };
    this.jobs.set(job.id, entry);
    this.schedule(entry);
    logger.info('Sound effect job added', { jobId: job.id, sessionId, sound, minIntervalSec, maxIntervalSec });
    return job.id;
  }

  removeJob(jobId: string): void {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw PlaybackError.sfxJobNotFound(jobId);
    }
    this.cancel(entry);
    logger.info('Sound effect job removed', { jobId });
  }

  listJobs(sessionId?: string): SfxJob[] {
    return [...this.jobs.values()]
      .map(entry => ({ ...entry.job }))
      .filter(job => sessionId === undefined || job.sessionId === sessionId);
  }

  removeSessionJobs(sessionId: string): number {
    const entries = [...this.jobs.values()].filter(entry => entry.job.sessionId === sessionId);
    entries.forEach(entry => this.cancel(entry));
    return entries.length;
  }

  stopAll(): number {
    const count = this.jobs.size;
    [...this.jobs.values()].forEach(entry => this.cancel(entry));
    return count;
  }

  private cancel(entry: ScheduledJob): void {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    this.jobs.delete(entry.job.id);
  }

  private schedule(entry: ScheduledJob): void {
    const { minIntervalSec, maxIntervalSec } = entry.job;
    const delayMs = Math.round((minIntervalSec + this.random() * (maxIntervalSec - minIntervalSec)) * 1000);
    entry.job.nextRunAt = new Date(Date.now() + delayMs);
    entry.timer = setTimeout(() => {
      entry.timer = null;
      this.run(entry).catch(error => {
        logger.error('Sound effect job crashed', { jobId: entry.job.id, error: serializeError(error) });
      });
    }, delayMs);
    entry.timer.unref();
  }

  private async run(entry: ScheduledJob): Promise<void> {
    const { job } = entry;
    try {
      await this.playSound(job.sessionId, job.sound);
      job.runCount++;
    } catch (error) {
      job.errorCount++;
      logger.warn('Sound effect job run failed', { jobId: job.id, sound: job.sound, error: serializeError(error) });
    } finally {
      job.lastRunAt = new Date();
    }

    if (this.jobs.get(job.id) === entry) {
      this.schedule(entry);
    }
  }
}
