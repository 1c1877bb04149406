/**
 * RecordingJanitor - age-based deletion of old recordings
 *
 * Runs once at startup and then daily, independent of the pipeline.
 * A file that cannot be deleted is logged and skipped for the pass.
 */

import { readdir, stat, unlink } from 'fs/promises';
import { join } from 'path';
import { isAudioFile } from '../../shared/audio.js';
import type { Logger } from '../ErrorHandler.js';
import { HousekeepingError, errnoCode, errorMessage } from '../errors.js';

export interface RecordingJanitorOptions {
  directory: string;
  enabled: boolean;
  retentionDays: number;
  /** Default: 24 hours */
  intervalMs?: number;
}

export interface SweepResult {
  scanned: number;
  deleted: number;
  failed: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class RecordingJanitor {
  private timer: NodeJS.Timeout | null = null;
  private sweeping: Promise<SweepResult> | null = null;

  constructor(
    private readonly options: RecordingJanitorOptions,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Delete audio files whose mtime is older than the retention window.
   */
  sweep(): Promise<SweepResult> {
    // Overlapping timer ticks share one pass
    if (!this.sweeping) {
      this.sweeping = this.runSweep().finally(() => {
        this.sweeping = null;
      });
    }
    return this.sweeping;
  }

  /**
   * Sweep now, then on every interval. The timer never keeps the process alive.
   */
  start(): void {
    if (this.timer) return;

    const run = (): void => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('Housekeeping pass failed', { error: errorMessage(error) });
      });
    };

    run();
    this.timer = setInterval(run, this.options.intervalMs ?? DAY_MS);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async runSweep(): Promise<SweepResult> {
    const result: SweepResult = { scanned: 0, deleted: 0, failed: 0 };

    if (!this.options.enabled) {
      this.logger.debug('Recording deletion disabled, skipping housekeeping');
      return result;
    }

    let entries: string[];
    try {
      entries = await readdir(this.options.directory);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return result;
      }
      throw error;
    }

    const cutoff = this.now() - this.options.retentionDays * DAY_MS;

    for (const entry of entries) {
      if (!isAudioFile(entry)) continue;

      const filePath = join(this.options.directory, entry);
      try {
        const stats = await stat(filePath);
        if (!stats.isFile()) continue;
        result.scanned++;

        if (stats.mtimeMs < cutoff) {
          await unlink(filePath);
          result.deleted++;
          this.logger.info(`Deleted old recording: ${entry}`);
        }
      } catch (error) {
        result.failed++;
        const failure = new HousekeepingError(`Could not delete ${entry}: ${errorMessage(error)}`, filePath, {
          cause: error,
        });
        this.logger.warn(failure.message, { operation: 'sweep', data: { filePath } });
      }
    }

    this.logger.info('Housekeeping pass complete', { data: { ...result } });
    return result;
  }
}
