/**
 * WatchMode.ts - Directory watcher feeding dropped recordings to the pipeline
 *
 * Monitors a directory for new audio files and submits each one once it
 * is stable (done being written to disk). Files present at startup, files
 * the capture controller writes itself and temporary "autosaved" files of
 * the OS voice recorder are never submitted.
 */

import { watch, existsSync, mkdirSync, type FSWatcher } from 'fs';
import { stat, readdir } from 'fs/promises';
import { randomUUID } from 'crypto';
import { join, resolve, basename } from 'path';
import { isAudioFile } from '../../shared/audio.js';
import type { Recording } from '../../shared/types.js';
import type { Logger } from '../ErrorHandler.js';
import { errorMessage } from '../errors.js';
import type { SubmitResult } from '../pipeline/TranscriptionPipeline.js';

// ============================================================================
// Types
// ============================================================================

export interface WatchModeOptions {
  /** Directory to watch; created when absent */
  watchDir: string;
  /** Stability check interval in ms (default: 1000) */
  stabilityInterval?: number;
  /** Maximum number of stability checks before giving up (default: 60) */
  maxStabilityChecks?: number;
}

export type SubmitRecording = (recording: Recording) => SubmitResult;

// ============================================================================
// WatchMode Class
// ============================================================================

export class WatchMode {
  private readonly watchDir: string;
  private watcher: FSWatcher | null = null;
  private seen = new Set<string>();
  private pendingStabilityChecks = new Map<string, NodeJS.Timeout>();
  private stopped = false;

  constructor(
    private readonly options: WatchModeOptions,
    private readonly submit: SubmitRecording,
    private readonly logger: Logger
  ) {
    this.watchDir = resolve(options.watchDir);
  }

  /**
   * Start watching. Resolves once the watcher is installed.
   */
  async start(): Promise<void> {
    if (this.watcher) return;
    this.stopped = false;

    if (!existsSync(this.watchDir)) {
      mkdirSync(this.watchDir, { recursive: true });
      this.logger.info(`Created watch directory: ${this.watchDir}`);
    }

    await this.scanExistingFiles();

    this.watcher = watch(this.watchDir, (_eventType, filename) => {
      if (this.stopped || !filename) return;
      this.handleFileEvent(filename.toString());
    });

    this.watcher.on('error', (err) => {
      this.logger.error('Watcher error', { error: err.message });
    });

    this.logger.info(`Watching: ${this.watchDir}`);
  }

  /**
   * Stop watching and clean up.
   */
  stop(): void {
    this.stopped = true;

    for (const [, timeout] of this.pendingStabilityChecks) {
      clearTimeout(timeout);
    }
    this.pendingStabilityChecks.clear();

    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Exclude a path from submission, e.g. a file the capture controller
   * is about to write into the watched directory.
   */
  markSeen(filePath: string): void {
    this.seen.add(resolve(filePath));
  }

  getSeenFiles(): ReadonlySet<string> {
    return this.seen;
  }

  getWatchDir(): string {
    return this.watchDir;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Mark every audio file already in the directory as seen.
   */
  private async scanExistingFiles(): Promise<void> {
    try {
      const entries = await readdir(this.watchDir);
      for (const entry of entries) {
        if (isAudioFile(entry)) {
          this.seen.add(join(this.watchDir, entry));
        }
      }
      this.logger.debug(`Marked ${this.seen.size} existing files as seen`);
    } catch (error) {
      // Files will be discovered through the watcher instead
      this.logger.warn('Could not scan watch directory', { error: errorMessage(error) });
    }
  }

  private shouldIgnore(filename: string): boolean {
    const name = basename(filename);
    return name.startsWith('.') || name.toLowerCase().includes('autosaved') || !isAudioFile(name);
  }

  private handleFileEvent(filename: string): void {
    if (this.shouldIgnore(filename)) return;

    const fullPath = join(this.watchDir, filename);

    if (this.seen.has(fullPath)) return;
    if (this.pendingStabilityChecks.has(fullPath)) return;

    this.logger.debug(`File detected: ${basename(fullPath)}`);
    this.scheduleStabilityCheck(fullPath);
  }

  /**
   * The file is stable once two consecutive checks see the same non-zero size.
   */
  private scheduleStabilityCheck(filePath: string, previousSize?: number, checks = 0): void {
    const interval = this.options.stabilityInterval ?? 1000;
    const maxChecks = this.options.maxStabilityChecks ?? 60;

    if (this.stopped) return;

    if (checks >= maxChecks) {
      this.logger.warn(`Gave up waiting for file to stabilize: ${basename(filePath)}`);
      this.pendingStabilityChecks.delete(filePath);
      return;
    }

    const timeout = setTimeout(() => {
      void this.checkStability(filePath, previousSize, checks);
    }, interval);

    this.pendingStabilityChecks.set(filePath, timeout);
  }

  private async checkStability(filePath: string, previousSize: number | undefined, checks: number): Promise<void> {
    this.pendingStabilityChecks.delete(filePath);
    if (this.stopped) return;

    try {
      if (!existsSync(filePath)) {
        // File was removed before stabilizing
        return;
      }

      const stats = await stat(filePath);
      const currentSize = stats.size;

      if (currentSize > 0 && previousSize !== undefined && currentSize === previousSize) {
        this.submitFile(filePath, currentSize);
        return;
      }

      this.logger.debug(`File size: ${currentSize} bytes (check ${checks + 1}): ${basename(filePath)}`);
      this.scheduleStabilityCheck(filePath, currentSize, checks + 1);
    } catch (error) {
      // stat failed -- file may have been removed
      this.logger.debug(`Stability check failed: ${basename(filePath)}`, { error: errorMessage(error) });
    }
  }

  private submitFile(filePath: string, sizeBytes: number): void {
    if (this.stopped || this.seen.has(filePath)) return;
    this.seen.add(filePath);

    const recording: Recording = {
      id: randomUUID(),
      path: filePath,
      createdAt: Date.now(),
      source: 'watch',
      sizeBytes,
    };

    const result = this.submit(recording);
    this.logger.info(
      result.accepted
        ? `Submitted ${basename(filePath)}`
        : `Dropped ${basename(filePath)}: pipeline ${result.reason}`
    );
  }
}
