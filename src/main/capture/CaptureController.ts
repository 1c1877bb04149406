/**
 * CaptureController - toggle-driven microphone recording
 *
 *   idle ──toggle──▶ recording ──toggle──▶ idle (+ submit)
 *
 * Capture is independent of the pipeline: a recording may start while a
 * transcription is running, and its submission then follows the
 * pipeline's admission policy. Toggles arriving while the recorder is
 * starting or stopping are ignored.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { stat, unlink } from 'fs/promises';
import { join, basename } from 'path';
import type { Notifier, Recording } from '../../shared/types.js';
import type { Logger } from '../ErrorHandler.js';
import { CaptureError, errnoCode, errorMessage } from '../errors.js';
import type { SubmitResult } from '../pipeline/TranscriptionPipeline.js';

// ============================================================================
// Types
// ============================================================================

export type CaptureState = 'idle' | 'starting' | 'recording' | 'stopping';

export interface Recorder {
  start(outputPath: string): Promise<void>;
  stop(): Promise<void>;
}

export interface CaptureControllerOptions {
  recordingsDir: string;
  minRecordingMs: number;
}

export interface CaptureControllerDeps {
  /** Called with the output path before the recorder creates the file */
  markSeen?: (filePath: string) => void;
  now?: () => number;
}

export const RECORDING_STARTED_MESSAGE = 'Recording started';
export const TOO_SHORT_MESSAGE = 'Recording too short';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `recording_YYYYMMDD_HHMMSS.wav` in local time
 */
export function recordingFilename(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `recording_${day}_${time}.wav`;
}

// ============================================================================
// CaptureController Class
// ============================================================================

export class CaptureController extends EventEmitter {
  private state: CaptureState = 'idle';
  private outputPath: string | null = null;
  private startedAt = 0;
  private readonly now: () => number;

  constructor(
    private readonly options: CaptureControllerOptions,
    private readonly recorder: Recorder,
    private readonly submit: (recording: Recording) => SubmitResult,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
    private readonly deps: CaptureControllerDeps = {}
  ) {
    super();
    this.now = deps.now ?? Date.now;
  }

  getState(): CaptureState {
    return this.state;
  }

  isRecording(): boolean {
    return this.state === 'recording';
  }

  onStateChange(callback: (state: CaptureState) => void): () => void {
    this.on('state', callback);
    return () => {
      this.off('state', callback);
    };
  }

  /**
   * Start a recording when idle, stop and submit it when recording.
   */
  async onToggle(): Promise<void> {
    switch (this.state) {
      case 'idle':
        await this.startRecording();
        return;
      case 'recording':
        await this.stopRecording();
        return;
      default:
        this.logger.debug(`Toggle ignored while ${this.state}`);
    }
  }

  /**
   * Stop an active recording without submitting it, e.g. on exit.
   */
  async cancel(): Promise<void> {
    if (this.state !== 'recording') {
      return;
    }

    const outputPath = this.outputPath;
    this.setState('stopping');
    try {
      await this.recorder.stop();
    } catch (error) {
      this.logger.warn('Recorder did not stop cleanly', { operation: 'cancel', error: errorMessage(error) });
    }
    this.outputPath = null;
    this.setState('idle');
    this.logger.info('Recording cancelled', { operation: 'cancel', data: { outputPath } });
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async startRecording(): Promise<void> {
    this.setState('starting');

    const startedAt = this.now();
    const outputPath = join(this.options.recordingsDir, recordingFilename(new Date(startedAt)));
    this.deps.markSeen?.(outputPath);

    try {
      await this.recorder.start(outputPath);
    } catch (error) {
      const failure =
        error instanceof CaptureError ? error : new CaptureError(errorMessage(error), { cause: error });
      this.logger.error('Recording failed to start', {
        operation: 'start',
        error: failure.message,
        stack: failure.stack,
      });
      this.setState('idle');
      this.notifier.notify(failure.message, 'error');
      return;
    }

    this.outputPath = outputPath;
    this.startedAt = startedAt;
    this.setState('recording');
    this.notifier.notify(RECORDING_STARTED_MESSAGE, 'info');
  }

  private async stopRecording(): Promise<void> {
    const outputPath = this.outputPath;
    this.setState('stopping');

    try {
      await this.recorder.stop();
    } catch (error) {
      this.logger.error('Recorder failed to stop', { operation: 'stop', error: errorMessage(error) });
      this.outputPath = null;
      this.setState('idle');
      this.notifier.notify(`Recording failed: ${errorMessage(error)}`, 'error');
      return;
    }

    const durationMs = this.now() - this.startedAt;
    this.outputPath = null;
    this.setState('idle');

    if (!outputPath) {
      return;
    }

    const sizeBytes = await this.fileSize(outputPath);
    if (durationMs < this.options.minRecordingMs || sizeBytes === 0) {
      this.logger.info('Discarding short recording', {
        operation: 'stop',
        data: { file: basename(outputPath), durationMs, sizeBytes },
      });
      await this.discard(outputPath);
      this.notifier.notify(TOO_SHORT_MESSAGE, 'info');
      return;
    }

    const recording: Recording = {
      id: randomUUID(),
      path: outputPath,
      createdAt: this.startedAt,
      source: 'hotkey',
      sizeBytes,
      durationMs,
    };

    this.logger.info('Recording finished', {
      operation: 'stop',
      data: { file: basename(outputPath), durationMs, sizeBytes },
    });
    this.submit(recording);
  }

  /** Size in bytes; 0 when the recorder never created the file */
  private async fileSize(filePath: string): Promise<number> {
    try {
      return (await stat(filePath)).size;
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn('Could not stat recording', { error: errorMessage(error) });
      }
      return 0;
    }
  }

  private async discard(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn(`Could not remove ${basename(filePath)}`, { error: errorMessage(error) });
      }
    }
  }

  private setState(state: CaptureState): void {
    this.state = state;
    this.emit('state', state);
  }
}

export default CaptureController;
