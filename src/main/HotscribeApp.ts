/**
 * HotscribeApp - Composition root
 *
 * Wires the triggers (hotkey capture, folder watch) to the single
 * transcription pipeline and the delivery layer, and owns startup and
 * graceful shutdown:
 *
 *   hotkey ─▶ CaptureController ─┐
 *                                ├─▶ TranscriptionPipeline ─▶ backend ─▶ delivery
 *   fs.watch ─▶ WatchMode ───────┘
 *
 * The combined status (`recording` from capture, the rest from the
 * pipeline) is emitted as `status` for the terminal status line.
 */

import { EventEmitter } from 'events';
import { mkdir } from 'fs/promises';
import type { AppStatus, HotkeyAction, Recording, TextDelivery } from '../shared/types.js';
import { AudioRecorder } from './capture/AudioRecorder.js';
import { CaptureController, type Recorder } from './capture/CaptureController.js';
import { errorHandler as defaultErrorHandler, type ErrorHandler, type Logger } from './ErrorHandler.js';
import { errorMessage } from './errors.js';
import { HotkeyManager } from './HotkeyManager.js';
import { RecordingJanitor } from './housekeeping/RecordingJanitor.js';
import { ClipboardService } from './output/ClipboardService.js';
import { NotificationService } from './output/NotificationService.js';
import { TranscriptionPipeline, type SubmitResult } from './pipeline/TranscriptionPipeline.js';
import type { HotscribeSettings } from './settings/SettingsManager.js';
import { createTranscriptionBackend } from './transcription/index.js';
import type { TranscriptionBackend } from './transcription/types.js';
import { WatchMode } from './watch/WatchMode.js';

// ============================================================================
// Types
// ============================================================================

export interface HotscribeAppDeps {
  errorHandler?: ErrorHandler;
  backend?: TranscriptionBackend;
  delivery?: TextDelivery;
  notifications?: NotificationService;
  recorder?: Recorder;
  hotkeys?: HotkeyManager;
}

export interface StartOptions {
  watch: boolean;
  hotkeys: boolean;
}

export declare interface HotscribeApp {
  on(event: 'status', listener: (status: AppStatus, previous: AppStatus) => void): this;
  on(event: 'transcript', listener: (text: string, recording: Recording) => void): this;
  on(event: 'shutdown', listener: () => void): this;
}

// ============================================================================
// HotscribeApp Class
// ============================================================================

export class HotscribeApp extends EventEmitter {
  readonly pipeline: TranscriptionPipeline;
  readonly capture: CaptureController;
  readonly notifications: NotificationService;
  readonly janitor: RecordingJanitor;

  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;
  private readonly backend: TranscriptionBackend;
  private readonly hotkeys: HotkeyManager;
  private watcher: WatchMode | null = null;
  private status: AppStatus = 'idle';
  private started = false;
  private shutdownPromise: Promise<void> | null = null;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    private readonly settings: HotscribeSettings,
    deps: HotscribeAppDeps = {}
  ) {
    super();
    this.errorHandler = deps.errorHandler ?? defaultErrorHandler;
    this.logger = this.errorHandler.scoped('App');

    this.backend = deps.backend ?? createTranscriptionBackend(settings.backend, this.errorHandler.scoped('Backend'));

    this.notifications =
      deps.notifications ??
      new NotificationService({ enabled: settings.notifications }, this.errorHandler.scoped('Notifications'));

    const delivery =
      deps.delivery ??
      new ClipboardService(
        { autoPaste: settings.autoPaste, pasteDelayMs: settings.pasteDelayMs, encoding: settings.textEncoding },
        this.errorHandler.scoped('Clipboard')
      );

    this.pipeline = new TranscriptionPipeline(
      this.backend,
      delivery,
      this.notifications,
      this.errorHandler.scoped('Pipeline'),
      { timeoutMs: settings.transcriptionTimeoutMs }
    );

    const recorder =
      deps.recorder ??
      new AudioRecorder(
        { format: settings.audioInput.format, device: settings.audioInput.device },
        this.errorHandler.scoped('Recorder')
      );

    this.capture = new CaptureController(
      { recordingsDir: settings.recordingsDir, minRecordingMs: settings.minRecordingMs },
      recorder,
      (recording) => this.submit(recording),
      this.notifications,
      this.errorHandler.scoped('Capture'),
      { markSeen: (filePath) => this.watcher?.markSeen(filePath) }
    );

    this.janitor = new RecordingJanitor(
      {
        directory: settings.recordingsDir,
        enabled: settings.deleteRecordings,
        retentionDays: settings.maxRecordingAgeDays,
      },
      this.errorHandler.scoped('Housekeeping')
    );

    this.hotkeys = deps.hotkeys ?? new HotkeyManager(settings.hotkeys, this.errorHandler.scoped('Hotkeys'));

    this.unsubscribers.push(
      this.pipeline.onStateChange(() => this.refreshStatus()),
      this.capture.onStateChange(() => this.refreshStatus()),
      this.pipeline.onTranscript((text, recording) => {
        this.emit('transcript', text, recording);
      })
    );
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  getStatus(): AppStatus {
    return this.status;
  }

  describeBackend(): string {
    return this.backend.describe();
  }

  /**
   * The single entry point both triggers submit through
   */
  submit(recording: Recording): SubmitResult {
    return this.pipeline.submit(recording);
  }

  /**
   * Validate the backend, then bring up housekeeping, the watcher and
   * the hotkey listener. Rejects when the backend can never work.
   */
  async start(options: StartOptions): Promise<void> {
    if (this.started) return;

    await this.backend.prepare();
    await mkdir(this.settings.recordingsDir, { recursive: true });

    this.janitor.start();

    if (options.watch && this.settings.watchEnabled) {
      this.watcher = new WatchMode(
        { watchDir: this.settings.watchDir },
        (recording) => this.submit(recording),
        this.errorHandler.scoped('Watch')
      );
      await this.watcher.start();
    }

    if (options.hotkeys) {
      this.unsubscribers.push(this.hotkeys.onHotkey((action) => this.handleHotkey(action)));
      await this.hotkeys.start();
    }

    this.started = true;
    this.logger.info('hotscribe ready', {
      data: {
        backend: this.backend.describe(),
        watching: this.watcher ? this.watcher.getWatchDir() : null,
        hotkeys: options.hotkeys ? this.hotkeys.getConfig() : null,
      },
    });
  }

  /**
   * Stop listeners and timers, cancel an active recording, abandon the
   * in-flight transcription and flush logs. Safe to call repeatedly.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async handleHotkey(action: HotkeyAction): Promise<void> {
    switch (action) {
      case 'toggleRecording':
        await this.capture.onToggle();
        return;
      case 'resetPipeline':
        this.pipeline.reset();
        return;
      case 'exit':
        this.logger.info('Exit hotkey pressed');
        await this.shutdown();
        return;
    }
  }

  private async performShutdown(): Promise<void> {
    this.logger.info('Shutting down');

    this.hotkeys.stop();
    this.watcher?.stop();
    this.janitor.stop();

    try {
      await this.capture.cancel();
    } catch (error) {
      this.logger.warn('Could not cancel recording', { error: errorMessage(error) });
    }

    this.pipeline.abandon();

    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }

    await this.errorHandler.flushLogs();
    this.emit('shutdown');
  }

  private refreshStatus(): void {
    const pipelineStatus = this.pipeline.getState().status;
    const next: AppStatus = this.capture.isRecording()
      ? 'recording'
      : pipelineStatus === 'transcribing' || pipelineStatus === 'error'
        ? pipelineStatus
        : 'idle';

    if (next === this.status) return;

    const previous = this.status;
    this.status = next;
    this.emit('status', next, previous);
  }
}

export default HotscribeApp;
