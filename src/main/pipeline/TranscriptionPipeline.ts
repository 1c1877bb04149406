/**
 * TranscriptionPipeline.ts - Single-flight Capture-to-Delivery State Machine
 *
 * States:
 *   idle ──submit──▶ transcribing ──success──▶ idle
 *                          │
 *                          └──failure / timeout──▶ error ──▶ idle
 *   any ──reset──▶ idle
 *
 * The check-and-set in `submit` runs before any await, so two callers can
 * never both observe idle. Every run ends in exactly one notification.
 * A run whose token no longer matches (after a timeout or reset) is
 * discarded when its backend call finally settles.
 */

import { EventEmitter } from 'events';
import type { DeliveryReport, Notifier, Recording, TextDelivery } from '../../shared/types.js';
import type { Logger } from '../ErrorHandler.js';
import { DeliveryError, errorMessage } from '../errors.js';
import { TimeoutError, toTranscriptionError, type TranscriptionError } from '../transcription/errors.js';
import type { TranscriptionBackend, TranscriptionResult } from '../transcription/types.js';

// ============================================================================
// Types
// ============================================================================

export type PipelineState =
  | { status: 'idle' }
  | { status: 'transcribing'; recording: Recording; startedAt: number }
  | { status: 'error'; error: TranscriptionError };

export type SubmitResult = { accepted: true } | { accepted: false; reason: 'busy' };

export interface PipelineOptions {
  timeoutMs: number;
  /** Deadline for clipboard write plus paste. */
  deliveryTimeoutMs?: number;
}

export const DEFAULT_TRANSCRIPTION_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_DELIVERY_TIMEOUT_MS = 15 * 1000;

export const BUSY_MESSAGE = 'Already transcribing, please wait';
export const NO_SPEECH_MESSAGE = 'No speech detected';
export const RESET_MESSAGE = 'Pipeline reset';
export const DELIVERY_FAILED_MESSAGE = 'Transcript ready, but copying or pasting may have failed';

// ============================================================================
// TranscriptionPipeline Class
// ============================================================================

export class TranscriptionPipeline extends EventEmitter {
  private state: PipelineState = { status: 'idle' };
  private runToken = 0;
  private controller: AbortController | null = null;
  private current: Promise<void> = Promise.resolve();

  constructor(
    private readonly backend: TranscriptionBackend,
    private readonly delivery: TextDelivery,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
    private readonly options: PipelineOptions = { timeoutMs: DEFAULT_TRANSCRIPTION_TIMEOUT_MS }
  ) {
    super();
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  getState(): PipelineState {
    return this.state;
  }

  isIdle(): boolean {
    return this.state.status === 'idle';
  }

  /**
   * Admit a recording if the pipeline is idle. A busy pipeline rejects the
   * recording outright; nothing is queued.
   */
  submit(recording: Recording): SubmitResult {
    if (this.state.status !== 'idle') {
      this.logger.info('Submission rejected, pipeline busy', {
        operation: 'submit',
        data: { path: recording.path, source: recording.source },
      });
      this.notifier.notify(BUSY_MESSAGE, 'info');
      return { accepted: false, reason: 'busy' };
    }

    const token = ++this.runToken;
    const controller = new AbortController();
    this.controller = controller;
    this.setState({ status: 'transcribing', recording, startedAt: Date.now() });

    this.logger.info('Transcription started', {
      operation: 'submit',
      data: { id: recording.id, path: recording.path, source: recording.source, backend: this.backend.describe() },
    });

    this.current = this.run(recording, token, controller).catch((error: unknown) => {
      this.logger.error('Pipeline run crashed', {
        operation: 'run',
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      if (token === this.runToken && this.state.status !== 'idle') {
        this.controller = null;
        this.setState({ status: 'idle' });
      }
    });
    return { accepted: true };
  }

  /**
   * Return to idle from any state. The in-flight call is aborted and its
   * eventual result ignored.
   */
  reset(): void {
    const previous = this.state.status;
    this.abandonRun();

    this.logger.warn('Pipeline reset', { operation: 'reset', data: { previous } });
    this.notifier.notify(RESET_MESSAGE, 'info');

    if (this.state.status !== 'idle') {
      this.setState({ status: 'idle' });
    }
  }

  /**
   * Abandon the in-flight run without notifying. Used on shutdown.
   */
  abandon(): void {
    if (this.state.status === 'idle') {
      return;
    }
    this.logger.info('Abandoning in-flight transcription', { operation: 'abandon' });
    this.abandonRun();
    this.setState({ status: 'idle' });
  }

  /**
   * Resolves once the current run, if any, has settled.
   */
  drain(): Promise<void> {
    return this.current;
  }

  onStateChange(callback: (state: PipelineState) => void): () => void {
    this.on('state', callback);
    return () => {
      this.off('state', callback);
    };
  }

  onTranscript(callback: (text: string, recording: Recording) => void): () => void {
    this.on('transcript', callback);
    return () => {
      this.off('transcript', callback);
    };
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async run(recording: Recording, token: number, controller: AbortController): Promise<void> {
    const result = await this.transcribeWithTimeout(recording, controller);

    if (token !== this.runToken) {
      this.logger.info('Discarding late transcription result', {
        operation: 'run',
        data: { id: recording.id, ok: result.ok },
      });
      return;
    }
    this.controller = null;

    if (!result.ok) {
      this.fail(result.error, recording);
      return;
    }

    const text = result.text.trim();
    if (text.length === 0) {
      this.logger.info('Transcription produced no text', { operation: 'run', data: { id: recording.id } });
      this.notifier.notify(NO_SPEECH_MESSAGE, 'info');
      this.setState({ status: 'idle' });
      return;
    }

    let message: string;
    let kind: 'success' | 'info' = 'success';
    try {
      const report = await this.deliverWithTimeout(text);
      message = report.pasted
        ? 'Transcription pasted'
        : report.copied
          ? 'Transcription copied to clipboard'
          : 'Transcription complete';
    } catch (error) {
      const stage = error instanceof DeliveryError ? error.stage : 'clipboard';
      this.logger.warn('Delivery failed, transcript still produced', {
        operation: 'deliver',
        error: errorMessage(error),
        data: { stage, id: recording.id },
      });
      message = DELIVERY_FAILED_MESSAGE;
      kind = 'info';
    }

    if (token !== this.runToken) {
      return;
    }

    this.logger.info('Transcription complete', {
      operation: 'run',
      data: { id: recording.id, chars: text.length },
    });
    this.emit('transcript', text, recording);
    this.notifier.notify(message, kind);
    this.setState({ status: 'idle' });
  }

  /**
   * A clipboard or paste helper that hangs must not hold the pipeline busy.
   */
  private deliverWithTimeout(text: string): Promise<DeliveryReport> {
    const timeoutMs = this.options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new DeliveryError(`Delivery timed out after ${Math.round(timeoutMs / 1000)}s`, 'clipboard'));
      }, timeoutMs);
    });

    return Promise.race([this.delivery.deliver(text), deadline]).finally(() => {
      clearTimeout(timer);
    });
  }

  /**
   * Race the backend call against the deadline and the run's abort signal.
   * Always resolves, whether or not the backend ever settles.
   */
  private transcribeWithTimeout(recording: Recording, controller: AbortController): Promise<TranscriptionResult> {
    const { timeoutMs } = this.options;

    return new Promise<TranscriptionResult>((resolve) => {
      const timer = setTimeout(() => {
        resolve({
          ok: false,
          error: new TimeoutError(`Transcription exceeded ${Math.round(timeoutMs / 1000)}s`, timeoutMs),
        });
        controller.abort();
      }, timeoutMs);

      controller.signal.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          resolve({ ok: false, error: new TimeoutError('Transcription aborted', timeoutMs) });
        },
        { once: true }
      );

      let call: Promise<TranscriptionResult>;
      try {
        call = this.backend.transcribe(recording.path, { signal: controller.signal });
      } catch (error) {
        call = Promise.reject(error);
      }

      call.then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          resolve({ ok: false, error: toTranscriptionError(error) });
        }
      );
    });
  }

  private fail(error: TranscriptionError, recording: Recording): void {
    this.logger.error(`Transcription failed: ${error.label}`, {
      operation: 'run',
      error: error.message,
      stack: error.stack,
      data: { kind: error.kind, id: recording.id, path: recording.path, source: recording.source },
    });

    this.setState({ status: 'error', error });
    this.notifier.notify(`Transcription failed: ${error.label}`, 'error');
    this.setState({ status: 'idle' });
  }

  private abandonRun(): void {
    this.runToken++;
    this.controller?.abort();
    this.controller = null;
  }

  private setState(state: PipelineState): void {
    this.state = state;
    this.emit('state', state);
  }
}

export default TranscriptionPipeline;
