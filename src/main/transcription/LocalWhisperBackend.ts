/**
 * LocalWhisperBackend - offline transcription through the whisper.cpp CLI
 *
 * The model file is acquired lazily on first use. Concurrent callers share
 * one acquisition, bounded by its own timeout. Audio that is not already
 * WAV is converted to 16 kHz mono PCM with ffmpeg before inference.
 */

import { randomUUID } from 'crypto';
import { unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { extname, join } from 'path';
import type { Logger } from '../ErrorHandler.js';
import { errorMessage } from '../errors.js';
import { CommandFailedError, runCommand } from '../utils/exec.js';
import { ModelDownloadManager } from './ModelDownloadManager.js';
import { BackendUnavailable, TimeoutError, toTranscriptionError, type TranscriptionError } from './errors.js';
import type { LocalBackendConfig, TranscribeOptions, TranscriptionBackend, TranscriptionResult } from './types.js';

export type ModelStore = Pick<
  ModelDownloadManager,
  'isModelDownloaded' | 'getModelPath' | 'downloadModel' | 'getDownloadedModels'
>;

export interface LocalWhisperDeps {
  models?: ModelStore;
  exec?: typeof runCommand;
}

/**
 * whisper.cpp prints one line per segment; join them into plain text.
 */
export function normalizeWhisperOutput(stdout: string): string {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && line !== '[BLANK_AUDIO]')
    .join(' ')
    .trim();
}

function abortError(): Error {
  const error = new Error('Transcription aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Resolve with `promise` unless `signal` fires first.
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class LocalWhisperBackend implements TranscriptionBackend {
  readonly kind = 'local';

  private readonly models: ModelStore;
  private readonly exec: typeof runCommand;
  private acquisition: Promise<string> | null = null;
  private resolvedModelPath: string | null = null;

  constructor(
    private readonly config: LocalBackendConfig,
    private readonly logger: Logger,
    deps: LocalWhisperDeps = {}
  ) {
    this.models = deps.models ?? new ModelDownloadManager(config.modelsDir, logger);
    this.exec = deps.exec ?? runCommand;
  }

  describe(): string {
    return `local whisper.cpp (${this.config.model}${this.config.useGpu ? ', GPU' : ''})`;
  }

  /**
   * Verify the whisper.cpp binary can be launched. The model is fetched
   * on first use, not here.
   */
  async prepare(): Promise<void> {
    try {
      await this.exec(this.config.whisperBin, ['--help']);
    } catch (error) {
      if (error instanceof CommandFailedError && error.notFound) {
        throw new BackendUnavailable(
          `whisper.cpp binary "${this.config.whisperBin}" not found; install whisper.cpp or set WHISPER_BIN`,
          { cause: error }
        );
      }
      // Some builds exit non-zero on --help; reaching the binary is enough
      this.logger.debug('whisper.cpp --help exited with an error', { error: errorMessage(error) });
    }
  }

  async transcribe(audioPath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    let convertedPath: string | null = null;

    try {
      const modelPath = await untilAborted(this.ensureModel(), options.signal);

      let wavPath = audioPath;
      if (extname(audioPath).toLowerCase() !== '.wav') {
        convertedPath = join(tmpdir(), `hotscribe-${randomUUID()}.wav`);
        await this.convertToWav(audioPath, convertedPath, options.signal);
        wavPath = convertedPath;
      }

      const args = ['-m', modelPath, '-f', wavPath, '-nt', '-np'];
      if (!this.config.useGpu) {
        args.push('-ng');
      }
      if (this.config.threads > 0) {
        args.push('-t', String(this.config.threads));
      }
      if (this.config.language) {
        args.push('-l', this.config.language);
      }

      const { stdout } = await this.exec(this.config.whisperBin, args, { signal: options.signal });
      return { ok: true, text: normalizeWhisperOutput(stdout) };
    } catch (error) {
      return { ok: false, error: this.classify(error) };
    } finally {
      if (convertedPath) {
        await unlink(convertedPath).catch((error: unknown) => {
          this.logger.debug('Could not remove converted audio', { error: errorMessage(error) });
        });
      }
    }
  }

  // ==========================================================================
  // Model acquisition
  // ==========================================================================

  private ensureModel(): Promise<string> {
    if (this.resolvedModelPath) {
      return Promise.resolve(this.resolvedModelPath);
    }

    if (this.models.isModelDownloaded(this.config.model)) {
      this.resolvedModelPath = this.models.getModelPath(this.config.model);
      return Promise.resolve(this.resolvedModelPath);
    }

    if (!this.acquisition) {
      this.acquisition = this.acquireModel().finally(() => {
        this.acquisition = null;
      });
    }
    return this.acquisition;
  }

  private async acquireModel(): Promise<string> {
    const { model, downloadTimeoutMs } = this.config;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, downloadTimeoutMs);

    this.logger.info(`Model ${model} not found locally, downloading`);

    try {
      const path = await this.models.downloadModel(model, { signal: controller.signal });
      this.resolvedModelPath = path;
      return path;
    } catch (error) {
      const reason = timedOut ? `download timed out after ${Math.round(downloadTimeoutMs / 1000)}s` : errorMessage(error);

      const fallback = this.models.getDownloadedModels()[0];
      if (fallback) {
        this.logger.warn(`Model ${model} unavailable (${reason}); using downloaded model ${fallback}`);
        this.resolvedModelPath = this.models.getModelPath(fallback);
        return this.resolvedModelPath;
      }

      throw new BackendUnavailable(`Model ${model} is not available: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async convertToWav(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.exec(
        'ffmpeg',
        ['-hide_banner', '-loglevel', 'error', '-y', '-i', inputPath, '-ar', '16000', '-ac', '1', '-c:a', 'pcm_s16le', outputPath],
        { signal }
      );
    } catch (error) {
      if (error instanceof CommandFailedError) {
        throw new BackendUnavailable(
          error.notFound
            ? 'ffmpeg is required to convert non-WAV audio for local transcription'
            : `Cannot decode ${inputPath}: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  private classify(error: unknown): TranscriptionError {
    if (error instanceof CommandFailedError) {
      return new BackendUnavailable(
        error.notFound
          ? `whisper.cpp binary "${this.config.whisperBin}" not found`
          : `whisper.cpp failed: ${error.message}`,
        { cause: error }
      );
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return new TimeoutError('Local transcription aborted', 0, { cause: error });
    }
    return toTranscriptionError(error);
  }
}
