/**
 * ModelDownloadManager.ts - whisper.cpp Model Download and Management
 *
 * Handles:
 * - Downloading ggml models from Hugging Face
 * - Progress tracking with events
 * - Resume support for interrupted downloads
 * - Sharing one in-flight download between concurrent callers
 */

import { EventEmitter } from 'events';
import { createWriteStream, existsSync, statSync, unlinkSync, mkdirSync, renameSync, type WriteStream } from 'fs';
import type { ClientRequest, IncomingMessage } from 'http';
import { join } from 'path';
import * as https from 'https';
import type { Logger } from '../ErrorHandler.js';
import { errorMessage } from '../errors.js';
import { WHISPER_MODELS, type WhisperModel, type ModelInfo, type DownloadProgress, type ProgressCallback } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const HUGGINGFACE_BASE_URL = 'https://huggingface.co/ggerganov/whisper.cpp/resolve/main';
const MAX_REDIRECTS = 5;

/** Sizes in MiB */
const MODEL_SIZES_MB: Record<WhisperModel, number> = {
  tiny: 75,
  'tiny.en': 75,
  base: 142,
  'base.en': 142,
  small: 466,
  'small.en': 466,
  medium: 1457,
  'medium.en': 1457,
  'large-v3': 2951,
  'large-v3-turbo': 1549,
};

function modelInfo(name: WhisperModel): ModelInfo {
  const filename = `ggml-${name}.bin`;
  return {
    name,
    filename,
    sizeMB: MODEL_SIZES_MB[name],
    url: `${HUGGINGFACE_BASE_URL}/${filename}`,
  };
}

export interface DownloadOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

// ============================================================================
// ModelDownloadManager Class
// ============================================================================

export class ModelDownloadManager extends EventEmitter {
  private activeDownloads: Map<WhisperModel, { promise: Promise<string>; abort: () => void }> = new Map();

  constructor(
    private readonly modelsDir: string,
    private readonly logger: Logger
  ) {
    super();
  }

  // ============================================================================
  // Public API
  // ============================================================================

  getModelsDirectory(): string {
    return this.modelsDir;
  }

  getAvailableModels(): ModelInfo[] {
    return WHISPER_MODELS.map(modelInfo);
  }

  getModelInfo(model: WhisperModel): ModelInfo {
    return modelInfo(model);
  }

  getModelPath(model: WhisperModel): string {
    return join(this.modelsDir, modelInfo(model).filename);
  }

  /**
   * Check if a model is downloaded. A file well under the expected size
   * is a truncated download and does not count.
   */
  isModelDownloaded(model: WhisperModel): boolean {
    const path = this.getModelPath(model);
    if (!existsSync(path)) {
      return false;
    }

    const stats = statSync(path);
    const expectedSize = MODEL_SIZES_MB[model] * 1024 * 1024;
    return stats.size >= expectedSize * 0.9;
  }

  getDownloadedModels(): WhisperModel[] {
    return WHISPER_MODELS.filter((model) => this.isModelDownloaded(model));
  }

  /**
   * Download a model with progress tracking. Resolves with the model path.
   * A second call for the same model joins the download already running.
   */
  downloadModel(model: WhisperModel, options: DownloadOptions = {}): Promise<string> {
    const targetPath = this.getModelPath(model);

    if (this.isModelDownloaded(model)) {
      this.logger.debug(`Model ${model} already downloaded`);
      return Promise.resolve(targetPath);
    }

    const existing = this.activeDownloads.get(model);
    const pending = existing?.promise ?? this.startDownload(model);

    if (options.onProgress) {
      const listener = (progress: DownloadProgress): void => {
        if (progress.model === model) options.onProgress?.(progress);
      };
      this.on('progress', listener);
      pending.then(
        () => this.off('progress', listener),
        () => this.off('progress', listener)
      );
    }

    if (options.signal) {
      const signal = options.signal;
      if (signal.aborted) {
        this.cancelDownload(model);
      } else {
        signal.addEventListener('abort', () => this.cancelDownload(model), { once: true });
      }
    }

    return pending;
  }

  /**
   * Cancel an active download. The partial file is kept for resume.
   */
  cancelDownload(model: WhisperModel): void {
    this.activeDownloads.get(model)?.abort();
  }

  isDownloading(model: WhisperModel): boolean {
    return this.activeDownloads.has(model);
  }

  /**
   * Remove a model and its partial download, cancelling the download first
   * if one is running. Returns false when there was nothing on disk.
   */
  deleteModel(model: WhisperModel): boolean {
    if (this.isDownloading(model)) {
      this.cancelDownload(model);
    }

    let removed = false;
    const path = this.getModelPath(model);
    if (existsSync(path)) {
      unlinkSync(path);
      removed = true;
      this.logger.info(`Model deleted: ${model}`);
    }

    const tempPath = `${path}.download`;
    if (existsSync(tempPath)) {
      unlinkSync(tempPath);
      removed = true;
    }
    return removed;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private startDownload(model: WhisperModel): Promise<string> {
    const info = modelInfo(model);
    const targetPath = this.getModelPath(model);
    const tempPath = `${targetPath}.download`;

    if (!existsSync(this.modelsDir)) {
      mkdirSync(this.modelsDir, { recursive: true });
      this.logger.info(`Created models directory: ${this.modelsDir}`);
    }

    this.logger.info(`Starting download: ${model} (${info.sizeMB}MB)`);

    let currentRequest: ClientRequest | undefined;
    let writeStream: WriteStream | undefined;
    let cancelled = false;
    let rejectDownload: (error: Error) => void = () => undefined;

    const promise = new Promise<string>((resolve, reject) => {
      rejectDownload = reject;

      let downloadedBytes = 0;
      let lastProgressTime = Date.now();
      let lastDownloadedBytes = 0;

      // Check for partial download (resume support)
      if (existsSync(tempPath)) {
        downloadedBytes = statSync(tempPath).size;
        lastDownloadedBytes = downloadedBytes;
        this.logger.info(`Resuming download from ${Math.round(downloadedBytes / 1024 / 1024)}MB`);
      }

      const fail = (error: Error): void => {
        if (cancelled) return;
        this.activeDownloads.delete(model);
        writeStream?.destroy();
        this.logger.error(`Download failed: ${model}`, { error: error.message });
        reject(error);
      };

      const request = (url: string, redirectCount: number): void => {
        currentRequest = https.get(
          url,
          { headers: downloadedBytes > 0 ? { Range: `bytes=${downloadedBytes}-` } : {} },
          (response) => handleResponse(response, url, redirectCount)
        );
        currentRequest.on('error', fail);
      };

      const handleResponse = (response: IncomingMessage, url: string, redirectCount: number): void => {
        if (cancelled) {
          response.destroy();
          return;
        }

        const status = response.statusCode ?? 0;

        // Hugging Face answers with redirects to its CDN
        if (status === 301 || status === 302 || status === 307 || status === 308) {
          response.resume();
          const location = response.headers.location;
          if (!location) {
            fail(new Error(`Redirect without location (HTTP ${status})`));
            return;
          }
          if (redirectCount >= MAX_REDIRECTS) {
            fail(new Error('Too many redirects'));
            return;
          }
          request(new URL(location, url).toString(), redirectCount + 1);
          return;
        }

        if (status !== 200 && status !== 206) {
          response.resume();
          fail(new Error(`Download failed: HTTP ${status}`));
          return;
        }

        // A 200 after a Range request means the server restarted from zero
        if (status === 200 && downloadedBytes > 0) {
          downloadedBytes = 0;
          lastDownloadedBytes = 0;
        }

        const contentLength = parseInt(response.headers['content-length'] ?? '0', 10);
        const totalBytes = downloadedBytes + contentLength;
        const stream = createWriteStream(tempPath, { flags: downloadedBytes > 0 ? 'a' : 'w' });
        writeStream = stream;

        response.on('data', (chunk: Buffer) => {
          downloadedBytes += chunk.length;

          const now = Date.now();
          const timeDelta = (now - lastProgressTime) / 1000;

          if (timeDelta >= 0.1) {
            const bytesDelta = downloadedBytes - lastDownloadedBytes;
            const progress: DownloadProgress = {
              model,
              downloadedBytes,
              totalBytes,
              percent: totalBytes > 0 ? Math.round((downloadedBytes / totalBytes) * 100) : 0,
              speedBps: Math.round(bytesDelta / timeDelta),
            };
            this.emit('progress', progress);

            lastProgressTime = now;
            lastDownloadedBytes = downloadedBytes;
          }
        });

        response.on('error', fail);
        stream.on('error', fail);

        stream.on('finish', () => {
          if (cancelled) {
            return;
          }
          this.activeDownloads.delete(model);

          try {
            renameSync(tempPath, targetPath);
          } catch (renameError) {
            fail(new Error(`Could not move model into place: ${errorMessage(renameError)}`));
            return;
          }

          if (!this.isModelDownloaded(model)) {
            fail(new Error('Downloaded file size mismatch - download may be corrupted'));
            return;
          }

          this.logger.info(`Download complete: ${model}`);
          resolve(targetPath);
        });

        response.pipe(stream);
      };

      request(info.url, 0);
    });

    this.activeDownloads.set(model, {
      promise,
      abort: () => {
        cancelled = true;
        this.activeDownloads.delete(model);
        currentRequest?.destroy();
        writeStream?.destroy();
        this.logger.info(`Download cancelled: ${model}`);
        rejectDownload(new Error(`Download cancelled: ${model}`));
      },
    });

    return promise;
  }
}

export default ModelDownloadManager;
