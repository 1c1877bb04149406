/**
 * Shared Types for Transcription Backends
 *
 * Available backends (one per process, chosen at startup):
 * - local: whisper.cpp CLI against a downloaded ggml model
 * - openai: OpenAI audio transcription API
 * - fireworks: Fireworks audio transcription API
 */

import type { TranscriptionError } from './errors.js';

// ============================================================================
// Backend Selection
// ============================================================================

export type BackendKind = 'local' | 'openai' | 'fireworks';

/**
 * whisper.cpp ggml models available for download
 */
export const WHISPER_MODELS = [
  'tiny',
  'tiny.en',
  'base',
  'base.en',
  'small',
  'small.en',
  'medium',
  'medium.en',
  'large-v3',
  'large-v3-turbo',
] as const;

export type WhisperModel = (typeof WHISPER_MODELS)[number];

export interface LocalBackendConfig {
  kind: 'local';
  model: WhisperModel;
  modelsDir: string;
  whisperBin: string;
  useGpu: boolean;
  threads: number;
  /** ISO code or 'auto' */
  language: string;
  downloadTimeoutMs: number;
}

export interface OpenAIBackendConfig {
  kind: 'openai';
  apiKey: string;
  model: string;
  baseUrl: string;
  /** ISO code or 'auto' */
  language: string;
}

export interface FireworksBackendConfig {
  kind: 'fireworks';
  apiKey: string;
  model: string;
  baseUrl: string;
  language: string;
  vadModel: string;
}

export type BackendConfig = LocalBackendConfig | OpenAIBackendConfig | FireworksBackendConfig;

// ============================================================================
// Results
// ============================================================================

export type TranscriptionResult =
  | { ok: true; text: string }
  | { ok: false; error: TranscriptionError };

export interface TranscribeOptions {
  /** Aborted by the pipeline on timeout or manual reset */
  signal?: AbortSignal;
}

/**
 * Uniform capability over every backend variant
 */
export interface TranscriptionBackend {
  readonly kind: BackendKind;
  /** Human readable, e.g. "local whisper.cpp (small.en)" */
  describe(): string;
  /**
   * Startup validation. Rejects with BackendUnavailable when the backend
   * can never work with the current configuration.
   */
  prepare(): Promise<void>;
  transcribe(audioPath: string, options?: TranscribeOptions): Promise<TranscriptionResult>;
}

// ============================================================================
// Model Download Types
// ============================================================================

/**
 * Information about a whisper.cpp model
 */
export interface ModelInfo {
  name: WhisperModel;
  filename: string;
  sizeMB: number;
  url: string;
}

/**
 * Progress information during model download
 */
export interface DownloadProgress {
  model: WhisperModel;
  downloadedBytes: number;
  totalBytes: number;
  percent: number;
  speedBps: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;
