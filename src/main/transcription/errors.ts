/**
 * Transcription error taxonomy.
 *
 * Every backend, whatever its transport, reports failures as one of five
 * kinds. The pipeline maps a kind to exactly one user-facing label.
 */

import { HotscribeError } from '../errors.js';

export type TranscriptionErrorKind =
  | 'network'
  | 'auth'
  | 'timeout'
  | 'unavailable'
  | 'malformed';

export const TRANSCRIPTION_ERROR_LABELS: Record<TranscriptionErrorKind, string> = {
  network: 'Network error',
  auth: 'Authentication error',
  timeout: 'Timed out',
  unavailable: 'Backend unavailable',
  malformed: 'Malformed response',
};

export abstract class TranscriptionError extends HotscribeError {
  public abstract readonly kind: TranscriptionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transcription', options);
  }

  get label(): string {
    return TRANSCRIPTION_ERROR_LABELS[this.kind];
  }
}

export class NetworkError extends TranscriptionError {
  public readonly kind = 'network';
  public readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'NetworkError';
    this.status = options?.status;
  }
}

export class AuthError extends TranscriptionError {
  public readonly kind = 'auth';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export class TimeoutError extends TranscriptionError {
  public readonly kind = 'timeout';
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class BackendUnavailable extends TranscriptionError {
  public readonly kind = 'unavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendUnavailable';
  }
}

export class MalformedResponse extends TranscriptionError {
  public readonly kind = 'malformed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponse';
  }
}

/**
 * Coerce anything a backend threw into the taxonomy. Unknown faults are
 * reported as the backend being unavailable.
 */
export function toTranscriptionError(error: unknown): TranscriptionError {
  if (error instanceof TranscriptionError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new TimeoutError(error.message || 'Request aborted', 0, { cause: error });
    }
    if (error instanceof TypeError && /fetch failed|network/i.test(error.message)) {
      return new NetworkError(error.message, { cause: error });
    }
    return new BackendUnavailable(error.message, { cause: error });
  }

  return new BackendUnavailable(String(error));
}
