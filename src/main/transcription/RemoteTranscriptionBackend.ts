/**
 * RemoteTranscriptionBackend - shared HTTP transport for the cloud backends
 *
 * Both providers expose an OpenAI-compatible `POST /audio/transcriptions`
 * endpoint taking a multipart form and answering `{ "text": "..." }`.
 * Subclasses only contribute their form fields.
 */

import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { z } from 'zod';
import type { Logger } from '../ErrorHandler.js';
import { errorMessage } from '../errors.js';
import {
  AuthError,
  BackendUnavailable,
  MalformedResponse,
  NetworkError,
  TimeoutError,
  toTranscriptionError,
  type TranscriptionError,
} from './errors.js';
import type {
  FireworksBackendConfig,
  OpenAIBackendConfig,
  TranscribeOptions,
  TranscriptionBackend,
  TranscriptionResult,
} from './types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const transcriptionResponseSchema = z.object({
  text: z.string(),
});

const apiErrorSchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

const MIME_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.mp3': 'audio/mpeg',
  '.mpeg': 'audio/mpeg',
  '.mpga': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.webm': 'audio/webm',
  '.flac': 'audio/flac',
};

export function mimeTypeFor(filePath: string): string {
  return MIME_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Extract a readable message from a provider error body.
 */
async function extractApiError(response: Response): Promise<string> {
  const raw = (await response.text().catch(() => '')).trim();
  if (raw.length === 0) {
    return `HTTP ${response.status}`;
  }

  try {
    const parsed = apiErrorSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      const { error } = parsed.data;
      return typeof error === 'string' ? error : error.message;
    }
  } catch {
    // Not JSON, fall through to the raw body
  }

  return raw.length > 220 ? `${raw.slice(0, 220)}...` : raw;
}

export abstract class RemoteTranscriptionBackend<C extends OpenAIBackendConfig | FireworksBackendConfig>
  implements TranscriptionBackend
{
  abstract readonly kind: C['kind'];
  /** Shown in logs and messages */
  protected abstract readonly providerName: string;
  /** Environment variable holding the credential */
  protected abstract readonly credentialVariable: string;

  constructor(
    protected readonly config: C,
    protected readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  protected abstract appendFields(form: FormData): void;

  describe(): string {
    return `${this.providerName} (${this.config.model})`;
  }

  async prepare(): Promise<void> {
    if (this.config.apiKey.trim().length === 0) {
      throw new BackendUnavailable(`${this.credentialVariable} is not set; ${this.providerName} transcription cannot run`);
    }
  }

  async transcribe(audioPath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const apiKey = this.config.apiKey.trim();
    if (apiKey.length === 0) {
      return { ok: false, error: new AuthError(`${this.credentialVariable} is not set`) };
    }

    let audio: Buffer;
    try {
      audio = await readFile(audioPath);
    } catch (error) {
      return {
        ok: false,
        error: new BackendUnavailable(`Cannot read audio file ${audioPath}: ${errorMessage(error)}`, { cause: error }),
      };
    }

    const form = new FormData();
    this.appendFields(form);
    if (this.config.language && this.config.language !== 'auto') {
      form.append('language', this.config.language);
    }
    form.append('file', new Blob([new Uint8Array(audio)], { type: mimeTypeFor(audioPath) }), basename(audioPath));

    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/audio/transcriptions`;
    const startedAt = Date.now();

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
        },
        body: form,
        signal: options.signal,
      });

      if (!response.ok) {
        const detail = await extractApiError(response);
        return { ok: false, error: this.errorForStatus(response.status, detail) };
      }

      const text = await this.parseBody(response);
      this.logger.debug(`${this.providerName} transcription complete`, {
        data: { durationMs: Date.now() - startedAt, chars: text.length },
      });
      return { ok: true, text };
    } catch (error) {
      return { ok: false, error: toTranscriptionError(error) };
    }
  }

  private async parseBody(response: Response): Promise<string> {
    const raw = await response.text();

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new MalformedResponse(`${this.providerName} returned a non-JSON body`, { cause: error });
    }

    const parsed = transcriptionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponse(`${this.providerName} response has no text field`, { cause: parsed.error });
    }

    return parsed.data.text.trim();
  }

  private errorForStatus(status: number, detail: string): TranscriptionError {
    const message = `${this.providerName} transcription failed (${status}): ${detail}`;

    if (status === 401 || status === 403) {
      return new AuthError(message);
    }
    if (status === 408) {
      return new TimeoutError(message, 0);
    }
    if (status === 429 || status >= 500) {
      return new NetworkError(message, { status });
    }
    return new BackendUnavailable(message);
  }
}
