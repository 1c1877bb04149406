/**
 * Transcription backends
 *
 * `createTranscriptionBackend` is the only place that branches on the
 * configured backend kind.
 */

import type { Logger } from '../ErrorHandler.js';
import { FireworksBackend } from './FireworksBackend.js';
import { LocalWhisperBackend } from './LocalWhisperBackend.js';
import { OpenAIBackend } from './OpenAIBackend.js';
import type { BackendConfig, TranscriptionBackend } from './types.js';

export function createTranscriptionBackend(config: BackendConfig, logger: Logger): TranscriptionBackend {
  switch (config.kind) {
    case 'local':
      return new LocalWhisperBackend(config, logger);
    case 'openai':
      return new OpenAIBackend(config, logger);
    case 'fireworks':
      return new FireworksBackend(config, logger);
  }
}

export * from './types.js';
export * from './errors.js';
export { ModelDownloadManager } from './ModelDownloadManager.js';
export { LocalWhisperBackend } from './LocalWhisperBackend.js';
export { OpenAIBackend } from './OpenAIBackend.js';
export { FireworksBackend } from './FireworksBackend.js';
