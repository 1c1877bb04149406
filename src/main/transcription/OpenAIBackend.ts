import type { Logger } from '../ErrorHandler.js';
import { RemoteTranscriptionBackend, type FetchLike } from './RemoteTranscriptionBackend.js';
import type { OpenAIBackendConfig } from './types.js';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const OPENAI_DEFAULT_MODEL = 'whisper-1';

/**
 * OpenAI audio transcription API
 */
export class OpenAIBackend extends RemoteTranscriptionBackend<OpenAIBackendConfig> {
  readonly kind = 'openai';
  protected readonly providerName = 'OpenAI';
  protected readonly credentialVariable = 'OPENAI_API_KEY';

  constructor(config: OpenAIBackendConfig, logger: Logger, fetchImpl?: FetchLike) {
    super(config, logger, fetchImpl);
  }

  protected appendFields(form: FormData): void {
    form.append('model', this.config.model);
    form.append('response_format', 'json');
  }
}
