import type { Logger } from '../ErrorHandler.js';
import { RemoteTranscriptionBackend, type FetchLike } from './RemoteTranscriptionBackend.js';
import type { FireworksBackendConfig } from './types.js';

export const FIREWORKS_DEFAULT_BASE_URL = 'https://audio-turbo.us-virginia-1.direct.fireworks.ai/v1';
export const FIREWORKS_DEFAULT_MODEL = 'whisper-v3-turbo';
export const FIREWORKS_DEFAULT_VAD_MODEL = 'silero';

/**
 * Fireworks audio transcription API (whisper-v3-turbo with silero VAD)
 */
export class FireworksBackend extends RemoteTranscriptionBackend<FireworksBackendConfig> {
  readonly kind = 'fireworks';
  protected readonly providerName = 'Fireworks';
  protected readonly credentialVariable = 'FIREWORKS_API_KEY';

  constructor(config: FireworksBackendConfig, logger: Logger, fetchImpl?: FetchLike) {
    super(config, logger, fetchImpl);
  }

  protected appendFields(form: FormData): void {
    form.append('model', this.config.model);
    form.append('temperature', '0');
    form.append('vad_model', this.config.vadModel);
  }
}
