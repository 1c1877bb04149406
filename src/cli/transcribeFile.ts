/**
 * One-shot transcription of an existing audio file
 *
 * Runs the same pipeline the daemon uses, for a single recording, and
 * maps the outcome to a process exit code.
 */

import { existsSync, statSync } from 'fs';
import { randomUUID } from 'crypto';
import { resolve } from 'path';
import { isAudioFile } from '../shared/audio.js';
import type { NotificationKind, TextDelivery } from '../shared/types.js';
import type { ErrorHandler } from '../main/ErrorHandler.js';
import { errorMessage } from '../main/errors.js';
import { ClipboardService, PrintOnlyDelivery } from '../main/output/ClipboardService.js';
import { NotificationService } from '../main/output/NotificationService.js';
import { TranscriptionPipeline } from '../main/pipeline/TranscriptionPipeline.js';
import type { HotscribeSettings } from '../main/settings/SettingsManager.js';
import { AuthError, TranscriptionError } from '../main/transcription/errors.js';
import { createTranscriptionBackend } from '../main/transcription/index.js';
import type { TranscriptionBackend } from '../main/transcription/types.js';

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;

export interface TranscribeFileOptions {
  /** Copy (and paste, per settings) the text; off prints only */
  deliver: boolean;
}

export interface TranscribeFileDeps {
  backend?: TranscriptionBackend;
  delivery?: TextDelivery;
  notifications?: NotificationService;
}

export interface TranscribeFileResult {
  exitCode: number;
  /** Transcript, '' when no speech was detected */
  text: string | null;
  /** Last notification raised for the run */
  message: string | null;
  kind: NotificationKind | null;
}

/**
 * Rejected credentials are the user's to fix; every other failure of a
 * started run is a system error.
 */
export function exitCodeFor(error: TranscriptionError): number {
  return error instanceof AuthError ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
}

export async function transcribeFile(
  filePath: string,
  settings: HotscribeSettings,
  errorHandler: ErrorHandler,
  options: TranscribeFileOptions,
  deps: TranscribeFileDeps = {}
): Promise<TranscribeFileResult> {
  const audioPath = resolve(filePath);
  const result: TranscribeFileResult = { exitCode: EXIT_SUCCESS, text: null, message: null, kind: null };

  if (!existsSync(audioPath)) {
    return { ...result, exitCode: EXIT_USER_ERROR, message: `File not found: ${audioPath}`, kind: 'error' };
  }
  if (!isAudioFile(audioPath)) {
    return { ...result, exitCode: EXIT_USER_ERROR, message: `Not an audio file: ${audioPath}`, kind: 'error' };
  }

  const backend = deps.backend ?? createTranscriptionBackend(settings.backend, errorHandler.scoped('Backend'));
  try {
    await backend.prepare();
  } catch (error) {
    // Missing credential or whisper binary: configuration the user must fix
    return { ...result, exitCode: EXIT_USER_ERROR, message: errorMessage(error), kind: 'error' };
  }

  const notifications =
    deps.notifications ??
    new NotificationService({ enabled: settings.notifications }, errorHandler.scoped('Notifications'));
  const delivery =
    deps.delivery ??
    (options.deliver
      ? new ClipboardService(
          { autoPaste: false, pasteDelayMs: 0, encoding: settings.textEncoding },
          errorHandler.scoped('Clipboard')
        )
      : new PrintOnlyDelivery(settings.textEncoding));

  const pipeline = new TranscriptionPipeline(backend, delivery, notifications, errorHandler.scoped('Pipeline'), {
    timeoutMs: settings.transcriptionTimeoutMs,
  });

  const failure: { error: TranscriptionError | null } = { error: null };
  const unsubscribers = [
    pipeline.onStateChange((state) => {
      if (state.status === 'error') failure.error = state.error;
    }),
    pipeline.onTranscript((text) => {
      result.text = text;
    }),
    notifications.onNotify((message, kind) => {
      result.message = message;
      result.kind = kind;
    }),
  ];

  try {
    pipeline.submit({
      id: randomUUID(),
      path: audioPath,
      createdAt: Date.now(),
      source: 'file',
      sizeBytes: statSync(audioPath).size,
    });
    await pipeline.drain();
  } finally {
    for (const unsubscribe of unsubscribers) unsubscribe();
  }

  if (failure.error) {
    return { ...result, exitCode: exitCodeFor(failure.error) };
  }

  return { ...result, text: result.text ?? '' };
}
