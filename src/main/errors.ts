/**
 * Error classes for the non-transcription failure paths.
 *
 * Transcription failures have their own taxonomy in
 * `transcription/errors.ts`; everything here is caught close to where it
 * happens and never propagates out of the pipeline.
 */

export type ErrorCategory =
  | 'capture'
  | 'transcription'
  | 'delivery'
  | 'housekeeping'
  | 'config'
  | 'unknown';

export class HotscribeError extends Error {
  public readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HotscribeError';
    this.category = category;
  }
}

/**
 * Audio device or recorder process failure. Aborts the current recording only.
 */
export class CaptureError extends HotscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'capture', options);
    this.name = 'CaptureError';
  }
}

/**
 * Clipboard, paste or notification failure. The transcript still counts
 * as produced.
 */
export class DeliveryError extends HotscribeError {
  public readonly stage: 'clipboard' | 'paste';

  constructor(message: string, stage: 'clipboard' | 'paste', options?: { cause?: unknown }) {
    super(message, 'delivery', options);
    this.name = 'DeliveryError';
    this.stage = stage;
  }
}

/**
 * A single recording could not be deleted.
 */
export class HousekeepingError extends HotscribeError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, 'housekeeping', options);
    this.name = 'HousekeepingError';
    this.filePath = filePath;
  }
}

/**
 * Invalid or incomplete configuration, reported once at startup.
 */
export class ConfigError extends HotscribeError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid hotscribe configuration:\n- ${issues.join('\n- ')}`, 'config');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The `code` of a Node system error ('ENOENT', 'EACCES', ...), if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
