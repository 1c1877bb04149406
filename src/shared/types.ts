/**
 * Shared Types for hotscribe
 *
 * Data model shared by the triggers (hotkey capture, folder watch), the
 * transcription pipeline and the delivery layer.
 */

// ============================================================================
// Recordings
// ============================================================================

/**
 * Which input path produced a recording
 */
export type RecordingSource = 'hotkey' | 'watch' | 'file';

/**
 * A captured audio artifact awaiting (or done with) transcription
 */
export interface Recording {
  id: string;
  /** Absolute path of a fully written audio file */
  path: string;
  /** Epoch milliseconds */
  createdAt: number;
  source: RecordingSource;
  sizeBytes: number;
  /** Wall-clock capture length, known only for hotkey recordings */
  durationMs?: number;
}

// ============================================================================
// Status
// ============================================================================

/**
 * Combined status shown to the user. `recording` belongs to the capture
 * controller, the others to the pipeline.
 */
export type AppStatus = 'idle' | 'recording' | 'transcribing' | 'error';

export type NotificationKind = 'info' | 'success' | 'error';

/**
 * Best-effort user notification sink. Implementations never throw.
 */
export interface Notifier {
  notify(message: string, kind: NotificationKind): void;
}

/**
 * Outcome of handing text to the clipboard / paste collaborator
 */
export interface DeliveryReport {
  copied: boolean;
  pasted: boolean;
  /** Text actually written after sanitizing */
  text: string;
}

export interface TextDelivery {
  deliver(text: string): Promise<DeliveryReport>;
}

// ============================================================================
// Hotkeys
// ============================================================================

export type HotkeyAction = 'toggleRecording' | 'resetPipeline' | 'exit';

export type HotkeyConfig = Record<HotkeyAction, string>;
