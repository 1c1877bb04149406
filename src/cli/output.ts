/**
 * Console output helpers for the hotscribe CLI
 */

import type { AppStatus } from '../shared/types.js';

export const SYMBOLS = {
  check: '✔', // checkmark
  cross: '✘', // cross
  arrow: '→', // right arrow
  bullet: '•', // bullet
  dot: '●', // recording dot
  pencil: '✎', // transcribing
  line: '─', // horizontal line
} as const;

export function banner(version: string): void {
  console.log();
  console.log(`  hotscribe v${version} ${SYMBOLS.bullet} dictation daemon`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

export function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

export function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

export function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

export function warn(message: string): void {
  console.log(`  ! ${message}`);
}

/**
 * The status line for a combined-status change, or null when the change
 * has nothing to show. Idle only reads as done after a transcription.
 */
export function formatStatusLine(status: AppStatus, previous: AppStatus): string | null {
  switch (status) {
    case 'recording':
      return `${SYMBOLS.dot} Recording`;
    case 'transcribing':
      return `${SYMBOLS.pencil} Transcribing`;
    case 'error':
      return `${SYMBOLS.cross} Error`;
    case 'idle':
      return previous === 'transcribing' ? `${SYMBOLS.check} Done` : null;
  }
}

/**
 * "12.3 MB"
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
