/**
 * Audio file recognition shared by the watcher and housekeeping.
 */

import { extname } from 'path';

export const AUDIO_EXTENSIONS: readonly string[] = [
  '.m4a',
  '.wav',
  '.mp3',
  '.ogg',
  '.webm',
  '.flac',
  '.mp4',
  '.mpeg',
  '.mpga',
];

export function isAudioFile(filename: string): boolean {
  return AUDIO_EXTENSIONS.includes(extname(filename).toLowerCase());
}
