/**
 * AudioRecorder - microphone capture to a WAV file using ffmpeg
 *
 * `start` spawns ffmpeg and resolves once the device is open; `stop`
 * sends SIGINT so ffmpeg finalizes the WAV header, force-killing the
 * process if it has not exited within the grace period.
 */

import { spawn, type ChildProcess } from 'child_process';
import type { Logger } from '../ErrorHandler.js';
import { CaptureError, errnoCode } from '../errors.js';
import { SAFE_CHILD_ENV } from '../utils/exec.js';

export interface AudioInput {
  /** ffmpeg input format: avfoundation, dshow, pulse, alsa ... */
  format: string;
  device: string;
}

export interface AudioRecorderOptions extends AudioInput {
  ffmpegPath?: string;
  sampleRate?: number;
  /** Time to wait after spawn before the device counts as open */
  startupDelayMs?: number;
  /** Time to wait after SIGINT before SIGKILL */
  stopTimeoutMs?: number;
}

const DEFAULT_SAMPLE_RATE = 16000;
const START_STABILITY_DELAY_MS = 300;
const STOP_TIMEOUT_MS = 5000;

/**
 * The platform's default capture input
 */
export function defaultAudioInput(platform: NodeJS.Platform = process.platform): AudioInput {
  switch (platform) {
    case 'darwin':
      return { format: 'avfoundation', device: ':default' };
    case 'win32':
      return { format: 'dshow', device: 'audio=default' };
    default:
      return { format: 'pulse', device: 'default' };
  }
}

const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant microphone access to your terminal and try again.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Unknown input format/i.test(detail)) {
    return 'Microphone input device is unavailable. Check AUDIO_INPUT_FORMAT and AUDIO_INPUT_DEVICE.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export class AudioRecorder {
  private process: ChildProcess | null = null;
  private outputPath: string | null = null;

  constructor(
    private readonly options: AudioRecorderOptions,
    private readonly logger: Logger
  ) {}

  isRecording(): boolean {
    return this.process !== null;
  }

  buildArgs(outputPath: string): string[] {
    return [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.format,
      '-i',
      this.options.device,
      '-ac',
      '1',
      '-ar',
      String(this.options.sampleRate ?? DEFAULT_SAMPLE_RATE),
      '-c:a',
      'pcm_s16le',
      '-y',
      outputPath,
    ];
  }

  /**
   * Start recording into `outputPath`. Rejects with CaptureError when
   * ffmpeg is missing or the device cannot be opened.
   */
  async start(outputPath: string): Promise<void> {
    if (this.process) {
      throw new CaptureError('Recorder is already active');
    }

    const ffmpegPath = this.options.ffmpegPath ?? 'ffmpeg';
    const startupDelayMs = this.options.startupDelayMs ?? START_STABILITY_DELAY_MS;
    const ffmpeg = spawn(ffmpegPath, this.buildArgs(outputPath), {
      env: SAFE_CHILD_ENV,
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let stderrLog = '';
    let settled = false;

    ffmpeg.stderr?.on('data', (chunk: Buffer) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.on('close', (code) => {
      if (this.process === ffmpeg) {
        this.process = null;
        this.logger.warn(`Recorder exited unexpectedly (code ${code})`, { error: stderrLog.trim() || undefined });
      }
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          this.logger.error('Recorder process error', { error: error.message });
          return;
        }
        settled = true;
        reject(
          errnoCode(error) === 'ENOENT'
            ? new CaptureError(`ffmpeg not found (${ffmpegPath}); install ffmpeg to record audio`, { cause: error })
            : new CaptureError(normalizeMicError(error.message), { cause: error })
        );
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }
          settled = true;

          if (ffmpeg.exitCode !== null) {
            reject(new CaptureError(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          this.outputPath = outputPath;
          resolve();
        }, startupDelayMs);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }
        settled = true;
        reject(new CaptureError(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.logger.info('Recorder started', {
      data: { format: this.options.format, device: this.options.device, outputPath },
    });
  }

  /**
   * Stop recording. Resolves once ffmpeg has exited.
   */
  async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      return;
    }
    this.process = null;

    if (current.exitCode !== null) {
      this.logger.debug('Recorder already exited');
      return;
    }

    const stopTimeoutMs = this.options.stopTimeoutMs ?? STOP_TIMEOUT_MS;

    await new Promise<void>((resolve) => {
      const forceKillTimeout = setTimeout(() => {
        this.logger.warn(`Force-killing recorder (${stopTimeoutMs}ms timeout exceeded)`);
        current.kill('SIGKILL');
      }, stopTimeoutMs);

      current.once('exit', (code) => {
        clearTimeout(forceKillTimeout);
        this.logger.info(`Recorder stopped (code ${code})`, { data: { outputPath: this.outputPath } });
        resolve();
      });

      // SIGINT tells ffmpeg to finalize the file cleanly
      current.kill('SIGINT');
    });
  }
}
