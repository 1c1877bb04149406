/**
 * Child process helpers shared by capture, the local backend, paste
 * simulation and the doctor command.
 */

import { execFile as execFileCb } from 'child_process';

/**
 * Safe child environment -- only expose PATH and essential vars.
 * The display variables are needed by xdotool on Linux.
 */
export const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
  SYSTEMROOT: process.env.SYSTEMROOT,
  DISPLAY: process.env.DISPLAY,
  WAYLAND_DISPLAY: process.env.WAYLAND_DISPLAY,
  XAUTHORITY: process.env.XAUTHORITY,
  XDG_RUNTIME_DIR: process.env.XDG_RUNTIME_DIR,
};

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export class CommandFailedError extends Error {
  /** 'ENOENT' when the binary is missing, the exit code otherwise */
  public readonly code: string | number | undefined;
  public readonly stderr: string;

  constructor(
    public readonly command: string,
    code: string | number | undefined,
    stderr: string,
    options?: { cause?: unknown }
  ) {
    const detail = stderr.trim().split('\n').slice(-1)[0] ?? '';
    super(`${command} failed (${code ?? 'unknown'})${detail ? `: ${detail}` : ''}`, options);
    this.name = 'CommandFailedError';
    this.code = code;
    this.stderr = stderr;
  }

  get notFound(): boolean {
    return this.code === 'ENOENT';
  }
}

/**
 * Run a command to completion. Rejects with CommandFailedError, or with
 * the AbortError raised when `signal` fires.
 */
export function runCommand(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    execFileCb(
      command,
      args,
      {
        env: SAFE_CHILD_ENV,
        signal: options.signal,
        timeout: options.timeoutMs,
        maxBuffer: 16 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout: stdout.toString(), stderr: stderr.toString() });
          return;
        }

        if (error.name === 'AbortError') {
          reject(error);
          return;
        }

        const code = typeof error.code === 'string' || typeof error.code === 'number' ? error.code : undefined;
        reject(new CommandFailedError(command, code, stderr.toString(), { cause: error }));
      }
    );
  });
}

/**
 * Execute a command and return trimmed stdout, or null on failure.
 */
export function execQuiet(command: string, args: string[]): Promise<string | null> {
  return runCommand(command, args).then(
    ({ stdout }) => stdout.trim(),
    () => null
  );
}
