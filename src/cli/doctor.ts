/**
 * doctor.ts - Environment health check for hotscribe
 *
 * Checks what the configured setup needs:
 * - Node.js version compatibility
 * - ffmpeg (required for recording and audio conversion)
 * - whisper.cpp binary and model (local backend only)
 * - API credentials (cloud backends only)
 * - Recordings and watch directories
 */

import { access, constants } from 'fs/promises';
import { platform } from 'os';
import type { HotscribeSettings } from '../main/settings/SettingsManager.js';
import { ModelDownloadManager } from '../main/transcription/ModelDownloadManager.js';
import type { LocalBackendConfig, WhisperModel } from '../main/transcription/types.js';
import { execQuiet } from '../main/utils/exec.js';
import type { Logger } from '../main/ErrorHandler.js';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface ModelCatalog {
  isModelDownloaded(model: WhisperModel): boolean;
  getDownloadedModels(): WhisperModel[];
  getModelsDirectory(): string;
}

export interface DoctorDeps {
  exec?: (command: string, args: string[]) => Promise<string | null>;
  models?: ModelCatalog;
  nodeVersion?: string;
  /** Resolves when the directory exists and is writable */
  checkWritable?: (dir: string) => Promise<void>;
}

export const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a semver string into [major, minor, patch].
 */
function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

function installHint(tool: string): string {
  const os = platform();
  return os === 'darwin'
    ? `brew install ${tool}`
    : os === 'win32'
      ? `winget install ${tool}`
      : `apt install ${tool} (or your package manager)`;
}

const writable = (dir: string): Promise<void> => access(dir, constants.W_OK);

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string): DoctorCheck {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `hotscribe requires Node.js >= ${MIN_NODE_MAJOR}`,
    };
  }

  if (parsed[0] >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR})` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `hotscribe requires Node.js >= ${MIN_NODE_MAJOR}. Upgrade at https://nodejs.org`,
  };
}

async function checkFfmpeg(exec: NonNullable<DoctorDeps['exec']>): Promise<DoctorCheck> {
  const stdout = await exec('ffmpeg', ['-version']);

  if (stdout === null) {
    return {
      name: 'ffmpeg',
      status: 'fail',
      message: 'Not found on PATH',
      hint: `Install via: ${installHint('ffmpeg')}`,
    };
  }

  // First line looks like "ffmpeg version 6.1.1 ..."
  const versionMatch = stdout.match(/ffmpeg version (\S+)/);
  return { name: 'ffmpeg', status: 'pass', message: `Installed (${versionMatch ? versionMatch[1] : 'unknown'})` };
}

async function checkWhisperBinary(
  config: LocalBackendConfig,
  exec: NonNullable<DoctorDeps['exec']>
): Promise<DoctorCheck> {
  const stdout = await exec(config.whisperBin, ['--help']);

  if (stdout === null) {
    return {
      name: 'whisper.cpp',
      status: 'fail',
      message: `${config.whisperBin} not found or not runnable`,
      hint: `Install via: ${installHint('whisper-cpp')}, or point WHISPER_BIN at the binary`,
    };
  }

  return { name: 'whisper.cpp', status: 'pass', message: `${config.whisperBin} runs` };
}

function checkWhisperModel(config: LocalBackendConfig, models: ModelCatalog): DoctorCheck {
  if (models.isModelDownloaded(config.model)) {
    return {
      name: 'Whisper model',
      status: 'pass',
      message: `${config.model} found in ${models.getModelsDirectory()}`,
    };
  }

  const present = models.getDownloadedModels();
  return {
    name: 'Whisper model',
    status: 'warn',
    message:
      present.length > 0
        ? `${config.model} not downloaded (have: ${present.join(', ')})`
        : `${config.model} not downloaded`,
    hint: `It downloads on first use, or run: hotscribe models download ${config.model}`,
  };
}

function checkCredentials(settings: HotscribeSettings): DoctorCheck {
  const { backend } = settings;

  if (backend.kind === 'local') {
    return { name: 'Credentials', status: 'pass', message: 'Not needed for the local backend' };
  }

  const variable = backend.kind === 'openai' ? 'OPENAI_API_KEY' : 'FIREWORKS_API_KEY';
  if (!backend.apiKey.trim()) {
    return {
      name: 'Credentials',
      status: 'fail',
      message: `${variable} not set`,
      hint: `TRANSCRIPTION_MODEL=${backend.kind} needs ${variable} in .env or the environment`,
    };
  }

  return { name: 'Credentials', status: 'pass', message: `${variable} is set` };
}

async function checkDirectory(
  name: string,
  dir: string,
  check: (dir: string) => Promise<void>
): Promise<DoctorCheck> {
  try {
    await check(dir);
    return { name, status: 'pass', message: dir };
  } catch {
    return { name, status: 'warn', message: `${dir} is missing or not writable`, hint: 'Created on start when possible' };
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks for the given settings.
 */
export async function runDoctorChecks(
  settings: HotscribeSettings,
  logger: Logger,
  deps: DoctorDeps = {}
): Promise<DoctorResult> {
  const exec = deps.exec ?? execQuiet;
  const checkWritable = deps.checkWritable ?? writable;

  const pending: Array<DoctorCheck | Promise<DoctorCheck>> = [
    checkNodeVersion(deps.nodeVersion ?? process.version),
    checkFfmpeg(exec),
  ];

  if (settings.backend.kind === 'local') {
    const models = deps.models ?? new ModelDownloadManager(settings.backend.modelsDir, logger);
    pending.push(checkWhisperBinary(settings.backend, exec), checkWhisperModel(settings.backend, models));
  }

  pending.push(checkCredentials(settings), checkDirectory('Recordings directory', settings.recordingsDir, checkWritable));
  if (settings.watchEnabled && settings.watchDir !== settings.recordingsDir) {
    pending.push(checkDirectory('Watch directory', settings.watchDir, checkWritable));
  }

  const checks = await Promise.all(pending);

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
