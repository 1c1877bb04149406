/**
 * SettingsManager - Environment-driven configuration for hotscribe
 *
 * Handles:
 * - Reading `.env` (dotenv) merged under the process environment
 * - Cleaning values the way people write them in .env files
 *   (inline `# comments`, surrounding quotes)
 * - Validating everything with one zod schema into an immutable snapshot
 *
 * The snapshot is built once at startup and never mutated.
 */

import { existsSync, readFileSync } from 'fs';
import { cpus, homedir } from 'os';
import { join, resolve } from 'path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { isValidHotkey, DEFAULT_HOTKEY_CONFIG } from '../../shared/hotkeys.js';
import type { HotkeyConfig } from '../../shared/types.js';
import { defaultAudioInput, type AudioInput } from '../capture/AudioRecorder.js';
import type { LogLevel } from '../ErrorHandler.js';
import { ConfigError } from '../errors.js';
import type { TextEncodingTarget } from '../output/textSanitizer.js';
import { FIREWORKS_DEFAULT_BASE_URL, FIREWORKS_DEFAULT_MODEL, FIREWORKS_DEFAULT_VAD_MODEL } from '../transcription/FireworksBackend.js';
import { OPENAI_DEFAULT_BASE_URL, OPENAI_DEFAULT_MODEL } from '../transcription/OpenAIBackend.js';
import { WHISPER_MODELS, type BackendConfig } from '../transcription/types.js';

// ============================================================================
// Types
// ============================================================================

export type RawEnvironment = Record<string, string | undefined>;

export interface HotscribeSettings {
  readonly backend: Readonly<BackendConfig>;
  /** whisper.cpp models directory, also used by `models` with a cloud backend */
  readonly modelsDir: string;
  readonly hotkeys: Readonly<HotkeyConfig>;
  readonly recordingsDir: string;
  readonly watchDir: string;
  readonly watchEnabled: boolean;
  readonly audioInput: Readonly<AudioInput>;
  readonly minRecordingMs: number;
  readonly transcriptionTimeoutMs: number;
  readonly autoPaste: boolean;
  readonly pasteDelayMs: number;
  readonly textEncoding: TextEncodingTarget;
  readonly notifications: boolean;
  readonly deleteRecordings: boolean;
  readonly maxRecordingAgeDays: number;
  readonly logDir: string;
  readonly logLevel: LogLevel;
}

/**
 * Machine facts the defaults depend on; overridable in tests
 */
export interface SettingsContext {
  homeDir: string;
  platform: NodeJS.Platform;
  cpuCount: number;
}

export interface LoadSettingsOptions {
  /** Path of the .env file; defaults to `.env` in the working directory */
  envFile?: string;
  env?: RawEnvironment;
  context?: Partial<SettingsContext>;
}

// ============================================================================
// Value Cleaning
// ============================================================================

const TRUE_VALUES = new Set(['true', 'yes', '1']);

/**
 * Drop an inline `#` comment, surrounding whitespace and quotes.
 * Blank values count as unset.
 */
export function cleanEnvValue(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  let cleaned = value;
  const hash = cleaned.indexOf('#');
  if (hash !== -1) {
    cleaned = cleaned.slice(0, hash);
  }
  cleaned = cleaned.trim().replace(/^(['"])(.*)\1$/, '$2').trim();

  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Expand a leading `~` to the home directory and resolve the result.
 */
export function expandHome(path: string, homeDir: string = homedir()): string {
  if (path === '~') {
    return homeDir;
  }
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homeDir, path.slice(2));
  }
  return resolve(path);
}

// ============================================================================
// Schema
// ============================================================================

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : TRUE_VALUES.has(value.toLowerCase())));

const integer = (fallback: number, min: number) =>
  z
    .string()
    .regex(/^-?\d+$/, 'Expected a whole number')
    .optional()
    .transform((value) => (value === undefined ? fallback : Number(value)))
    .pipe(z.number().int().min(min));

const lowercase = <U extends string, T extends [U, ...U[]]>(values: T, fallback: T[number]) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.toLowerCase()))
    .pipe(z.enum(values));

const hotkey = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => value ?? fallback)
    .refine(isValidHotkey, (value) => ({ message: `'${value}' is not a valid hotkey` }));

function createEnvSchema(context: SettingsContext) {
  const input = defaultAudioInput(context.platform);
  const defaultThreads = Math.max(1, Math.floor(context.cpuCount / 2));

  return z.object({
    TRANSCRIPTION_MODEL: lowercase(['local', 'openai', 'fireworks'], 'local'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default(OPENAI_DEFAULT_MODEL),
    OPENAI_BASE_URL: z.string().url().default(OPENAI_DEFAULT_BASE_URL),
    FIREWORKS_API_KEY: z.string().optional(),
    FIREWORKS_MODEL: z.string().default(FIREWORKS_DEFAULT_MODEL),
    FIREWORKS_BASE_URL: z.string().url().default(FIREWORKS_DEFAULT_BASE_URL),
    LOCAL_MODEL_PATH: z.string().default('~/.hotscribe/models'),
    DEFAULT_MODEL_SIZE: z.enum(WHISPER_MODELS).default('small.en'),
    WHISPER_BIN: z.string().default('whisper-cli'),
    USE_GPU: flag(false),
    WHISPER_THREADS: integer(defaultThreads, 1),
    TRANSCRIPTION_LANGUAGE: z.string().default('auto'),
    RECORDING_HOTKEY: hotkey(DEFAULT_HOTKEY_CONFIG.toggleRecording),
    RESET_HOTKEY: hotkey(DEFAULT_HOTKEY_CONFIG.resetPipeline),
    EXIT_HOTKEY: hotkey(DEFAULT_HOTKEY_CONFIG.exit),
    RECORDINGS_DIR: z.string().default('~/Documents/Sound Recordings'),
    WATCH_DIR: z.string().optional(),
    WATCH_ENABLED: flag(true),
    AUDIO_INPUT_FORMAT: z.string().default(input.format),
    AUDIO_INPUT_DEVICE: z.string().default(input.device),
    MIN_RECORDING_MS: integer(500, 0),
    TRANSCRIPTION_TIMEOUT_MS: integer(300_000, 1000),
    MODEL_DOWNLOAD_TIMEOUT_MS: integer(600_000, 1000),
    AUTO_PASTE: flag(true),
    PASTE_DELAY_MS: integer(80, 0),
    TEXT_ENCODING: lowercase(['utf8', 'latin1', 'ascii'], 'utf8'),
    NOTIFICATIONS: flag(true),
    DELETE_RECORDINGS: flag(true),
    MAX_RECORDING_AGE_DAYS: integer(7, 1),
    LOG_DIR: z.string().default('~/.hotscribe/logs'),
    LOG_LEVEL: lowercase(['debug', 'info', 'warn', 'error'], 'info'),
  });
}

type ParsedEnv = z.infer<ReturnType<typeof createEnvSchema>>;

function toBackendConfig(env: ParsedEnv, modelsDir: string): BackendConfig {
  switch (env.TRANSCRIPTION_MODEL) {
    case 'openai':
      return {
        kind: 'openai',
        apiKey: env.OPENAI_API_KEY ?? '',
        model: env.OPENAI_MODEL,
        baseUrl: env.OPENAI_BASE_URL,
        language: env.TRANSCRIPTION_LANGUAGE,
      };
    case 'fireworks':
      return {
        kind: 'fireworks',
        apiKey: env.FIREWORKS_API_KEY ?? '',
        model: env.FIREWORKS_MODEL,
        baseUrl: env.FIREWORKS_BASE_URL,
        language: env.TRANSCRIPTION_LANGUAGE,
        vadModel: FIREWORKS_DEFAULT_VAD_MODEL,
      };
    case 'local':
      return {
        kind: 'local',
        model: env.DEFAULT_MODEL_SIZE,
        modelsDir,
        whisperBin: env.WHISPER_BIN,
        useGpu: env.USE_GPU,
        threads: env.WHISPER_THREADS,
        language: env.TRANSCRIPTION_LANGUAGE,
        downloadTimeoutMs: env.MODEL_DOWNLOAD_TIMEOUT_MS,
      };
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a raw environment into settings. Pure: no file or process access.
 * Throws ConfigError listing every invalid variable.
 */
export function parseSettings(raw: RawEnvironment, context: Partial<SettingsContext> = {}): HotscribeSettings {
  const ctx: SettingsContext = {
    homeDir: context.homeDir ?? homedir(),
    platform: context.platform ?? process.platform,
    cpuCount: context.cpuCount ?? cpus().length,
  };

  const cleaned: RawEnvironment = {};
  for (const [key, value] of Object.entries(raw)) {
    cleaned[key] = cleanEnvValue(value);
  }

  const parsed = createEnvSchema(ctx).safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const env = parsed.data;
  const recordingsDir = expandHome(env.RECORDINGS_DIR, ctx.homeDir);
  const modelsDir = expandHome(env.LOCAL_MODEL_PATH, ctx.homeDir);

  return Object.freeze({
    backend: Object.freeze(toBackendConfig(env, modelsDir)),
    modelsDir,
    hotkeys: Object.freeze({
      toggleRecording: env.RECORDING_HOTKEY,
      resetPipeline: env.RESET_HOTKEY,
      exit: env.EXIT_HOTKEY,
    }),
    recordingsDir,
    watchDir: env.WATCH_DIR ? expandHome(env.WATCH_DIR, ctx.homeDir) : recordingsDir,
    watchEnabled: env.WATCH_ENABLED,
    audioInput: Object.freeze({ format: env.AUDIO_INPUT_FORMAT, device: env.AUDIO_INPUT_DEVICE }),
    minRecordingMs: env.MIN_RECORDING_MS,
    transcriptionTimeoutMs: env.TRANSCRIPTION_TIMEOUT_MS,
    autoPaste: env.AUTO_PASTE,
    pasteDelayMs: env.PASTE_DELAY_MS,
    textEncoding: env.TEXT_ENCODING,
    notifications: env.NOTIFICATIONS,
    deleteRecordings: env.DELETE_RECORDINGS,
    maxRecordingAgeDays: env.MAX_RECORDING_AGE_DAYS,
    logDir: expandHome(env.LOG_DIR, ctx.homeDir),
    logLevel: env.LOG_LEVEL,
  });
}

/**
 * The `.env` file's values with the process environment layered on top.
 * A missing default `.env` is fine; a missing explicit `--env-file` is not.
 */
export function readEnvironment(envFile?: string, env: RawEnvironment = process.env): RawEnvironment {
  const envPath = envFile ? resolve(envFile) : join(process.cwd(), '.env');

  if (!existsSync(envPath)) {
    if (envFile) {
      throw new ConfigError([`Env file not found: ${envPath}`]);
    }
    return { ...env };
  }

  return { ...parseDotenv(readFileSync(envPath)), ...env };
}

export function loadSettings(options: LoadSettingsOptions = {}): HotscribeSettings {
  return parseSettings(readEnvironment(options.envFile, options.env), options.context);
}
