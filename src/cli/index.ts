#!/usr/bin/env node
/**
 * hotscribe CLI - Hotkey and folder-watch dictation from the terminal
 *
 * Usage:
 *   hotscribe [run] [--no-watch] [--no-hotkeys]
 *   hotscribe transcribe <file> [--no-deliver]
 *   hotscribe cleanup
 *   hotscribe models [download <size> | delete <size>]
 *   hotscribe doctor
 *
 * Global options: --env-file <path>, --verbose
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { HotscribeApp } from '../main/HotscribeApp.js';
import { errorHandler } from '../main/ErrorHandler.js';
import { ConfigError, errorMessage } from '../main/errors.js';
import { RecordingJanitor } from '../main/housekeeping/RecordingJanitor.js';
import { formatHotkeyForDisplay, HOTKEYS } from '../shared/hotkeys.js';
import { loadSettings, type HotscribeSettings } from '../main/settings/SettingsManager.js';
import { ModelDownloadManager } from '../main/transcription/ModelDownloadManager.js';
import { WHISPER_MODELS, type WhisperModel } from '../main/transcription/types.js';
import { runDoctorChecks } from './doctor.js';
import { banner, fail, formatMegabytes, formatStatusLine, step, success, warn, SYMBOLS } from './output.js';
import { EXIT_SUCCESS, EXIT_SYSTEM_ERROR, EXIT_USER_ERROR, transcribeFile } from './transcribeFile.js';

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    const parsed = packageSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    return '0.0.0-dev';
  }
}

const VERSION = readVersion();

interface GlobalOptions {
  envFile?: string;
  verbose?: boolean;
}

// ============================================================================
// Bootstrap
// ============================================================================

/**
 * Load settings and start logging. Invalid configuration exits 1.
 */
async function bootstrap(globals: GlobalOptions): Promise<HotscribeSettings> {
  let settings: HotscribeSettings;
  try {
    settings = loadSettings({ envFile: globals.envFile });
  } catch (error) {
    if (error instanceof ConfigError) {
      fail('Invalid configuration:');
      for (const issue of error.issues) {
        console.log(`    ${SYMBOLS.bullet} ${issue}`);
      }
      process.exit(EXIT_USER_ERROR);
    }
    throw error;
  }

  await errorHandler.initialize({
    logDir: settings.logDir,
    level: globals.verbose ? 'debug' : settings.logLevel,
    consoleLevel: globals.verbose ? 'debug' : 'warn',
  });
  errorHandler.installProcessHandlers();

  return settings;
}

async function exit(code: number): Promise<never> {
  await errorHandler.destroy();
  process.exit(code);
}

function parseModel(value: string): WhisperModel {
  const model = WHISPER_MODELS.find((candidate) => candidate === value);
  if (!model) {
    fail(`Unknown model "${value}". Available: ${WHISPER_MODELS.join(', ')}`);
    process.exit(EXIT_USER_ERROR);
  }
  return model;
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('hotscribe')
  .description('Record with a hotkey or drop audio in a folder; get the transcript pasted at your cursor')
  .version(VERSION, '-v, --version')
  .option('--env-file <path>', 'Path to the .env file (default: ./.env)')
  .option('--verbose', 'Verbose output', false)
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// run command
// ============================================================================

program
  .command('run', { isDefault: true })
  .description('Start the dictation daemon (hotkeys, folder watch, housekeeping)')
  .option('--no-watch', 'Do not watch the recordings folder')
  .option('--no-hotkeys', 'Do not listen for global hotkeys')
  .action(async (options: { watch: boolean; hotkeys: boolean }) => {
    banner(VERSION);
    const settings = await bootstrap(program.opts<GlobalOptions>());
    const app = new HotscribeApp(settings);

    app.on('status', (status, previous) => {
      const line = formatStatusLine(status, previous);
      if (line) console.log(`  ${line}`);
    });
    app.notifications.onNotify((message, kind) => {
      if (kind === 'error') fail(message);
    });
    app.on('transcript', (text) => {
      console.log(`  ${SYMBOLS.arrow} ${text}`);
    });

    const shutdown = () => {
      console.log('\n  Stopping...');
      // Completion is reported through the 'shutdown' event below
      app.shutdown().catch((error: unknown) => {
        fail(`Shutdown failed: ${errorMessage(error)}`);
        return exit(EXIT_SYSTEM_ERROR);
      });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    app.on('shutdown', () => {
      void exit(EXIT_SUCCESS);
    });

    try {
      await app.start({ watch: options.watch, hotkeys: options.hotkeys });
    } catch (error) {
      fail(errorMessage(error));
      await exit(EXIT_USER_ERROR);
    }

    step(`Backend:    ${app.describeBackend()}`);
    step(`Recordings: ${settings.recordingsDir}`);
    if (options.watch && settings.watchEnabled) {
      step(`Watching:   ${settings.watchDir}`);
    }
    if (options.hotkeys) {
      for (const hotkey of HOTKEYS) {
        step(`${`${hotkey.label}:`.padEnd(18)}${formatHotkeyForDisplay(settings.hotkeys[hotkey.id])}`);
      }
    }
    console.log();
    success('Ready');
  });

// ============================================================================
// transcribe command
// ============================================================================

program
  .command('transcribe')
  .description('Transcribe one audio file and print the text')
  .argument('<file>', 'Audio file to transcribe')
  .option('--no-deliver', 'Print only; do not copy to the clipboard')
  .action(async (file: string, options: { deliver: boolean }) => {
    const settings = await bootstrap(program.opts<GlobalOptions>());

    const result = await transcribeFile(file, settings, errorHandler, { deliver: options.deliver });

    if (result.exitCode !== EXIT_SUCCESS) {
      fail(result.message ?? 'Transcription failed');
    } else if (result.text) {
      console.log(result.text);
    } else {
      warn(result.message ?? 'No speech detected');
    }

    await exit(result.exitCode);
  });

// ============================================================================
// cleanup command
// ============================================================================

program
  .command('cleanup')
  .description('Delete recordings older than MAX_RECORDING_AGE_DAYS now')
  .action(async () => {
    const settings = await bootstrap(program.opts<GlobalOptions>());

    if (!settings.deleteRecordings) {
      warn('DELETE_RECORDINGS is off; nothing deleted');
      await exit(EXIT_SUCCESS);
    }

    const janitor = new RecordingJanitor(
      { directory: settings.recordingsDir, enabled: true, retentionDays: settings.maxRecordingAgeDays },
      errorHandler.scoped('Housekeeping')
    );
    try {
      const result = await janitor.sweep();
      success(`Scanned ${result.scanned}, deleted ${result.deleted}, failed ${result.failed}`);
      await exit(result.failed > 0 ? EXIT_SYSTEM_ERROR : EXIT_SUCCESS);
    } catch (error) {
      fail(`Cleanup failed: ${errorMessage(error)}`);
      await exit(EXIT_SYSTEM_ERROR);
    }
  });

// ============================================================================
// models command group
// ============================================================================

const modelsCmd = program
  .command('models')
  .description('List whisper.cpp models and which are downloaded')
  .action(async () => {
    const settings = await bootstrap(program.opts<GlobalOptions>());
    const manager = modelManager(settings);

    step(`Models directory: ${manager.getModelsDirectory()}`);
    console.log();
    for (const info of manager.getAvailableModels()) {
      const mark = manager.isModelDownloaded(info.name) ? SYMBOLS.check : ' ';
      console.log(`  ${mark} ${info.name.padEnd(16)} ${String(info.sizeMB).padStart(5)} MB`);
    }
    console.log();
  });

modelsCmd
  .command('download')
  .description('Download one whisper.cpp model')
  .argument('<size>', `Model (${WHISPER_MODELS.join(', ')})`)
  .action(async (size: string) => {
    const model = parseModel(size);
    const settings = await bootstrap(program.opts<GlobalOptions>());
    const manager = modelManager(settings);

    if (manager.isModelDownloaded(model)) {
      success(`${model} is already downloaded`);
      await exit(EXIT_SUCCESS);
    }

    step(`Downloading ${model} (${manager.getModelInfo(model).sizeMB} MB) to ${manager.getModelsDirectory()}`);
    const controller = new AbortController();
    process.on('SIGINT', () => controller.abort());

    try {
      const path = await manager.downloadModel(model, {
        signal: controller.signal,
        onProgress: (progress) => {
          process.stdout.write(
            `\r  ${SYMBOLS.arrow} ${Math.round(progress.percent)}% of ${formatMegabytes(progress.totalBytes)}   `
          );
        },
      });
      console.log();
      success(`Saved ${path}`);
      await exit(EXIT_SUCCESS);
    } catch (error) {
      console.log();
      fail(errorMessage(error));
      await exit(EXIT_SYSTEM_ERROR);
    }
  });

modelsCmd
  .command('delete')
  .description('Delete one downloaded whisper.cpp model')
  .argument('<size>', `Model (${WHISPER_MODELS.join(', ')})`)
  .action(async (size: string) => {
    const model = parseModel(size);
    const settings = await bootstrap(program.opts<GlobalOptions>());
    const manager = modelManager(settings);
    const { filename, sizeMB } = manager.getModelInfo(model);

    try {
      if (manager.deleteModel(model)) {
        success(`Deleted ${filename} (${sizeMB} MB)`);
      } else {
        warn(`${model} is not downloaded`);
      }
      await exit(EXIT_SUCCESS);
    } catch (error) {
      fail(`Could not delete ${filename}: ${errorMessage(error)}`);
      await exit(EXIT_SYSTEM_ERROR);
    }
  });

function modelManager(settings: HotscribeSettings): ModelDownloadManager {
  return new ModelDownloadManager(settings.modelsDir, errorHandler.scoped('Models'));
}

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check the environment for everything hotscribe needs')
  .action(async () => {
    banner(VERSION);
    const settings = await bootstrap(program.opts<GlobalOptions>());
    const result = await runDoctorChecks(settings, errorHandler.scoped('Doctor'));

    for (const check of result.checks) {
      const line = `${check.name}: ${check.message}`;
      if (check.status === 'pass') success(line);
      else if (check.status === 'warn') warn(line);
      else fail(line);
      if (check.hint && check.status !== 'pass') {
        console.log(`      ${check.hint}`);
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warnings, ${result.failed} failed`);
    await exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  });

program.parseAsync().catch((error: unknown) => {
  fail(errorMessage(error));
  process.exit(EXIT_SYSTEM_ERROR);
});
