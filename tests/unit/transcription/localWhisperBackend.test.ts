/**
 * LocalWhisperBackend Unit Tests
 *
 * whisper.cpp and ffmpeg are replaced by an injected exec; the model store
 * is a fake.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import {
  LocalWhisperBackend,
  normalizeWhisperOutput,
  type ModelStore,
} from '../../../src/main/transcription/LocalWhisperBackend.js';
import { BackendUnavailable, TimeoutError } from '../../../src/main/transcription/errors.js';
import type { LocalBackendConfig, TranscriptionResult, WhisperModel } from '../../../src/main/transcription/types.js';
import { CommandFailedError, type runCommand } from '../../../src/main/utils/exec.js';
import { createTestLogger, deferred, errnoError, type MockLogger } from '../../helpers.js';

const { mockUnlink } = vi.hoisted(() => ({
  mockUnlink: vi.fn(),
}));

vi.mock('fs/promises', () => ({
  unlink: mockUnlink,
}));

interface FakeModelStore extends ModelStore {
  isModelDownloaded: Mock<ModelStore['isModelDownloaded']>;
  getModelPath: Mock<ModelStore['getModelPath']>;
  downloadModel: Mock<ModelStore['downloadModel']>;
  getDownloadedModels: Mock<ModelStore['getDownloadedModels']>;
}

function createModelStore(downloaded: WhisperModel[] = ['small.en']): FakeModelStore {
  return {
    isModelDownloaded: vi.fn<ModelStore['isModelDownloaded']>((model) => downloaded.includes(model)),
    getModelPath: vi.fn<ModelStore['getModelPath']>((model) => `/models/ggml-${model}.bin`),
    downloadModel: vi.fn<ModelStore['downloadModel']>((model) => Promise.resolve(`/models/ggml-${model}.bin`)),
    getDownloadedModels: vi.fn<ModelStore['getDownloadedModels']>(() => [...downloaded]),
  };
}

function config(overrides: Partial<LocalBackendConfig> = {}): LocalBackendConfig {
  return {
    kind: 'local',
    model: 'small.en',
    modelsDir: '/models',
    whisperBin: 'whisper-cli',
    useGpu: false,
    threads: 4,
    language: 'auto',
    downloadTimeoutMs: 600000,
    ...overrides,
  };
}

function expectFailure(result: TranscriptionResult) {
  if (result.ok) {
    throw new Error(`expected a failure, got text "${result.text}"`);
  }
  return result.error;
}

describe('normalizeWhisperOutput', () => {
  it('joins segment lines with spaces', () => {
    expect(normalizeWhisperOutput(' Hello there.\n How are you?\n')).toBe('Hello there. How are you?');
  });

  it('drops blank-audio markers and empty lines', () => {
    expect(normalizeWhisperOutput('\r\n[BLANK_AUDIO]\r\n\r\n  ok  \r\n')).toBe('ok');
  });

  it('returns an empty string for silence', () => {
    expect(normalizeWhisperOutput('[BLANK_AUDIO]\n')).toBe('');
  });
});

describe('LocalWhisperBackend', () => {
  let exec: Mock<typeof runCommand>;
  let models: FakeModelStore;
  let logger: MockLogger;

  beforeEach(() => {
    mockUnlink.mockReset();
    mockUnlink.mockResolvedValue(undefined);
    exec = vi.fn<typeof runCommand>(() => Promise.resolve({ stdout: ' Hello there.\n', stderr: '' }));
    models = createModelStore();
    logger = createTestLogger();
  });

  function createBackend(overrides: Partial<LocalBackendConfig> = {}): LocalWhisperBackend {
    return new LocalWhisperBackend(config(overrides), logger, { models, exec });
  }

  it('describes the model and GPU use', () => {
    expect(createBackend().describe()).toBe('local whisper.cpp (small.en)');
    expect(createBackend({ useGpu: true, model: 'base' }).describe()).toBe('local whisper.cpp (base, GPU)');
  });

  // --------------------------------------------------------------------------
  // prepare
  // --------------------------------------------------------------------------

  describe('prepare', () => {
    it('runs the binary once to check it exists', async () => {
      await createBackend().prepare();

      expect(exec).toHaveBeenCalledWith('whisper-cli', ['--help']);
    });

    it('rejects when the binary is missing', async () => {
      exec.mockRejectedValue(new CommandFailedError('whisper-cli', 'ENOENT', ''));

      const prepared = createBackend().prepare();

      await expect(prepared).rejects.toThrow(BackendUnavailable);
      await expect(prepared).rejects.toThrow(
        'whisper.cpp binary "whisper-cli" not found; install whisper.cpp or set WHISPER_BIN'
      );
    });

    it('accepts a binary that exits non-zero on --help', async () => {
      exec.mockRejectedValue(new CommandFailedError('whisper-cli', 1, 'usage: ...'));

      await expect(createBackend().prepare()).resolves.toBeUndefined();
      expect(logger.debug).toHaveBeenCalledWith('whisper.cpp --help exited with an error', {
        error: 'whisper-cli failed (1): usage: ...',
      });
    });

    it('does not download the model', async () => {
      models = createModelStore([]);

      await createBackend().prepare();

      expect(models.downloadModel).not.toHaveBeenCalled();
    });
  });

  // --------------------------------------------------------------------------
  // transcribe
  // --------------------------------------------------------------------------

  describe('transcribe', () => {
    it('runs whisper.cpp on a WAV file and returns the text', async () => {
      exec.mockResolvedValue({ stdout: ' Hello there.\n[BLANK_AUDIO]\n How are you?\n', stderr: '' });

      const result = await createBackend().transcribe('/tmp/a.wav');

      expect(result).toEqual({ ok: true, text: 'Hello there. How are you?' });
      expect(exec).toHaveBeenCalledTimes(1);
      expect(exec).toHaveBeenCalledWith(
        'whisper-cli',
        ['-m', '/models/ggml-small.en.bin', '-f', '/tmp/a.wav', '-nt', '-np', '-ng', '-t', '4', '-l', 'auto'],
        { signal: undefined }
      );
      expect(mockUnlink).not.toHaveBeenCalled();
    });

    it('omits the GPU, thread and language flags when not wanted', async () => {
      await createBackend({ useGpu: true, threads: 0, language: '' }).transcribe('/tmp/a.WAV');

      expect(exec.mock.calls[0][1]).toEqual(['-m', '/models/ggml-small.en.bin', '-f', '/tmp/a.WAV', '-nt', '-np']);
    });

    it('passes the abort signal to the process', async () => {
      const controller = new AbortController();

      await createBackend().transcribe('/tmp/a.wav', { signal: controller.signal });

      expect(exec.mock.calls[0][2]).toEqual({ signal: controller.signal });
    });

    it('converts other formats to WAV first and removes the temporary file', async () => {
      const result = await createBackend().transcribe('/tmp/memo.m4a');

      expect(result).toEqual({ ok: true, text: 'Hello there.' });
      expect(exec).toHaveBeenCalledTimes(2);

      const [ffmpegCommand, ffmpegArgs] = exec.mock.calls[0];
      const convertedPath = ffmpegArgs[ffmpegArgs.length - 1];
      expect(ffmpegCommand).toBe('ffmpeg');
      expect(convertedPath).toMatch(/hotscribe-[0-9a-f-]+\.wav$/);
      expect(ffmpegArgs).toEqual([
        '-hide_banner',
        '-loglevel',
        'error',
        '-y',
        '-i',
        '/tmp/memo.m4a',
        '-ar',
        '16000',
        '-ac',
        '1',
        '-c:a',
        'pcm_s16le',
        convertedPath,
      ]);

      const whisperArgs = exec.mock.calls[1][1];
      expect(whisperArgs[whisperArgs.indexOf('-f') + 1]).toBe(convertedPath);
      expect(mockUnlink).toHaveBeenCalledWith(convertedPath);
    });

    it('reports a missing ffmpeg for non-WAV input', async () => {
      exec.mockRejectedValueOnce(new CommandFailedError('ffmpeg', 'ENOENT', ''));
      mockUnlink.mockRejectedValue(errnoError('ENOENT'));

      const error = expectFailure(await createBackend().transcribe('/tmp/memo.ogg'));

      expect(error).toBeInstanceOf(BackendUnavailable);
      expect(error.message).toBe('ffmpeg is required to convert non-WAV audio for local transcription');
      expect(exec).toHaveBeenCalledTimes(1);
    });

    it('reports an undecodable file', async () => {
      exec.mockRejectedValueOnce(new CommandFailedError('ffmpeg', 1, 'Invalid data found when processing input\n'));

      const error = expectFailure(await createBackend().transcribe('/tmp/memo.mp3'));

      expect(error.message).toBe(
        'Cannot decode /tmp/memo.mp3: ffmpeg failed (1): Invalid data found when processing input'
      );
    });

    it('reports a whisper.cpp failure', async () => {
      exec.mockRejectedValue(new CommandFailedError('whisper-cli', 1, 'loading...\nerror: failed to load model\n'));

      const error = expectFailure(await createBackend().transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(BackendUnavailable);
      expect(error.message).toBe('whisper.cpp failed: whisper-cli failed (1): error: failed to load model');
    });

    it('reports a missing binary at transcription time', async () => {
      exec.mockRejectedValue(new CommandFailedError('whisper-cli', 'ENOENT', ''));

      const error = expectFailure(await createBackend().transcribe('/tmp/a.wav'));

      expect(error.message).toBe('whisper.cpp binary "whisper-cli" not found');
    });

    it('reports an aborted process as a timeout', async () => {
      const abort = new Error('The operation was aborted');
      abort.name = 'AbortError';
      exec.mockRejectedValue(abort);

      const error = expectFailure(await createBackend().transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error.message).toBe('Local transcription aborted');
    });
  });

  // --------------------------------------------------------------------------
  // Model acquisition
  // --------------------------------------------------------------------------

  describe('model acquisition', () => {
    it('downloads a missing model on first use only', async () => {
      models = createModelStore([]);
      const backend = createBackend();

      await backend.transcribe('/tmp/a.wav');
      await backend.transcribe('/tmp/b.wav');

      expect(models.downloadModel).toHaveBeenCalledTimes(1);
      expect(models.downloadModel).toHaveBeenCalledWith('small.en', { signal: expect.any(AbortSignal) });
      expect(exec.mock.calls[1][1].slice(0, 2)).toEqual(['-m', '/models/ggml-small.en.bin']);
    });

    it('shares one download between concurrent calls', async () => {
      models = createModelStore([]);
      const download = deferred<string>();
      models.downloadModel.mockReturnValue(download.promise);
      const backend = createBackend();

      const first = backend.transcribe('/tmp/a.wav');
      const second = backend.transcribe('/tmp/b.wav');
      download.resolve('/models/ggml-small.en.bin');

      expect(await first).toEqual({ ok: true, text: 'Hello there.' });
      expect(await second).toEqual({ ok: true, text: 'Hello there.' });
      expect(models.downloadModel).toHaveBeenCalledTimes(1);
    });

    it('falls back to an already downloaded model', async () => {
      models = createModelStore(['base.en']);
      models.downloadModel.mockRejectedValue(new Error('network down'));

      const result = await createBackend().transcribe('/tmp/a.wav');

      expect(result.ok).toBe(true);
      expect(exec.mock.calls[0][1].slice(0, 2)).toEqual(['-m', '/models/ggml-base.en.bin']);
      expect(logger.warn).toHaveBeenCalledWith(
        'Model small.en unavailable (network down); using downloaded model base.en'
      );
    });

    it('fails when no model can be obtained', async () => {
      models = createModelStore([]);
      models.downloadModel.mockRejectedValue(new Error('network down'));

      const error = expectFailure(await createBackend().transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(BackendUnavailable);
      expect(error.message).toBe('Model small.en is not available: network down');
      expect(exec).not.toHaveBeenCalled();
    });

    it('gives up on a download that exceeds its timeout', async () => {
      vi.useFakeTimers();
      models = createModelStore([]);
      models.downloadModel.mockImplementation(
        (model, options) =>
          new Promise<string>((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () => reject(new Error(`Download cancelled: ${model}`)));
          })
      );

      const pending = createBackend({ downloadTimeoutMs: 2000 }).transcribe('/tmp/a.wav');
      await vi.advanceTimersByTimeAsync(2000);

      const error = expectFailure(await pending);
      expect(error.message).toBe('Model small.en is not available: download timed out after 2s');
    });

    it('stops waiting for the model when the call is aborted', async () => {
      models = createModelStore([]);
      models.downloadModel.mockReturnValue(deferred<string>().promise);
      const controller = new AbortController();

      const pending = createBackend({ downloadTimeoutMs: 50 }).transcribe('/tmp/a.wav', { signal: controller.signal });
      controller.abort();

      const error = expectFailure(await pending);
      expect(error).toBeInstanceOf(TimeoutError);
      expect(exec).not.toHaveBeenCalled();
    });
  });
});
