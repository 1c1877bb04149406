/**
 * OpenAI / Fireworks Backend Unit Tests
 *
 * fetch is injected; the audio file read is mocked.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { OpenAIBackend } from '../../../src/main/transcription/OpenAIBackend.js';
import { FireworksBackend } from '../../../src/main/transcription/FireworksBackend.js';
import { mimeTypeFor, type FetchLike } from '../../../src/main/transcription/RemoteTranscriptionBackend.js';
import {
  AuthError,
  BackendUnavailable,
  MalformedResponse,
  NetworkError,
  TimeoutError,
} from '../../../src/main/transcription/errors.js';
import type { FireworksBackendConfig, OpenAIBackendConfig, TranscriptionResult } from '../../../src/main/transcription/types.js';
import { createTestLogger, errnoError } from '../../helpers.js';

const { mockReadFile } = vi.hoisted(() => ({
  mockReadFile: vi.fn(),
}));

vi.mock('fs/promises', () => ({
  readFile: mockReadFile,
}));

const AUDIO = Buffer.from('RIFFtest');

function openAIConfig(overrides: Partial<OpenAIBackendConfig> = {}): OpenAIBackendConfig {
  return {
    kind: 'openai',
    apiKey: 'test-secret',
    model: 'whisper-1',
    baseUrl: 'https://api.example.test/v1/',
    language: 'auto',
    ...overrides,
  };
}

function fireworksConfig(overrides: Partial<FireworksBackendConfig> = {}): FireworksBackendConfig {
  return {
    kind: 'fireworks',
    apiKey: 'test-secret',
    model: 'whisper-v3-turbo',
    baseUrl: 'https://audio.example.test/v1',
    language: 'auto',
    vadModel: 'silero',
    ...overrides,
  };
}

function respond(body: string, status = 200): Mock<FetchLike> {
  return vi.fn<FetchLike>(() => Promise.resolve(new Response(body, { status })));
}

function sentRequest(fetchMock: Mock<FetchLike>): { url: string; init: RequestInit; form: FormData } {
  expect(fetchMock).toHaveBeenCalledTimes(1);
  const [url, init] = fetchMock.mock.calls[0];
  const form = init.body;
  if (!(form instanceof FormData)) {
    throw new Error('expected a multipart body');
  }
  return { url, init, form };
}

function expectFailure(result: TranscriptionResult) {
  if (result.ok) {
    throw new Error(`expected a failure, got text "${result.text}"`);
  }
  return result.error;
}

describe('OpenAIBackend', () => {
  const logger = createTestLogger();

  beforeEach(() => {
    mockReadFile.mockReset();
    mockReadFile.mockResolvedValue(AUDIO);
  });

  it('describes itself with the model', () => {
    expect(new OpenAIBackend(openAIConfig(), logger).describe()).toBe('OpenAI (whisper-1)');
  });

  // --------------------------------------------------------------------------
  // Request
  // --------------------------------------------------------------------------

  describe('request', () => {
    it('posts a multipart form to the transcription endpoint', async () => {
      const fetchMock = respond(JSON.stringify({ text: 'hello' }));
      const controller = new AbortController();

      await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/memo.wav', {
        signal: controller.signal,
      });

      const { url, init, form } = sentRequest(fetchMock);
      expect(url).toBe('https://api.example.test/v1/audio/transcriptions');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({ Authorization: 'Bearer test-secret' });
      expect(init.signal).toBe(controller.signal);
      expect(form.get('model')).toBe('whisper-1');
      expect(form.get('response_format')).toBe('json');
      expect(form.has('language')).toBe(false);
      expect(mockReadFile).toHaveBeenCalledWith('/tmp/memo.wav');
    });

    it('attaches the audio with its mime type', async () => {
      const fetchMock = respond(JSON.stringify({ text: 'hello' }));

      await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/memo.m4a');

      const file = sentRequest(fetchMock).form.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) {
        expect(file.type).toBe('audio/mp4');
        expect(file.size).toBe(AUDIO.length);
      }
    });

    it('sends an explicit language', async () => {
      const fetchMock = respond(JSON.stringify({ text: 'hallo' }));

      await new OpenAIBackend(openAIConfig({ language: 'de' }), logger, fetchMock).transcribe('/tmp/memo.wav');

      expect(sentRequest(fetchMock).form.get('language')).toBe('de');
    });

    it('trims the key before using it', async () => {
      const fetchMock = respond(JSON.stringify({ text: 'hello' }));

      await new OpenAIBackend(openAIConfig({ apiKey: '  test-secret \n' }), logger, fetchMock).transcribe('/tmp/a.wav');

      expect(sentRequest(fetchMock).init.headers).toEqual({ Authorization: 'Bearer test-secret' });
    });
  });

  // --------------------------------------------------------------------------
  // Success
  // --------------------------------------------------------------------------

  it('returns the trimmed text', async () => {
    const fetchMock = respond(JSON.stringify({ text: '  hello world \n' }));

    const result = await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/memo.wav');

    expect(result).toEqual({ ok: true, text: 'hello world' });
  });

  // --------------------------------------------------------------------------
  // Credentials
  // --------------------------------------------------------------------------

  describe('credentials', () => {
    it('prepare rejects a missing key', async () => {
      const backend = new OpenAIBackend(openAIConfig({ apiKey: '' }), logger);

      await expect(backend.prepare()).rejects.toThrow(BackendUnavailable);
      await expect(backend.prepare()).rejects.toThrow('OPENAI_API_KEY is not set; OpenAI transcription cannot run');
    });

    it('prepare accepts a configured key', async () => {
      await expect(new OpenAIBackend(openAIConfig(), logger).prepare()).resolves.toBeUndefined();
    });

    it('fails with an auth error without calling the API', async () => {
      const fetchMock = respond('{}');

      const result = await new OpenAIBackend(openAIConfig({ apiKey: '   ' }), logger, fetchMock).transcribe('/tmp/a.wav');

      const error = expectFailure(result);
      expect(error).toBeInstanceOf(AuthError);
      expect(error.message).toBe('OPENAI_API_KEY is not set');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  // --------------------------------------------------------------------------
  // Failures
  // --------------------------------------------------------------------------

  describe('failures', () => {
    it.each([
      [401, AuthError],
      [403, AuthError],
      [408, TimeoutError],
      [429, NetworkError],
      [500, NetworkError],
      [503, NetworkError],
      [400, BackendUnavailable],
      [404, BackendUnavailable],
    ])('maps HTTP %i to %o', async (status, ErrorClass) => {
      const fetchMock = respond(JSON.stringify({ error: { message: 'provider said no' } }), status);

      const result = await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav');

      const error = expectFailure(result);
      expect(error).toBeInstanceOf(ErrorClass);
      expect(error.message).toBe(`OpenAI transcription failed (${status}): provider said no`);
    });

    it('reads a plain string error', async () => {
      const fetchMock = respond(JSON.stringify({ error: 'quota exceeded' }), 429);

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error.message).toBe('OpenAI transcription failed (429): quota exceeded');
    });

    it('truncates a long non-JSON error body', async () => {
      const fetchMock = respond('x'.repeat(300), 502);

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error.message).toBe(`OpenAI transcription failed (502): ${'x'.repeat(220)}...`);
    });

    it('falls back to the status for an empty error body', async () => {
      const fetchMock = respond('', 500);

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error.message).toBe('OpenAI transcription failed (500): HTTP 500');
    });

    it('reports a non-JSON success body as malformed', async () => {
      const fetchMock = respond('<html>gateway</html>');

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(MalformedResponse);
      expect(error.message).toBe('OpenAI returned a non-JSON body');
    });

    it('reports a body without text as malformed', async () => {
      const fetchMock = respond(JSON.stringify({ transcript: 'hello' }));

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(MalformedResponse);
      expect(error.message).toBe('OpenAI response has no text field');
    });

    it('maps a transport failure to a network error', async () => {
      const fetchMock = vi.fn<FetchLike>(() => Promise.reject(new TypeError('fetch failed')));

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(NetworkError);
      expect(error.label).toBe('Network error');
    });

    it('maps an aborted request to a timeout', async () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';
      const fetchMock = vi.fn<FetchLike>(() => Promise.reject(abort));

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

      expect(error).toBeInstanceOf(TimeoutError);
    });

    it('reports an unreadable audio file', async () => {
      mockReadFile.mockRejectedValue(errnoError('ENOENT', 'no such file'));
      const fetchMock = respond('{}');

      const error = expectFailure(await new OpenAIBackend(openAIConfig(), logger, fetchMock).transcribe('/tmp/gone.wav'));

      expect(error).toBeInstanceOf(BackendUnavailable);
      expect(error.message).toBe('Cannot read audio file /tmp/gone.wav: no such file');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});

describe('FireworksBackend', () => {
  const logger = createTestLogger();

  beforeEach(() => {
    mockReadFile.mockReset();
    mockReadFile.mockResolvedValue(AUDIO);
  });

  it('describes itself with the model', () => {
    expect(new FireworksBackend(fireworksConfig(), logger).describe()).toBe('Fireworks (whisper-v3-turbo)');
  });

  it('sends the model, temperature and VAD fields', async () => {
    const fetchMock = respond(JSON.stringify({ text: 'hello' }));

    const result = await new FireworksBackend(fireworksConfig(), logger, fetchMock).transcribe('/tmp/memo.ogg');

    const { url, form } = sentRequest(fetchMock);
    expect(url).toBe('https://audio.example.test/v1/audio/transcriptions');
    expect(form.get('model')).toBe('whisper-v3-turbo');
    expect(form.get('temperature')).toBe('0');
    expect(form.get('vad_model')).toBe('silero');
    expect(form.has('response_format')).toBe(false);
    expect(result).toEqual({ ok: true, text: 'hello' });
  });

  it('names its own credential', async () => {
    await expect(new FireworksBackend(fireworksConfig({ apiKey: '' }), logger).prepare()).rejects.toThrow(
      'FIREWORKS_API_KEY is not set; Fireworks transcription cannot run'
    );
  });

  it('labels provider errors with its name', async () => {
    const fetchMock = respond(JSON.stringify({ error: 'invalid api key' }), 401);

    const error = expectFailure(await new FireworksBackend(fireworksConfig(), logger, fetchMock).transcribe('/tmp/a.wav'));

    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe('Fireworks transcription failed (401): invalid api key');
  });
});

describe('mimeTypeFor', () => {
  it.each([
    ['/a/b.wav', 'audio/wav'],
    ['/a/b.M4A', 'audio/mp4'],
    ['/a/b.mp3', 'audio/mpeg'],
    ['/a/b.flac', 'audio/flac'],
    ['/a/b.bin', 'application/octet-stream'],
  ])('%s is %s', (path, type) => {
    expect(mimeTypeFor(path)).toBe(type);
  });
});
