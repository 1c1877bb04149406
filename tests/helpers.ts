/**
 * Shared test utilities
 */

import { vi, type Mock } from 'vitest';
import type { Logger } from '../src/main/ErrorHandler.js';
import type { DeliveryReport, Notifier, Recording, TextDelivery } from '../src/shared/types.js';
import type { TranscriptionBackend, TranscriptionResult } from '../src/main/transcription/types.js';

export interface MockLogger extends Logger {
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
}

export function createTestLogger(): MockLogger {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

export interface MockNotifier extends Notifier {
  notify: Mock<Notifier['notify']>;
}

export function createMockNotifier(): MockNotifier {
  return { notify: vi.fn<Notifier['notify']>() };
}

export interface MockDelivery extends TextDelivery {
  deliver: Mock<TextDelivery['deliver']>;
}

export function createMockDelivery(report: Partial<DeliveryReport> = {}): MockDelivery {
  return {
    deliver: vi.fn<TextDelivery['deliver']>((text) =>
      Promise.resolve({ copied: true, pasted: true, text, ...report })
    ),
  };
}

export interface StubBackend extends TranscriptionBackend {
  prepare: Mock<TranscriptionBackend['prepare']>;
  transcribe: Mock<TranscriptionBackend['transcribe']>;
}

/**
 * Backend answering `hello world` unless given another implementation
 */
export function createStubBackend(
  transcribe: TranscriptionBackend['transcribe'] = () => Promise.resolve({ ok: true, text: 'hello world' })
): StubBackend {
  return {
    kind: 'local',
    describe: () => 'stub backend',
    prepare: vi.fn<TranscriptionBackend['prepare']>(() => Promise.resolve()),
    transcribe: vi.fn<TranscriptionBackend['transcribe']>(transcribe),
  };
}

export function createRecording(overrides: Partial<Recording> = {}): Recording {
  return {
    id: overrides.id ?? `rec-${Math.random().toString(36).slice(2)}`,
    path: '/tmp/recordings/recording_20240105_090307.wav',
    createdAt: 1_700_000_000_000,
    source: 'hotkey',
    sizeBytes: 32000,
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * A backend call that settles only when the test says so, capturing the
 * signal it was given.
 */
export function createControlledBackend(): {
  backend: StubBackend;
  calls: Array<{ path: string; signal?: AbortSignal; result: Deferred<TranscriptionResult> }>;
} {
  const calls: Array<{ path: string; signal?: AbortSignal; result: Deferred<TranscriptionResult> }> = [];
  const backend = createStubBackend((path, options) => {
    const result = deferred<TranscriptionResult>();
    calls.push({ path, signal: options?.signal, result });
    return result.promise;
  });
  return { backend, calls };
}

/**
 * Flush all pending promises
 */
export async function flushPromises(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

export function errnoError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}
