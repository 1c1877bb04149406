/**
 * HotkeyManager Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GlobalKeyboardListener } from 'node-global-key-listener';
import { HotkeyManager, type KeyboardListener, type KeyHandler } from '../../src/main/HotkeyManager.js';
import { DEFAULT_HOTKEY_CONFIG, type KeysDown } from '../../src/shared/hotkeys.js';
import type { HotkeyAction } from '../../src/shared/types.js';
import { createTestLogger, flushPromises, type MockLogger } from '../helpers.js';

class FakeKeyboardListener implements KeyboardListener {
  handlers: KeyHandler[] = [];
  killed = false;

  addListener(listener: KeyHandler): Promise<void> {
    this.handlers.push(listener);
    return Promise.resolve();
  }

  removeListener(listener: KeyHandler): void {
    this.handlers = this.handlers.filter((handler) => handler !== listener);
  }

  kill(): void {
    this.killed = true;
  }

  /** Press a key with the given modifiers held; returns whether any handler swallowed it */
  press(key: 'F9' | 'ESCAPE' | 'A', modifiers: Array<'LEFT CTRL' | 'LEFT SHIFT'> = []): boolean {
    const down: KeysDown = {};
    down[key] = true;
    for (const modifier of modifiers) {
      down[modifier] = true;
    }
    return this.handlers.some((handler) => handler({ name: key, state: 'DOWN' }, down));
  }
}

describe('HotkeyManager', () => {
  let logger: MockLogger;
  let keyboard: FakeKeyboardListener;
  let manager: HotkeyManager;
  let actions: HotkeyAction[];

  beforeEach(() => {
    logger = createTestLogger();
    keyboard = new FakeKeyboardListener();
    manager = new HotkeyManager({ ...DEFAULT_HOTKEY_CONFIG }, logger, () => keyboard);
    actions = [];
    manager.onHotkey((action) => {
      actions.push(action);
    });
  });

  it('rejects an invalid binding up front', () => {
    expect(
      () => new HotkeyManager({ ...DEFAULT_HOTKEY_CONFIG, exit: 'Ctrl+Shift' }, logger, () => keyboard)
    ).toThrow('Hotkey missing a trigger key: Ctrl+Shift');
  });

  it('starts listening once', async () => {
    await manager.start();
    await manager.start();

    expect(manager.isListening()).toBe(true);
    expect(keyboard.handlers).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith('Hotkey listener started', {
      data: { toggleRecording: 'F9', resetPipeline: 'Ctrl+Shift+F9', exit: 'Escape' },
    });
  });

  it('dispatches each configured action', async () => {
    await manager.start();

    keyboard.press('F9');
    keyboard.press('F9', ['LEFT CTRL', 'LEFT SHIFT']);
    keyboard.press('ESCAPE');
    await flushPromises();

    expect(actions).toEqual(['toggleRecording', 'resetPipeline', 'exit']);
  });

  it('ignores unbound keys', async () => {
    await manager.start();

    keyboard.press('A');
    keyboard.press('F9', ['LEFT CTRL']);
    await flushPromises();

    expect(actions).toEqual([]);
  });

  it('never swallows key events', async () => {
    await manager.start();

    expect(keyboard.press('F9')).toBe(false);
  });

  it('keeps dispatching after a subscriber fails', async () => {
    manager.onHotkey(() => Promise.reject(new Error('recorder busy')));
    await manager.start();

    keyboard.press('F9');
    await flushPromises();
    keyboard.press('F9');
    await flushPromises();

    expect(actions).toEqual(['toggleRecording', 'toggleRecording']);
    expect(logger.error).toHaveBeenCalledWith('Hotkey callback failed', {
      operation: 'toggleRecording',
      error: 'recorder busy',
    });
  });

  it('also contains a subscriber that throws synchronously', async () => {
    manager.onHotkey(() => {
      throw new Error('boom');
    });
    await manager.start();

    keyboard.press('ESCAPE');
    await flushPromises();

    expect(actions).toEqual(['exit']);
    expect(logger.error).toHaveBeenCalledWith('Hotkey callback failed', { operation: 'exit', error: 'boom' });
  });

  it('stops calling an unsubscribed callback', async () => {
    const callback = vi.fn();
    const unsubscribe = manager.onHotkey(callback);
    await manager.start();

    unsubscribe();
    keyboard.press('F9');
    await flushPromises();

    expect(callback).not.toHaveBeenCalled();
  });

  it('releases the listener on stop', async () => {
    await manager.start();

    manager.stop();
    manager.stop();

    expect(keyboard.handlers).toEqual([]);
    expect(keyboard.killed).toBe(true);
    expect(manager.isListening()).toBe(false);
    expect(logger.info).toHaveBeenCalledTimes(2);
  });

  it('returns a copy of its bindings', () => {
    const config = manager.getConfig();
    config.toggleRecording = 'F10';

    expect(manager.getConfig().toggleRecording).toBe('F9');
  });

  it('uses the global keyboard listener by default', async () => {
    await new HotkeyManager(DEFAULT_HOTKEY_CONFIG, logger).start();

    expect(GlobalKeyboardListener).toHaveBeenCalledTimes(1);
  });
});
