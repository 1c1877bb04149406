/**
 * HotkeyManager - Global Hotkey Listening for hotscribe
 *
 * Handles:
 * - A system-wide key listener that works whichever app is focused
 * - Matching key-down events against the configured bindings
 * - Dispatching actions to subscribers without letting a failing
 *   subscriber break the listener
 *
 * Default hotkeys:
 * - F9: Toggle recording
 * - Ctrl+Shift+F9: Reset the transcription pipeline
 * - Escape: Exit
 */

import { GlobalKeyboardListener } from 'node-global-key-listener';
import type { HotkeyAction, HotkeyConfig } from '../shared/types.js';
import { matchesHotkey, parseHotkey, type KeyEvent, type KeysDown, type ParsedHotkey } from '../shared/hotkeys.js';
import type { Logger } from './ErrorHandler.js';
import { errorMessage } from './errors.js';

export type HotkeyCallback = (action: HotkeyAction) => Promise<void> | void;

export type KeyHandler = (event: KeyEvent, down: KeysDown) => boolean;

/**
 * The subset of GlobalKeyboardListener the manager drives
 */
export interface KeyboardListener {
  addListener(listener: KeyHandler): Promise<void>;
  removeListener(listener: KeyHandler): void;
  kill(): void;
}

const ACTIONS: HotkeyAction[] = ['toggleRecording', 'resetPipeline', 'exit'];

export class HotkeyManager {
  private readonly bindings: Array<{ action: HotkeyAction; hotkey: ParsedHotkey }>;
  private readonly callbacks = new Set<HotkeyCallback>();
  private readonly handler: KeyHandler;
  private listener: KeyboardListener | null = null;

  constructor(
    private readonly config: HotkeyConfig,
    private readonly logger: Logger,
    private readonly createListener: () => KeyboardListener = () => new GlobalKeyboardListener()
  ) {
    this.bindings = ACTIONS.map((action) => ({ action, hotkey: parseHotkey(config[action]) }));

    this.handler = (event, down) => {
      this.onKeyEvent(event, down);
      // Never swallow keys; other apps still see them
      return false;
    };
  }

  getConfig(): HotkeyConfig {
    return { ...this.config };
  }

  isListening(): boolean {
    return this.listener !== null;
  }

  /**
   * Subscribe to hotkey actions. Returns an unsubscribe function.
   */
  onHotkey(callback: HotkeyCallback): () => void {
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  async start(): Promise<void> {
    if (this.listener) {
      return;
    }

    const listener = this.createListener();
    await listener.addListener(this.handler);
    this.listener = listener;

    this.logger.info('Hotkey listener started', { data: { ...this.config } });
  }

  stop(): void {
    if (!this.listener) {
      return;
    }

    this.listener.removeListener(this.handler);
    this.listener.kill();
    this.listener = null;

    this.logger.info('Hotkey listener stopped');
  }

  private onKeyEvent(event: KeyEvent, down: KeysDown): void {
    const binding = this.bindings.find(({ hotkey }) => matchesHotkey(hotkey, event, down));
    if (!binding) {
      return;
    }

    this.logger.debug('Hotkey pressed', { data: { action: binding.action, key: binding.hotkey.source } });

    for (const callback of this.callbacks) {
      this.invokeSafely(callback, binding.action);
    }
  }

  private invokeSafely(callback: HotkeyCallback, action: HotkeyAction): void {
    Promise.resolve()
      .then(() => callback(action))
      .catch((error: unknown) => {
        this.logger.error('Hotkey callback failed', {
          operation: action,
          error: errorMessage(error),
        });
      });
  }
}
