/**
 * ClipboardService - Copy transcripts to the clipboard and paste them
 *
 * Features:
 * - Sanitizes text for the configured target encoding
 * - Writes the clipboard through clipboardy
 * - Optionally simulates the platform paste chord at the focused window
 *   (osascript on macOS, PowerShell SendKeys on Windows, xdotool on Linux)
 */

import clipboardy from 'clipboardy';
import type { DeliveryReport, TextDelivery } from '../../shared/types.js';
import type { Logger } from '../ErrorHandler.js';
import { DeliveryError, errorMessage } from '../errors.js';
import { runCommand } from '../utils/exec.js';
import { sanitizeText, type TextEncodingTarget } from './textSanitizer.js';

// =============================================================================
// Types
// =============================================================================

export interface ClipboardAdapter {
  write(text: string): Promise<void>;
  read(): Promise<string>;
}

export interface ClipboardServiceOptions {
  autoPaste: boolean;
  pasteDelayMs: number;
  encoding: TextEncodingTarget;
}

export interface ClipboardServiceDeps {
  clipboard?: ClipboardAdapter;
  exec?: typeof runCommand;
  platform?: NodeJS.Platform;
}

export interface PasteCommand {
  command: string;
  args: string[];
}

const PASTE_TIMEOUT_MS = 4000;

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }
  await new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * The command that sends the paste shortcut to the focused window
 */
export function pasteCommandFor(platform: NodeJS.Platform): PasteCommand {
  switch (platform) {
    case 'darwin':
      return {
        command: 'osascript',
        args: ['-e', 'tell application "System Events" to keystroke "v" using command down'],
      };
    case 'win32':
      return {
        command: 'powershell',
        args: [
          '-NoProfile',
          '-NonInteractive',
          '-Command',
          "$wshell = New-Object -ComObject wscript.shell; $wshell.SendKeys('^v')",
        ],
      };
    default:
      return { command: 'xdotool', args: ['key', '--clearmodifiers', 'ctrl+v'] };
  }
}

// =============================================================================
// ClipboardService Implementation
// =============================================================================

export class ClipboardService implements TextDelivery {
  private readonly clipboard: ClipboardAdapter;
  private readonly exec: typeof runCommand;
  private readonly platform: NodeJS.Platform;

  constructor(
    private readonly options: ClipboardServiceOptions,
    private readonly logger: Logger,
    deps: ClipboardServiceDeps = {}
  ) {
    this.clipboard = deps.clipboard ?? clipboardy;
    this.exec = deps.exec ?? runCommand;
    this.platform = deps.platform ?? process.platform;
  }

  /**
   * Copy the transcript and, when enabled, paste it at the cursor.
   * Throws DeliveryError naming the stage that failed.
   */
  async deliver(text: string): Promise<DeliveryReport> {
    const clean = sanitizeText(text, this.options.encoding);

    try {
      await this.clipboard.write(clean);
    } catch (error) {
      throw new DeliveryError(`Failed to copy to clipboard: ${errorMessage(error)}`, 'clipboard', { cause: error });
    }
    this.logger.info(`Copied ${clean.length} characters`);

    if (!this.options.autoPaste) {
      return { copied: true, pasted: false, text: clean };
    }

    await sleep(this.options.pasteDelayMs);

    const { command, args } = pasteCommandFor(this.platform);
    try {
      await this.exec(command, args, { timeoutMs: PASTE_TIMEOUT_MS });
    } catch (error) {
      throw new DeliveryError(`Failed to paste with ${command}: ${errorMessage(error)}`, 'paste', { cause: error });
    }
    this.logger.debug('Paste chord sent', { data: { command } });

    return { copied: true, pasted: true, text: clean };
  }
}

/**
 * Delivery that only sanitizes, for runs where the caller prints the text
 */
export class PrintOnlyDelivery implements TextDelivery {
  constructor(private readonly encoding: TextEncodingTarget = 'utf8') {}

  async deliver(text: string): Promise<DeliveryReport> {
    return { copied: false, pasted: false, text: sanitizeText(text, this.encoding) };
  }
}
