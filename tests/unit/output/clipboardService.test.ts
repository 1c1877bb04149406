/**
 * ClipboardService Unit Tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import clipboardy from 'clipboardy';
import {
  ClipboardService,
  PrintOnlyDelivery,
  pasteCommandFor,
  type ClipboardAdapter,
  type ClipboardServiceOptions,
} from '../../../src/main/output/ClipboardService.js';
import { DeliveryError } from '../../../src/main/errors.js';
import { CommandFailedError, type runCommand } from '../../../src/main/utils/exec.js';
import { createTestLogger, type MockLogger } from '../../helpers.js';

describe('ClipboardService', () => {
  let clipboard: { write: Mock<ClipboardAdapter['write']>; read: Mock<ClipboardAdapter['read']> };
  let exec: Mock<typeof runCommand>;
  let logger: MockLogger;

  beforeEach(() => {
    clipboard = {
      write: vi.fn<ClipboardAdapter['write']>(() => Promise.resolve()),
      read: vi.fn<ClipboardAdapter['read']>(() => Promise.resolve('')),
    };
    exec = vi.fn<typeof runCommand>(() => Promise.resolve({ stdout: '', stderr: '' }));
    logger = createTestLogger();
  });

  function createService(
    options: Partial<ClipboardServiceOptions> = {},
    platform: NodeJS.Platform = 'linux'
  ): ClipboardService {
    return new ClipboardService(
      { autoPaste: true, pasteDelayMs: 0, encoding: 'utf8', ...options },
      logger,
      { clipboard, exec, platform }
    );
  }

  // ==========================================================================
  // Copy
  // ==========================================================================

  describe('copy', () => {
    it('writes the sanitized text to the clipboard', async () => {
      const report = await createService({ autoPaste: false }).deliver('  hello\r\nworld  ');

      expect(clipboard.write).toHaveBeenCalledWith('hello\nworld');
      expect(report).toEqual({ copied: true, pasted: false, text: 'hello\nworld' });
      expect(exec).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith('Copied 11 characters');
    });

    it('applies the target encoding', async () => {
      const report = await createService({ autoPaste: false, encoding: 'ascii' }).deliver('café');

      expect(clipboard.write).toHaveBeenCalledWith('caf?');
      expect(report.text).toBe('caf?');
    });

    it('reports a clipboard failure as a delivery error', async () => {
      clipboard.write.mockRejectedValue(new Error('xsel not found'));

      const delivered = createService().deliver('hello');

      await expect(delivered).rejects.toThrow(DeliveryError);
      await expect(delivered).rejects.toMatchObject({
        stage: 'clipboard',
        message: 'Failed to copy to clipboard: xsel not found',
      });
      expect(exec).not.toHaveBeenCalled();
    });

    it('uses clipboardy by default', async () => {
      const service = new ClipboardService({ autoPaste: false, pasteDelayMs: 0, encoding: 'utf8' }, logger);

      await service.deliver('hello');

      expect(clipboardy.write).toHaveBeenCalledWith('hello');
    });
  });

  // ==========================================================================
  // Paste
  // ==========================================================================

  describe('paste', () => {
    it('sends the paste chord after copying', async () => {
      const report = await createService().deliver('hello');

      expect(exec).toHaveBeenCalledWith('xdotool', ['key', '--clearmodifiers', 'ctrl+v'], { timeoutMs: 4000 });
      expect(report).toEqual({ copied: true, pasted: true, text: 'hello' });
    });

    it('waits for the paste delay before pasting', async () => {
      vi.useFakeTimers();
      const delivered = createService({ pasteDelayMs: 80 }).deliver('hello');

      await vi.advanceTimersByTimeAsync(79);
      expect(clipboard.write).toHaveBeenCalled();
      expect(exec).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      await delivered;
      expect(exec).toHaveBeenCalledTimes(1);
    });

    it('uses osascript on macOS', async () => {
      await createService({}, 'darwin').deliver('hello');

      expect(exec.mock.calls[0][0]).toBe('osascript');
    });

    it('reports a paste failure as a delivery error', async () => {
      exec.mockRejectedValue(new CommandFailedError('xdotool', 'ENOENT', ''));

      const delivered = createService().deliver('hello');

      await expect(delivered).rejects.toMatchObject({
        stage: 'paste',
        message: 'Failed to paste with xdotool: xdotool failed (ENOENT)',
      });
      expect(clipboard.write).toHaveBeenCalledWith('hello');
    });
  });
});

describe('pasteCommandFor', () => {
  it('uses System Events on macOS', () => {
    expect(pasteCommandFor('darwin')).toEqual({
      command: 'osascript',
      args: ['-e', 'tell application "System Events" to keystroke "v" using command down'],
    });
  });

  it('uses SendKeys on Windows', () => {
    const { command, args } = pasteCommandFor('win32');

    expect(command).toBe('powershell');
    expect(args[args.length - 1]).toContain("SendKeys('^v')");
  });

  it('uses xdotool elsewhere', () => {
    expect(pasteCommandFor('freebsd')).toEqual({ command: 'xdotool', args: ['key', '--clearmodifiers', 'ctrl+v'] });
  });
});

describe('PrintOnlyDelivery', () => {
  it('sanitizes without copying', async () => {
    const report = await new PrintOnlyDelivery('latin1').deliver(' naïve ✓ ');

    expect(report).toEqual({ copied: false, pasted: false, text: 'naïve ?' });
    expect(clipboardy.write).not.toHaveBeenCalledWith('naïve ?');
  });
});
