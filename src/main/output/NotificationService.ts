/**
 * NotificationService - best-effort desktop notifications
 *
 * Wraps node-notifier. Every call reaches the listeners and, when
 * enabled, the desktop; a failing notifier is logged, never thrown.
 */

import notifier from 'node-notifier';
import type { NotificationKind, Notifier } from '../../shared/types.js';
import type { Logger } from '../ErrorHandler.js';
import { errorMessage } from '../errors.js';

export interface ToastSender {
  notify(
    notification: { title: string; message: string; sound?: boolean; wait?: boolean },
    callback?: (error: Error | null, response: string) => void
  ): unknown;
}

export interface NotificationServiceOptions {
  enabled: boolean;
}

const TITLES: Record<NotificationKind, string> = {
  info: 'hotscribe',
  success: 'hotscribe ✔',
  error: 'hotscribe ✘',
};

export class NotificationService implements Notifier {
  private readonly listeners = new Set<(message: string, kind: NotificationKind) => void>();

  constructor(
    private readonly options: NotificationServiceOptions,
    private readonly logger: Logger,
    private readonly sender: ToastSender = notifier
  ) {}

  notify(message: string, kind: NotificationKind): void {
    this.logger.info(`Notify (${kind}): ${message}`);

    for (const listener of this.listeners) {
      try {
        listener(message, kind);
      } catch (error) {
        this.logger.warn('Notification listener failed', { error: errorMessage(error) });
      }
    }

    if (!this.options.enabled) {
      return;
    }

    try {
      this.sender.notify({ title: TITLES[kind], message, sound: kind === 'error', wait: false }, (error) => {
        if (error) {
          this.logger.warn('Desktop notification failed', { error: error.message });
        }
      });
    } catch (error) {
      this.logger.warn('Desktop notification failed', { error: errorMessage(error) });
    }
  }

  /**
   * Mirror notifications elsewhere, e.g. the terminal status line
   */
  onNotify(listener: (message: string, kind: NotificationKind) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
