/**
 * ErrorHandler - Centralized Logging and Fault Handling for hotscribe
 *
 * Provides:
 * - Leveled logging to the console and a JSON-lines log file
 * - Buffered writes with periodic flush and size-based rotation
 * - Component-scoped loggers handed to every service
 * - Process-wide handlers that log stray faults instead of exiting
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { errnoCode, errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  component?: string;
  operation?: string;
  data?: Record<string, unknown>;
  error?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  operation?: string;
  data?: Record<string, unknown>;
  error?: string;
  stack?: string;
}

/**
 * Logger bound to one component. Services depend on this, not on the
 * handler itself.
 */
export interface Logger {
  debug(message: string, context?: Omit<LogContext, 'component'>): void;
  info(message: string, context?: Omit<LogContext, 'component'>): void;
  warn(message: string, context?: Omit<LogContext, 'component'>): void;
  error(message: string, context?: Omit<LogContext, 'component'>): void;
}

export interface ErrorHandlerOptions {
  logDir: string;
  /** Minimum level written to the log file */
  level: LogLevel;
  /** Minimum level echoed to the console */
  consoleLevel: LogLevel;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_FILENAME = 'hotscribe.log';
const MAX_LOG_SIZE_BYTES = 5 * 1024 * 1024; // 5MB
const FLUSH_INTERVAL_MS = 5000;
const MAX_PENDING_ENTRIES = 1000; // Oldest entries go first while no file is ready
const LOG_ROTATION_CHECK_INTERVAL_MS = 60000; // Check every minute

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

// ============================================================================
// ErrorHandler Class
// ============================================================================

export class ErrorHandler {
  private logPath: string | null = null;
  private level: LogLevel = 'info';
  private consoleLevel: LogLevel = 'warn';
  private logBuffer: string[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private rotationTimer: NodeJS.Timeout | null = null;
  private flushing: Promise<void> = Promise.resolve();
  private isInitialized = false;
  private processHandlersInstalled = false;

  /**
   * Prepare the log directory and start the flush/rotation timers.
   * Until this runs, entries are kept in memory and echoed to the console.
   */
  async initialize(options: ErrorHandlerOptions): Promise<void> {
    if (this.isInitialized) return;

    this.level = options.level;
    this.consoleLevel = options.consoleLevel;

    try {
      await fs.mkdir(options.logDir, { recursive: true });
      this.logPath = path.join(options.logDir, LOG_FILENAME);
    } catch (error) {
      console.error(`[hotscribe] Cannot create log directory ${options.logDir}: ${errorMessage(error)}`);
      this.logPath = null;
      this.logBuffer.length = 0;
    }

    this.flushTimer = setInterval(() => {
      void this.flushLogs();
    }, FLUSH_INTERVAL_MS);
    this.flushTimer.unref();

    this.rotationTimer = setInterval(() => {
      void this.checkLogRotation();
    }, LOG_ROTATION_CHECK_INTERVAL_MS);
    this.rotationTimer.unref();

    this.isInitialized = true;
    this.log('info', 'ErrorHandler initialized', {
      component: 'ErrorHandler',
      data: { logPath: this.logPath },
    });
  }

  // ==========================================================================
  // Logging
  // ==========================================================================

  /**
   * Log a message with context
   */
  log(level: LogLevel, message: string, context: LogContext = {}): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: context.component,
      operation: context.operation,
      data: context.data,
      error: context.error,
      stack: context.stack,
    };

    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.consoleLevel]) {
      const reset = '\x1b[0m';
      const prefix = `${COLORS[level]}[${level.toUpperCase()}]${reset}`;
      const componentStr = context.component ? ` [${context.component}]` : '';
      const detail = context.error ? ` (${context.error})` : '';
      console.error(`[hotscribe] ${prefix}${componentStr} ${message}${detail}`);
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    // Initialized without a log file: the console echo is all there is
    if (this.isInitialized && !this.logPath) {
      return;
    }

    this.logBuffer.push(JSON.stringify(entry));
    if (this.logBuffer.length > MAX_PENDING_ENTRIES) {
      this.logBuffer.splice(0, this.logBuffer.length - MAX_PENDING_ENTRIES);
    }

    // Flush immediately on error
    if (level === 'error') {
      void this.flushLogs();
    }
  }

  /**
   * Create a logger bound to one component
   */
  scoped(component: string): Logger {
    return {
      debug: (message, context) => this.log('debug', message, { ...context, component }),
      info: (message, context) => this.log('info', message, { ...context, component }),
      warn: (message, context) => this.log('warn', message, { ...context, component }),
      error: (message, context) => this.log('error', message, { ...context, component }),
    };
  }

  /**
   * Flush buffered logs to disk. Writes are serialized so lines never
   * interleave.
   */
  flushLogs(): Promise<void> {
    this.flushing = this.flushing.then(async () => {
      if (!this.logPath || this.logBuffer.length === 0) return;

      const logs = this.logBuffer.splice(0);
      try {
        await fs.appendFile(this.logPath, logs.join('\n') + '\n', 'utf-8');
      } catch (error) {
        // Log write failure - output to console only
        console.error(`[hotscribe] Failed to write logs: ${errorMessage(error)}`);
      }
    });
    return this.flushing;
  }

  /**
   * Get log file path for support
   */
  getLogPath(): string | null {
    return this.logPath;
  }

  /**
   * Entries waiting for the next flush
   */
  getPendingCount(): number {
    return this.logBuffer.length;
  }

  // ==========================================================================
  // Process-wide Faults
  // ==========================================================================

  /**
   * Log a fault that escaped every other handler. The process keeps
   * running so the listeners stay available for the next trigger.
   */
  handleUncaught(error: unknown, origin: string): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.log('error', 'Uncaught fault', {
      component: 'process',
      operation: origin,
      error: err.message,
      stack: err.stack,
    });
  }

  installProcessHandlers(): void {
    if (this.processHandlersInstalled) return;
    this.processHandlersInstalled = true;

    process.on('uncaughtException', (error) => {
      this.handleUncaught(error, 'uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      this.handleUncaught(reason, 'unhandledRejection');
    });
  }

  // ==========================================================================
  // Rotation
  // ==========================================================================

  /**
   * Move the log aside once it grows past the size limit
   */
  private async checkLogRotation(): Promise<void> {
    if (!this.logPath) return;

    try {
      const stats = await fs.stat(this.logPath);
      if (stats.size > MAX_LOG_SIZE_BYTES) {
        await this.flushing;
        await fs.rename(this.logPath, `${this.logPath}.old`);
        this.log('info', 'Log file rotated', { component: 'ErrorHandler' });
      }
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        console.error(`[hotscribe] Log rotation failed: ${errorMessage(error)}`);
      }
    }
  }

  // ==========================================================================
  // Cleanup
  // ==========================================================================

  /**
   * Clean up resources
   */
  async destroy(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.rotationTimer) {
      clearInterval(this.rotationTimer);
      this.rotationTimer = null;
    }

    // Final log flush
    await this.flushLogs();
    this.isInitialized = false;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const errorHandler = new ErrorHandler();
export default ErrorHandler;
