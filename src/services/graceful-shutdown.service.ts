/**
 * Graceful Shutdown Service
 *
 * Handles application shutdown gracefully:
 * - Captures SIGTERM and SIGINT signals
 * - Stops accepting new uploads
 * - Waits for in-flight batches to finish, with timeout
 * - Closes the HTTP server
 */

import { logger } from './logger.service.js';

export interface ShutdownConfig {
  /** Timeout in milliseconds to wait for in-flight work */
  timeout: number;
  /** Force shutdown timeout in milliseconds (safety net) */
  forceTimeout: number;
  /** Callback to stop accepting new work */
  onShutdownStart?: () => void | Promise<void>;
  /** Callback resolving once in-flight work is done */
  onWaitForQueue?: () => Promise<void>;
  /** Callback before final exit */
  onBeforeExit?: () => void | Promise<void>;
  exit?: (code: number) => void;
}

export class GracefulShutdownService {
  private isShuttingDown = false;
  private shutdownConfig: ShutdownConfig;
  private shutdownTimeout?: NodeJS.Timeout;
  private forceShutdownTimeout?: NodeJS.Timeout;
  private exit: (code: number) => void;

  constructor(config: ShutdownConfig) {
    this.shutdownConfig = config;
    this.exit = config.exit ?? ((code) => process.exit(code));
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    // Handle SIGTERM (e.g., docker stop)
    process.on('SIGTERM', () => {
      void this.handleShutdown('SIGTERM');
    });

    // Handle SIGINT (e.g., Ctrl+C in terminal)
    process.on('SIGINT', () => {
      void this.handleShutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception', { error });
      void this.handleShutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled rejection', { error: reason });
      void this.handleShutdown('UNHANDLED_REJECTION', 1);
    });

    logger.debug('Shutdown handlers registered');
  }

  /**
   * Runs the shutdown sequence once; later calls are ignored
   */
  async handleShutdown(signal: string, exitCode = 0): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress', { signal });
      return;
    }

    this.isShuttingDown = true;
    this.setupForceShutdownTimeout(this.shutdownConfig.forceTimeout);

    logger.shutdownStarted({ signal });
    const startTime = Date.now();

    try {
      // Step 1: Stop accepting new work
      if (this.shutdownConfig.onShutdownStart) {
        await this.shutdownConfig.onShutdownStart();
      }

      // Step 2: Wait for in-flight batches with timeout
      const drained = await this.waitWithTimeout(
        this.shutdownConfig.onWaitForQueue,
        this.shutdownConfig.timeout
      );

      if (!drained) {
        logger.warn(`In-flight work not finished after ${this.formatDuration(this.shutdownConfig.timeout)}, proceeding with shutdown`);
      }

      // Step 3: Final cleanup
      if (this.shutdownConfig.onBeforeExit) {
        await this.shutdownConfig.onBeforeExit();
      }

      logger.shutdownCompleted({ duration: Date.now() - startTime });
      this.clearTimers();
      this.exit(exitCode);
    } catch (error) {
      logger.error('Error during graceful shutdown, forcing exit', { error });
      this.clearTimers();
      this.exit(1);
    }
  }

  /**
   * Waits for a callback with timeout
   * @returns false when the timeout expired or the callback failed
   */
  private async waitWithTimeout(
    callback?: () => Promise<void>,
    timeoutMs: number = 30000
  ): Promise<boolean> {
    if (!callback) {
      return true;
    }

    return new Promise((resolve) => {
      let completed = false;

      this.shutdownTimeout = setTimeout(() => {
        if (!completed) {
          completed = true;
          resolve(false);
        }
      }, timeoutMs);

      callback()
        .then(() => {
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(true);
          }
        })
        .catch((error: unknown) => {
          logger.error('Error waiting for in-flight work', { error });
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(false);
          }
        });
    });
  }

  /**
   * Sets up force shutdown timeout
   * If graceful shutdown takes too long, force exit
   */
  setupForceShutdownTimeout(timeoutMs: number = 60000): void {
    this.forceShutdownTimeout = setTimeout(() => {
      logger.error(`Force shutdown timeout (${this.formatDuration(timeoutMs)}) expired, exiting`);
      this.exit(1);
    }, timeoutMs);
    this.forceShutdownTimeout.unref();
  }

  private clearTimers(): void {
    clearTimeout(this.shutdownTimeout);
    clearTimeout(this.forceShutdownTimeout);
  }

  /**
   * Checks if shutdown is in progress
   */
  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }

  /**
   * Formats duration in milliseconds to human-readable string
   */
  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);

    if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
  }
}

/**
 * Creates a graceful shutdown service with default configuration
 */
export function createGracefulShutdown(customConfig?: Partial<ShutdownConfig>): GracefulShutdownService {
  const defaultConfig: ShutdownConfig = {
    timeout: 30000, // 30 seconds default
    forceTimeout: 60000, // 60 seconds default
    ...customConfig,
  };

  return new GracefulShutdownService(defaultConfig);
}
