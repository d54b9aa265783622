/**
 * GracefulShutdown - Clean shutdown handling
 * Stops intake first, then lets registered handlers drain in order.
 */

import chalk from 'chalk';
import { getErrorMessage } from '../core/errors.js';
import { logger } from './Logger.js';

export type ShutdownHandler = () => Promise<void>;

export interface ShutdownOptions {
  exitCode?: number;
  /** Force exit after this time (ms) */
  forceAfter?: number;
}

const DEFAULT_OPTIONS: Required<ShutdownOptions> = {
  exitCode: 0,
  forceAfter: 15000,
};

export class GracefulShutdownManager {
  private handlers: Array<{ name: string; handler: ShutdownHandler }> = [];
  private isShuttingDown = false;

  constructor(private readonly exit: (code: number) => void = (code) => process.exit(code)) {}

  /**
   * Register a shutdown handler. Handlers run sequentially in registration order.
   */
  register(name: string, handler: ShutdownHandler): void {
    this.handlers.push({ name, handler });
  }

  unregister(name: string): void {
    this.handlers = this.handlers.filter((entry) => entry.name !== name);
  }

  /**
   * Route SIGINT/SIGTERM to shutdown(); a second signal forces exit
   */
  installSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    for (const signal of signals) {
      process.on(signal, () => {
        if (this.isShuttingDown) {
          logger.error('Force exit requested');
          this.exit(1);
          return;
        }

        logger.warn(`Received ${signal}, initiating graceful shutdown...`);
        void this.shutdown({ exitCode: signal === 'SIGTERM' ? 0 : 130 });
      });
    }

    process.on('unhandledRejection', (reason) => {
      console.error(chalk.red('\nUnhandled Rejection:'), reason);
      void this.shutdown({ exitCode: 1 });
    });
  }

  /**
   * Run every handler, then exit. A failing handler does not stop the rest.
   */
  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    const opts = { ...DEFAULT_OPTIONS, ...options };

    const forceExitTimer = setTimeout(() => {
      console.error(chalk.red('\nShutdown timeout exceeded, forcing exit'));
      this.exit(opts.exitCode);
    }, opts.forceAfter);
    forceExitTimer.unref();

    for (const { name, handler } of this.handlers) {
      try {
        logger.debug(`  Shutting down ${name}`);
        await handler();
      } catch (error) {
        logger.warn(`  ${name} failed to shut down: ${getErrorMessage(error)}`);
      }
    }

    clearTimeout(forceExitTimer);
    logger.success('Shutdown complete');
    this.exit(opts.exitCode);
  }

  isInProgress(): boolean {
    return this.isShuttingDown;
  }
}
