/**
 * GracefulShutdown
 *
 * Closes the browser when the run is interrupted:
 * - Catches SIGINT and SIGTERM
 * - Runs cleanup handlers once, last registered first
 * - Exits with the conventional signal exit code
 */

import { Logger, getLogger } from '../logging';
import { errorMessage } from '../../domain/errors/AppErrors';

export type ShutdownHandler = () => Promise<void>;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

const SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

const SIGNAL_EXIT_CODES: Record<ShutdownSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Process surface used by the shutdown coordinator.
 */
export interface ProcessHooks {
  on(signal: ShutdownSignal, listener: () => void): void;
  off(signal: ShutdownSignal, listener: () => void): void;
  exit(code: number): void;
}

const nodeProcess: ProcessHooks = {
  on: (signal, listener) => {
    process.on(signal, listener);
  },
  off: (signal, listener) => {
    process.off(signal, listener);
  },
  exit: code => process.exit(code),
};

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private inProgress = false;
  private readonly listeners = new Map<ShutdownSignal, () => void>();
  private readonly logger: Logger;

  constructor(
    private readonly hooks: ProcessHooks = nodeProcess,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger('Shutdown');
  }

  /**
   * Register a cleanup handler to run during shutdown.
   */
  onShutdown(handler: ShutdownHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Install the signal listeners.
   */
  register(): void {
    if (this.listeners.size > 0) {
      return;
    }
    for (const signal of SIGNALS) {
      const listener = (): void => {
        this.logger.info(`Received ${signal} signal`);
        void this.shutdown(signal);
      };
      this.listeners.set(signal, listener);
      this.hooks.on(signal, listener);
    }
  }

  /**
   * Remove the signal listeners after a normal finish.
   */
  unregister(): void {
    for (const [signal, listener] of this.listeners) {
      this.hooks.off(signal, listener);
    }
    this.listeners.clear();
  }

  /**
   * Run cleanup handlers and exit.
   */
  async shutdown(signal: ShutdownSignal): Promise<void> {
    if (this.inProgress) {
      this.logger.warn('Shutdown already in progress');
      return;
    }
    this.inProgress = true;
    this.logger.info(`Starting graceful shutdown (reason: ${signal})`);

    for (const handler of [...this.handlers].reverse()) {
      try {
        await handler();
      } catch (error) {
        this.logger.error('Shutdown handler failed', { error: errorMessage(error) });
      }
    }

    this.hooks.exit(SIGNAL_EXIT_CODES[signal]);
  }
}
