import type { PerfController } from '../services/perf-controller.js';
import type { ShutdownReport } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface ShutdownOptions {
  /** Hard deadline for the whole shutdown, milliseconds. */
  timeout: number;
  drainTimeoutMs: number;
  forceExit: boolean;
  handleSignals: boolean;
  cleanupTasks: Array<() => Promise<void>>;
  exit: (code: number) => void;
}

export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private readonly options: ShutdownOptions;
  private readonly logger: Logger;

  constructor(
    private readonly controller: PerfController,
    logger: Logger,
    options: Partial<ShutdownOptions> = {}
  ) {
    this.logger = logger.child({ component: 'shutdown' });
    this.options = {
      timeout: 45000,
      drainTimeoutMs: 30000,
      forceExit: true,
      handleSignals: true,
      cleanupTasks: [],
      exit: (code) => process.exit(code),
      ...options,
    };

    if (this.options.handleSignals) {
      this.setupSignalHandlers();
    }
  }

  private setupSignalHandlers(): void {
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });

    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      this.logger.fatal({ err: error }, 'Uncaught exception');
      void this.shutdown('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.fatal({ err: reason }, 'Unhandled rejection');
      void this.shutdown('unhandledRejection', reason);
    });
  }

  /**
   * Cleanup tasks run in registration order after the controller has stopped.
   */
  addCleanupTask(task: () => Promise<void>): void {
    this.options.cleanupTasks.push(task);
  }

  /**
   * Stop the controller (drain, then cancel), run cleanup tasks and exit.
   * Only the first call does anything.
   */
  async shutdown(signal: string, error?: unknown): Promise<ShutdownReport | null> {
    if (this.isShuttingDown) {
      this.logger.info({ signal }, 'Shutdown already in progress, ignoring signal');
      return null;
    }

    this.isShuttingDown = true;
    this.logger.info({ signal }, 'Initiating graceful shutdown');

    this.shutdownTimeout = setTimeout(() => {
      this.logger.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    try {
      const report = await this.controller.stop(this.options.drainTimeoutMs);
      this.logger.info(
        {
          drained: report.drained,
          cancelledJobs: report.cancelledJobs,
          discardedJobs: report.discardedJobs,
        },
        'Controller stopped'
      );

      await this.executeCleanupTasks();

      this.clearTimeout();
      this.logger.info('Graceful shutdown completed');
      this.options.exit(error === undefined ? 0 : 1);
      return report;
    } catch (shutdownError) {
      this.logger.error({ err: shutdownError }, 'Error during graceful shutdown');
      this.clearTimeout();
      this.options.exit(1);
      return null;
    }
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private async executeCleanupTasks(): Promise<void> {
    const tasks = this.options.cleanupTasks;

    for (let i = 0; i < tasks.length; i++) {
      const task = tasks[i];
      if (!task) continue;
      try {
        await task();
      } catch (error) {
        // continue with the remaining tasks
        this.logger.error({ err: error, task: i + 1, total: tasks.length }, 'Cleanup task failed');
      }
    }
  }

  private clearTimeout(): void {
    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }
  }
}
