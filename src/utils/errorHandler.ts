import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
        stack: error.stack,
      });

      // Operational errors end the command, not the process
      if (!error.isOperational) {
        process.exit(1);
      }
      process.exitCode = 1;
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  /**
   * Installs process-level handlers. The first SIGINT/SIGTERM calls `onInterrupt`
   * so a running batch can stop between records; a second one exits immediately.
   */
  static setupGlobalHandlers(onInterrupt?: () => boolean): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    const shutdown = ErrorHandler.createShutdownHandler(onInterrupt);
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  }

  /**
   * `onInterrupt` returns false when there is nothing to stop; the process then
   * exits on the first signal.
   */
  static createShutdownHandler(onInterrupt?: () => boolean): (signal: NodeJS.Signals) => void {
    let interrupted = false;
    return (signal) => {
      if (!interrupted && onInterrupt?.()) {
        interrupted = true;
        Logger.info(`${signal} received, stopping after the current record`);
        return;
      }
      Logger.info(`${signal} received, shutting down`);
      process.exit(0);
    };
  }
}
