import chalk from 'chalk';
import { PipewrightError, isPipelineAbort } from '@core/errors';
import { cliLogger } from '@core/utils/logger';

export interface ErrorHandlerOptions {
  debug?: boolean;
}

type ErrorWriter = (line: string) => void;

/**
 * Print a failed run to stderr and choose the process exit status.
 */
export class ErrorHandler {
  constructor(private readonly write: ErrorWriter = line => console.error(line)) {}

  handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
    if (isPipelineAbort(error)) {
      // The failing step already reported itself
      cliLogger.debug(`Pipeline aborted with exit code ${error.exitCode}`);
      this.write(chalk.yellow(error.message));
      return error.exitStatus;
    }

    if (error instanceof PipewrightError) {
      this.handlePipewrightError(error, options);
    } else if (error instanceof Error) {
      this.handleGenericError(error, options);
    } else {
      this.handleUnknownError(error);
    }
    return 1;
  }

  private handlePipewrightError(error: PipewrightError, options: ErrorHandlerOptions): void {
    this.write(chalk.red(`Error [${error.code}]: `) + error.message);
    if (options.debug && error.details) {
      this.write(chalk.gray(JSON.stringify(error.details, null, 2)));
    }
    this.writeCause(error.cause);
  }

  private handleGenericError(error: Error, options: ErrorHandlerOptions): void {
    cliLogger.debug('An unexpected error occurred', { name: error.name });
    this.write(chalk.red('Error: ') + error.message);
    this.writeCause(error.cause);
    if (options.debug && error.stack) {
      this.write(chalk.gray(error.stack));
    }
  }

  private handleUnknownError(error: unknown): void {
    this.write(chalk.red(`Unknown Error: ${String(error)}`));
  }

  private writeCause(cause: unknown): void {
    if (cause instanceof Error) {
      this.write(chalk.red(`  Cause: ${cause.message}`));
    }
  }
}
