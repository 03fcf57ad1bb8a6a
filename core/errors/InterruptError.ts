import { PipewrightError, ErrorSeverity } from './PipewrightError';

/** Exit code reported for any step interrupted by the operator. */
export const INTERRUPT_EXIT_CODE = 130;

/**
 * Raised when the operator interrupts (SIGINT) a running command or action.
 * Executors translate it to {@link INTERRUPT_EXIT_CODE}.
 */
export class InterruptError extends PipewrightError {
  constructor(what: string) {
    super(`Interrupted by user: ${what}`, {
      code: 'INTERRUPTED',
      severity: ErrorSeverity.Recoverable,
      details: { exitCode: INTERRUPT_EXIT_CODE }
    });
  }
}

export function isInterrupt(error: unknown): error is InterruptError {
  return error instanceof PipewrightError && error.code === 'INTERRUPTED';
}
