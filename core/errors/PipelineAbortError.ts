import { ErrorSeverity, PipewrightError } from './PipewrightError';

/** Exit code carried by an abort chosen at the manual gate. */
export const MANUAL_ABORT_CODE = '1';

/**
 * Pipeline-wide termination. Carries the exit code as a string, either
 * {@link MANUAL_ABORT_CODE} or the code of the step that failed.
 */
export class PipelineAbortError extends PipewrightError {
  public readonly exitCode: string;

  constructor(exitCode: string, message?: string) {
    const resolvedMessage = typeof message === 'string' && message.trim().length > 0
      ? message
      : `Pipeline aborted with exit code ${exitCode}.`;

    super(resolvedMessage, {
      code: 'PIPELINE_ABORT',
      severity: ErrorSeverity.Fatal,
      details: { exitCode }
    });

    this.exitCode = exitCode;
  }

  /**
   * Numeric process exit status for this abort. Codes that do not parse
   * to a positive integer fall back to 1.
   */
  get exitStatus(): number {
    const parsed = Number.parseInt(this.exitCode, 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : 1;
  }
}

export function isPipelineAbort(error: unknown): error is PipelineAbortError {
  if (!(error instanceof PipewrightError)) {
    return false;
  }
  return error.code === 'PIPELINE_ABORT';
}
