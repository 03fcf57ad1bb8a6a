import { PipewrightError, ErrorSeverity } from './PipewrightError';

/**
 * Thrown when a step key names no known execution kind.
 * This is an authoring error in the pipeline, so it is never retried.
 */
export class UnknownCommandKindError extends PipewrightError {
  public readonly key: string;

  constructor(key: string) {
    super(`Command type ${key} is not known.`, {
      code: 'UNKNOWN_COMMAND_KIND',
      severity: ErrorSeverity.Fatal,
      details: { key }
    });
    this.key = key;
  }
}
