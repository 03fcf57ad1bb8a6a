import { PipewrightError, ErrorSeverity } from './PipewrightError';

/**
 * Configuration-related errors (invalid values in a config file, bad environment overrides)
 */
export class ConfigurationError extends PipewrightError {
  constructor(message: string, filePath?: string) {
    super(message, {
      code: 'INVALID_CONFIG',
      severity: ErrorSeverity.Fatal,
      details: filePath ? { filePath } : undefined
    });
  }
}
