import { PipewrightError, ErrorSeverity } from './PipewrightError';

export class ScriptLoadError extends PipewrightError {
  constructor(message: string, filePath?: string, cause?: unknown) {
    super(filePath ? `${filePath}: ${message}` : message, {
      code: 'SCRIPT_LOAD_FAILED',
      severity: ErrorSeverity.Fatal,
      details: filePath ? { filePath } : undefined,
      cause
    });
  }
}
