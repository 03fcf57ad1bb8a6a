import { PipewrightError, ErrorSeverity, type BaseErrorDetails } from './PipewrightError';

/**
 * Represents details specific to variable resolution errors.
 */
export interface UnresolvedVariableErrorDetails extends BaseErrorDetails {
  variableName: string;
  template: string;
  availableVariables: string[];
}

/**
 * Error thrown when a template references a name that is neither a
 * variable nor a `const_` constant.
 */
export class UnresolvedVariableError extends PipewrightError {
  public readonly variableName: string;

  constructor(variableName: string, template: string, availableVariables: string[]) {
    super(`Variable "${variableName}" is not defined (in: ${template})`, {
      code: 'VARIABLE_NOT_FOUND',
      severity: ErrorSeverity.Fatal,
      details: { variableName, template, availableVariables } satisfies UnresolvedVariableErrorDetails
    });
    this.variableName = variableName;
  }
}
