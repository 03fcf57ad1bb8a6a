import { PipewrightError, ErrorSeverity } from './PipewrightError';

export interface CommandExecutionDetails {
  command: string;
  exitCode: number;
  stdout?: string;
  [key: string]: unknown;
}

export class CommandExecutionError extends PipewrightError {
  constructor(message: string, details: CommandExecutionDetails) {
    super(message, {
      code: 'COMMAND_EXECUTION_FAILED',
      severity: ErrorSeverity.Recoverable,
      details
    });
  }

  static create(command: string, exitCode: number, stdout?: string): CommandExecutionError {
    return new CommandExecutionError(
      `Command execution failed with exit code ${exitCode}: ${command}`,
      { command, exitCode, stdout }
    );
  }
}
