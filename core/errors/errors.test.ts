import { describe, it, expect } from 'vitest';
import {
  CommandExecutionError,
  ErrorSeverity,
  InterruptError,
  PipelineAbortError,
  PipewrightError,
  ScriptLoadError,
  UnknownCommandKindError,
  UnknownHostError,
  UnresolvedVariableError,
  isInterrupt,
  isPipelineAbort
} from './index';

describe('pipewright errors', () => {
  it('names the unknown command kind', () => {
    const error = new UnknownCommandKindError('docker');
    expect(error.message).toBe('Command type docker is not known.');
    expect(error.code).toBe('UNKNOWN_COMMAND_KIND');
    expect(error.severity).toBe(ErrorSeverity.Fatal);
    expect(error).toBeInstanceOf(PipewrightError);
  });

  it('lists the known systems for an unknown host', () => {
    const error = new UnknownHostError('db', ['web1', 'web2']);
    expect(error.message).toBe('System "db" is not defined in systems (known: web1, web2).');
    expect(error.hostName).toBe('db');
  });

  it('carries the missing variable and the available names', () => {
    const error = new UnresolvedVariableError('port', 'nc {host} {port}', ['host']);
    expect(error.variableName).toBe('port');
    expect(error.details).toEqual({ variableName: 'port', template: 'nc {host} {port}', availableVariables: ['host'] });
  });

  describe('PipelineAbortError', () => {
    it('keeps the exit code as text and parses the exit status', () => {
      const error = new PipelineAbortError('5');
      expect(error.exitCode).toBe('5');
      expect(error.exitStatus).toBe(5);
      expect(error.message).toBe('Pipeline aborted with exit code 5.');
    });

    it('falls back to exit status 1 for codes that are not positive integers', () => {
      expect(new PipelineAbortError('oops').exitStatus).toBe(1);
      expect(new PipelineAbortError('0').exitStatus).toBe(1);
    });

    it('is recognised by isPipelineAbort', () => {
      expect(isPipelineAbort(new PipelineAbortError('1'))).toBe(true);
      expect(isPipelineAbort(new Error('x'))).toBe(false);
    });
  });

  it('marks interrupts as recoverable', () => {
    const error = new InterruptError('sleep 10');
    expect(isInterrupt(error)).toBe(true);
    expect(error.severity).toBe(ErrorSeverity.Recoverable);
    expect(isInterrupt(new PipelineAbortError('130'))).toBe(false);
  });

  it('prefixes script load errors with the file', () => {
    const cause = new Error('ENOENT');
    const error = new ScriptLoadError('Cannot read script', 'deploy.yml', cause);
    expect(error.message).toBe('deploy.yml: Cannot read script');
    expect(error.cause).toBe(cause);
  });

  it('serializes code, severity and details', () => {
    const error = CommandExecutionError.create('ps axu', 255, 'ssh: no route');
    expect(error.toJSON()).toEqual({
      name: 'CommandExecutionError',
      message: 'Command execution failed with exit code 255: ps axu',
      code: 'COMMAND_EXECUTION_FAILED',
      severity: 'recoverable',
      details: { command: 'ps axu', exitCode: 255, stdout: 'ssh: no route' }
    });
    expect(error.toString()).toBe(
      '[COMMAND_EXECUTION_FAILED] Command execution failed with exit code 255: ps axu (Severity: recoverable)'
    );
  });
});
