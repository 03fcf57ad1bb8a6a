/**
 * Central export point for pipewright error types.
 */
export { PipewrightError, ErrorSeverity, type BaseErrorDetails, type PipewrightErrorOptions } from './PipewrightError';
export { UnknownCommandKindError } from './UnknownCommandKindError';
export { UnknownHostError } from './UnknownHostError';
export { UnresolvedVariableError, type UnresolvedVariableErrorDetails } from './UnresolvedVariableError';
export { PipelineAbortError, MANUAL_ABORT_CODE, isPipelineAbort } from './PipelineAbortError';
export { InterruptError, INTERRUPT_EXIT_CODE, isInterrupt } from './InterruptError';
export { ScriptLoadError } from './ScriptLoadError';
export { ConfigurationError } from './ConfigurationError';
export { CommandExecutionError, type CommandExecutionDetails } from './CommandExecutionError';
