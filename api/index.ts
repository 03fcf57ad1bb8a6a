/**
 * pipewright API Entry Point
 *
 * Load and run pipeline scripts programmatically.
 */
/// <reference types="node" />
export * from '@core/errors';
export { ConfigLoader, resolveConfig, DEFAULT_CONFIG } from '@core/config/loader';
export type { PipewrightConfig, ResolvedConfig } from '@core/config/types';
export { ScriptLoader, parseScript } from '@core/pipeline/ScriptLoader';
export type {
  ExecutionContext,
  PipelineScript,
  StepEntry,
  StepKind,
  StepTarget,
  StepValue,
  StepRunOptions
} from '@core/types/pipeline';
export type { Prompter, PromptChoice } from '@core/types/prompt';
export type { ILogger } from '@core/utils/logger';
export type { ShellRunner, ShellRunResult, ShellRunOptions } from '@interpreter/env/ShellRunner';
export type { ActionEvaluator, ActionScope } from '@interpreter/env/ActionEvaluator';
export type { RemoteProcessDirectory, RemoteSignal } from '@interpreter/env/RemoteProcessDirectory';
export {
  createPipelineRunner,
  runPipeline,
  ExecutionController,
  PipelineRunner,
  formatOverview,
  createExecutionContext,
  Step,
  classifyStep,
  resolveStep,
  resolveTemplate,
  buildResolutionScope,
  buildCommand,
  type RuntimeDependencies,
  type PipelineRunOptions
} from '@interpreter/index';
