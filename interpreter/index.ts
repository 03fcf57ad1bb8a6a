import type { ResolvedConfig } from '@core/config/types';
import type { ExecutionContext, PipelineScript } from '@core/types/pipeline';
import type { Prompter } from '@core/types/prompt';
import type { SignalSource } from '@core/utils/interrupt';
import type { ILogger } from '@core/utils/logger';
import type { ActionEvaluator } from './env/ActionEvaluator';
import type { RemoteProcessDirectory } from './env/RemoteProcessDirectory';
import { ProcessShellRunner, type ShellRunner } from './env/ShellRunner';
import { StepExecutorFactory } from './env/executors/StepExecutorFactory';
import { ExecutionController } from './control/ExecutionController';
import { PipelineRunner, type PipelineRunOptions } from './pipeline/PipelineRunner';

export interface RuntimeDependencies {
  config: ResolvedConfig;
  prompter: Prompter;
  /** Defaults to the configured shell on this machine */
  shellRunner?: ShellRunner;
  evaluator?: ActionEvaluator;
  processDirectory?: RemoteProcessDirectory;
  signals?: SignalSource;
  logger?: ILogger;
}

/**
 * Wire the executors, the controller and the runner for one configuration.
 */
export function createPipelineRunner(dependencies: RuntimeDependencies): PipelineRunner {
  const { config, prompter } = dependencies;
  const shellRunner = dependencies.shellRunner
    ?? new ProcessShellRunner(config.shell, config.encoding, dependencies.signals);

  const dispatcher = new StepExecutorFactory({
    config,
    shellRunner,
    prompter,
    evaluator: dependencies.evaluator,
    processDirectory: dependencies.processDirectory,
    signals: dependencies.signals
  });
  const controller = new ExecutionController({ dispatcher, prompter, logger: dependencies.logger });

  return new PipelineRunner(controller, config.constants);
}

/**
 * Run a decoded script and return the final state of its variables.
 */
export async function runPipeline(
  script: PipelineScript,
  options: PipelineRunOptions,
  dependencies: RuntimeDependencies
): Promise<ExecutionContext> {
  return createPipelineRunner(dependencies).run(script, options);
}

export { ExecutionController } from './control/ExecutionController';
export { PipelineRunner, formatOverview, createExecutionContext, type PipelineRunOptions } from './pipeline/PipelineRunner';
export { Step } from './step/Step';
export { classifyStep } from './step/classify';
export { resolveStep, resolveTemplate, buildResolutionScope } from './step/resolve';
export { buildCommand } from './step/CommandBuilder';
