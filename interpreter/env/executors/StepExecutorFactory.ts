import type { ResolvedConfig } from '@core/config/types';
import type { Prompter } from '@core/types/prompt';
import type { SignalSource } from '@core/utils/interrupt';
import { JavaScriptActionEvaluator, type ActionEvaluator } from '../ActionEvaluator';
import { RemoteChannel } from '../RemoteChannel';
import { SshProcessDirectory, type RemoteProcessDirectory } from '../RemoteProcessDirectory';
import type { ShellRunner } from '../ShellRunner';
import type { StepExecution } from './BaseStepExecutor';
import { InterpretedExecutor } from './InterpretedExecutor';
import { LocalExecutor } from './LocalExecutor';
import { RemoteExecutor } from './RemoteExecutor';

export interface ExecutorDependencies {
  config: ResolvedConfig;
  shellRunner: ShellRunner;
  prompter: Prompter;
  evaluator?: ActionEvaluator;
  processDirectory?: RemoteProcessDirectory;
  signals?: SignalSource;
}

/**
 * Routes a classified step to the executor for its kind.
 */
export interface StepDispatcher {
  dispatch(execution: StepExecution): Promise<number>;
}

/**
 * Factory for creating and routing to the step executors
 */
export class StepExecutorFactory implements StepDispatcher {
  private localExecutor: LocalExecutor;
  private remoteExecutor: RemoteExecutor;
  private interpretedExecutor: InterpretedExecutor;

  constructor(dependencies: ExecutorDependencies) {
    const { config, shellRunner, prompter } = dependencies;
    const channel = new RemoteChannel(config.remote);
    const processDirectory = dependencies.processDirectory ?? new SshProcessDirectory(channel, shellRunner);

    this.localExecutor = new LocalExecutor(shellRunner, config.importPath);
    this.remoteExecutor = new RemoteExecutor(shellRunner, channel, processDirectory, prompter, {
      importPath: config.importPath,
      stagingDir: config.remote.stagingDir
    });
    this.interpretedExecutor = new InterpretedExecutor(
      dependencies.evaluator ?? new JavaScriptActionEvaluator(),
      undefined,
      dependencies.signals
    );
  }

  /**
   * Run one attempt. Manual steps have nothing to run and succeed.
   */
  async dispatch(execution: StepExecution): Promise<number> {
    switch (execution.target.kind) {
      case 'local':
        return this.localExecutor.execute(execution);
      case 'remote':
        return this.remoteExecutor.execute(execution);
      case 'interpreted':
        return this.interpretedExecutor.execute(execution);
      case 'manual':
        return 0;
    }
  }
}
