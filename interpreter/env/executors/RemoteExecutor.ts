import { INTERRUPT_EXIT_CODE, isInterrupt } from '@core/errors';
import type { PromptChoice, Prompter } from '@core/types/prompt';
import { remoteLogger, type ILogger } from '@core/utils/logger';
import { buildCommand } from '@interpreter/step/CommandBuilder';
import type { RemoteChannel } from '../RemoteChannel';
import type { RemoteProcessDirectory, RemoteSignal } from '../RemoteProcessDirectory';
import type { ShellRunner } from '../ShellRunner';
import { BaseStepExecutor, type StepExecution } from './BaseStepExecutor';

export interface RemoteExecutorOptions {
  /** Local directory the import scripts are packed from */
  importPath: string;
  /** Directory created on the remote host for the import scripts */
  stagingDir: string;
}

type SignalChoice = 'i' | 't' | 'k' | 'p';

const SIGNAL_CHOICES: readonly PromptChoice<SignalChoice>[] = [
  { key: 'i', label: 'send SIGINT' },
  { key: 't', label: 'send SIGTERM' },
  { key: 'k', label: 'send SIGKILL' },
  { key: 'p', label: 'do nothing and proceed' }
];

const SIGNAL_BY_CHOICE: Record<Exclude<SignalChoice, 'p'>, RemoteSignal> = {
  i: 'INT',
  t: 'TERM',
  k: 'KILL'
};

/**
 * Runs a step on a remote host over SSH.
 *
 * SSH does not reliably forward an interrupt to the remote command, so after
 * a local interrupt the remote processes are looked up and the operator
 * decides which signal, if any, they get. Staged imports are removed on
 * every path.
 */
export class RemoteExecutor extends BaseStepExecutor {
  constructor(
    private readonly shell: ShellRunner,
    private readonly channel: RemoteChannel,
    private readonly processes: RemoteProcessDirectory,
    private readonly prompter: Prompter,
    private readonly options: RemoteExecutorOptions,
    logger: ILogger = remoteLogger
  ) {
    super(logger);
  }

  async execute(execution: StepExecution): Promise<number> {
    const { target, context } = execution;
    if (target.kind !== 'remote') {
      throw new TypeError(`RemoteExecutor cannot run a ${target.kind} step`);
    }

    const staged = context.imports.length > 0;
    try {
      return await this.dispatch(execution, target.host, this.buildInvocation(execution, target.host));
    } finally {
      if (staged) {
        await this.removeStagingDir(target.host);
      }
    }
  }

  private buildInvocation({ resolved, context }: StepExecution, host: string): string {
    if (context.imports.length === 0) {
      return this.channel.execute(host, resolved);
    }
    const { importPath, stagingDir } = this.options;
    return this.channel.stageAndExecute(
      host,
      importPath,
      context.imports,
      stagingDir,
      buildCommand(resolved, context.imports, stagingDir)
    );
  }

  private async dispatch(execution: StepExecution, host: string, invocation: string): Promise<number> {
    const { step } = execution;
    try {
      const result = await this.shell.run(invocation, { capture: step.assignment });
      if (step.assignment) {
        this.storeAssignment(execution, result.stdout);
      }
      return result.exitCode;
    } catch (error: unknown) {
      if (!isInterrupt(error)) {
        throw error;
      }
      this.logInterrupt();
      await this.stopRemoteProcesses(host, execution.resolved);
      return INTERRUPT_EXIT_CODE;
    }
  }

  /**
   * Querying → Prompting → Signaling → Querying, until no process matches
   * or the operator chooses to proceed.
   */
  private async stopRemoteProcesses(host: string, command: string): Promise<void> {
    let pids = await this.queryPids(host, command);

    while (pids.length > 0) {
      this.logger.notice(`Remote command seems still to be running! Found PIDs: ${pids.join(',')}`);
      const answer = await this.prompter.promptChoice('What should I do?', SIGNAL_CHOICES, 'i');
      if (answer === 'p') {
        break;
      }

      if (!(await this.signalAll(host, pids, SIGNAL_BY_CHOICE[answer]))) {
        break;
      }

      pids = await this.queryPids(host, command);
    }

    this.logger.info('Keystroke interrupt handled.\n');
  }

  /**
   * Returns false when signalling stopped early, e.g. on a second interrupt.
   */
  private async signalAll(host: string, pids: string[], signal: RemoteSignal): Promise<boolean> {
    try {
      for (const pid of pids) {
        await this.processes.signal(host, pid, signal);
      }
      return true;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warning(`Stopped sending SIG${signal} on ${host}: ${message}`);
      return false;
    }
  }

  private async queryPids(host: string, command: string): Promise<string[]> {
    try {
      return await this.processes.findPids(host, command);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warning(`Could not look up remote processes on ${host}: ${message}`);
      return [];
    }
  }

  private async removeStagingDir(host: string): Promise<void> {
    const { stagingDir } = this.options;
    const cleanup = this.channel.removeDirectory(host, stagingDir);
    this.logger.debug(`Executing: ${cleanup}`);

    try {
      const { exitCode } = await this.shell.run(cleanup);
      if (exitCode !== 0) {
        this.logger.warning(`Failed to remove ${stagingDir}, exitcode: ${exitCode}`);
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warning(`Failed to remove ${stagingDir}: ${message}`);
    }
  }
}
