import { buildCommand } from '@interpreter/step/CommandBuilder';
import type { ILogger } from '@core/utils/logger';
import type { ShellRunner } from '../ShellRunner';
import { BaseStepExecutor, type StepExecution } from './BaseStepExecutor';

/**
 * Runs a step in the local shell, sourcing the imports from `importPath`.
 */
export class LocalExecutor extends BaseStepExecutor {
  constructor(
    private readonly shell: ShellRunner,
    private readonly importPath: string,
    logger?: ILogger
  ) {
    super(logger);
  }

  async execute(execution: StepExecution): Promise<number> {
    const { step, resolved, context } = execution;
    const command = buildCommand(resolved, context.imports, this.importPath);

    return this.executeWithInterruptHandling(async () => {
      const result = await this.shell.run(command, { capture: step.assignment });
      if (step.assignment) {
        this.storeAssignment(execution, result.stdout);
      }
      return result.exitCode;
    });
  }
}
