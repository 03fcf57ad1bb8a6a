import { INTERRUPT_EXIT_CODE, isInterrupt } from '@core/errors';
import type { ExecutionContext, StepTarget } from '@core/types/pipeline';
import { executionLogger, type ILogger } from '@core/utils/logger';
import type { Step } from '@interpreter/step/Step';

/**
 * Everything an executor needs to run one attempt of a step.
 */
export interface StepExecution {
  step: Step;
  /** Step text with every placeholder substituted */
  resolved: string;
  target: StepTarget;
  context: ExecutionContext;
}

export interface IStepExecutor {
  /**
   * Run the step once and return its exit code.
   */
  execute(execution: StepExecution): Promise<number>;
}

/**
 * Base class for all step executors providing the shared interrupt and
 * output-capture handling
 */
export abstract class BaseStepExecutor implements IStepExecutor {
  constructor(protected readonly logger: ILogger = executionLogger) {}

  abstract execute(execution: StepExecution): Promise<number>;

  /**
   * Map an operator interrupt raised by `work` to exit code 130.
   * The interrupted work is not retried here.
   */
  protected async executeWithInterruptHandling(work: () => Promise<number>): Promise<number> {
    try {
      return await work();
    } catch (error: unknown) {
      if (!isInterrupt(error)) {
        throw error;
      }
      this.logInterrupt();
      return INTERRUPT_EXIT_CODE;
    }
  }

  protected logInterrupt(): void {
    this.logger.info(`Abort command by user key stroke. Exit code is set to ${INTERRUPT_EXIT_CODE}.`);
  }

  /**
   * Store output in the step's assignment variable, visible to later steps
   */
  protected storeAssignment(execution: StepExecution, output: string): void {
    const name = execution.step.assignmentVariable;
    execution.context.variables[name] = output;
    this.logger.info(`Variable ${name} = ${output}`);
  }
}
