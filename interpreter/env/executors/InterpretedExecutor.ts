import { INTERRUPT_EXIT_CODE, isInterrupt } from '@core/errors';
import { raceInterrupt, type SignalSource } from '@core/utils/interrupt';
import type { ILogger } from '@core/utils/logger';
import { formatActionResult, type ActionEvaluator } from '../ActionEvaluator';
import { BaseStepExecutor, type StepExecution } from './BaseStepExecutor';

/**
 * Runs a step's text as an in-process action. Every failure of the action
 * ends here: it is logged and reported as exit code 1.
 */
export class InterpretedExecutor extends BaseStepExecutor {
  constructor(
    private readonly evaluator: ActionEvaluator,
    logger?: ILogger,
    private readonly signals: SignalSource = process
  ) {
    super(logger);
  }

  async execute(execution: StepExecution): Promise<number> {
    const { step, resolved, context } = execution;
    this.logger.debug(`Run action: ${resolved}`);

    try {
      const result = await raceInterrupt(
        resolved,
        () => this.evaluator.evaluate(
          resolved,
          { vars: context.variables, systems: context.systems, constants: context.constants },
          { expression: step.assignment }
        ),
        this.signals
      );
      if (step.assignment) {
        this.storeAssignment(execution, formatActionResult(result));
      }
      return 0;
    } catch (error: unknown) {
      if (isInterrupt(error)) {
        this.logInterrupt();
        return INTERRUPT_EXIT_CODE;
      }
      this.logger.error(error instanceof Error ? error.message : String(error));
      return 1;
    }
  }
}
