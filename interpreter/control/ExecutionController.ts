import { MANUAL_ABORT_CODE, PipelineAbortError } from '@core/errors';
import type { ExecutionContext, StepRunOptions } from '@core/types/pipeline';
import type { PromptChoice, Prompter } from '@core/types/prompt';
import { executionLogger, type ILogger } from '@core/utils/logger';
import type { StepDispatcher } from '@interpreter/env/executors/StepExecutorFactory';
import { classifyStep } from '@interpreter/step/classify';
import { resolveStep } from '@interpreter/step/resolve';
import type { Step } from '@interpreter/step/Step';

type GateChoice = 'p' | 's' | 'a';
type FailureChoice = 'p' | 'r' | 'a';

const GATE_CHOICES: readonly PromptChoice<GateChoice>[] = [
  { key: 'p', label: 'proceed' },
  { key: 's', label: 'skip' },
  { key: 'a', label: 'abort' }
];

const FAILURE_CHOICES: readonly PromptChoice<FailureChoice>[] = [
  { key: 'p', label: 'proceed' },
  { key: 'r', label: 'retry' },
  { key: 'a', label: 'abort' }
];

export interface ControllerDependencies {
  dispatcher: StepDispatcher;
  prompter: Prompter;
  logger?: ILogger;
}

/**
 * Drives one step through
 * `Pending → ManualGate? → Dispatching → Succeeded | Failed → FailureGate`.
 *
 * A step ends normally unless the operator (or a failing step with the
 * operator's choice) aborts, which raises {@link PipelineAbortError}.
 */
export class ExecutionController {
  private readonly dispatcher: StepDispatcher;
  private readonly prompter: Prompter;
  private readonly logger: ILogger;

  constructor(dependencies: ControllerDependencies) {
    this.dispatcher = dependencies.dispatcher;
    this.prompter = dependencies.prompter;
    this.logger = dependencies.logger ?? executionLogger;
  }

  async execute(step: Step, context: ExecutionContext, options: StepRunOptions = {}): Promise<void> {
    const interactive = options.interactive ?? false;
    const force = options.force ?? false;

    // Retry re-runs the whole step, including resolution and the gate
    for (;;) {
      const resolved = resolveStep(step, context);
      this.logger.notice(`\n(${step.index}) [${step.originalKey}]: ${resolved}`);

      const target = classifyStep(step, context.systems);

      if (target.kind === 'manual' || interactive) {
        const answer = await this.prompter.promptChoice('Proceed?', GATE_CHOICES, 'p');
        if (answer === 's') {
          return;
        }
        if (answer === 'a') {
          throw new PipelineAbortError(MANUAL_ABORT_CODE);
        }
      }

      const exitCode = target.kind === 'manual'
        ? 0
        : await this.dispatcher.dispatch({ step, resolved, target, context });

      if (exitCode === 0) {
        return;
      }

      this.logger.error(`Command (${step.index}) failed with return code ${exitCode}.`);
      if (force) {
        return;
      }

      const answer = await this.prompter.promptChoice('What should I do?', FAILURE_CHOICES, 'p');
      if (answer === 'a') {
        throw new PipelineAbortError(String(exitCode));
      }
      if (answer === 'p') {
        return;
      }
    }
  }
}
