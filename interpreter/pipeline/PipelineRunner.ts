import { isPipelineAbort } from '@core/errors';
import type { ExecutionContext, PipelineScript, StepEntry, StepRunOptions } from '@core/types/pipeline';
import { pipelineLogger, type ILogger } from '@core/utils/logger';
import type { ExecutionController } from '@interpreter/control/ExecutionController';
import { Step } from '@interpreter/step/Step';

export interface PipelineRunOptions extends StepRunOptions {
  /** 1-based index of the first pipeline step to run */
  jumpTo?: number;
  /** Values that override the script's `vars` */
  variables?: Record<string, string>;
}

/**
 * Build the shared state of one run.
 */
export function createExecutionContext(
  script: PipelineScript,
  constants: Readonly<Record<string, string>>,
  overrides: Record<string, string> = {}
): ExecutionContext {
  return {
    variables: { ...script.vars, ...overrides },
    systems: { ...script.systems },
    imports: [...script.imports],
    constants: { ...constants }
  };
}

/**
 * Runs the steps of a script one after another.
 *
 * `always` steps run after the pipeline however it ended, with failures
 * absorbed. An abort or error from the pipeline is raised once they are done.
 */
export class PipelineRunner {
  constructor(
    private readonly controller: ExecutionController,
    private readonly constants: Readonly<Record<string, string>> = {},
    private readonly logger: ILogger = pipelineLogger
  ) {}

  async run(script: PipelineScript, options: PipelineRunOptions = {}): Promise<ExecutionContext> {
    const context = createExecutionContext(script, this.constants, options.variables);
    const jumpTo = options.jumpTo ?? 1;

    if (script.name) {
      this.logger.notice(script.name);
    }

    let failed = false;
    let failure: unknown;
    try {
      await this.runSteps(script.pipeline, context, options, jumpTo);
    } catch (error: unknown) {
      failed = true;
      failure = error;
    }

    await this.runAlways(script.always, context, options, failed);

    if (failed) {
      throw failure;
    }
    this.logger.info('\nAll commands finished.');
    return context;
  }

  private async runSteps(
    entries: StepEntry[],
    context: ExecutionContext,
    options: StepRunOptions,
    firstIndex: number
  ): Promise<void> {
    for (const [position, entry] of entries.entries()) {
      const step = new Step(entry, position + 1);
      if (step.index < firstIndex) {
        this.logger.debug(`Skipping (${step.index}) [${step.originalKey}]`);
        continue;
      }
      await this.controller.execute(step, context, options);
    }
  }

  private async runAlways(
    entries: StepEntry[],
    context: ExecutionContext,
    options: StepRunOptions,
    pipelineFailed: boolean
  ): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    this.logger.notice('\nRunning always steps');
    try {
      await this.runSteps(entries, context, { interactive: options.interactive, force: true }, 1);
    } catch (error: unknown) {
      // The pipeline's own failure is the one reported
      if (!pipelineFailed) {
        throw error;
      }
      const reason = isPipelineAbort(error)
        ? `exit code ${error.exitCode}`
        : error instanceof Error ? error.message : String(error);
      this.logger.warning(`Always steps stopped: ${reason}`);
    }
  }
}

/**
 * One line per step as `(<index>) [<key>]: <template>`, `always` steps last.
 */
export function formatOverview(script: PipelineScript): string[] {
  const describe = (entries: StepEntry[]): string[] =>
    entries.map((entry, position) => {
      const step = new Step(entry, position + 1);
      return `(${step.index}) [${step.originalKey}]: ${step.valueTemplate}`;
    });

  const lines = describe(script.pipeline);
  if (script.always.length > 0) {
    lines.push('always:', ...describe(script.always));
  }
  return lines;
}
