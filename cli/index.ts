import * as path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { ScriptLoader } from '@core/pipeline/ScriptLoader';
import type { Prompter } from '@core/types/prompt';
import { cliLogger, setLogLevel } from '@core/utils/logger';
import { createPipelineRunner, formatOverview, type RuntimeDependencies } from '@interpreter/index';
import { ErrorHandler } from './error/ErrorHandler';
import { ReadlinePrompter } from './interaction/ReadlinePrompter';

export interface CLIOptions {
  script: string;
  interactive: boolean;
  force: boolean;
  jumpTo: number;
  variables: Record<string, string>;
  printOverview: boolean;
  importPath?: string;
  debug: boolean;
}

/**
 * Process-level collaborators, replaced in tests.
 */
export interface CLIRuntime {
  cwd?: string;
  globalConfigPath?: string;
  prompter?: Prompter;
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  errorHandler?: ErrorHandler;
  dependencies?: Omit<RuntimeDependencies, 'config' | 'prompter'>;
}

export function parseJumpTo(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Step number must be a positive integer.');
  }
  return parsed;
}

/**
 * Collect repeated `--var name=value` options. The first `=` separates the
 * name, so values may contain `=`.
 */
export function collectVariable(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected name=value, got "${value}".`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

export function createProgram(): Command {
  return new Command()
    .name('pipewright')
    .description('Run a pipeline of local, remote and scripted steps')
    .argument('<script>', 'Pipeline script (YAML)')
    .option('-i, --interactive', 'Ask before every step', false)
    .option('-f, --force', 'Continue after failed steps without asking', false)
    .option('-j, --jump-to <n>', 'Start at step <n>', parseJumpTo, 1)
    .option('--var <name=value>', 'Override a script variable (repeatable)', collectVariable, {})
    .option('-p, --print-overview', 'List the steps and exit', false)
    .option('--import-path <dir>', 'Directory holding the import scripts')
    .option('-d, --debug', 'Verbose logging', false)
    .exitOverride()
    .configureOutput({
      writeErr: text => process.stderr.write(text)
    });
}

export function parseOptions(argv: string[], program: Command = createProgram()): CLIOptions {
  program.parse(argv, { from: 'user' });
  const opts = program.opts<{
    interactive: boolean;
    force: boolean;
    jumpTo: number;
    var: Record<string, string>;
    printOverview: boolean;
    importPath?: string;
    debug: boolean;
  }>();

  return {
    script: program.args[0],
    interactive: opts.interactive,
    force: opts.force,
    jumpTo: opts.jumpTo,
    variables: opts.var,
    printOverview: opts.printOverview,
    importPath: opts.importPath,
    debug: opts.debug
  };
}

function applyLogLevel(config: ResolvedConfig, options: CLIOptions, env: NodeJS.ProcessEnv): void {
  if (options.debug) {
    setLogLevel('debug');
  } else if (!env.LOG_LEVEL && env.PIPEWRIGHT_DEBUG !== 'true') {
    setLogLevel(config.logging.level);
  }
}

/**
 * Run the CLI and return the process exit status.
 */
export async function main(argv: string[], runtime: CLIRuntime = {}): Promise<number> {
  const errorHandler = runtime.errorHandler ?? new ErrorHandler();
  const stdout = runtime.stdout ?? ((line: string) => console.log(line));
  const cwd = runtime.cwd ?? process.cwd();

  let options: CLIOptions;
  try {
    options = parseOptions(argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander already printed usage or help
      return error.exitCode;
    }
    return errorHandler.handleError(error);
  }

  try {
    const loaded = new ConfigLoader(cwd, runtime.globalConfigPath).load(runtime.env ?? process.env);
    applyLogLevel(loaded, options, runtime.env ?? process.env);
    const config: ResolvedConfig = {
      ...loaded,
      importPath: path.resolve(cwd, options.importPath ?? loaded.importPath)
    };

    const script = await new ScriptLoader().load(path.resolve(cwd, options.script));
    if (options.printOverview) {
      formatOverview(script).forEach(line => stdout(line));
      return 0;
    }

    cliLogger.debug(`Running ${options.script}`, { jumpTo: options.jumpTo });
    // Opens stdin only when a question is asked
    const terminal = new ReadlinePrompter();
    const runner = createPipelineRunner({
      ...runtime.dependencies,
      config,
      prompter: runtime.prompter ?? terminal
    });
    try {
      await runner.run(script, {
        interactive: options.interactive,
        force: options.force,
        jumpTo: options.jumpTo,
        variables: options.variables
      });
    } finally {
      terminal.close();
    }
    return 0;
  } catch (error: unknown) {
    return errorHandler.handleError(error, { debug: options.debug });
  }
}
