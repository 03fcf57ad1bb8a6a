import { spawn } from 'child_process';
import * as os from 'os';
import { InterruptError } from '@core/errors';
import { InterruptGuard, type SignalSource } from '@core/utils/interrupt';
import { executionLogger } from '@core/utils/logger';

/** Reported when the shell itself cannot be started. */
export const SHELL_NOT_FOUND_EXIT_CODE = 127;

export interface ShellRunOptions {
  /** Collect stdout instead of letting it stream to the terminal */
  capture?: boolean;
  cwd?: string;
}

export interface ShellRunResult {
  exitCode: number;
  /** Decoded stdout when captured, otherwise '' */
  stdout: string;
}

/**
 * Runs one shell command string and waits for it. Rejects with an
 * {@link InterruptError} when the operator interrupts the command.
 */
export interface ShellRunner {
  run(command: string, options?: ShellRunOptions): Promise<ShellRunResult>;
}

/**
 * Exit status of a child that ended on a signal, as a shell reports it.
 */
export function exitCodeForSignal(signal: NodeJS.Signals | null): number {
  if (!signal) {
    return 1;
  }
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  const signalNumber: unknown = entry?.[1];
  return 128 + (typeof signalNumber === 'number' ? signalNumber : 0);
}

/**
 * Executes commands through `<shell> -c`, stdin and stderr always inherited.
 */
export class ProcessShellRunner implements ShellRunner {
  constructor(
    private readonly shell: string,
    private readonly encoding: BufferEncoding,
    private readonly signals: SignalSource = process
  ) {}

  run(command: string, options: ShellRunOptions = {}): Promise<ShellRunResult> {
    executionLogger.debug(`Executing: ${command}`);

    const guard = new InterruptGuard(this.signals);
    guard.arm();

    return new Promise((resolve, reject) => {
      let settled = false;
      const chunks: Buffer[] = [];

      const child = spawn(this.shell, ['-c', command], {
        cwd: options.cwd,
        stdio: ['inherit', options.capture ? 'pipe' : 'inherit', 'inherit']
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        guard.disarm();
        executionLogger.error(`Failed to start ${this.shell}: ${error.message}`);
        resolve({ exitCode: SHELL_NOT_FOUND_EXIT_CODE, stdout: '' });
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        guard.disarm();

        if (guard.wasInterrupted) {
          reject(new InterruptError(command));
          return;
        }

        resolve({
          exitCode: code ?? exitCodeForSignal(signal),
          stdout: Buffer.concat(chunks).toString(this.encoding)
        });
      });
    });
  }
}
