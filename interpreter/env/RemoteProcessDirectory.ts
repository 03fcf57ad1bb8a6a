import { CommandExecutionError } from '@core/errors';
import { remoteLogger } from '@core/utils/logger';
import type { RemoteChannel } from './RemoteChannel';
import type { ShellRunner } from './ShellRunner';

export type RemoteSignal = 'INT' | 'TERM' | 'KILL';

/**
 * Finds and signals processes on a remote host.
 */
export interface RemoteProcessDirectory {
  /** PIDs of processes whose command line contains `command` */
  findPids(host: string, command: string): Promise<string[]>;
  signal(host: string, pid: string, signal: RemoteSignal): Promise<void>;
}

const PID_PATTERN = /^\d+$/;

export class SshProcessDirectory implements RemoteProcessDirectory {
  constructor(
    private readonly channel: RemoteChannel,
    private readonly shell: ShellRunner
  ) {}

  async findPids(host: string, command: string): Promise<string[]> {
    const query = this.channel.processQuery(host, command);
    const { exitCode, stdout } = await this.shell.run(query, { capture: true });
    if (exitCode !== 0) {
      throw CommandExecutionError.create(query, exitCode, stdout);
    }
    // ssh errors share the stream with ps output
    return stdout.split(/\s+/).filter(token => PID_PATTERN.test(token));
  }

  async signal(host: string, pid: string, signal: RemoteSignal): Promise<void> {
    remoteLogger.info(`Kill ${pid} on ${host}`);
    const { exitCode } = await this.shell.run(this.channel.kill(host, pid, signal));
    if (exitCode !== 0) {
      remoteLogger.warning(`Sending SIG${signal} to ${pid} on ${host} failed, exitcode: ${exitCode}`);
    }
  }
}
