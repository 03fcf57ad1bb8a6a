import { quote } from 'shell-quote';
import type { RemoteSignal } from './RemoteProcessDirectory';

export interface RemoteChannelOptions {
  sshCommand: string;
  sudo: boolean;
}

/**
 * Builds the local command lines that reach a remote host over SSH.
 * Nothing here runs anything.
 */
export class RemoteChannel {
  constructor(private readonly options: RemoteChannelOptions) {}

  /**
   * `ssh <host>` followed by `sudo` when privileged and enabled.
   */
  prefix(host: string, privileged = true): string {
    const parts = [this.options.sshCommand, host];
    if (privileged && this.options.sudo) {
      parts.push('sudo');
    }
    return parts.join(' ');
  }

  /**
   * Run `command` on the host inside a single `bash -c`.
   */
  execute(host: string, command: string): string {
    return `${this.prefix(host)} ${quote(['bash -c ' + quote([command])])}`;
  }

  /**
   * Stream the import scripts as a tar archive into a fresh staging
   * directory, then run `command` (already prefixed with the staged imports).
   */
  stageAndExecute(
    host: string,
    importPath: string,
    imports: readonly string[],
    stagingDir: string,
    command: string
  ): string {
    const archive = `tar -C ${importPath} -cf - ${imports.join(' ')}`;
    const remote = `mkdir ${stagingDir}; tar -C ${stagingDir} -xf -; ${command}`;
    return `${archive} | ${this.execute(host, remote)}`;
  }

  /**
   * List PIDs of processes whose command line contains `command`.
   * Runs unprivileged; stderr is folded into stdout.
   */
  processQuery(host: string, command: string): string {
    const ps = `ps axu | grep ${quote([command])} | grep -v 'grep' | awk '{print $2}'`;
    return `${this.prefix(host, false)} ${quote([ps])} 2>&1`;
  }

  kill(host: string, pid: string, signal: RemoteSignal): string {
    return `${this.prefix(host)} kill -${signal} ${pid}`;
  }

  removeDirectory(host: string, directory: string): string {
    return `${this.prefix(host)} rm -r ${directory}`;
  }
}
