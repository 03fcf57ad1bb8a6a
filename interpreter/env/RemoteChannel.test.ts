import { describe, it, expect } from 'vitest';
import { RemoteChannel } from './RemoteChannel';

describe('RemoteChannel', () => {
  const channel = new RemoteChannel({ sshCommand: 'ssh', sudo: true });

  it('wraps the command in a quoted bash -c behind sudo', () => {
    expect(channel.execute('web1', 'echo hi')).toBe(`ssh web1 sudo "bash -c 'echo hi'"`);
  });

  it('keeps shell expansions for the remote side', () => {
    expect(channel.execute('web1', 'echo $HOME')).toBe(`ssh web1 sudo "bash -c 'echo \\$HOME'"`);
  });

  it('quotes a single-word command once', () => {
    expect(channel.execute('web1', 'uptime')).toBe(`ssh web1 sudo 'bash -c uptime'`);
  });

  it('streams the imports into the staging directory before running', () => {
    const command = channel.stageAndExecute('web1', '.', ['env.sh'], 'pipewright_tmp', '. pipewright_tmp/env.sh; echo hi');
    expect(command).toBe(
      `tar -C . -cf - env.sh | ssh web1 sudo "bash -c 'mkdir pipewright_tmp; tar -C pipewright_tmp -xf -; . pipewright_tmp/env.sh; echo hi'"`
    );
  });

  it('queries processes without sudo and folds stderr into stdout', () => {
    expect(channel.processQuery('web1', 'sleep 100')).toBe(
      `ssh web1 "ps axu | grep 'sleep 100' | grep -v 'grep' | awk '{print \\$2}'" 2>&1`
    );
  });

  it('builds kill and cleanup commands', () => {
    expect(channel.kill('web1', '123', 'INT')).toBe('ssh web1 sudo kill -INT 123');
    expect(channel.removeDirectory('web1', 'pipewright_tmp')).toBe('ssh web1 sudo rm -r pipewright_tmp');
  });

  it('leaves out sudo when disabled', () => {
    const plain = new RemoteChannel({ sshCommand: 'ssh -F ./ssh_config', sudo: false });
    expect(plain.execute('web1', 'echo hi')).toBe(`ssh -F ./ssh_config web1 "bash -c 'echo hi'"`);
    expect(plain.kill('web1', '9', 'KILL')).toBe('ssh -F ./ssh_config web1 kill -KILL 9');
  });
});
