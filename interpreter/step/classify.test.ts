import { describe, it, expect } from 'vitest';
import { UnknownCommandKindError, UnknownHostError } from '@core/errors';
import { textValue } from '@core/types/pipeline';
import { classifyStep } from './classify';
import { Step } from './Step';

const systems = { web: 'deploy@web1.internal', db: 'db1' };

function stepFor(key: string): Step {
  return new Step({ [key]: textValue('true') }, 1);
}

describe('classifyStep', () => {
  it('recognises the local, manual and interpreted kinds', () => {
    expect(classifyStep(stepFor('local'), systems)).toEqual({ kind: 'local' });
    expect(classifyStep(stepFor('manual'), systems)).toEqual({ kind: 'manual' });
    expect(classifyStep(stepFor('js'), systems)).toEqual({ kind: 'interpreted' });
    expect(classifyStep(stepFor('javascript'), systems)).toEqual({ kind: 'interpreted' });
  });

  it('classifies by the key without its assignment prefix', () => {
    expect(classifyStep(stepFor('out=local'), systems)).toEqual({ kind: 'local' });
  });

  it('looks up the host of a remote step', () => {
    expect(classifyStep(stepFor('remote@web'), systems)).toEqual({
      kind: 'remote',
      hostName: 'web',
      host: 'deploy@web1.internal'
    });
  });

  it('finds the remote marker anywhere in the key', () => {
    expect(classifyStep(stepFor('x-remote@db'), systems)).toEqual({ kind: 'remote', hostName: 'db', host: 'db1' });
  });

  it('rejects hosts missing from systems', () => {
    expect(() => classifyStep(stepFor('remote@cache'), systems)).toThrow(UnknownHostError);
  });

  it('does not treat inherited properties as hosts', () => {
    expect(() => classifyStep(stepFor('remote@toString'), systems)).toThrow(UnknownHostError);
  });

  it('rejects unknown kinds', () => {
    expect(() => classifyStep(stepFor('docker'), systems)).toThrow(new UnknownCommandKindError('docker').message);
    expect(() => classifyStep(stepFor('Local'), systems)).toThrow(UnknownCommandKindError);
  });
});
