import { describe, it, expect } from 'vitest';
import { JavaScriptActionEvaluator, formatActionResult, type ActionScope } from './ActionEvaluator';

function scope(vars: Record<string, string> = {}): ActionScope {
  return { vars, systems: { web: 'web1' }, constants: { env: 'test' } };
}

describe('JavaScriptActionEvaluator', () => {
  const evaluator = new JavaScriptActionEvaluator();

  it('runs statements against the live variables', async () => {
    const vars: Record<string, string> = { count: '1' };
    await evaluator.evaluate('vars.count = String(Number(vars.count) + 1);', scope(vars), { expression: false });
    expect(vars.count).toBe('2');
  });

  it('returns the value of an expression', async () => {
    await expect(evaluator.evaluate('systems.web + "-" + constants.env', scope(), { expression: true })).resolves.toBe(
      'web1-test'
    );
  });

  it('allows await', async () => {
    await expect(evaluator.evaluate('await Promise.resolve(5)', scope(), { expression: true })).resolves.toBe(5);
  });

  it('propagates errors thrown by the action', async () => {
    await expect(evaluator.evaluate('throw new Error("boom")', scope(), { expression: false })).rejects.toThrow('boom');
  });
});

describe('formatActionResult', () => {
  it('renders results as variable text', () => {
    expect(formatActionResult(undefined)).toBe('');
    expect(formatActionResult(null)).toBe('');
    expect(formatActionResult('plain')).toBe('plain');
    expect(formatActionResult({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(formatActionResult(42)).toBe('42');
    expect(formatActionResult(false)).toBe('false');
  });
});
