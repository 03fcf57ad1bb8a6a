import { describe, it, expect } from 'vitest';
import { PipelineAbortError } from '@core/errors';
import { PassThrough } from 'stream';
import type { PromptChoice } from '@core/types/prompt';
import { ReadlinePrompter, matchChoice } from './ReadlinePrompter';

type Choice = 'p' | 'r' | 'a';

const CHOICES: readonly PromptChoice<Choice>[] = [
  { key: 'p', label: 'proceed' },
  { key: 'r', label: 'retry' },
  { key: 'a', label: 'abort' }
];

function createStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });
  return { input, output, written: () => written };
}

describe('ReadlinePrompter', () => {
  it('shows the choices and returns the answer', async () => {
    const streams = createStreams();
    const prompter = new ReadlinePrompter(streams);

    const answer = prompter.promptChoice('What should I do?', CHOICES, 'p');
    streams.input.write('r\n');

    await expect(answer).resolves.toBe('r');
    expect(streams.written()).toBe('What should I do? (p: proceed (default), r: retry, a: abort) ');
  });

  it('falls back to the default for unknown answers', async () => {
    const streams = createStreams();
    const answer = new ReadlinePrompter(streams).promptChoice('What should I do?', CHOICES, 'p');
    streams.input.write('maybe\n');
    await expect(answer).resolves.toBe('p');
  });

  it('answers with the default at end of input', async () => {
    const streams = createStreams();
    const answer = new ReadlinePrompter(streams).promptChoice('What should I do?', CHOICES, 'a');
    streams.input.end();
    await expect(answer).resolves.toBe('a');
  });
});

describe('ReadlinePrompter across questions', () => {
  it('keeps answers that arrive together for the following questions', async () => {
    const streams = createStreams();
    const prompter = new ReadlinePrompter(streams);

    const first = prompter.promptChoice('What should I do?', CHOICES, 'p');
    streams.input.write('r\na\n');

    await expect(first).resolves.toBe('r');
    await expect(prompter.promptChoice('What should I do?', CHOICES, 'p')).resolves.toBe('a');
    prompter.close();
  });

  it('answers later questions with the default once input has ended', async () => {
    const streams = createStreams();
    const prompter = new ReadlinePrompter(streams);

    const first = prompter.promptChoice('What should I do?', CHOICES, 'p');
    streams.input.end('r\n');

    await expect(first).resolves.toBe('r');
    await expect(prompter.promptChoice('What should I do?', CHOICES, 'a')).resolves.toBe('a');
    await expect(prompter.promptChoice('What should I do?', CHOICES, 'p')).resolves.toBe('p');
  });

  it('answers a waiting question with its default on close', async () => {
    const streams = createStreams();
    const prompter = new ReadlinePrompter(streams);

    const answer = prompter.promptChoice('What should I do?', CHOICES, 'r');
    prompter.close();

    await expect(answer).resolves.toBe('r');
  });

  it('aborts the pipeline with 130 on Ctrl-C', async () => {
    const streams = createStreams();
    const prompter = new ReadlinePrompter({ input: streams.input, output: streams.output, terminal: true });

    const answer = prompter.promptChoice('Proceed?', CHOICES, 'p');
    streams.input.write('\x03');

    await expect(answer).rejects.toBeInstanceOf(PipelineAbortError);
    await expect(answer).rejects.toMatchObject({ exitCode: '130' });
    prompter.close();
  });
});

describe('matchChoice', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(matchChoice('  A ', CHOICES, 'p')).toBe('a');
    expect(matchChoice('', CHOICES, 'r')).toBe('r');
  });
});
