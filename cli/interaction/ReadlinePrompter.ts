import { createInterface, type Interface } from 'readline';
import { INTERRUPT_EXIT_CODE, PipelineAbortError } from '@core/errors';
import { formatChoiceQuestion, type PromptChoice, type Prompter } from '@core/types/prompt';

export interface ReadlinePrompterStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Defaults to whether `input` is a TTY */
  terminal?: boolean;
}

interface PendingAnswer {
  answer(line: string): void;
  end(): void;
  interrupt(): void;
}

/**
 * Terminal prompter. One readline interface serves every question; input is
 * paused between questions so running steps keep stdin, and lines that
 * arrive early are kept for the next question.
 */
export class ReadlinePrompter implements Prompter {
  private readline?: Interface;
  private pending?: PendingAnswer;
  private readonly queued: string[] = [];
  private ended = false;

  constructor(
    private readonly streams: ReadlinePrompterStreams = { input: process.stdin, output: process.stdout }
  ) {}

  promptChoice<K extends string>(
    question: string,
    choices: readonly PromptChoice<K>[],
    defaultKey: K
  ): Promise<K> {
    const text = formatChoiceQuestion(question, choices, defaultKey);

    const early = this.queued.shift();
    if (early !== undefined) {
      this.streams.output.write(text);
      return Promise.resolve(matchChoice(early, choices, defaultKey));
    }
    // End of input answers with the default
    if (this.ended) {
      this.streams.output.write(text);
      return Promise.resolve(defaultKey);
    }

    const rl = this.open();
    return new Promise<K>((resolve, reject) => {
      this.pending = {
        answer: line => resolve(matchChoice(line, choices, defaultKey)),
        end: () => resolve(defaultKey),
        // Ctrl-C at a prompt ends the pipeline
        interrupt: () => reject(new PipelineAbortError(String(INTERRUPT_EXIT_CODE), 'Aborted at prompt.'))
      };
      this.setRawMode(true);
      rl.setPrompt(text);
      rl.prompt();
    });
  }

  /**
   * Release stdin. A question still waiting is answered with its default.
   */
  close(): void {
    if (this.readline) {
      this.readline.close();
      this.readline = undefined;
    }
  }

  private open(): Interface {
    if (this.readline) {
      return this.readline;
    }

    const rl = createInterface({
      input: this.streams.input,
      output: this.streams.output,
      terminal: this.streams.terminal
    });
    rl.on('line', line => {
      const pending = this.take();
      if (pending) {
        pending.answer(line);
      } else {
        this.queued.push(line);
      }
    });
    rl.on('SIGINT', () => {
      this.take()?.interrupt();
    });
    rl.on('close', () => {
      this.ended = true;
      this.take()?.end();
    });

    this.readline = rl;
    return rl;
  }

  private take(): PendingAnswer | undefined {
    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      this.readline?.pause();
      this.setRawMode(false);
    }
    return pending;
  }

  // Raw mode would keep Ctrl-C from reaching a running step as SIGINT
  private setRawMode(enabled: boolean): void {
    const input = this.streams.input;
    if (this.readline?.terminal && 'setRawMode' in input && typeof input.setRawMode === 'function') {
      input.setRawMode(enabled);
    }
  }
}

export function matchChoice<K extends string>(
  answer: string,
  choices: readonly PromptChoice<K>[],
  defaultKey: K
): K {
  const normalized = answer.trim().toLowerCase();
  const match = choices.find(choice => choice.key === normalized);
  return match ? match.key : defaultKey;
}
