/**
 * One selectable answer of an interactive prompt.
 */
export interface PromptChoice<K extends string = string> {
  key: K;
  label: string;
}

/**
 * Blocking question/answer with the operator. The terminal implementation
 * lives in the CLI; tests use a scripted one.
 */
export interface Prompter {
  /**
   * Ask `question` and return the chosen key. Any answer that is not one of
   * the keys selects `defaultKey`.
   */
  promptChoice<K extends string>(
    question: string,
    choices: readonly PromptChoice<K>[],
    defaultKey: K
  ): Promise<K>;
}

/**
 * Render a question the way every gate shows it:
 * `Proceed? (p: proceed (default), s: skip, a: abort) `
 */
export function formatChoiceQuestion<K extends string>(
  question: string,
  choices: readonly PromptChoice<K>[],
  defaultKey: K
): string {
  const options = choices
    .map(choice => `${choice.key}: ${choice.label}${choice.key === defaultKey ? ' (default)' : ''}`)
    .join(', ');
  return `${question} (${options}) `;
}
