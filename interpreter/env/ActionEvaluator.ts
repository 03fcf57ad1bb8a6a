/**
 * What an interpreted action can see. `vars` is the live variable store of
 * the run; writes to it are visible to later steps.
 */
export interface ActionScope {
  vars: Record<string, string>;
  systems: Readonly<Record<string, string>>;
  constants: Readonly<Record<string, string>>;
}

export interface ActionEvaluationOptions {
  /** Evaluate the text as a single expression and return its value */
  expression: boolean;
}

/**
 * Evaluates the text of an interpreted step.
 */
export interface ActionEvaluator {
  evaluate(code: string, scope: ActionScope, options: ActionEvaluationOptions): Promise<unknown>;
}

/**
 * Runs actions as JavaScript in this process, with the trust level of the
 * process itself. `await` may be used anywhere in the action.
 */
export class JavaScriptActionEvaluator implements ActionEvaluator {
  async evaluate(code: string, scope: ActionScope, options: ActionEvaluationOptions): Promise<unknown> {
    const body = options.expression ? `return (${code});` : code;
    const fn = new Function('vars', 'systems', 'constants', `return (async () => {\n${body}\n})();`);
    const result: unknown = await fn(scope.vars, scope.systems, scope.constants);
    return result;
  }
}

/**
 * Text stored in a variable for an action's result.
 */
export function formatActionResult(result: unknown): string {
  if (result === undefined || result === null) {
    return '';
  }
  if (typeof result === 'string') {
    return result;
  }
  if (typeof result === 'object') {
    return JSON.stringify(result);
  }
  return String(result);
}
