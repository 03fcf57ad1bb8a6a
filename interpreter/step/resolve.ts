import { UnresolvedVariableError } from '@core/errors';
import type { ExecutionContext } from '@core/types/pipeline';
import type { Step } from './Step';

/** Prefix under which process-wide constants appear in templates. */
export const CONSTANT_PREFIX = 'const_';

const PLACEHOLDER = /\{([^{}]*)\}/g;

/**
 * Merge the run's variables with the constants. Constants are added after
 * the variables, so `const_x` always means the constant.
 */
export function buildResolutionScope(context: ExecutionContext): Record<string, string> {
  const scope: Record<string, string> = { ...context.variables };
  for (const [name, value] of Object.entries(context.constants)) {
    scope[`${CONSTANT_PREFIX}${name}`] = value;
  }
  return scope;
}

/**
 * Substitute every `{name}` placeholder in one pass. Substituted values are
 * not scanned again.
 */
export function resolveTemplate(template: string, scope: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(scope, name)) {
      throw new UnresolvedVariableError(name, template, Object.keys(scope));
    }
    return scope[name];
  });
}

export function resolveStep(step: Step, context: ExecutionContext): string {
  return resolveTemplate(step.valueTemplate, buildResolutionScope(context));
}
