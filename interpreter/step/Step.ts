import { ScriptLoadError } from '@core/errors';
import type { StepEntry, StepValue } from '@core/types/pipeline';

export interface AssignmentTarget {
  assignment: boolean;
  assignmentVariable: string;
  key: string;
}

/**
 * Split an optional `name=` prefix off a step key. The split happens at the
 * last `=`, so `a=b=local` assigns to `a=b`.
 */
export function parseAssignment(key: string): AssignmentTarget {
  const separator = key.lastIndexOf('=');
  if (separator === -1) {
    return { assignment: false, assignmentVariable: '', key };
  }
  return {
    assignment: true,
    assignmentVariable: key.slice(0, separator),
    key: key.slice(separator + 1)
  };
}

export function templateFromValue(value: StepValue): string {
  return value.type === 'reference' ? `{${value.name}}` : value.text;
}

/**
 * One pipeline entry, immutable once built. Executing it may still write
 * the captured output into the run's variables.
 */
export class Step {
  readonly originalKey: string;
  readonly assignment: boolean;
  readonly assignmentVariable: string;
  readonly normalizedKey: string;
  readonly valueTemplate: string;

  constructor(entry: StepEntry, readonly index: number) {
    const first = Object.entries(entry)[0];
    if (!first) {
      throw new ScriptLoadError(`Pipeline entry ${index} has no command`);
    }
    const [key, value] = first;
    const target = parseAssignment(key);

    this.originalKey = key;
    this.assignment = target.assignment;
    this.assignmentVariable = target.assignmentVariable;
    this.normalizedKey = target.key;
    this.valueTemplate = templateFromValue(value);
  }
}
