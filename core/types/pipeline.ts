/**
 * Types shared by the pipeline loader and the execution core.
 */

/**
 * Value of one pipeline entry, decided where the script is decoded.
 * A `reference` is a bare variable name written without quotes in YAML
 * (`local: {name}`), which the decoder hands us as a one-key mapping.
 */
export type StepValue =
  | { type: 'text'; text: string }
  | { type: 'reference'; name: string };

/**
 * One decoded pipeline entry. Only the first pair is significant.
 */
export type StepEntry = Record<string, StepValue>;

export type StepKind = 'local' | 'manual' | 'interpreted' | 'remote';

/**
 * Where a classified step runs.
 */
export type StepTarget =
  | { kind: 'local' }
  | { kind: 'manual' }
  | { kind: 'interpreted' }
  | { kind: 'remote'; hostName: string; host: string };

/**
 * Per-run state shared by every step of a pipeline run.
 * Only `variables` is written during the run (by capturing executors).
 */
export interface ExecutionContext {
  variables: Record<string, string>;
  readonly systems: Readonly<Record<string, string>>;
  readonly imports: readonly string[];
  readonly constants: Readonly<Record<string, string>>;
}

export interface StepRunOptions {
  /** Show the manual gate before every step */
  interactive?: boolean;
  /** Absorb failures instead of asking what to do */
  force?: boolean;
}

/**
 * A pipeline script after decoding.
 */
export interface PipelineScript {
  name?: string;
  systems: Record<string, string>;
  vars: Record<string, string>;
  imports: string[];
  pipeline: StepEntry[];
  always: StepEntry[];
}

export function textValue(text: string): StepValue {
  return { type: 'text', text };
}

export function referenceValue(name: string): StepValue {
  return { type: 'reference', name };
}
