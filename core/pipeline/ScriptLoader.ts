import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { ScriptLoadError } from '@core/errors';
import {
  referenceValue,
  textValue,
  type PipelineScript,
  type StepEntry,
  type StepValue
} from '@core/types/pipeline';

/**
 * Reads pipeline scripts from YAML files.
 */
export class ScriptLoader {
  async load(filePath: string): Promise<PipelineScript> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ScriptLoadError(`Cannot read script: ${message}`, filePath, error);
    }
    return parseScript(content, filePath);
  }
}

/**
 * Decode a YAML pipeline script.
 *
 * The core schema is used so that values such as dates stay text.
 */
export function parseScript(content: string, source?: string): PipelineScript {
  let document: unknown;
  try {
    document = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: source });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ScriptLoadError(`Invalid YAML: ${message}`, source, error);
  }

  if (!isRecord(document)) {
    throw new ScriptLoadError('Script must be a mapping', source);
  }
  if (document.pipeline === undefined) {
    throw new ScriptLoadError('Script has no "pipeline" section', source);
  }

  return {
    name: document.name === undefined || document.name === null ? undefined : String(document.name),
    systems: decodeScalarMap(document.systems, 'systems', source),
    vars: decodeScalarMap(document.vars, 'vars', source),
    imports: decodeImports(document.imports, source),
    pipeline: decodeSteps(document.pipeline, 'pipeline', source),
    always: document.always === undefined || document.always === null
      ? []
      : decodeSteps(document.always, 'always', source)
  };
}

/**
 * Decode one list item of `pipeline` or `always`.
 */
export function decodeStepEntry(item: unknown, index: number, section = 'pipeline', source?: string): StepEntry {
  if (!isRecord(item) || Object.keys(item).length === 0) {
    throw new ScriptLoadError(`${section} item ${index} must be a "key: command" mapping`, source);
  }

  const entry: StepEntry = {};
  for (const [key, value] of Object.entries(item)) {
    entry[key] = decodeStepValue(value, `${section} item ${index} ("${key}")`, source);
  }
  return entry;
}

function decodeStepValue(value: unknown, where: string, source?: string): StepValue {
  if (value === null || value === undefined) {
    return textValue('');
  }
  if (typeof value === 'string') {
    return textValue(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return textValue(String(value));
  }
  // `local: {name}` without quotes reaches us as the mapping { name: null }
  if (isRecord(value)) {
    const keys = Object.keys(value);
    if (keys.length === 1) {
      return referenceValue(keys[0]);
    }
  }
  throw new ScriptLoadError(`Unsupported command value in ${where}; quote the command text`, source);
}

function decodeSteps(raw: unknown, section: string, source?: string): StepEntry[] {
  if (!Array.isArray(raw)) {
    throw new ScriptLoadError(`"${section}" must be a list`, source);
  }
  return raw.map((item: unknown, position) => decodeStepEntry(item, position + 1, section, source));
}

function decodeScalarMap(raw: unknown, section: string, source?: string): Record<string, string> {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ScriptLoadError(`"${section}" must be a mapping`, source);
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null) {
      result[key] = '';
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[key] = String(value);
    } else {
      throw new ScriptLoadError(`"${section}.${key}" must be a scalar value`, source);
    }
  }
  return result;
}

function decodeImports(raw: unknown, source?: string): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw) || !raw.every((item: unknown): item is string => typeof item === 'string')) {
    throw new ScriptLoadError('"imports" must be a list of file names', source);
  }
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
