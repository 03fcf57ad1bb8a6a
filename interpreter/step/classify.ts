import { UnknownCommandKindError, UnknownHostError } from '@core/errors';
import type { StepTarget } from '@core/types/pipeline';
import type { Step } from './Step';

const REMOTE_MARKER = 'remote@';

/**
 * Keys that run the step text as an in-process JavaScript action.
 */
export const INTERPRETED_KEYWORDS: ReadonlySet<string> = new Set(['js', 'javascript']);

/**
 * Decide where a step runs from its normalized key. Remote host names are
 * looked up in `systems`; there is no fallback host.
 */
export function classifyStep(step: Step, systems: Readonly<Record<string, string>>): StepTarget {
  const key = step.normalizedKey;

  if (key === 'local') {
    return { kind: 'local' };
  }
  if (key === 'manual') {
    return { kind: 'manual' };
  }
  if (INTERPRETED_KEYWORDS.has(key)) {
    return { kind: 'interpreted' };
  }

  const marker = key.indexOf(REMOTE_MARKER);
  if (marker !== -1) {
    const hostName = key.slice(marker + REMOTE_MARKER.length);
    if (!Object.prototype.hasOwnProperty.call(systems, hostName)) {
      throw new UnknownHostError(hostName, Object.keys(systems));
    }
    return { kind: 'remote', hostName, host: systems[hostName] };
  }

  throw new UnknownCommandKindError(key);
}
