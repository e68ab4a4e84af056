import { sortBy } from '../../util/index.js';
import type { AdvisorReport } from './reportTypes.js';

/**
 * Serialize a report to a deterministic JSON string.
 * Keys are sorted for stable diffing; the `kind` discriminator is kept.
 */
export function toJson(report: AdvisorReport, pretty: boolean): string {
  const sorted = sortKeysDeep(report);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/** Recursively sort object keys for deterministic output. */
function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of sortBy(Object.entries(value), ([name]) => name)) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}
