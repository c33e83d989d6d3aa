/**
 * Facility manifest parsing and path reconciliation.
 *
 * A manifest is line oriented: labelled metadata lines (`Producer:`,
 * `Operator:`, `Job:`, `Notes:`) and bare location lines. Each location is
 * indexed by its stripped key so grading-tool paths can be resolved to the
 * facility's authoritative form.
 */

import { FACILITY_ROOT_PREFIX, STORAGE_ROOT_PREFIX } from '../config/LocationPrefixes';
import { MANIFEST_LABELS } from '../config/PipelineConfig';
import { stripLocationPrefix } from './LocationNormalizer';
import type { LocationMap, ManifestEntry } from './types';

export interface ParsedManifest {
  entry: ManifestEntry;
  locationMap: LocationMap;
}

type LabelKey = keyof typeof MANIFEST_LABELS;

const LABEL_KEYS: readonly LabelKey[] = ['producer', 'operator', 'job', 'notes'];

function matchLabel(line: string): LabelKey | null {
  for (const key of LABEL_KEYS) {
    if (line.startsWith(MANIFEST_LABELS[key])) return key;
  }
  return null;
}

/** Text after the first colon, trimmed. A label with no colon yields ''. */
function labelValue(line: string): string {
  const colon = line.indexOf(':');
  return colon === -1 ? '' : line.slice(colon + 1).trim();
}

/**
 * Parse manifest lines into metadata and a stripped-key location map.
 * A repeated stripped key keeps the last line seen.
 */
export function parseManifest(lines: Iterable<string>): ParsedManifest {
  const values: Record<LabelKey, string> = { producer: '', operator: '', job: '', notes: '' };
  const locationMap = new Map<string, string>();

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    const label = matchLabel(line);
    if (label) {
      values[label] = labelValue(line);
      continue;
    }

    locationMap.set(stripLocationPrefix(line, FACILITY_ROOT_PREFIX), line);
  }

  const entry: ManifestEntry = {
    producer: values.producer,
    operator: values.operator,
    job: values.job,
    ...(values.notes ? { notes: values.notes } : {}),
    locations: Array.from(locationMap, ([stripped, full]) => ({ stripped, full })),
  };

  return { entry, locationMap };
}

/**
 * Resolve a grading-tool path to its facility path, or null when the
 * manifest does not list it.
 */
export function resolveLocation(toolPath: string, locationMap: LocationMap): string | null {
  return locationMap.get(stripLocationPrefix(toolPath, STORAGE_ROOT_PREFIX)) ?? null;
}
