/**
 * Range Merger
 *
 * Maps grading-tool annotation lines onto facility locations and collapses
 * the annotated frames into maximal runs. A run breaks on a location change
 * or on any gap in frame numbers.
 */

import { ValidationError } from '../core/errors';
import { Logger } from '../utils/Logger';
import { resolveLocation } from './ManifestReconciler';
import type { FrameAnnotations, FrameRecord, FrameSpan, LocationMap } from './types';

const log = new Logger('RangeMerger');

const FRAME_TOKEN = /^\d+$/;
const FRAME_SPEC = /^(\d+)(?:-(\d+))?$/;

/**
 * Build the frame -> location map from annotation lines.
 *
 * Each line is a path token followed by frame tokens. Lines whose path does
 * not resolve are dropped whole; non-numeric tokens (`<err>`, `<null>`) and
 * frame numbers past Number.MAX_SAFE_INTEGER are skipped. A frame annotated
 * twice keeps the later location.
 */
export function collectFrameAnnotations(
  lines: Iterable<string>,
  locationMap: LocationMap,
): FrameAnnotations {
  const annotations = new Map<number, string>();
  let dropped = 0;
  let oversized = 0;

  for (const raw of lines) {
    const [pathToken, ...frameTokens] = raw.trim().split(/\s+/);
    if (!pathToken) continue;

    const location = resolveLocation(pathToken, locationMap);
    if (location === null) {
      dropped++;
      continue;
    }

    for (const token of frameTokens) {
      if (!FRAME_TOKEN.test(token)) continue;
      const frame = Number(token);
      if (!Number.isSafeInteger(frame)) {
        oversized++;
        continue;
      }
      annotations.set(frame, location);
    }
  }

  if (oversized > 0) {
    log.warn(`Skipped ${oversized} frame number(s) too large to represent exactly`);
  }

  if (dropped > 0) {
    log.debug(`Dropped ${dropped} annotation line(s) with no manifest location`);
  }
  return annotations;
}

export function formatFrameSpec(start: number, end: number): string {
  return start === end ? String(start) : `${start}-${end}`;
}

/**
 * Decode a FrameRecord's `frame` field. Throws ValidationError for anything
 * that is not `<n>` or `<start>-<end>` with start <= end.
 */
export function parseFrameSpec(spec: string): FrameSpan {
  const match = FRAME_SPEC.exec(spec.trim());
  if (!match || match[1] === undefined) {
    throw new ValidationError(`Malformed frame spec: "${spec}"`);
  }
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new ValidationError(`Frame number out of range: "${spec}"`);
  }
  if (end < start) {
    throw new ValidationError(`Frame range ends before it starts: "${spec}"`);
  }
  return { start, end };
}

/**
 * Collapse annotations into maximal runs, ascending by start frame.
 */
export function mergeFrameRuns(annotations: FrameAnnotations): FrameRecord[] {
  const sorted = Array.from(annotations).sort((a, b) => a[0] - b[0]);
  const records: FrameRecord[] = [];
  let run: { start: number; end: number; location: string } | null = null;

  for (const [frame, location] of sorted) {
    if (run && frame === run.end + 1 && location === run.location) {
      run.end = frame;
      continue;
    }
    if (run) records.push({ location: run.location, frame: formatFrameSpec(run.start, run.end) });
    run = { start: frame, end: frame, location };
  }
  if (run) records.push({ location: run.location, frame: formatFrameSpec(run.start, run.end) });

  return records;
}

/** Annotation lines straight to merged records */
export function mergeAnnotationLines(lines: Iterable<string>, locationMap: LocationMap): FrameRecord[] {
  const records = mergeFrameRuns(collectFrameAnnotations(lines, locationMap));
  log.debug(`Merged annotations into ${records.length} record(s)`);
  return records;
}
