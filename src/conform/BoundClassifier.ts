/**
 * Bound Classifier
 *
 * Splits merged frame records against a video's total frame count. Only
 * multi-frame ranges that fit inside the video are scheduled for
 * thumbnail and clip extraction; everything else lands in "not used".
 */

import { frameRangeToTimecode, frameToTimecode } from '../utils/Timecode';
import { parseFrameSpec } from './RangeMerger';
import type { FrameRecord, FrameSpan } from './types';

export interface ReportRow {
  location: string;
  /** `"<n>"` or `"<start>-<end>"`, as stored */
  frame: string;
  timecode: string;
  /** Generated thumbnail, set only for in-bound ranges whose extraction succeeded */
  thumbnailPath?: string;
}

/** Why a record was routed to "not used" */
export type NotUsedReason = 'single-frame' | 'out-of-bound';

export interface NotUsedRow extends ReportRow {
  reason: NotUsedReason;
  /** Whether every frame of the record is within the video */
  withinBound: boolean;
}

/** An in-bound range together with the artifact positions derived from it */
export interface InBoundRange {
  row: ReportRow;
  span: FrameSpan;
  /** Frame the thumbnail is taken from: floor((start + end) / 2) */
  thumbnailFrame: number;
  clipStartSeconds: number;
  clipEndSeconds: number;
}

export interface Classification {
  totalFrames: number;
  inBound: InBoundRange[];
  notUsed: NotUsedRow[];
}

export function isSpanInBound(span: FrameSpan, totalFrames: number): boolean {
  return span.start <= totalFrames && span.end <= totalFrames;
}

/**
 * Classify every record, preserving input order within each set.
 * Each record lands in exactly one of `inBound` / `notUsed`.
 */
export function classifyFrameRecords(
  records: readonly FrameRecord[],
  totalFrames: number,
  fps: number,
): Classification {
  const inBound: InBoundRange[] = [];
  const notUsed: NotUsedRow[] = [];

  for (const record of records) {
    const span = parseFrameSpec(record.frame);
    const withinBound = isSpanInBound(span, totalFrames);

    // Single frames never get artifacts, in bound or not.
    if (span.start === span.end) {
      notUsed.push({
        location: record.location,
        frame: record.frame,
        timecode: frameToTimecode(span.start, fps),
        reason: 'single-frame',
        withinBound,
      });
      continue;
    }

    const timecode = frameRangeToTimecode(span.start, span.end, fps);
    if (!withinBound) {
      notUsed.push({ location: record.location, frame: record.frame, timecode, reason: 'out-of-bound', withinBound });
      continue;
    }

    inBound.push({
      row: { location: record.location, frame: record.frame, timecode },
      span,
      thumbnailFrame: Math.floor((span.start + span.end) / 2),
      clipStartSeconds: span.start / fps,
      clipEndSeconds: span.end / fps,
    });
  }

  return { totalFrames, inBound, notUsed };
}
