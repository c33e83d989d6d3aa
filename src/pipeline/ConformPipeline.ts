/**
 * Conform pipeline stages.
 *
 * Ingest: manifest -> location map -> merged frame records, persisted.
 * Report: probe the video, classify the stored records against its length,
 * extract a thumbnail and clip per in-bound range, then write the report.
 */

import { join } from 'node:path';
import {
  DEFAULT_FPS,
  DEFAULT_SNIPPET_DIR,
  DEFAULT_THUMBNAIL_DIR,
  THUMBNAIL_SIZE,
  snippetFileName,
  thumbnailFileName,
} from '../config/PipelineConfig';
import { classifyFrameRecords, type NotUsedRow, type ReportRow } from '../conform/BoundClassifier';
import { parseManifest } from '../conform/ManifestReconciler';
import { mergeAnnotationLines } from '../conform/RangeMerger';
import type { FrameRecord, LocationMap } from '../conform/types';
import type { ReportWriter } from '../export/FileReportWriter';
import type { ConformReport } from '../export/ReportExporter';
import { computeTotalFrames, type DurationProbe } from '../media/DurationProbe';
import type { MediaExtractor } from '../media/MediaExtractor';
import type { RecordStore } from '../store/RecordStore';
import { Logger } from '../utils/Logger';

const log = new Logger('ConformPipeline');

/**
 * Parse and persist a facility manifest. Returns its location map for the
 * annotation stage.
 */
export async function ingestManifest(lines: Iterable<string>, store: RecordStore): Promise<LocationMap> {
  const { entry, locationMap } = parseManifest(lines);
  await store.insertManifest(entry);
  log.info(`Manifest: ${locationMap.size} location(s), job "${entry.job}"`);
  return locationMap;
}

/**
 * Merge annotation lines into frame records and persist them in ascending
 * start-frame order.
 */
export async function ingestAnnotations(
  lines: Iterable<string>,
  locationMap: LocationMap,
  store: RecordStore,
): Promise<FrameRecord[]> {
  const records = mergeAnnotationLines(lines, locationMap);
  await store.insertFrameRecords(records);
  log.info(`Annotations: stored ${records.length} frame record(s)`);
  return records;
}

function logNotUsed(rows: readonly NotUsedRow[]): void {
  let single = 0;
  let singleInBound = 0;
  let outOfBound = 0;
  for (const row of rows) {
    if (row.reason === 'out-of-bound') {
      outOfBound++;
    } else {
      single++;
      if (row.withinBound) singleInBound++;
    }
  }
  log.debug(`Not used: ${single} single frame(s) (${singleInBound} within bound), ${outOfBound} range(s) out of bound`);
}

export interface ReportJob {
  store: RecordStore;
  probe: DurationProbe;
  extractor: MediaExtractor;
  writer: ReportWriter;
  videoPath: string;
  outputPath: string;
  fps?: number;
  thumbnailDir?: string;
  snippetDir?: string;
  thumbnailSize?: string;
}

export interface ReportSummary {
  totalFrames: number;
  fixed: number;
  notUsed: number;
  thumbnailsFailed: number;
  clipsFailed: number;
  written: string[];
}

/**
 * Build and write the conform report for one video.
 *
 * An output path the writer cannot handle, or a probe failure, propagates
 * before anything is extracted or written.
 * Extraction failures are counted and logged; the row is still reported.
 */
export async function generateReport(job: ReportJob): Promise<ReportSummary> {
  const fps = job.fps ?? DEFAULT_FPS;
  const thumbnailDir = job.thumbnailDir ?? DEFAULT_THUMBNAIL_DIR;
  const snippetDir = job.snippetDir ?? DEFAULT_SNIPPET_DIR;
  const thumbnailSize = job.thumbnailSize ?? THUMBNAIL_SIZE;

  job.writer.checkOutputPath(job.outputPath);

  const durationSeconds = await job.probe.probeDurationSeconds(job.videoPath);
  const totalFrames = computeTotalFrames(durationSeconds, fps);
  log.info(`${job.videoPath}: ${durationSeconds}s, ${totalFrames} frame(s) at ${fps}fps`);

  const records = await job.store.findAllFrameRecords();
  const metadata = await job.store.findManifestMetadata();
  const { inBound, notUsed } = classifyFrameRecords(records, totalFrames, fps);
  logNotUsed(notUsed);

  const framesToFix: ReportRow[] = [];
  let thumbnailsFailed = 0;
  let clipsFailed = 0;

  for (const range of inBound) {
    const { start, end } = range.span;
    const thumbnailPath = join(thumbnailDir, thumbnailFileName(start, end));
    const clipPath = join(snippetDir, snippetFileName(start, end));

    const thumbnailOk = await job.extractor.extractThumbnail(job.videoPath, range.thumbnailFrame, thumbnailPath, thumbnailSize);
    if (!thumbnailOk) thumbnailsFailed++;

    const clipOk = await job.extractor.extractClip(job.videoPath, range.clipStartSeconds, range.clipEndSeconds, clipPath);
    if (!clipOk) clipsFailed++;

    framesToFix.push(thumbnailOk ? { ...range.row, thumbnailPath } : range.row);
  }

  if (thumbnailsFailed > 0 || clipsFailed > 0) {
    log.warn(`Artifact failures: ${thumbnailsFailed} thumbnail(s), ${clipsFailed} clip(s)`);
  }

  const report: ConformReport = {
    metadata: {
      producer: metadata?.producer ?? '',
      operator: metadata?.operator ?? '',
      job: metadata?.job ?? '',
    },
    framesToFix,
    framesNotUsed: notUsed.map(({ location, frame, timecode }) => ({ location, frame, timecode })),
  };
  const written = await job.writer.write(report, job.outputPath);

  return {
    totalFrames,
    fixed: framesToFix.length,
    notUsed: notUsed.length,
    thumbnailsFailed,
    clipsFailed,
    written,
  };
}
