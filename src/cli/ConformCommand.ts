/**
 * Wires parsed options and configuration to the pipeline stages.
 */

import { readFile } from 'node:fs/promises';
import type { PipelineConfig } from '../config/PipelineConfig';
import { FileReportWriter, type ReportWriter } from '../export/FileReportWriter';
import type { DurationProbe } from '../media/DurationProbe';
import { FfmpegMediaExtractor } from '../media/FfmpegMediaExtractor';
import { FfprobeDurationProbe } from '../media/FfprobeDurationProbe';
import type { MediaExtractor } from '../media/MediaExtractor';
import { MediabunnyDurationProbe } from '../media/MediabunnyDurationProbe';
import { generateReport, ingestAnnotations, ingestManifest, type ReportSummary } from '../pipeline/ConformPipeline';
import { JsonFileRecordStore } from '../store/JsonFileRecordStore';
import type { RecordStore } from '../store/RecordStore';
import { Logger } from '../utils/Logger';
import type { CliOptions } from './CliArgs';

const log = new Logger('ConformCommand');

export interface ConformDeps {
  store: RecordStore;
  probe: DurationProbe;
  extractor: MediaExtractor;
  writer: ReportWriter;
  readLines: (path: string) => Promise<string[]>;
}

export interface ConformResult {
  records: number;
  report: ReportSummary | null;
}

export async function readTextLines(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf8');
  return text.split(/\r?\n/);
}

/** Default collaborators for a run, resolved from options over config. */
export function createDefaultDeps(options: CliOptions, config: PipelineConfig): ConformDeps {
  const probeKind = options.probe ?? config.probe;
  return {
    store: new JsonFileRecordStore(options.store ?? config.storePath),
    probe: probeKind === 'mediabunny' ? new MediabunnyDurationProbe() : new FfprobeDurationProbe(config.ffprobePath),
    extractor: new FfmpegMediaExtractor(config.ffmpegPath),
    writer: new FileReportWriter(),
    readLines: readTextLines,
  };
}

/**
 * Ingest both input files, then generate the report when both a video and
 * an output path were given.
 */
export async function runConform(options: CliOptions, config: PipelineConfig, deps: ConformDeps): Promise<ConformResult> {
  if (options.output) {
    deps.writer.checkOutputPath(options.output);
  }
  if (options.reset) {
    await deps.store.clear();
  }

  const locationMap = await ingestManifest(await deps.readLines(options.xytech), deps.store);
  const records = await ingestAnnotations(await deps.readLines(options.baselight), locationMap, deps.store);

  if (!options.process || !options.output) {
    if (options.process || options.output) {
      log.warn('Report skipped: --process and --output must be given together');
    }
    return { records: records.length, report: null };
  }

  const report = await generateReport({
    store: deps.store,
    probe: deps.probe,
    extractor: deps.extractor,
    writer: deps.writer,
    videoPath: options.process,
    outputPath: options.output,
    fps: options.fps ?? config.fps,
    thumbnailDir: config.thumbnailDir,
    snippetDir: config.snippetDir,
    thumbnailSize: config.thumbnailSize,
  });
  log.info(`Report: ${report.fixed} range(s) to fix, ${report.notUsed} not used`);

  return { records: records.length, report };
}
