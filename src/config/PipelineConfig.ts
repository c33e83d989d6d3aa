/**
 * Centralized pipeline constants and environment overrides.
 *
 * Defaults live here as named constants; `loadPipelineConfig` resolves the
 * values a run may override from environment variables.
 */

import { parseLogLevel, type LogLevel } from '../utils/Logger';

/** Frame rate assumed when none is given */
export const DEFAULT_FPS = 24;

/** Thumbnail dimensions passed to the extractor (WIDTHxHEIGHT) */
export const THUMBNAIL_SIZE = '96x74';

export const DEFAULT_THUMBNAIL_DIR = 'thumbnails';
export const DEFAULT_SNIPPET_DIR = 'snippets';

/** Default location of the persisted record store */
export const DEFAULT_STORE_PATH = '.conform-store.json';

export const SHEET_FRAMES_TO_FIX = 'Frames to Fix';
export const SHEET_FRAMES_NOT_USED = 'Frames Not Used';

/** Manifest metadata labels, matched at the start of a line */
export const MANIFEST_LABELS = {
  producer: 'Producer',
  operator: 'Operator',
  job: 'Job',
  notes: 'Notes',
} as const;

export type ProbeKind = 'ffprobe' | 'mediabunny';

export function thumbnailFileName(start: number, end: number): string {
  return `thumb_${start}_${end}.jpg`;
}

export function snippetFileName(start: number, end: number): string {
  return `${start}-${end}.mp4`;
}

export interface PipelineConfig {
  ffmpegPath: string;
  ffprobePath: string;
  fps: number;
  thumbnailDir: string;
  snippetDir: string;
  thumbnailSize: string;
  storePath: string;
  probe: ProbeKind;
  logLevel: LogLevel | null;
}

function resolveFps(raw: string | undefined): number {
  if (!raw) return DEFAULT_FPS;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) return DEFAULT_FPS;
  return parsed;
}

function resolveProbe(raw: string | undefined): ProbeKind {
  const value = raw?.trim().toLowerCase();
  return value === 'mediabunny' ? 'mediabunny' : 'ffprobe';
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const value = raw?.trim();
  return value ? value : fallback;
}

/**
 * Resolve the run configuration from environment variables.
 * Invalid values fall back to the defaults above.
 */
export function loadPipelineConfig(
  env: Record<string, string | undefined> = process.env,
): PipelineConfig {
  return {
    ffmpegPath: nonEmpty(env.CONFORM_FFMPEG, 'ffmpeg'),
    ffprobePath: nonEmpty(env.CONFORM_FFPROBE, 'ffprobe'),
    fps: resolveFps(env.CONFORM_FPS),
    thumbnailDir: nonEmpty(env.CONFORM_THUMBNAIL_DIR, DEFAULT_THUMBNAIL_DIR),
    snippetDir: nonEmpty(env.CONFORM_SNIPPET_DIR, DEFAULT_SNIPPET_DIR),
    thumbnailSize: THUMBNAIL_SIZE,
    storePath: nonEmpty(env.CONFORM_STORE, DEFAULT_STORE_PATH),
    probe: resolveProbe(env.CONFORM_PROBE),
    logLevel: parseLogLevel(env.CONFORM_LOG_LEVEL),
  };
}
