/**
 * FfmpegMediaExtractor - cuts clips and grabs thumbnail frames with ffmpeg.
 *
 * Failures (tool missing, non-zero exit, unwritable output directory) are
 * logged and reported as `false`; the caller moves on to the next range.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Logger } from '../utils/Logger';
import type { MediaExtractor } from './MediaExtractor';
import { runTool, type ToolRunner } from './ToolRunner';

const log = new Logger('FfmpegMediaExtractor');

export function buildThumbnailArgs(videoPath: string, frameIndex: number, outputPath: string, size: string): string[] {
  return ['-i', videoPath, '-vf', `select=gte(n\\,${frameIndex})`, '-vframes', '1', '-s', size, outputPath, '-y'];
}

export function buildClipArgs(videoPath: string, startSeconds: number, endSeconds: number, outputPath: string): string[] {
  return ['-i', videoPath, '-ss', String(startSeconds), '-to', String(endSeconds), '-c', 'copy', outputPath, '-y'];
}

export class FfmpegMediaExtractor implements MediaExtractor {
  constructor(
    private readonly ffmpegPath: string = 'ffmpeg',
    private readonly run: ToolRunner = runTool,
  ) {}

  extractThumbnail(videoPath: string, frameIndex: number, outputPath: string, size: string): Promise<boolean> {
    return this.invoke('thumbnail', outputPath, buildThumbnailArgs(videoPath, frameIndex, outputPath, size));
  }

  extractClip(videoPath: string, startSeconds: number, endSeconds: number, outputPath: string): Promise<boolean> {
    return this.invoke('clip', outputPath, buildClipArgs(videoPath, startSeconds, endSeconds, outputPath));
  }

  private async invoke(kind: string, outputPath: string, args: string[]): Promise<boolean> {
    try {
      await mkdir(dirname(outputPath), { recursive: true });
      const result = await this.run(this.ffmpegPath, args);
      if (result.code !== 0) {
        const tail = result.stderr.trim().split('\n').pop() ?? '';
        log.warn(`ffmpeg ${kind} for ${outputPath} exited with code ${result.code}`, tail);
        return false;
      }
    } catch (err) {
      log.warn(`ffmpeg ${kind} for ${outputPath} failed`, err);
      return false;
    }
    log.debug(`Wrote ${kind} ${outputPath}`);
    return true;
  }
}
