/**
 * Duration probe backed by the ffprobe command-line tool.
 */

import { AppError, ProbeError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { DurationProbe } from './DurationProbe';
import { runTool, type ToolResult, type ToolRunner } from './ToolRunner';

const log = new Logger('FfprobeDurationProbe');

export function buildFfprobeArgs(videoPath: string): string[] {
  return ['-i', videoPath, '-show_entries', 'format=duration', '-v', 'quiet', '-of', 'csv=p=0'];
}

export class FfprobeDurationProbe implements DurationProbe {
  constructor(
    private readonly ffprobePath: string = 'ffprobe',
    private readonly run: ToolRunner = runTool,
  ) {}

  async probeDurationSeconds(videoPath: string): Promise<number> {
    let result: ToolResult;
    try {
      result = await this.run(this.ffprobePath, buildFfprobeArgs(videoPath));
    } catch (err) {
      const detail = err instanceof AppError ? err.message : String(err);
      throw new ProbeError(videoPath, detail);
    }

    if (result.code !== 0) {
      const stderr = result.stderr.trim();
      throw new ProbeError(videoPath, `ffprobe exited with code ${result.code}${stderr ? `: ${stderr}` : ''}`);
    }

    const output = result.stdout.trim();
    const duration = Number(output);
    if (output === '' || !Number.isFinite(duration) || duration < 0) {
      throw new ProbeError(videoPath, `unexpected ffprobe output "${output}"`);
    }

    log.debug(`${videoPath}: ${duration}s`);
    return duration;
  }
}
