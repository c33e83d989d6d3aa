/**
 * Duration probe that reads the container in-process via mediabunny,
 * for hosts without ffprobe installed.
 */

import { Input, FilePathSource, ALL_FORMATS } from 'mediabunny';
import { ProbeError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { DurationProbe } from './DurationProbe';

const log = new Logger('MediabunnyDurationProbe');

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class MediabunnyDurationProbe implements DurationProbe {
  async probeDurationSeconds(videoPath: string): Promise<number> {
    let input: Input;
    try {
      input = new Input({
        source: new FilePathSource(videoPath),
        formats: ALL_FORMATS,
      });
    } catch (err) {
      throw new ProbeError(videoPath, describeError(err));
    }

    let duration: number;
    try {
      duration = await input.computeDuration();
    } catch (err) {
      throw new ProbeError(videoPath, describeError(err));
    } finally {
      input.dispose();
    }

    if (!Number.isFinite(duration) || duration < 0) {
      throw new ProbeError(videoPath, `invalid duration ${duration}`);
    }
    log.debug(`${videoPath}: ${duration}s`);
    return duration;
  }
}
