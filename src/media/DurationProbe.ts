import { ValidationError } from '../core/errors';

/** Reports a video's duration in seconds; rejects with ProbeError on failure. */
export interface DurationProbe {
  probeDurationSeconds(videoPath: string): Promise<number>;
}

/**
 * Total frame count used as the classification bound:
 * floor(durationSeconds * fps).
 */
export function computeTotalFrames(durationSeconds: number, fps: number): number {
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new ValidationError(`Duration must be a non-negative number, got ${durationSeconds}`);
  }
  if (!Number.isInteger(fps) || fps < 1) {
    throw new ValidationError(`fps must be a positive integer, got ${fps}`);
  }
  return Math.floor(durationSeconds * fps);
}
