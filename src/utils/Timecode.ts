/**
 * Frame index to broadcast timecode (HH:MM:SS:FF).
 *
 * Frames are 0-based and the rate is an integer, non-drop. Hours are not
 * wrapped at 24 and may exceed two digits on very long material.
 */

import { DEFAULT_FPS } from '../config/PipelineConfig';
import { ValidationError } from '../core/errors';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Convert a 0-based frame index to `HH:MM:SS:FF`.
 *
 * @param frame - Non-negative integer frame index
 * @param fps - Positive integer frame rate (default 24)
 */
export function frameToTimecode(frame: number, fps: number = DEFAULT_FPS): string {
  if (!Number.isInteger(frame) || frame < 0) {
    throw new ValidationError(`Frame must be a non-negative integer, got ${frame}`);
  }
  if (!Number.isInteger(fps) || fps < 1) {
    throw new ValidationError(`fps must be a positive integer, got ${fps}`);
  }

  const hours = Math.floor(frame / (fps * 3600));
  const minutes = Math.floor(frame / (fps * 60)) % 60;
  const seconds = Math.floor(frame / fps) % 60;
  const frames = frame % fps;

  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}:${pad2(frames)}`;
}

/** `HH:MM:SS:FF - HH:MM:SS:FF` for an inclusive frame range */
export function frameRangeToTimecode(start: number, end: number, fps: number = DEFAULT_FPS): string {
  return `${frameToTimecode(start, fps)} - ${frameToTimecode(end, fps)}`;
}
