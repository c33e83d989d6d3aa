/**
 * Clip and thumbnail extraction seam. Implementations report failure through
 * the returned flag and never throw for tool failures.
 */
export interface MediaExtractor {
  extractClip(videoPath: string, startSeconds: number, endSeconds: number, outputPath: string): Promise<boolean>;
  extractThumbnail(videoPath: string, frameIndex: number, outputPath: string, size: string): Promise<boolean>;
}
