import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FPS,
  THUMBNAIL_SIZE,
  FACILITY_ROOT_PREFIX,
  STORAGE_ROOT_PREFIX,
  loadPipelineConfig,
  thumbnailFileName,
  snippetFileName,
} from './index';
import { LogLevel } from '../utils/Logger';

describe('pipeline config', () => {
  it('CFG-001: defaults when no overrides are set', () => {
    expect(loadPipelineConfig({})).toEqual({
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      fps: DEFAULT_FPS,
      thumbnailDir: 'thumbnails',
      snippetDir: 'snippets',
      thumbnailSize: THUMBNAIL_SIZE,
      storePath: '.conform-store.json',
      probe: 'ffprobe',
      logLevel: null,
    });
  });

  it('CFG-002: reads overrides from the environment', () => {
    const config = loadPipelineConfig({
      CONFORM_FFMPEG: '/opt/ffmpeg/bin/ffmpeg',
      CONFORM_FPS: '25',
      CONFORM_SNIPPET_DIR: 'out/clips',
      CONFORM_PROBE: 'Mediabunny',
      CONFORM_LOG_LEVEL: 'warn',
    });
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.fps).toBe(25);
    expect(config.snippetDir).toBe('out/clips');
    expect(config.probe).toBe('mediabunny');
    expect(config.logLevel).toBe(LogLevel.WARN);
  });

  it('CFG-003: invalid fps falls back to the default', () => {
    expect(loadPipelineConfig({ CONFORM_FPS: '0' }).fps).toBe(24);
    expect(loadPipelineConfig({ CONFORM_FPS: '23.976' }).fps).toBe(24);
    expect(loadPipelineConfig({ CONFORM_FPS: 'abc' }).fps).toBe(24);
  });

  it('CFG-004: blank overrides are ignored', () => {
    expect(loadPipelineConfig({ CONFORM_STORE: '   ' }).storePath).toBe('.conform-store.json');
  });

  it('CFG-005: artifact file names', () => {
    expect(thumbnailFileName(101, 103)).toBe('thumb_101_103.jpg');
    expect(snippetFileName(101, 103)).toBe('101-103.mp4');
  });

  it('CFG-006: prefix rules are anchored at the start', () => {
    expect(FACILITY_ROOT_PREFIX.pattern.source.startsWith('^')).toBe(true);
    expect(STORAGE_ROOT_PREFIX.pattern.source.startsWith('^')).toBe(true);
  });
});
