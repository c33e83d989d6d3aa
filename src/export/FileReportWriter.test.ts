import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileReportWriter, csvSheetPath, reportFormatOf } from './FileReportWriter';
import type { ConformReport } from './ReportExporter';
import { ValidationError } from '../core/errors';
import { Logger, LogLevel } from '../utils/Logger';

describe('FileReportWriter', () => {
  let dir: string;
  let report: ConformReport;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conform-report-'));
    report = {
      metadata: { producer: 'Jane Doe', operator: 'Sam Lee', job: 'reel conform' },
      framesToFix: [{ location: '/a', frame: '1-3', timecode: 'tc', thumbnailPath: join(dir, 'thumbs', 'thumb_1_3.jpg') }],
      framesNotUsed: [{ location: '/a', frame: '5', timecode: 'tc5' }],
    };
  });

  afterEach(async () => {
    Logger.setSink(null);
    await rm(dir, { recursive: true, force: true });
  });

  it('derives per-sheet CSV paths', () => {
    expect(csvSheetPath('out/report.csv', 'framesToFix')).toBe('out/report.frames-to-fix.csv');
    expect(csvSheetPath('out/report.csv', 'framesNotUsed')).toBe('out/report.frames-not-used.csv');
  });

  it('writes two CSV sheets', async () => {
    const output = join(dir, 'out', 'report.csv');
    const written = await new FileReportWriter().write(report, output);

    expect(written).toEqual([join(dir, 'out', 'report.frames-to-fix.csv'), join(dir, 'out', 'report.frames-not-used.csv')]);
    expect(await readFile(written[1] ?? '', 'utf8')).toBe('Location,Frames to Fix,Timecode\r\n/a,5,tc5\r\n');
  });

  it('inlines existing thumbnails into the HTML workbook', async () => {
    await mkdir(join(dir, 'thumbs'), { recursive: true });
    await writeFile(join(dir, 'thumbs', 'thumb_1_3.jpg'), Buffer.from([1, 2, 3]));
    const output = join(dir, 'report.html');

    await new FileReportWriter().write(report, output);
    const html = await readFile(output, 'utf8');
    expect(html).toContain('<img src="data:image/jpeg;base64,AQID" alt="1-3">');
  });

  it('warns and falls back to the path when a thumbnail is missing', async () => {
    const sink = vi.fn();
    Logger.setSink(sink);
    const output = join(dir, 'report.htm');

    await new FileReportWriter().write(report, output);
    const html = await readFile(output, 'utf8');
    expect(html).toContain(`<td>${join(dir, 'thumbs', 'thumb_1_3.jpg')}</td>`);
    expect(sink).toHaveBeenCalledWith(
      LogLevel.WARN,
      '[FileReportWriter]',
      `Cannot embed thumbnail ${join(dir, 'thumbs', 'thumb_1_3.jpg')}`,
      expect.anything(),
    );
  });

  it('picks the format from the extension', () => {
    expect(reportFormatOf('out/report.html')).toBe('html');
    expect(reportFormatOf('out/report.HTM')).toBe('html');
    expect(reportFormatOf('report.csv')).toBe('csv');
    expect(() => reportFormatOf('report.xlsx')).toThrow('Unsupported report format ".xlsx" (use .html or .csv)');
    expect(() => reportFormatOf('report')).toThrow('Unsupported report format "report" (use .html or .csv)');
  });

  it('checkOutputPath accepts supported paths and rejects the rest', () => {
    const writer = new FileReportWriter();
    expect(() => writer.checkOutputPath('report.csv')).not.toThrow();
    expect(() => writer.checkOutputPath('report.xlsx')).toThrow(ValidationError);
  });

  it('rejects unsupported extensions without creating anything', async () => {
    await expect(new FileReportWriter().write(report, join(dir, 'out', 'report.xlsx'))).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(await readdir(dir)).toEqual([]);
  });
});
