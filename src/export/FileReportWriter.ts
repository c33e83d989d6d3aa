/**
 * Writes a conform report to disk. The output extension picks the format:
 * `.html`/`.htm` produce one workbook with thumbnails inlined, `.csv`
 * produces one file per sheet next to the given path.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { ValidationError } from '../core/errors';
import { Logger } from '../utils/Logger';
import { renderReportCSV, renderReportHTML, type ConformReport, type ReportSheet } from './ReportExporter';

const log = new Logger('FileReportWriter');

export interface ReportWriter {
  /** Throws ValidationError when `outputPath` cannot be written by this writer */
  checkOutputPath(outputPath: string): void;
  /** Persist the report; resolves to the paths written */
  write(report: ConformReport, outputPath: string): Promise<string[]>;
}

export type ReportFormat = 'html' | 'csv';

const IMAGE_MIME: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

const CSV_SUFFIX: Record<ReportSheet, string> = {
  framesToFix: 'frames-to-fix',
  framesNotUsed: 'frames-not-used',
};

export function csvSheetPath(outputPath: string, sheet: ReportSheet): string {
  const ext = extname(outputPath);
  return `${outputPath.slice(0, outputPath.length - ext.length)}.${CSV_SUFFIX[sheet]}${ext}`;
}

/**
 * Report format for an output path, from its extension. Throws
 * ValidationError for anything but `.html`, `.htm` and `.csv`.
 */
export function reportFormatOf(outputPath: string): ReportFormat {
  const ext = extname(outputPath).toLowerCase();
  if (ext === '.html' || ext === '.htm') return 'html';
  if (ext === '.csv') return 'csv';
  throw new ValidationError(`Unsupported report format "${ext || outputPath}" (use .html or .csv)`);
}

export class FileReportWriter implements ReportWriter {
  checkOutputPath(outputPath: string): void {
    reportFormatOf(outputPath);
  }

  async write(report: ConformReport, outputPath: string): Promise<string[]> {
    const format = reportFormatOf(outputPath);
    await mkdir(dirname(outputPath), { recursive: true });

    if (format === 'html') {
      const thumbnailSources = await this.loadThumbnails(report);
      await writeFile(outputPath, renderReportHTML(report, { thumbnailSources }), 'utf8');
      log.info(`Wrote report ${outputPath}`);
      return [outputPath];
    }

    const written: string[] = [];
    for (const sheet of ['framesToFix', 'framesNotUsed'] as const) {
      const path = csvSheetPath(outputPath, sheet);
      await writeFile(path, renderReportCSV(report, sheet), 'utf8');
      written.push(path);
    }
    log.info(`Wrote report sheets ${written.join(', ')}`);
    return written;
  }

  /** Read each thumbnail into a data URI; unreadable files are skipped. */
  private async loadThumbnails(report: ConformReport): Promise<Map<string, string>> {
    const sources = new Map<string, string>();
    for (const row of report.framesToFix) {
      const path = row.thumbnailPath;
      if (!path || sources.has(path)) continue;
      try {
        const data = await readFile(path);
        const mime = IMAGE_MIME[extname(path).toLowerCase()] ?? 'application/octet-stream';
        sources.set(path, `data:${mime};base64,${data.toString('base64')}`);
      } catch (err) {
        log.warn(`Cannot embed thumbnail ${path}`, err);
      }
    }
    return sources;
  }
}
