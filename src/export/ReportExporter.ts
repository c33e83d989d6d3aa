/**
 * Conform Report Exporter
 *
 * Renders a conform report as CSV sheets or a single HTML workbook.
 * The "Frames to Fix" sheet carries the manifest metadata and one row per
 * in-bound range (with its thumbnail); "Frames Not Used" lists everything
 * else. All functions here are pure.
 */

import { SHEET_FRAMES_NOT_USED, SHEET_FRAMES_TO_FIX } from '../config/PipelineConfig';
import type { ReportRow } from '../conform/BoundClassifier';

// ---------------------------------------------------------------------------
// Data Model
// ---------------------------------------------------------------------------

export interface ReportMetadata {
  producer: string;
  operator: string;
  job: string;
}

export interface ConformReport {
  metadata: ReportMetadata;
  framesToFix: ReportRow[];
  framesNotUsed: ReportRow[];
}

export type ReportSheet = 'framesToFix' | 'framesNotUsed';

export const SHEET_TITLES: Record<ReportSheet, string> = {
  framesToFix: SHEET_FRAMES_TO_FIX,
  framesNotUsed: SHEET_FRAMES_NOT_USED,
};

export interface HTMLReportOptions {
  title?: string;
  /** Thumbnail path -> image source (data URI or relative URL) */
  thumbnailSources?: ReadonlyMap<string, string>;
}

const FIX_HEADER = ['Location', 'Frames to Fix', 'Timecode', 'Thumbnail'];
const NOT_USED_HEADER = ['Location', 'Frames to Fix', 'Timecode'];

// ---------------------------------------------------------------------------
// CSV helpers (RFC 4180)
// ---------------------------------------------------------------------------

/**
 * Escape a single field for CSV per RFC 4180:
 * - If the field contains a comma, double-quote, or newline, wrap in double-quotes
 * - Double-quotes inside the field are escaped by doubling them
 */
export function escapeCSVField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

function csvLine(fields: string[]): string {
  return fields.map(escapeCSVField).join(',');
}

/**
 * Render one sheet as CSV with CRLF line endings.
 */
export function renderReportCSV(report: ConformReport, sheet: ReportSheet): string {
  const lines: string[] = [];

  if (sheet === 'framesToFix') {
    const { producer, operator, job } = report.metadata;
    lines.push(csvLine(['Producer', producer]), csvLine(['Operator', operator]), csvLine(['Job', job]), '');
    lines.push(csvLine(FIX_HEADER));
    for (const row of report.framesToFix) {
      lines.push(csvLine([row.location, row.frame, row.timecode, row.thumbnailPath ?? '']));
    }
  } else {
    lines.push(csvLine(NOT_USED_HEADER));
    for (const row of report.framesNotUsed) {
      lines.push(csvLine([row.location, row.frame, row.timecode]));
    }
  }

  return lines.join('\r\n') + '\r\n';
}

// ---------------------------------------------------------------------------
// HTML generation
// ---------------------------------------------------------------------------

export function escapeHTML(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function thumbnailCell(row: ReportRow, sources: ReadonlyMap<string, string> | undefined): string {
  if (!row.thumbnailPath) return '<td></td>';
  const src = sources?.get(row.thumbnailPath);
  if (!src) return `<td>${escapeHTML(row.thumbnailPath)}</td>`;
  return `<td><img src="${escapeHTML(src)}" alt="${escapeHTML(row.frame)}"></td>`;
}

function headerRow(columns: string[]): string {
  return `<tr>${columns.map(c => `<th>${escapeHTML(c)}</th>`).join('')}</tr>`;
}

/**
 * Render both sheets into one HTML document. Thumbnails are shown as images
 * when a source is supplied for their path, otherwise as the path text.
 */
export function renderReportHTML(report: ConformReport, options: HTMLReportOptions = {}): string {
  const title = options.title || 'Conform Report';
  const { producer, operator, job } = report.metadata;

  const fixRows = report.framesToFix
    .map(row =>
      `<tr><td>${escapeHTML(row.location)}</td><td>${escapeHTML(row.frame)}</td><td>${escapeHTML(row.timecode)}</td>${thumbnailCell(row, options.thumbnailSources)}</tr>`,
    )
    .join('\n');

  const notUsedRows = report.framesNotUsed
    .map(row => `<tr><td>${escapeHTML(row.location)}</td><td>${escapeHTML(row.frame)}</td><td>${escapeHTML(row.timecode)}</td></tr>`)
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHTML(title)}</title>
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 2em; color: #1a1a2e; }
  table { border-collapse: collapse; width: 100%; margin-top: 1em; }
  th, td { border: 1px solid #ddd; padding: 8px 12px; text-align: left; }
  th { background: #f0f0f5; font-weight: 600; }
  dl { display: grid; grid-template-columns: max-content auto; gap: 4px 16px; }
  dt { font-weight: 600; }
  img { width: 96px; height: 74px; }
</style>
</head>
<body>
<h1>${escapeHTML(title)}</h1>
<section id="frames-to-fix">
<h2>${escapeHTML(SHEET_TITLES.framesToFix)}</h2>
<dl>
<dt>Producer</dt><dd>${escapeHTML(producer)}</dd>
<dt>Operator</dt><dd>${escapeHTML(operator)}</dd>
<dt>Job</dt><dd>${escapeHTML(job)}</dd>
</dl>
<table>
<thead>
${headerRow(FIX_HEADER)}
</thead>
<tbody>
${fixRows}
</tbody>
</table>
</section>
<section id="frames-not-used">
<h2>${escapeHTML(SHEET_TITLES.framesNotUsed)}</h2>
<table>
<thead>
${headerRow(NOT_USED_HEADER)}
</thead>
<tbody>
${notUsedRows}
</tbody>
</table>
</section>
</body>
</html>`;
}
