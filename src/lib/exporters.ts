import fs from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { RESULT_COLUMNS, Report, ResultRow, buildReport } from './report';
import type { ResultRecord } from './types';

export type ExportFormat = 'xlsx' | 'csv' | 'json' | 'all';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['xlsx', 'csv', 'json', 'all'];

export const MAX_COLUMN_WIDTH = 50;

/** Flat record shape shared by the CSV and JSON outputs. */
export type FlatResult = {
  isrc: string;
  release_year: string | null;
  track_name: string | null;
  artist_name: string | null;
  album_name: string | null;
  error: string | null;
};

const FLAT_COLUMNS: (keyof FlatResult)[] = [
  'isrc',
  'release_year',
  'track_name',
  'artist_name',
  'album_name',
  'error',
];

export function toFlat(r: ResultRecord): FlatResult {
  return {
    isrc: r.identifier,
    release_year: r.releaseYear,
    track_name: r.trackName,
    artist_name: r.artistName,
    album_name: r.albumName,
    error: r.errorReason,
  };
}

export function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

/** Width per column: longest cell (header included) plus 2, capped at `MAX_COLUMN_WIDTH`. */
export function columnWidths(rows: ResultRow[]): number[] {
  return RESULT_COLUMNS.map((col) => {
    const longest = rows.reduce((max, row) => Math.max(max, (row[col] ?? '').length), col.length);
    return Math.min(longest + 2, MAX_COLUMN_WIDTH);
  });
}

export function metadataRows(report: Report): string[][] {
  const { summary } = report;
  const info = [
    `Processing Date: ${formatTimestamp(summary.processedAt)}`,
    `Total ISRCs Processed: ${summary.total}`,
    `Successful: ${summary.successful}`,
    `Failed: ${summary.failed}`,
    `Success Rate: ${summary.successRate}%`,
  ];
  const errors = summary.commonErrors.map(({ error, count }) => `${error}: ${count}`);
  if (errors.length === 0) return [['Processing Information'], ...info.map((line) => [line])];

  const height = Math.max(info.length, errors.length);
  const out: string[][] = [['Processing Information', 'Common Errors']];
  for (let i = 0; i < height; i++) out.push([info[i] ?? '', errors[i] ?? '']);
  return out;
}

export function buildWorkbook(report: Report): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();

  const results = XLSX.utils.json_to_sheet(report.rows, { header: RESULT_COLUMNS });
  results['!cols'] = columnWidths(report.rows).map((wch) => ({ wch }));
  XLSX.utils.book_append_sheet(wb, results, 'Results');

  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(metadataRows(report)), 'Metadata');

  if (report.yearDistribution.length > 0) {
    const years = report.yearDistribution.map(({ year, count }) => [year, count]);
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet([['Year', 'Count'], ...years]),
      'Year Distribution',
    );
  }
  if (report.topArtists.length > 0) {
    const artists = report.topArtists.map(({ artist, count }) => [artist, count]);
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet([['Artist', 'Track Count'], ...artists]),
      'Top Artists',
    );
  }
  return wb;
}

export async function writeWorkbook(report: Report, file: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  XLSX.writeFile(buildWorkbook(report), file);
}

export function toCsv(results: readonly ResultRecord[]): string {
  const sheet = XLSX.utils.json_to_sheet(results.map(toFlat), { header: FLAT_COLUMNS });
  // sheet_to_csv may or may not end with a row separator; normalise to exactly one
  return `${XLSX.utils.sheet_to_csv(sheet).replace(/\n+$/, '')}\n`;
}

export async function writeCsv(results: readonly ResultRecord[], file: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, toCsv(results), 'utf8');
}

export async function writeJson(results: readonly ResultRecord[], file: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, `${JSON.stringify(results.map(toFlat), null, 2)}\n`, 'utf8');
}

/** `out.xlsx` → `out.csv`; a path without an extension just gets one. */
export function withExtension(file: string, ext: 'xlsx' | 'csv' | 'json'): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}.${ext}`);
}

/**
 * Write the results in `format`. `all` writes `.xlsx`, `.csv` and `.json` side by side,
 * named after `outPath` without its extension. Resolves with the paths written.
 */
export async function exportResults(
  results: readonly ResultRecord[],
  outPath: string,
  format: ExportFormat,
  processedAt = new Date(),
): Promise<string[]> {
  const written: string[] = [];
  if (format === 'xlsx' || format === 'all') {
    const file = format === 'all' ? withExtension(outPath, 'xlsx') : outPath;
    await writeWorkbook(buildReport(results, processedAt), file);
    written.push(file);
  }
  if (format === 'csv' || format === 'all') {
    const file = format === 'all' ? withExtension(outPath, 'csv') : outPath;
    await writeCsv(results, file);
    written.push(file);
  }
  if (format === 'json' || format === 'all') {
    const file = format === 'all' ? withExtension(outPath, 'json') : outPath;
    await writeJson(results, file);
    written.push(file);
  }
  return written;
}
