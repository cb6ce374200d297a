import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import * as XLSX from 'xlsx';
import { SourceError, errorMessage } from './errors';

export const DEFAULT_ISRC_COLUMN = 'ISRC';

/** Tried in order when the requested column is not in the header row. */
export const COMMON_ISRC_COLUMNS = ['ISRC', 'isrc', 'ISRC_CODE', 'isrc_code', 'Code', 'code'];

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xls', '.csv', '.ods']);

export type WorkbookReadOptions = {
  /** First sheet when unset. */
  sheetName?: string | null;
  column?: string;
  /** 1-based row holding the column names. */
  headerRow?: number;
};

/** Expand a leading `~` and resolve relative paths against `base`. */
export function resolveUserPath(input: string, base: string = process.cwd()): string {
  if (!input) return input;
  if (input.startsWith('~')) {
    const home = os.homedir() || process.env.HOME || '';
    const tail = input.slice(1);
    return path.resolve(path.join(home, tail.startsWith('/') ? tail.slice(1) : tail));
  }
  return path.resolve(base, input);
}

export function isWorkbookPath(file: string): boolean {
  return WORKBOOK_EXTENSIONS.has(path.extname(file).toLowerCase());
}

/** Pick the header cell for the ISRC column: exact name ignoring case, then the usual names. */
export function findIsrcColumn(header: readonly string[], column = DEFAULT_ISRC_COLUMN): number {
  const wanted = column.toUpperCase();
  const idx = header.findIndex((h) => h.toUpperCase() === wanted);
  if (idx !== -1) return idx;
  for (const name of COMMON_ISRC_COLUMNS) {
    const i = header.indexOf(name);
    if (i !== -1) return i;
  }
  return -1;
}

function cellText(v: unknown): string {
  if (v === null || v === undefined) return '';
  return String(v).trim();
}

/** Pull the ISRC column out of a parsed workbook. */
export function isrcsFromWorkbook(wb: XLSX.WorkBook, opts: WorkbookReadOptions = {}): string[] {
  const sheetName = opts.sheetName || wb.SheetNames[0];
  const sheet = sheetName ? wb.Sheets[sheetName] : undefined;
  if (!sheetName || !sheet) {
    throw new SourceError(
      `Sheet "${opts.sheetName ?? ''}" not found. Available sheets: ${wb.SheetNames.join(', ')}`,
    );
  }

  const headerRow = Math.max(1, Math.floor(opts.headerRow ?? 1));
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range: headerRow - 1,
    defval: null,
    blankrows: false,
  });
  const header = (rows[0] ?? []).map(cellText);
  const col = findIsrcColumn(header, opts.column ?? DEFAULT_ISRC_COLUMN);
  if (col === -1) {
    throw new SourceError(
      `Could not find ISRC column. Available columns: ${header.filter(Boolean).join(', ')}`,
    );
  }

  return rows
    .slice(1)
    .map((row) => cellText(row[col]))
    .filter(Boolean);
}

export function readIsrcsFromWorkbook(file: string, opts: WorkbookReadOptions = {}): string[] {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.readFile(resolveUserPath(file));
  } catch (err) {
    throw new SourceError(`Could not read ${file}: ${errorMessage(err)}`);
  }
  return isrcsFromWorkbook(wb, opts);
}

export const isIsrcLine = (line: string) => {
  const trimmed = line.trim();
  if (!trimmed) return false;
  if (trimmed.startsWith('#') || trimmed.startsWith('//')) return false;
  return true;
};

/** Identifiers from free text: one per line or comma-separated, comments skipped. */
export function parseIsrcList(text: string): string[] {
  return text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(isIsrcLine)
    .flatMap((line) => line.split(','))
    .map((s) => s.trim())
    .filter(Boolean);
}

export async function* lineStream(file: string | null) {
  const input = file ? fs.createReadStream(resolveUserPath(file)) : process.stdin;
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  for await (const line of rl) yield line;
}

export async function readIsrcsFromText(file: string | null): Promise<string[]> {
  const out: string[] = [];
  try {
    for await (const line of lineStream(file)) out.push(...parseIsrcList(line));
  } catch (err) {
    throw new SourceError(`Could not read ${file ?? 'stdin'}: ${errorMessage(err)}`);
  }
  return out;
}

/** Read identifiers from a workbook or a text list, chosen by file extension. */
export async function readIsrcs(file: string, opts: WorkbookReadOptions = {}): Promise<string[]> {
  if (!fs.existsSync(resolveUserPath(file))) throw new SourceError(`File not found: ${file}`);
  if (isWorkbookPath(file)) return readIsrcsFromWorkbook(file, opts);
  return readIsrcsFromText(file);
}

export const SAMPLE_WORKBOOK = 'sample_isrcs.xlsx';

const SAMPLE_ROWS: [isrc: string, title: string, notes: string][] = [
  ['USUG11904257', 'Blinding Lights', 'The Weeknd hit'],
  ['GBUM71029604', 'Someone Like You', 'Adele classic'],
  ['USUM71703861', 'Shape of You', 'Ed Sheeran popular'],
  ['USRC17607839', 'Despacito', 'Luis Fonsi ft. Daddy Yankee'],
  ['GBAHS1700133', 'Watermelon Sugar', 'Harry Styles'],
  ['INVALID_ISRC', 'Test Invalid', 'Testing error handling'],
];

/** Write a small workbook with an `ISRC` column to try the tool against. */
export function createSampleWorkbook(file: string = SAMPLE_WORKBOOK): string {
  const wb = XLSX.utils.book_new();
  const sheet = XLSX.utils.aoa_to_sheet([['ISRC', 'Song Title', 'Notes'], ...SAMPLE_ROWS]);
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  XLSX.writeFile(wb, file);
  return file;
}
