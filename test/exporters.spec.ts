import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as XLSX from 'xlsx';
import {
  columnWidths,
  exportResults,
  formatTimestamp,
  metadataRows,
  toCsv,
  withExtension,
} from '../src/lib/exporters';
import { buildReport } from '../src/lib/report';
import { failed, matched } from '../src/lib/types';

const results = [
  matched('USUG11904257', {
    releaseYear: '2019',
    trackName: 'Blinding Lights',
    artistName: 'The Weeknd',
    albumName: 'After Hours',
  }),
  failed('INVALID_ISRC', 'Track not found'),
  matched('GBUM71029604', {
    releaseYear: '2011',
    trackName: 'Someone Like You',
    artistName: 'Adele',
    albumName: '21',
  }),
];

describe('exporters', () => {
  let tmp: string;
  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'isrc-export-'));
  });
  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  test('formatTimestamp pads every field', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });

  test('withExtension swaps or adds the extension', () => {
    expect(withExtension(path.join('out', 'report.xlsx'), 'csv')).toBe(path.join('out', 'report.csv'));
    expect(withExtension('report', 'json')).toBe('report.json');
  });

  test('column widths are the longest cell plus two, capped at 50', () => {
    const long = matched('US1', {
      releaseYear: '2000',
      trackName: 'x'.repeat(80),
      artistName: 'A',
      albumName: null,
    });
    const { rows } = buildReport([long, failed('GB2', 'Track not found')]);
    // ISRC, Release Year, Track Name, Artist Name, Album Name, Status, Error
    expect(columnWidths(rows)).toEqual([6, 14, 50, 13, 12, 9, 17]);
  });

  test('metadata lists processing information and common errors side by side', () => {
    const report = buildReport(results, new Date(2024, 5, 1, 12, 0, 0));
    expect(metadataRows(report)).toEqual([
      ['Processing Information', 'Common Errors'],
      ['Processing Date: 2024-06-01 12:00:00', 'Track not found: 1'],
      ['Total ISRCs Processed: 3', ''],
      ['Successful: 2', ''],
      ['Failed: 1', ''],
      ['Success Rate: 66.7%', ''],
    ]);
  });

  test('metadata without errors has a single column', () => {
    const report = buildReport(results.slice(0, 1), new Date(2024, 5, 1, 12, 0, 0));
    expect(metadataRows(report)[0]).toEqual(['Processing Information']);
    expect(metadataRows(report)).toHaveLength(6);
  });

  test('toCsv writes a header and empty cells for missing values', () => {
    expect(toCsv(results).split('\n')).toEqual([
      'isrc,release_year,track_name,artist_name,album_name,error',
      'USUG11904257,2019,Blinding Lights,The Weeknd,After Hours,',
      'INVALID_ISRC,,,,,Track not found',
      'GBUM71029604,2011,Someone Like You,Adele,21,',
      '',
    ]);
  });

  test('toCsv quotes values containing commas', () => {
    const csv = toCsv([
      matched('US1', { releaseYear: null, trackName: 'Hello, World', artistName: 'A', albumName: null }),
    ]);
    expect(csv.split('\n')[1]).toBe('US1,,"Hello, World",A,,');
  });

  test('xlsx export has results, metadata, year and artist sheets', async () => {
    const out = path.join(tmp, 'nested', 'report.xlsx');
    await expect(exportResults(results, out, 'xlsx')).resolves.toEqual([out]);

    const wb = XLSX.readFile(out);
    expect(wb.SheetNames).toEqual(['Results', 'Metadata', 'Year Distribution', 'Top Artists']);

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(wb.Sheets.Results, { defval: '' });
    expect(rows).toEqual([
      {
        ISRC: 'USUG11904257',
        'Release Year': '2019',
        'Track Name': 'Blinding Lights',
        'Artist Name': 'The Weeknd',
        'Album Name': 'After Hours',
        Status: 'Success',
        Error: '',
      },
      {
        ISRC: 'INVALID_ISRC',
        'Release Year': '',
        'Track Name': '',
        'Artist Name': '',
        'Album Name': '',
        Status: 'Failed',
        Error: 'Track not found',
      },
      {
        ISRC: 'GBUM71029604',
        'Release Year': '2011',
        'Track Name': 'Someone Like You',
        'Artist Name': 'Adele',
        'Album Name': '21',
        Status: 'Success',
        Error: '',
      },
    ]);

    const years = XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets['Year Distribution'], { header: 1 });
    expect(years).toEqual([
      ['Year', 'Count'],
      ['2011', 1],
      ['2019', 1],
    ]);
    const artists = XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets['Top Artists'], { header: 1 });
    expect(artists).toEqual([
      ['Artist', 'Track Count'],
      ['The Weeknd', 1],
      ['Adele', 1],
    ]);
  });

  test('xlsx export of failures only has no distribution sheets', async () => {
    const out = path.join(tmp, 'fail.xlsx');
    await exportResults([failed('X', 'Track not found')], out, 'xlsx');
    expect(XLSX.readFile(out).SheetNames).toEqual(['Results', 'Metadata']);
  });

  test('json export keeps nulls and snake_case keys', async () => {
    const out = path.join(tmp, 'report.json');
    await exportResults(results.slice(0, 2), out, 'json');
    expect(JSON.parse(await fs.readFile(out, 'utf8'))).toEqual([
      {
        isrc: 'USUG11904257',
        release_year: '2019',
        track_name: 'Blinding Lights',
        artist_name: 'The Weeknd',
        album_name: 'After Hours',
        error: null,
      },
      {
        isrc: 'INVALID_ISRC',
        release_year: null,
        track_name: null,
        artist_name: null,
        album_name: null,
        error: 'Track not found',
      },
    ]);
  });

  test('format all writes three files named after the output stem', async () => {
    const out = path.join(tmp, 'batch.xlsx');
    const written = await exportResults(results, out, 'all');
    expect(written).toEqual([
      path.join(tmp, 'batch.xlsx'),
      path.join(tmp, 'batch.csv'),
      path.join(tmp, 'batch.json'),
    ]);
    for (const file of written) await expect(fs.stat(file)).resolves.toBeTruthy();
  });

  test('a write failure is surfaced', async () => {
    const blocker = path.join(tmp, 'not-a-dir');
    await fs.writeFile(blocker, 'x');
    await expect(exportResults(results, path.join(blocker, 'out.json'), 'json')).rejects.toThrow();
  });
});
