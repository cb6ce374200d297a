import type { ResultRecord } from './types';

export const TOP_ARTIST_LIMIT = 20;

export type ResultRow = {
  ISRC: string;
  'Release Year': string | null;
  'Track Name': string | null;
  'Artist Name': string | null;
  'Album Name': string | null;
  Status: 'Success' | 'Failed';
  Error: string;
};

export const RESULT_COLUMNS: (keyof ResultRow)[] = [
  'ISRC',
  'Release Year',
  'Track Name',
  'Artist Name',
  'Album Name',
  'Status',
  'Error',
];

export type ErrorCount = { error: string; count: number };
export type YearCount = { year: string; count: number };
export type ArtistCount = { artist: string; count: number };

export type ReportSummary = {
  total: number;
  successful: number;
  failed: number;
  /** Percentage with one decimal, e.g. `66.7`. */
  successRate: string;
  processedAt: Date;
  commonErrors: ErrorCount[];
};

export type Report = {
  rows: ResultRow[];
  summary: ReportSummary;
  yearDistribution: YearCount[];
  topArtists: ArtistCount[];
};

/** Count occurrences, keeping keys in the order they were first seen. */
function tally(values: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return counts;
}

export function toRow(r: ResultRecord): ResultRow {
  return {
    ISRC: r.identifier,
    'Release Year': r.releaseYear,
    'Track Name': r.trackName,
    'Artist Name': r.artistName,
    'Album Name': r.albumName,
    Status: r.errorReason === null ? 'Success' : 'Failed',
    Error: r.errorReason ?? '',
  };
}

export function successRate(successful: number, total: number): string {
  if (total === 0) return '0.0';
  return ((successful / total) * 100).toFixed(1);
}

export function summarize(results: readonly ResultRecord[], processedAt = new Date()): ReportSummary {
  const errors = results.flatMap((r) => (r.errorReason === null ? [] : [r.errorReason]));
  const successful = results.length - errors.length;
  return {
    total: results.length,
    successful,
    failed: errors.length,
    successRate: successRate(successful, results.length),
    processedAt,
    // keyed on message text: distinct causes with the same message share a row
    commonErrors: Array.from(tally(errors), ([error, count]) => ({ error, count })),
  };
}

export function yearDistribution(results: readonly ResultRecord[]): YearCount[] {
  const years = results.flatMap((r) => (r.releaseYear ? [r.releaseYear] : []));
  return Array.from(tally(years), ([year, count]) => ({ year, count })).sort((a, b) =>
    a.year < b.year ? -1 : a.year > b.year ? 1 : 0,
  );
}

/** Most frequent artists first; `Array#sort` is stable so ties stay in first-seen order. */
export function topArtists(results: readonly ResultRecord[], limit = TOP_ARTIST_LIMIT): ArtistCount[] {
  const artists = results.flatMap((r) => (r.artistName ? [r.artistName] : []));
  return Array.from(tally(artists), ([artist, count]) => ({ artist, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function buildReport(results: readonly ResultRecord[], processedAt = new Date()): Report {
  return {
    rows: results.map(toRow),
    summary: summarize(results, processedAt),
    yearDistribution: yearDistribution(results),
    topArtists: topArtists(results),
  };
}
