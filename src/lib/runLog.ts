import fs from 'node:fs/promises';
import path from 'node:path';
import type { ReportSummary } from './report';
import type { ResultRecord } from './types';

export function runLogContent(cmd: string, summary: ReportSummary, results: readonly ResultRecord[]): string {
  const failures = results.flatMap((r) =>
    r.errorReason === null ? [] : [`${r.identifier}\t${r.errorReason}`],
  );
  return [
    `CMD: ${cmd}`,
    '',
    'SUMMARY:',
    `total: ${summary.total}`,
    `successful: ${summary.successful}`,
    `failed: ${summary.failed}`,
    `success rate: ${summary.successRate}%`,
    '',
    'FAILED:',
    ...failures,
    '',
  ].join('\n');
}

/**
 * Write `logs/isrc-lookup/<name>.log` under `baseDir`. A failed write is reported on stderr
 * and resolves to null; the run itself has already succeeded by then.
 */
export async function writeRunLog(
  name: string,
  cmd: string,
  summary: ReportSummary,
  results: readonly ResultRecord[],
  baseDir: string = process.cwd(),
): Promise<string | null> {
  try {
    const logDir = path.join(baseDir, 'logs', 'isrc-lookup');
    await fs.mkdir(logDir, { recursive: true });
    const file = path.join(logDir, `${name}.log`);
    await fs.writeFile(file, runLogContent(cmd, summary, results), 'utf8');
    return file;
  } catch (e) {
    console.error('Failed to write run log:', e);
    return null;
  }
}
