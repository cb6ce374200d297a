import fs from 'node:fs';
import path from 'node:path';
import { parseCliArgs } from './parseCliArgs';
import {
  setColorEnabled,
  green,
  yellow,
  red,
  cyan,
  bold,
  dim,
  isTTY,
  colorForStatus,
  statusMark,
  statusOf,
} from './ui/colors';
import { createSpinner } from './ui/spinner';
import { LOOKUP_DELAY_MS, SPOTIFY_MARKET } from './env';
import { Credentials, DEFAULT_CONFIG_PATH, loadCredentials } from './config';
import { AuthError, ConfigError, SourceError, errorMessage } from './errors';
import type { FetchLike } from './http';
import { TokenProvider } from './tokenProvider';
import { CatalogClient } from './catalogClient';
import { BatchProgress, processIsrcList } from './batchProcessor';
import { summarize } from './report';
import { ExportFormat, exportResults } from './exporters';
import {
  SAMPLE_WORKBOOK,
  WorkbookReadOptions,
  createSampleWorkbook,
  isWorkbookPath,
  readIsrcs,
  readIsrcsFromText,
  resolveUserPath,
} from './isrcSource';
import { Ask, promptRunOptions, terminalAsk } from './prompts';
import { writeRunLog } from './runLog';
import { isMatch } from './types';
import type { ResultRecord } from './types';

export const USAGE = [
  'Usage: isrc-lookup [file] [ISRC ...] [options]',
  '',
  'Looks up release year, track, artist and album for each ISRC on Spotify.',
  '',
  'Input:',
  '  file                 .xlsx/.xls/.csv/.ods workbook or a text file with one ISRC per line',
  '  ISRC ...             literal ISRCs (also --isrc <code>, repeatable)',
  '  --column <name>      ISRC column name (default: ISRC)',
  '  --sheet <name>       sheet to read (default: first sheet)',
  '  --header-row <n>     1-based row holding the column names (default: 1)',
  '  --sample             create sample_isrcs.xlsx and process it',
  '  --interactive, -i    prompt for the settings above',
  '',
  'Output:',
  '  --out, -o <path>     report path (default: <input>_spotify_results.xlsx)',
  '  --format <fmt>       xlsx | csv | json | all (default: from --out, else xlsx)',
  '',
  'Other:',
  '  --delay <ms>         pause between requests (default: ISRC_LOOKUP_DELAY_MS or 100)',
  '  --config <path>      credentials file (default: config.json, else SPOTIFY_CLIENT_ID/SECRET)',
  '  --quiet | --verbose  output detail',
  '  --no-color           disable ANSI colours',
].join('\n');

export type RunDeps = {
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** Current time in epoch seconds, for the token cache. */
  now?: () => number;
  /** Prompt function for interactive runs; defaults to the terminal. */
  ask?: Ask;
  /** Whether stdin is a terminal, i.e. a run without input should prompt. */
  interactiveTerminal?: boolean;
  cwd?: string;
  env?: Partial<Credentials>;
};

type RunInput = {
  file: string | null;
  isrcs: string[];
  readOptions: WorkbookReadOptions;
  out: string | null;
  /** No file and no ISRCs given: read the list from stdin. */
  stdin: boolean;
};

export function inferFormat(out: string | null): ExportFormat | null {
  if (!out) return null;
  const ext = path.extname(out).toLowerCase();
  if (ext === '.xlsx') return 'xlsx';
  if (ext === '.csv') return 'csv';
  if (ext === '.json') return 'json';
  return null;
}

/** `<dir>/<stem>_spotify_results.<ext>` beside the input, or `spotify_isrc_results.<ext>`. */
export function defaultOutputPath(file: string | null, format: ExportFormat, cwd: string): string {
  const ext = format === 'all' ? 'xlsx' : format;
  if (!file) return path.join(cwd, `spotify_isrc_results.${ext}`);
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}_spotify_results.${ext}`);
}

function looksLikePath(arg: string): boolean {
  return isWorkbookPath(arg) || /[\\/]/.test(arg) || path.extname(arg).toLowerCase() === '.txt';
}

function describeResult(r: ResultRecord): string {
  const paint = colorForStatus(statusOf(r));
  if (isMatch(r)) {
    return paint(`${r.releaseYear ?? '????'} - ${r.trackName} by ${r.artistName ?? 'unknown artist'}`);
  }
  return paint(r.errorReason);
}

async function resolveInput(
  args: ReturnType<typeof parseCliArgs>,
  deps: RunDeps,
  cwd: string,
): Promise<RunInput> {
  const readOptions: WorkbookReadOptions = {
    column: args.column,
    sheetName: args.sheet,
    headerRow: args.headerRow,
  };
  const noInput = args.positionals.length === 0 && args.isrcs.length === 0 && !args.sample;
  const interactiveTerminal = deps.interactiveTerminal ?? !!process.stdin.isTTY;

  if (args.interactive || (noInput && interactiveTerminal)) {
    const terminal = deps.ask ? null : terminalAsk();
    const ask = deps.ask ?? terminal?.ask;
    if (!ask) throw new SourceError('No prompt available for interactive mode');
    try {
      const answers = await promptRunOptions(ask);
      const file = answers.file
        ? resolveUserPath(answers.file, cwd)
        : createSampleWorkbook(path.join(cwd, SAMPLE_WORKBOOK));
      if (!answers.file) console.log(`${green('✓')} Sample file created: ${file}`);
      return {
        file,
        isrcs: [],
        readOptions: { column: answers.column, sheetName: answers.sheet, headerRow: answers.headerRow },
        out: answers.out ?? args.out,
        stdin: false,
      };
    } finally {
      terminal?.close();
    }
  }

  if (args.sample) {
    const file = createSampleWorkbook(path.join(cwd, SAMPLE_WORKBOOK));
    console.log(`${green('✓')} Sample file created: ${file}`);
    return { file, isrcs: [...args.positionals, ...args.isrcs], readOptions, out: args.out, stdin: false };
  }

  let file: string | null = null;
  const isrcs: string[] = [];
  for (const arg of args.positionals) {
    const abs = path.resolve(cwd, arg);
    if (!file && fs.existsSync(abs) && fs.statSync(abs).isFile()) file = abs;
    else if (!file && looksLikePath(arg)) throw new SourceError(`File not found: ${arg}`);
    else isrcs.push(arg);
  }
  isrcs.push(...args.isrcs);
  return { file, isrcs, readOptions, out: args.out, stdin: !file && isrcs.length === 0 };
}

function printSummary(results: readonly ResultRecord[], written: string[]) {
  const summary = summarize(results);
  console.log('');
  console.log(bold('Summary:'));
  console.log(`  Σ total: ${summary.total}`);
  console.log(`  ${statusMark('success')} successful: ${summary.successful}`);
  console.log(`  ${statusMark('failed')} failed: ${summary.failed}`);
  console.log(`  success rate: ${summary.successRate}%`);
  for (const file of written) console.log(`  ${dim('→')} ${file}`);

  const successes = results.filter(isMatch).slice(0, 3);
  if (successes.length) {
    console.log('');
    console.log('Sample successful results:');
    for (const r of successes) console.log(`  ${r.identifier} → ${describeResult(r)}`);
  }
  const failures = results.filter((r) => !isMatch(r)).slice(0, 3);
  if (failures.length) {
    console.log('');
    console.log('Sample failed results:');
    for (const r of failures) console.log(`  ${r.identifier} → ${describeResult(r)}`);
  }
  return summary;
}

/**
 * Main entrypoint: resolve the ISRC input, look every code up on Spotify and export the
 * report. Resolves with the process exit code.
 */
export async function main(argv: string[] = process.argv, deps: RunDeps = {}): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.noColor) setColorEnabled(false);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.errors.length) {
    for (const e of args.errors) console.error(red(e));
    console.error(USAGE);
    return 1;
  }

  const cwd = deps.cwd ?? process.cwd();
  const quiet = args.quiet && !args.verbose; // verbose overrides quiet

  try {
    const credentials = await loadCredentials({
      configPath: args.config ? path.resolve(cwd, args.config) : path.join(cwd, DEFAULT_CONFIG_PATH),
      ...(deps.env ? { env: deps.env } : {}),
    });

    const input = await resolveInput(args, deps, cwd);
    const isrcs = [
      ...(input.file ? await readIsrcs(input.file, input.readOptions) : []),
      ...(input.stdin ? await readIsrcsFromText(null) : []),
      ...input.isrcs,
    ];
    if (isrcs.length === 0) {
      console.error('No ISRCs found (check the file, column name and header row).');
      return 2;
    }

    const format = args.format ?? inferFormat(input.out) ?? 'xlsx';
    const out = input.out ? path.resolve(cwd, input.out) : defaultOutputPath(input.file, format, cwd);
    const delayMs = args.delayMs ?? LOOKUP_DELAY_MS;

    console.log(cyan(`>>> Processing ${isrcs.length} ISRC${isrcs.length === 1 ? '' : 's'}`));
    if (!quiet) {
      console.log(`  Input: ${input.file ?? (input.stdin ? 'stdin' : 'command line')}`);
      if (input.file && isWorkbookPath(input.file)) {
        console.log(`  Column: ${input.readOptions.column}`);
        console.log(`  Header Row: ${input.readOptions.headerRow}`);
        console.log(`  Sheet: ${input.readOptions.sheetName || 'First sheet'}`);
      }
      console.log(`  Output: ${out} (${format})`);
      console.log(`  Delay: ${delayMs}ms`);
    }

    const tokens = new TokenProvider({ ...credentials, fetch: deps.fetch, now: deps.now });
    const client = new CatalogClient(tokens, {
      fetch: deps.fetch,
      ...(SPOTIFY_MARKET ? { market: SPOTIFY_MARKET } : {}),
    });

    const spinner = createSpinner(isTTY() && !args.verbose);
    const onProgress = ({ index, total, identifier, result }: BatchProgress) => {
      if (!result) {
        spinner.update(`looking up ${index}/${total}: ${identifier}`);
        return;
      }
      if (!args.verbose) return;
      console.log(`  [${index}/${total}] ${statusMark(result)} ${identifier}: ${describeResult(result)}`);
    };

    spinner.start();
    const results = await processIsrcList(client, isrcs, {
      delayMs,
      sleep: deps.sleep,
      onProgress,
    }).finally(() => spinner.stop());

    let written: string[];
    try {
      written = await exportResults(results, out, format);
    } catch (e) {
      console.error(`${red('✗')} Failed to write ${out}: ${errorMessage(e)}`);
      return 1;
    }
    const summary = printSummary(results, written);

    const log = await writeRunLog(path.parse(out).name, argv.slice(2).join(' '), summary, results, cwd);
    if (log && !quiet) console.log(`  ${dim('log:')} ${log}`);
    if (summary.failed > 0 && !quiet) console.log(yellow(`  ${summary.failed} ISRC(s) could not be matched`));
    return 0;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof SourceError) {
      console.error(`${red('✗')} ${err.message}`);
      return 1;
    }
    if (err instanceof AuthError) {
      console.error(`${red('✗')} Spotify authentication failed: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

export default main;
