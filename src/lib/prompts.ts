import readline from 'node:readline/promises';
import { DEFAULT_ISRC_COLUMN } from './isrcSource';
import { parseHeaderRow } from './parseCliArgs';

export type Ask = (question: string) => Promise<string>;

export type PromptAnswers = {
  /** null means "create and use the sample workbook". */
  file: string | null;
  column: string;
  headerRow: number;
  out: string | null;
  sheet: string | null;
};

/** Ask for the run settings one by one; an empty answer keeps the default. */
export async function promptRunOptions(ask: Ask): Promise<PromptAnswers> {
  const file = (await ask('Path to spreadsheet with ISRCs (Enter for sample): ')).trim();
  const column = (await ask(`ISRC column name (Enter for '${DEFAULT_ISRC_COLUMN}'): `)).trim();
  const headerRow = (await ask('Header row number (Enter for row 1): ')).trim();
  const out = (await ask('Output file name (Enter for auto-generated): ')).trim();
  const sheet = (await ask('Sheet name (Enter for first sheet): ')).trim();
  return {
    file: file || null,
    column: column || DEFAULT_ISRC_COLUMN,
    headerRow: headerRow ? parseHeaderRow(headerRow) : 1,
    out: out || null,
    sheet: sheet || null,
  };
}

export function terminalAsk(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): { ask: Ask; close: () => void } {
  const rl = readline.createInterface({ input, output });
  return { ask: (q) => rl.question(q), close: () => rl.close() };
}
