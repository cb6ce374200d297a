import { EXPORT_FORMATS, ExportFormat } from './exporters';
import { DEFAULT_ISRC_COLUMN } from './isrcSource';

export type CliArgs = {
  /** Non-flag arguments: an input file and/or literal ISRCs. */
  positionals: string[];
  isrcs: string[];
  column: string;
  sheet: string | null;
  headerRow: number;
  out: string | null;
  format: ExportFormat | null;
  delayMs: number | null;
  config: string | null;
  sample: boolean;
  interactive: boolean;
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
  help: boolean;
  /** Problems found while parsing, in argument order. */
  errors: string[];
};

function isExportFormat(v: string): v is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === v);
}

/** Row numbers below 1 or that do not parse fall back to row 1. */
export function parseHeaderRow(raw: string): number {
  const n = Number.parseInt(raw, 10);
  return Number.isNaN(n) || n < 1 ? 1 : n;
}

/**
 * Parse CLI arguments for the isrc-lookup command.
 *
 * Recognised flags:
 * - --isrc <code> (repeatable)
 * - --column <name>, --sheet <name>, --header-row <n>
 * - --out <path>, --format xlsx|csv|json|all
 * - --delay <ms>, --config <path>
 * - --sample, --interactive
 * - --quiet | --verbose, --no-color, --help
 */
export function parseCliArgs(argv: string[]): CliArgs {
  // Default to quiet output; --verbose prints one line per lookup
  const result: CliArgs = {
    positionals: [],
    isrcs: [],
    column: DEFAULT_ISRC_COLUMN,
    sheet: null,
    headerRow: 1,
    out: null,
    format: null,
    delayMs: null,
    config: null,
    sample: false,
    interactive: false,
    quiet: true,
    verbose: false,
    noColor: false,
    help: false,
    errors: [],
  };

  // Skip node and script path
  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    switch (arg) {
      case '--isrc': {
        const val = (argv[++i] || '').trim();
        if (val) result.isrcs.push(val);
        else result.errors.push('--isrc needs a value');
        break;
      }
      case '--column':
        result.column = (argv[++i] || '').trim() || DEFAULT_ISRC_COLUMN;
        break;
      case '--sheet':
        result.sheet = (argv[++i] || '').trim() || null;
        break;
      case '--header-row':
        result.headerRow = parseHeaderRow(argv[++i] || '');
        break;
      case '--out':
      case '-o':
        result.out = argv[++i] || null;
        break;
      case '--format': {
        const val = (argv[++i] || '').toLowerCase();
        if (isExportFormat(val)) result.format = val;
        else result.errors.push(`--format must be one of ${EXPORT_FORMATS.join(', ')}`);
        break;
      }
      case '--delay': {
        const n = Number(argv[++i]);
        if (Number.isFinite(n) && n >= 0) result.delayMs = n;
        else result.errors.push('--delay must be a non-negative number of milliseconds');
        break;
      }
      case '--config':
        result.config = argv[++i] || null;
        break;
      case '--sample':
        result.sample = true;
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--quiet':
        result.quiet = true;
        break;
      case '--verbose':
        result.verbose = true;
        result.quiet = false;
        break;
      case '--no-color':
        result.noColor = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) result.errors.push(`Unknown option: ${arg}`);
        else result.positionals.push(arg);
        break;
    }
  }
  return result;
}
