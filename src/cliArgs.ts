import { SelectionOptions } from './types';
import { SelectionError, UsageError } from './utils/errors';

export interface CliOptions {
  selection: SelectionOptions;
  outputDir?: string;
  configPath?: string;
  skipExisting: boolean;
  verbose: boolean;
  help: boolean;
}

const INTEGER_FLAGS = {
  '--sequence': 'sequence',
  '--single': 'single',
  '--limit': 'limit',
  '--table': 'table',
  '--item': 'item',
} as const;

type IntegerFlag = keyof typeof INTEGER_FLAGS;

function isIntegerFlag(flag: string): flag is IntegerFlag {
  return Object.prototype.hasOwnProperty.call(INTEGER_FLAGS, flag);
}

function parseInteger(flag: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new SelectionError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    selection: {},
    skipExisting: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    // Accept both "--flag value" and "--flag=value"
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inlineValue = eq > 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    if (isIntegerFlag(flag)) {
      options.selection[INTEGER_FLAGS[flag]] = parseInteger(flag, takeValue());
    } else if (flag === '--range') {
      options.selection.range = takeValue();
    } else if (flag === '--book-id') {
      options.selection.bookId = takeValue();
    } else if (flag === '--output' || flag === '-o') {
      options.outputDir = takeValue();
    } else if (flag === '--config' || flag === '-c') {
      options.configPath = takeValue();
    } else if (flag === '--skip-existing') {
      options.skipExisting = true;
    } else if (flag === '--verbose' || flag === '-v') {
      options.verbose = true;
    } else if (flag === '--help' || flag === '-h') {
      options.help = true;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export const USAGE = `
Usage: textbook-dl [mode] [options]

Download modes (one per run; precedence top to bottom):
  --book-id ID        Download the book with this id
  --sequence N        Download the Nth book across all catalogs (1-based)
  --range A-B         Download books A..B by global sequence number ("A" alone for one)
  --single N          Legacy: only the Nth book counted from --table/--item
  --limit N           Legacy: stop after N books
  --table N           Legacy: start from catalog N (0-based)
  --item N            Legacy: start from item N within that catalog (0-based)

Options:
  -o, --output DIR    Output directory
  -c, --config PATH   Configuration file (default ./config.json)
  --skip-existing     Keep documents that are already downloaded and valid
  -v, --verbose       Debug logging
  -h, --help          Show this help

Examples:
  textbook-dl --sequence 2548
  textbook-dl --range 1-5
  textbook-dl --table 1 --item 5 --limit 10
`;
