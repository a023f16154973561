/**
 * Command line parsing
 */

export interface CliArgs {
  termSheetPath: string;
  bookingsPath: string;
  configPath?: string;
  outputDir?: string;
  verbose: boolean;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; error: string };

export const USAGE = [
  'Usage: termrecon --term-sheet <term_sheet.json> --bookings <bookings.csv|json|xlsx> [options]',
  '',
  'Options:',
  '  --config <config.json>   Reconciliation, output, bookings and logging settings',
  '  --output-dir <dir>       Report directory (default: outputs)',
  '  --verbose                Debug logging',
  '  --help                   Show this message',
].join('\n');

const VALUE_FLAGS = {
  '--term-sheet': 'termSheetPath',
  '--bookings': 'bookingsPath',
  '--config': 'configPath',
  '--output-dir': 'outputDir',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const values: { [K in (typeof VALUE_FLAGS)[ValueFlag]]?: string } = {};
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--verbose' || arg === '-v') {
      verbose = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      return { ok: false, error: '' };
    }

    const [flag, inline] = arg.includes('=') ? arg.split(/=(.*)/s, 2) : [arg, undefined];
    if (flag === undefined || !isValueFlag(flag)) {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }

    const value = inline ?? argv[++i];
    if (value === undefined || value === '' || value.startsWith('--')) {
      return { ok: false, error: `Missing value for ${flag}` };
    }
    values[VALUE_FLAGS[flag]] = value;
  }

  const { termSheetPath, bookingsPath, configPath, outputDir } = values;
  if (!termSheetPath || !bookingsPath) {
    return { ok: false, error: 'Both --term-sheet and --bookings are required' };
  }

  return {
    ok: true,
    args: {
      termSheetPath,
      bookingsPath,
      verbose,
      ...(configPath === undefined ? {} : { configPath }),
      ...(outputDir === undefined ? {} : { outputDir }),
    },
  };
}
