#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   termrecon --term-sheet ./term_sheet.json --bookings ./bookings.csv
 */

import { USAGE, parseCliArgs } from './args.js';
import { runReconciliation } from './run.js';

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));

  if (!parsed.ok) {
    if (parsed.error) {
      console.error(parsed.error);
      console.error('');
    }
    console.error(USAGE);
    process.exit(1);
  }

  const { exitCode } = await runReconciliation(parsed.args);
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
