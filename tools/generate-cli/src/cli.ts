#!/usr/bin/env tsx
/*
 * Generates one player's Jigsaw progression and prints the canonical slot
 * data JSON to stdout.
 */

import { createConsoleTelemetry, setTelemetry } from '@jigsaw-world/core';

import { CliUsageError, USAGE, loadOptionsFile, parseArgs, runGeneration } from './lib.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    // Keep stdout clean for JSON consumers; print help on stderr.
    console.error(USAGE);
    return;
  }
  if (args.verbose) {
    setTelemetry(createConsoleTelemetry());
  }

  const options = args.optionsPath ? await loadOptionsFile(args.optionsPath) : {};
  const output = runGeneration(args, options);

  process.stdout.write(output.slotData + '\n');
  if (args.spoiler) {
    console.error(output.spoiler);
  }
}

// eslint-disable-next-line unicorn/prefer-top-level-await
main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(`Error: ${error.message}\n`);
    console.error(USAGE);
    // eslint-disable-next-line no-process-exit
    process.exit(2);
  }
  console.error('jigsaw-generate failed:', error instanceof Error ? error.message : String(error));
  // eslint-disable-next-line no-process-exit
  process.exit(1);
});
