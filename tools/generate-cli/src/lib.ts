import { readFile } from 'node:fs/promises';

import JSON5 from 'json5';

import { InMemoryGenerationHost, JigsawWorld } from '@jigsaw-world/generator';
import { encodeSlotData } from '@jigsaw-world/options-schema';

export interface CliArgs {
  seed: string;
  player: number;
  optionsPath?: string;
  pieces?: number;
  spoiler: boolean;
  verbose: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE =
  `Usage: jigsaw-generate --seed <name> [options]\n\n` +
  `Options:\n` +
  `  --seed <name>        Seed name driving every random choice (required)\n` +
  `  --player <n>         Player slot number (default: 1)\n` +
  `  --options <file>     Player options as JSON or JSON5\n` +
  `  --pieces <n>         Override number_of_pieces from the options file\n` +
  `  --spoiler            Print the spoiler summary on stderr\n` +
  `  --verbose            Log generation telemetry to the console\n`;

function readValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function readPositiveInt(argv: readonly string[], index: number, flag: string): number {
  const value = Number(readValue(argv, index, flag));
  if (!Number.isInteger(value) || value <= 0) {
    throw new CliUsageError(`${flag} <n> must be a positive integer`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    seed: '',
    player: 1,
    spoiler: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === '--seed') {
      args.seed = readValue(argv, ++i, a);
    } else if (a === '--player') {
      args.player = readPositiveInt(argv, ++i, a);
    } else if (a === '--options') {
      args.optionsPath = readValue(argv, ++i, a);
    } else if (a === '--pieces') {
      args.pieces = readPositiveInt(argv, ++i, a);
    } else if (a === '--spoiler') {
      args.spoiler = true;
    } else if (a === '--verbose') {
      args.verbose = true;
    } else if (a === '--help' || a === '-h') {
      args.help = true;
    } else {
      throw new CliUsageError(`Unknown argument: ${a}`);
    }
  }

  if (!args.help && args.seed.length === 0) {
    throw new CliUsageError('--seed <name> is required');
  }

  return args;
}

export async function loadOptionsFile(path: string): Promise<Record<string, unknown>> {
  const raw = await readFile(path, 'utf8');
  const parsed: unknown = JSON5.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CliUsageError(`${path} must contain an object of player options`);
  }
  return { ...parsed };
}

export interface GenerationOutput {
  /** Canonical JSON slot data. */
  readonly slotData: string;
  readonly spoiler: string;
  readonly precollected: readonly string[];
  readonly itemPool: readonly string[];
}

/**
 * Runs every generation step for a single player against an in-memory host.
 */
export function runGeneration(
  args: Pick<CliArgs, 'seed' | 'player' | 'pieces'>,
  options: Record<string, unknown> = {},
): GenerationOutput {
  const host = new InMemoryGenerationHost(args.seed);
  const world = new JigsawWorld({
    player: args.player,
    host,
    options: args.pieces === undefined ? options : { ...options, numberOfPieces: args.pieces },
  });

  world.generateEarly();
  const items = world.createItems();
  world.createLocations();

  return {
    slotData: encodeSlotData(world.fillSlotData()),
    spoiler: world.writeSpoiler(),
    precollected: host.precollected.map((item) => item.name),
    itemPool: items.map((item) => item.name),
  };
}
