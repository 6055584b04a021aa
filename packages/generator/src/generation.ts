import {
  ConfigurationInfeasibleError,
  DEFAULT_GENERATOR_CONFIG,
  telemetry,
  type GeneratorConfig,
  type RandomSource,
} from '@jigsaw-world/core';
import type { JigsawOptions } from '@jigsaw-world/options-schema';

import { calculateOptimalGrid, resolveOrientation } from './grid-sizing.js';
import { pieceBundleName } from './items.js';
import { computeLocationBudget, type LocationBudget } from './location-layout.js';
import { planPieceOrder } from './piece-order-planner.js';
import { buildProgressionTable, type ProgressionTable } from './progression-table.js';

/**
 * Largest puzzle the location table has ids for.
 */
export const MAX_PUZZLE_PIECES = 2000;

export interface PieceProgression {
  readonly orientation: number;
  readonly nx: number;
  readonly ny: number;
  readonly npieces: number;
  readonly precollectedPieces: readonly number[];
  readonly itempoolPieces: readonly number[];
  readonly table: ProgressionTable;
  readonly budget: LocationBudget;
  /** Bundle names placed into the shared item pool. */
  readonly poolItemNames: readonly string[];
  /** Bundle sizes pushed into the start inventory. */
  readonly precollectedBundles: readonly number[];
}

export function splitIntoBundles(total: number, maxBundle: number): number[] {
  const bundles: number[] = [];
  let left = total;
  while (left > 0) {
    const size = Math.min(left, maxBundle);
    bundles.push(size);
    left -= size;
  }
  return bundles;
}

/**
 * Everything decided before locations exist: grid size, piece order, the
 * merge table and how many pieces each check hands out.
 */
export function generatePieceProgression(
  options: JigsawOptions,
  random: RandomSource,
  config: GeneratorConfig = DEFAULT_GENERATOR_CONFIG,
): PieceProgression {
  const orientation = resolveOrientation(options);
  const { nx, ny } = calculateOptimalGrid(options.numberOfPieces, orientation);
  const npieces = nx * ny;

  if (npieces > MAX_PUZZLE_PIECES) {
    throw new ConfigurationInfeasibleError(
      `A ${nx}×${ny} puzzle exceeds the ${MAX_PUZZLE_PIECES}-piece limit.`,
      { nx, ny },
    );
  }

  const plan = planPieceOrder({
    width: nx,
    height: ny,
    pieceTypeOrder: options.pieceTypeOrder,
    strictnessPieceTypeOrder: options.strictnessPieceTypeOrder,
    pieceOrder: options.pieceOrder,
    strictnessPieceOrder: options.strictnessPieceOrder,
    checksOutOfLogic: options.numberOfChecksOutOfLogic,
    random,
  });

  const table = buildProgressionTable({
    width: nx,
    height: ny,
    pieceOrder: [...plan.precollected, ...plan.itempool],
    checksOutOfLogic: options.numberOfChecksOutOfLogic,
    tailWindow: config.progression.tailWindow,
  });

  const budget = computeLocationBudget({
    npieces,
    itempoolCount: plan.itempool.length,
    percentageOfExtraPieces: options.percentageOfExtraPieces,
    percentageOfMergesThatAreChecks: options.percentageOfMergesThatAreChecks,
    maximumNumberOfChecks: options.maximumNumberOfChecks,
    maxPiecesPerLocation: config.limits.maxPiecesPerLocation,
  });

  if (budget.numberOfLocations === 0 && plan.itempool.length > 0) {
    telemetry.recordWarning('NoItemLocations', {
      npieces,
      itempool: plan.itempool.length,
    });
  }

  return {
    orientation,
    nx,
    ny,
    npieces,
    precollectedPieces: plan.precollected,
    itempoolPieces: plan.itempool,
    table,
    budget,
    poolItemNames: budget.bundleSizes.map(pieceBundleName),
    precollectedBundles: splitIntoBundles(
      plan.precollected.length,
      config.limits.maxPiecesPerBundle,
    ),
  };
}
