import {
  ConfigurationInfeasibleError,
  DEFAULT_GENERATOR_CONFIG,
  telemetry,
  type RandomSource,
} from '@jigsaw-world/core';

export interface LocationBudgetOptions {
  readonly npieces: number;
  readonly itempoolCount: number;
  readonly percentageOfExtraPieces: number;
  readonly percentageOfMergesThatAreChecks: number;
  readonly maximumNumberOfChecks: number;
  readonly maxPiecesPerLocation?: number;
}

export interface LocationBudget {
  /** Pieces to hand out through checks, extras included. */
  readonly piecesLeft: number;
  /** Milestones that carry a piece bundle. */
  readonly numberOfLocations: number;
  readonly minPiecesPerLocation: number;
  /** One bundle size per item location. */
  readonly bundleSizes: readonly number[];
}

export interface MilestoneLayout {
  readonly itemLocations: readonly number[];
  readonly fillerLocations: readonly number[];
}

export interface MilestoneRepairOptions extends MilestoneLayout {
  readonly npieces: number;
  readonly precollectedCount: number;
  readonly minPiecesPerLocation: number;
  readonly possibleMerges: readonly number[];
  readonly random: RandomSource;
  readonly maxRepairPasses?: number;
}

export interface MilestoneRepairResult extends MilestoneLayout {
  readonly swaps: number;
}

export function computeLocationBudget(options: LocationBudgetOptions): LocationBudget {
  const maxPiecesPerLocation =
    options.maxPiecesPerLocation ?? DEFAULT_GENERATOR_CONFIG.limits.maxPiecesPerLocation;
  const piecesLeft = Math.ceil(
    (options.itempoolCount * (100 + options.percentageOfExtraPieces)) / 100,
  );
  const numberOfLocations = Math.max(
    0,
    Math.min(
      Math.floor((options.percentageOfMergesThatAreChecks * (options.npieces - 2)) / 100),
      options.maximumNumberOfChecks,
    ),
  );

  const minPiecesPerLocation =
    numberOfLocations > 0 ? Math.ceil(piecesLeft / numberOfLocations) : 1;

  if (minPiecesPerLocation > maxPiecesPerLocation) {
    throw new ConfigurationInfeasibleError('Too many pieces per location.', {
      minPiecesPerLocation,
      maxPiecesPerLocation,
      numberOfLocations,
    });
  }

  return {
    piecesLeft,
    numberOfLocations,
    minPiecesPerLocation,
    bundleSizes: Array.from({ length: numberOfLocations }, () => minPiecesPerLocation),
  };
}

/**
 * Spreads `numberOfLocations` item milestones over `1 .. npieces-2` in runs,
 * separating the runs with filler milestones. The last milestone
 * (`npieces-1`) is the goal and is never part of the layout.
 */
export function distributeMilestones(npieces: number, numberOfLocations: number): MilestoneLayout {
  const maxScore = npieces - 1;
  let items = numberOfLocations;
  let locations = maxScore - 1;

  const itemLocations: number[] = [];
  const fillerLocations: number[] = [];

  let milestone = 1;
  while (milestone < maxScore) {
    let inARow = locations;
    let notInARow = 0;
    if (locations > items) {
      inARow = Math.floor((locations - 1) / (locations - items));
      notInARow = Math.max(1, Math.floor((locations - items) / (items + 1)));
    }
    for (let offset = 0; offset < inARow; offset += 1) {
      itemLocations.push(milestone + offset);
    }
    for (let offset = 0; offset < notInARow; offset += 1) {
      fillerLocations.push(milestone + inARow + offset);
    }
    milestone += inARow + notInARow;
    locations -= inARow + notInARow;
    items -= inARow;
  }

  return { itemLocations, fillerLocations };
}

function ascending(a: number, b: number): number {
  return a - b;
}

/**
 * Moves item milestones earlier until logic never stalls.
 *
 * Walking the milestones in order, pieces are credited for the precollected
 * set and for every item milestone passed. The first milestone whose credited
 * pieces allow no more merges than the milestone itself is a dead end: a later
 * item milestone is swapped with an earlier-or-equal filler milestone and the
 * walk restarts. Each swap moves an item strictly earlier, so the loop ends;
 * `maxRepairPasses` still bounds it.
 */
export function repairMilestones(options: MilestoneRepairOptions): MilestoneRepairResult {
  const { npieces, possibleMerges, minPiecesPerLocation, random } = options;
  const maxRepairPasses =
    options.maxRepairPasses ?? DEFAULT_GENERATOR_CONFIG.limits.maxRepairPasses;

  const itemLocations = [...options.itemLocations].sort(ascending);
  const fillerLocations = [...options.fillerLocations].sort(ascending);

  if (itemLocations.length === 0) {
    return { itemLocations, fillerLocations, swaps: 0 };
  }

  let swaps = 0;
  let passes = 0;
  let deficient = true;

  while (deficient) {
    passes += 1;
    if (passes > maxRepairPasses) {
      throw new ConfigurationInfeasibleError('Milestone repair did not converge.', {
        passes: maxRepairPasses,
        swaps,
      });
    }

    deficient = false;
    const items = new Set(itemLocations);
    let pieces = options.precollectedCount;

    for (let milestone = 1; milestone < npieces - 1; milestone += 1) {
      if (items.has(milestone)) {
        pieces += minPiecesPerLocation;
      }
      if (possibleMerges[Math.min(npieces, pieces)] !== milestone) {
        continue;
      }

      const itemCandidates = itemLocations.filter((location) => location > milestone);
      const fillerCandidates = fillerLocations.filter((location) => location <= milestone);
      if (itemCandidates.length === 0 || fillerCandidates.length === 0) {
        throw new ConfigurationInfeasibleError(
          `Failed to find a location to unlock milestone ${milestone}.`,
          { milestone, pieces, swaps },
        );
      }

      const movedItem = random.choice(itemCandidates);
      const movedFiller = random.choice(fillerCandidates);
      itemLocations.splice(itemLocations.indexOf(movedItem), 1, movedFiller);
      fillerLocations.splice(fillerLocations.indexOf(movedFiller), 1, movedItem);
      itemLocations.sort(ascending);
      fillerLocations.sort(ascending);

      swaps += 1;
      deficient = true;
      break;
    }
  }

  if (swaps > 0) {
    telemetry.recordCounters('location_repair', { swaps });
  }

  return { itemLocations, fillerLocations, swaps };
}
