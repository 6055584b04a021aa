import {
  ConfigurationInfeasibleError,
  createRandomSource,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
} from '@jigsaw-world/core';
import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  computeLocationBudget,
  distributeMilestones,
  repairMilestones,
} from './location-layout.js';

describe('computeLocationBudget', () => {
  it('spreads the item pool plus extras over every merge', () => {
    expect(
      computeLocationBudget({
        npieces: 25,
        itempoolCount: 20,
        percentageOfExtraPieces: 10,
        percentageOfMergesThatAreChecks: 100,
        maximumNumberOfChecks: 1000,
      }),
    ).toEqual({
      piecesLeft: 22,
      numberOfLocations: 23,
      minPiecesPerLocation: 1,
      bundleSizes: Array.from({ length: 23 }, () => 1),
    });
  });

  it('rounds the share of checks down and bundles up', () => {
    const budget = computeLocationBudget({
      npieces: 25,
      itempoolCount: 20,
      percentageOfExtraPieces: 0,
      percentageOfMergesThatAreChecks: 50,
      maximumNumberOfChecks: 1000,
    });

    expect(budget.numberOfLocations).toBe(11);
    expect(budget.minPiecesPerLocation).toBe(2);
    expect(budget.bundleSizes).toHaveLength(11);
  });

  it('caps the number of checks', () => {
    const budget = computeLocationBudget({
      npieces: 25,
      itempoolCount: 20,
      percentageOfExtraPieces: 0,
      percentageOfMergesThatAreChecks: 100,
      maximumNumberOfChecks: 4,
    });

    expect(budget.numberOfLocations).toBe(4);
    expect(budget.minPiecesPerLocation).toBe(5);
  });

  it('falls back to one piece per location when there are no checks', () => {
    expect(
      computeLocationBudget({
        npieces: 25,
        itempoolCount: 20,
        percentageOfExtraPieces: 0,
        percentageOfMergesThatAreChecks: 1,
        maximumNumberOfChecks: 1000,
      }),
    ).toEqual({ piecesLeft: 20, numberOfLocations: 0, minPiecesPerLocation: 1, bundleSizes: [] });
  });

  it('rejects bundles above the per-location limit', () => {
    expect(() =>
      computeLocationBudget({
        npieces: 25,
        itempoolCount: 20,
        percentageOfExtraPieces: 0,
        percentageOfMergesThatAreChecks: 50,
        maximumNumberOfChecks: 1000,
        maxPiecesPerLocation: 1,
      }),
    ).toThrow(ConfigurationInfeasibleError);
  });
});

describe('distributeMilestones', () => {
  it('alternates items and filler when half the merges are checks', () => {
    expect(distributeMilestones(6, 2)).toEqual({
      itemLocations: [1, 3],
      fillerLocations: [2, 4],
    });
  });

  it('fills every milestone but the goal with items when possible', () => {
    expect(distributeMilestones(5, 3)).toEqual({
      itemLocations: [1, 2, 3],
      fillerLocations: [],
    });
  });

  it('uses only filler when there are no item locations', () => {
    expect(distributeMilestones(6, 0)).toEqual({
      itemLocations: [],
      fillerLocations: [1, 2, 3, 4],
    });
  });

  it('puts the spare filler after the last item run', () => {
    expect(distributeMilestones(10, 3)).toEqual({
      itemLocations: [1, 3, 5],
      fillerLocations: [2, 4, 6, 7, 8],
    });
  });
});

describe('repairMilestones', () => {
  afterEach(() => {
    resetTelemetry();
  });

  const possibleMerges = [0, 0, 1, 2, 3, 4];

  it('leaves a layout without dead ends untouched', () => {
    const result = repairMilestones({
      npieces: 5,
      precollectedCount: 2,
      minPiecesPerLocation: 2,
      possibleMerges,
      itemLocations: [1, 3],
      fillerLocations: [2],
      random: createRandomSource(1),
    });

    expect(result).toEqual({ itemLocations: [1, 3], fillerLocations: [2], swaps: 0 });
  });

  it('moves an item milestone in front of a dead end', () => {
    const recordCounters = vi.fn();
    setTelemetry({ ...silentTelemetry, recordCounters });

    const result = repairMilestones({
      npieces: 5,
      precollectedCount: 2,
      minPiecesPerLocation: 2,
      possibleMerges,
      itemLocations: [2, 3],
      fillerLocations: [1],
      random: createRandomSource(5),
    });

    expect(result.swaps).toBe(1);
    expect(result.itemLocations).toHaveLength(2);
    expect(result.itemLocations[0]).toBe(1);
    expect([...result.itemLocations, ...result.fillerLocations].sort((a, b) => a - b)).toEqual([
      1, 2, 3,
    ]);
    expect(recordCounters).toHaveBeenCalledWith('location_repair', { swaps: 1 });
  });

  it('fails when no earlier filler milestone is left to swap', () => {
    expect(() =>
      repairMilestones({
        npieces: 5,
        precollectedCount: 2,
        minPiecesPerLocation: 1,
        possibleMerges,
        itemLocations: [2, 3],
        fillerLocations: [1],
        random: createRandomSource(5),
      }),
    ).toThrow(ConfigurationInfeasibleError);
  });

  it('gives up after the configured number of passes', () => {
    expect(() =>
      repairMilestones({
        npieces: 5,
        precollectedCount: 2,
        minPiecesPerLocation: 2,
        possibleMerges,
        itemLocations: [2, 3],
        fillerLocations: [1],
        random: createRandomSource(5),
        maxRepairPasses: 1,
      }),
    ).toThrow('Milestone repair did not converge.');
  });

  it('skips the repair when there are no item locations', () => {
    const result = repairMilestones({
      npieces: 5,
      precollectedCount: 0,
      minPiecesPerLocation: 1,
      possibleMerges: [0, 0, 0, 0, 0, 4],
      itemLocations: [],
      fillerLocations: [1, 2, 3],
      random: createRandomSource(5),
    });

    expect(result).toEqual({ itemLocations: [], fillerLocations: [1, 2, 3], swaps: 0 });
  });
});
