import { ConfigurationInfeasibleError } from '@jigsaw-world/core';
import { describe, expect, it } from 'vitest';

import {
  buildProgressionTable,
  computePiecesNeededPerMerge,
} from './progression-table.js';

describe('computePiecesNeededPerMerge', () => {
  it('finds the first piece count reaching each merge', () => {
    expect(computePiecesNeededPerMerge([0, 0, 1, 2, 3], 4)).toEqual([0, 2, 3, 4]);
    expect(computePiecesNeededPerMerge([-1, -1, 0, 1, 3], 4)).toEqual([0, 3, 4, 4]);
  });

  it('rejects a table that never reaches the final merge', () => {
    expect(() => computePiecesNeededPerMerge([0, 0, 1, 1, 2], 4)).toThrow(
      ConfigurationInfeasibleError,
    );
  });
});

describe('buildProgressionTable', () => {
  it('records the merge count after every piece', () => {
    const table = buildProgressionTable({
      width: 2,
      height: 2,
      pieceOrder: [1, 2, 3, 4],
      checksOutOfLogic: 0,
    });

    expect(table).toEqual({
      possibleMerges: [0, 0, 1, 2, 3],
      actualPossibleMerges: [0, 0, 1, 2, 3],
      piecesNeededPerMerge: [0, 2, 3, 4],
    });
  });

  it('counts separated pieces as separate clusters', () => {
    const table = buildProgressionTable({
      width: 3,
      height: 1,
      pieceOrder: [1, 3, 2],
      checksOutOfLogic: 0,
    });

    expect(table.actualPossibleMerges).toEqual([0, 0, 0, 2]);
    expect(table.piecesNeededPerMerge).toEqual([0, 3, 3]);
  });

  it('skips the slack inside the tail window', () => {
    const table = buildProgressionTable({
      width: 2,
      height: 2,
      pieceOrder: [1, 2, 3, 4],
      checksOutOfLogic: 1,
    });

    expect(table.possibleMerges).toEqual([-1, 0, 1, 2, 3]);
    expect(table.actualPossibleMerges).toEqual([0, 0, 1, 2, 3]);
  });

  it('subtracts the slack before the tail window', () => {
    const table = buildProgressionTable({
      width: 2,
      height: 2,
      pieceOrder: [1, 2, 3, 4],
      checksOutOfLogic: 1,
      tailWindow: 2,
    });

    expect(table.possibleMerges).toEqual([-1, -1, 0, 1, 3]);
    expect(table.piecesNeededPerMerge).toEqual([0, 3, 4, 4]);
  });

  it('rejects an order that does not list every piece', () => {
    expect(() =>
      buildProgressionTable({ width: 2, height: 2, pieceOrder: [1, 2, 3], checksOutOfLogic: 0 }),
    ).toThrow(ConfigurationInfeasibleError);
  });
});
