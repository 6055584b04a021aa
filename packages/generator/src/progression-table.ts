import {
  ConfigurationInfeasibleError,
  DEFAULT_GENERATOR_CONFIG,
  PuzzleBoard,
  pieceToCell,
} from '@jigsaw-world/core';

export interface ProgressionTableOptions {
  readonly width: number;
  readonly height: number;
  /** Every piece, in collection order. */
  readonly pieceOrder: readonly number[];
  readonly checksOutOfLogic: number;
  readonly tailWindow?: number;
}

export interface ProgressionTable {
  /**
   * `possibleMerges[k]`: merges logic assumes once `k` pieces are held, with
   * the out-of-logic slack taken off outside the tail window.
   */
  readonly possibleMerges: readonly number[];
  /** `actualPossibleMerges[k]`: merges really available with `k` pieces. */
  readonly actualPossibleMerges: readonly number[];
  /** `piecesNeededPerMerge[m]`: fewest pieces for which logic allows `m` merges. */
  readonly piecesNeededPerMerge: readonly number[];
}

/**
 * Inverse of `possibleMerges` for `m` in `0 .. npieces-1`. Non-decreasing by
 * construction since the scan position only moves forward.
 */
export function computePiecesNeededPerMerge(
  possibleMerges: readonly number[],
  npieces: number,
): number[] {
  const needed = [0];
  let pieces = 0;
  for (let merges = 1; merges < npieces; merges += 1) {
    while (pieces < possibleMerges.length && possibleMerges[pieces] < merges) {
      pieces += 1;
    }
    if (pieces === possibleMerges.length) {
      throw new ConfigurationInfeasibleError(
        `No piece count allows ${merges} merges.`,
        { merges, npieces },
      );
    }
    needed.push(pieces);
  }
  return needed;
}

/**
 * Replays the planned order on a fresh board and records the merge count after
 * every piece.
 */
export function buildProgressionTable(options: ProgressionTableOptions): ProgressionTable {
  const { width, height, pieceOrder, checksOutOfLogic } = options;
  const tailWindow = options.tailWindow ?? DEFAULT_GENERATOR_CONFIG.progression.tailWindow;
  const npieces = width * height;

  if (pieceOrder.length !== npieces) {
    throw new ConfigurationInfeasibleError(
      `Piece order lists ${pieceOrder.length} pieces but the puzzle has ${npieces}.`,
    );
  }

  const board = new PuzzleBoard(width, height);
  const possibleMerges = [-checksOutOfLogic];
  const actualPossibleMerges = [0];

  pieceOrder.forEach((piece, position) => {
    board.addPiece(pieceToCell(piece));
    const merges = board.mergesCount;
    const remaining = npieces - position;
    possibleMerges.push(remaining < tailWindow ? merges : merges - checksOutOfLogic);
    actualPossibleMerges.push(merges);
  });

  return {
    possibleMerges,
    actualPossibleMerges,
    piecesNeededPerMerge: computePiecesNeededPerMerge(possibleMerges, npieces),
  };
}
