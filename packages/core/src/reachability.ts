import { assertGridDimensions, assertPieceId } from './grid.js';

/**
 * Splits a set of 1-based piece ids into groups of orthogonally connected
 * pieces. Duplicates are ignored; the input order does not matter.
 */
export function findPieceGroups(
  pieces: Iterable<number>,
  width: number,
  height: number,
): number[][] {
  assertGridDimensions(width, height);
  const total = width * height;

  const held = new Set<number>();
  for (const piece of pieces) {
    assertPieceId(piece, width, height);
    held.add(piece);
  }

  const visited = new Set<number>();
  const groups: number[][] = [];

  for (const start of held) {
    if (visited.has(start)) {
      continue;
    }

    const group: number[] = [];
    const stack = [start];
    visited.add(start);

    for (let piece = stack.pop(); piece !== undefined; piece = stack.pop()) {
      group.push(piece);
      const column = (piece - 1) % width;
      const candidates: number[] = [];
      if (column > 0) {
        candidates.push(piece - 1);
      }
      if (column < width - 1) {
        candidates.push(piece + 1);
      }
      if (piece - width >= 1) {
        candidates.push(piece - width);
      }
      if (piece + width <= total) {
        candidates.push(piece + width);
      }

      for (const next of candidates) {
        if (held.has(next) && !visited.has(next)) {
          visited.add(next);
          stack.push(next);
        }
      }
    }

    groups.push(group);
  }

  return groups;
}

/**
 * Number of merges a player holding `pieces` can make: held pieces minus
 * connected groups. Matches `PuzzleBoard.mergesCount` after placing the same
 * pieces in any order.
 */
export function countMerges(
  pieces: Iterable<number>,
  width: number,
  height: number,
): number {
  const groups = findPieceGroups(pieces, width, height);
  let held = 0;
  for (const group of groups) {
    held += group.length;
  }
  return held - groups.length;
}
