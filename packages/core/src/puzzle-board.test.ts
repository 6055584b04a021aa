import { describe, expect, it } from 'vitest';

import { InvalidGridError, PieceContractError } from './errors.js';
import { PuzzleBoard } from './puzzle-board.js';

function addAll(board: PuzzleBoard, cells: readonly number[]): number[] {
  return cells.map((cell) => {
    board.addPiece(cell);
    return board.mergesCount;
  });
}

describe('PuzzleBoard', () => {
  describe('constructor', () => {
    it('starts empty with a full id pool', () => {
      const board = new PuzzleBoard(5, 3);

      expect(board.size).toBe(15);
      expect(board.capacity).toBe(8);
      expect(board.freeIdCount).toBe(8);
      expect(board.clusterCount).toBe(0);
      expect(board.mergesCount).toBe(0);
      expect(board.placedCount).toBe(0);
    });

    it('rejects non-positive or fractional dimensions', () => {
      expect(() => new PuzzleBoard(0, 3)).toThrow(InvalidGridError);
      expect(() => new PuzzleBoard(3, -1)).toThrow(InvalidGridError);
      expect(() => new PuzzleBoard(2.5, 2)).toThrow(InvalidGridError);
    });
  });

  describe('addPiece', () => {
    it('counts a touch on two members of one cluster as a single merge', () => {
      const board = new PuzzleBoard(2, 2);

      expect(addAll(board, [0, 1, 2, 3])).toEqual([0, 1, 2, 3]);
      expect(board.clusterCount).toBe(1);
      expect(board.placedCount).toBe(4);
    });

    it('adds one merge per distinct cluster joined', () => {
      const board = new PuzzleBoard(3, 1);
      board.addPiece(0);
      board.addPiece(2);
      expect(board.clusterCount).toBe(2);

      expect(board.addPiece(1)).toBe(2);
      expect(board.mergesCount).toBe(2);
      expect(board.clusterCount).toBe(1);
      expect(board.freeIdCount).toBe(1);
    });

    it('keeps the id of the largest joined cluster', () => {
      const board = new PuzzleBoard(5, 1);
      board.addPiece(0);
      board.addPiece(1);
      board.addPiece(3);
      const largest = board.clusterOf(0);

      board.addPiece(2);

      for (const cell of [0, 1, 2, 3]) {
        expect(board.clusterOf(cell)).toBe(largest);
      }
      expect(board.piecesInCluster(largest ?? -1)).toHaveLength(4);
      expect(board.freeIdCount).toBe(2);
    });

    it('breaks size ties in favour of the first neighbour in adjacency order', () => {
      const board = new PuzzleBoard(3, 1);
      board.addPiece(0);
      board.addPiece(2);
      const leftId = board.clusterOf(0);

      board.addPiece(1);

      expect(board.clusterOf(2)).toBe(leftId);
    });

    it('throws when the cell is already occupied', () => {
      const board = new PuzzleBoard(3, 3);
      board.addPiece(4);

      expect(() => board.addPiece(4)).toThrow(PieceContractError);
      expect(board.mergesCount).toBe(0);
      expect(board.placedCount).toBe(1);
    });

    it('throws for cells outside the board', () => {
      const board = new PuzzleBoard(3, 3);

      expect(() => board.addPiece(9)).toThrow(PieceContractError);
      expect(() => board.addPiece(-1)).toThrow(PieceContractError);
    });
  });

  describe('getMergesFromAddingPiece', () => {
    it('returns the same value on repeated calls without mutating the board', () => {
      const board = new PuzzleBoard(3, 1);
      board.addPiece(0);
      board.addPiece(2);

      expect(board.getMergesFromAddingPiece(1)).toBe(2);
      expect(board.getMergesFromAddingPiece(1)).toBe(2);
      expect(board.mergesCount).toBe(0);
      expect(board.placedCount).toBe(2);
      expect(board.hasPiece(1)).toBe(false);
    });

    it('returns 0 for an isolated cell', () => {
      const board = new PuzzleBoard(4, 4);
      board.addPiece(0);

      expect(board.getMergesFromAddingPiece(15)).toBe(0);
    });

    it('throws for an occupied cell', () => {
      const board = new PuzzleBoard(2, 2);
      board.addPiece(3);

      expect(() => board.getMergesFromAddingPiece(3)).toThrow(PieceContractError);
    });
  });

  describe('removePiece', () => {
    it('splits a cluster when its bridge piece is removed', () => {
      const board = new PuzzleBoard(3, 1);
      addAll(board, [0, 1, 2]);

      expect(board.removePiece(1)).toBe(-2);
      expect(board.mergesCount).toBe(0);
      expect(board.placedCount).toBe(2);
      expect(board.clusterCount).toBe(2);
      expect(board.clusterOf(0)).not.toBe(board.clusterOf(2));
      expect(board.freeIdCount + board.clusterCount).toBe(board.capacity);
    });

    it('rebuilds the remaining members into one cluster when they stay connected', () => {
      const board = new PuzzleBoard(2, 2);
      addAll(board, [0, 1, 2, 3]);

      expect(board.removePiece(0)).toBe(-1);
      expect(board.mergesCount).toBe(2);
      expect(board.clusterCount).toBe(1);
      expect(board.hasPiece(0)).toBe(false);
    });

    it('restores the merge count when the piece is added back', () => {
      const board = new PuzzleBoard(3, 1);
      addAll(board, [0, 1, 2]);

      board.removePiece(1);
      board.addPiece(1);

      expect(board.mergesCount).toBe(2);
      expect(board.clusterCount).toBe(1);
    });

    it('leaves other clusters untouched', () => {
      const board = new PuzzleBoard(5, 1);
      addAll(board, [0, 1, 3, 4]);
      const rightId = board.clusterOf(3);

      board.removePiece(0);

      expect(board.clusterOf(3)).toBe(rightId);
      expect(board.clusterOf(4)).toBe(rightId);
      expect(board.mergesCount).toBe(1);
    });

    it('throws when no piece is placed at the cell', () => {
      const board = new PuzzleBoard(3, 3);

      expect(() => board.removePiece(2)).toThrow(PieceContractError);
    });
  });

  describe('tryRemovePiece', () => {
    it('is a no-op returning 0 for an absent piece', () => {
      const board = new PuzzleBoard(3, 1);
      board.addPiece(0);
      board.addPiece(1);

      expect(board.tryRemovePiece(2)).toBe(0);
      expect(board.mergesCount).toBe(1);
      expect(board.placedCount).toBe(2);
    });

    it('removes a present piece', () => {
      const board = new PuzzleBoard(3, 1);
      board.addPiece(0);
      board.addPiece(1);

      expect(board.tryRemovePiece(1)).toBe(-1);
      expect(board.placedCount).toBe(1);
    });
  });
});
