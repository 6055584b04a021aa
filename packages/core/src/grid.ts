import { InvalidGridError, PieceContractError } from './errors.js';

/**
 * Cell index → in-bounds orthogonal neighbours, ordered left, right, up, down.
 */
export type AdjacencyTable = readonly (readonly number[])[];

export interface GridDimensions {
  readonly width: number;
  readonly height: number;
}

export function assertGridDimensions(width: number, height: number): void {
  if (
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new InvalidGridError(width, height);
  }
}

export function buildAdjacencyTable(width: number, height: number): AdjacencyTable {
  assertGridDimensions(width, height);

  const table: (readonly number[])[] = [];
  for (let cell = 0; cell < width * height; cell += 1) {
    const x = cell % width;
    const y = Math.floor(cell / width);
    const neighbours: number[] = [];
    if (x > 0) {
      neighbours.push(cell - 1);
    }
    if (x < width - 1) {
      neighbours.push(cell + 1);
    }
    if (y > 0) {
      neighbours.push(cell - width);
    }
    if (y < height - 1) {
      neighbours.push(cell + width);
    }
    table.push(Object.freeze(neighbours));
  }
  return Object.freeze(table);
}

/**
 * Pieces are numbered from 1 in row-major order; board cells from 0.
 */
export function pieceToCell(piece: number): number {
  return piece - 1;
}

export function cellToPiece(cell: number): number {
  return cell + 1;
}

export function assertPieceId(piece: number, width: number, height: number): void {
  if (!Number.isInteger(piece) || piece < 1 || piece > width * height) {
    throw new PieceContractError(
      `Piece ${piece} is outside the ${width}×${height} puzzle.`,
      pieceToCell(piece),
    );
  }
}
