import {
  ConfigurationInfeasibleError,
  PuzzleBoard,
  pieceToCell,
  telemetry,
  type RandomSource,
} from '@jigsaw-world/core';
import type { PieceOrder, PieceTypeOrder } from '@jigsaw-world/options-schema';

export interface PieceClasses {
  readonly corners: readonly number[];
  readonly edges: readonly number[];
  readonly normal: readonly number[];
}

export interface PieceOrderPlanOptions {
  readonly width: number;
  readonly height: number;
  readonly pieceTypeOrder: PieceTypeOrder;
  /** 0–100; lower values bleed more pieces into earlier groups. */
  readonly strictnessPieceTypeOrder: number;
  readonly pieceOrder: PieceOrder;
  /** 0–100; chance, in percent, that `pieceOrder` is honoured for a pick. */
  readonly strictnessPieceOrder: number;
  readonly checksOutOfLogic: number;
  readonly random: RandomSource;
}

export interface PieceOrderPlan {
  /** Granted at game start, in collection order. */
  readonly precollected: readonly number[];
  /** Found during play, in the order the progression assumes. */
  readonly itempool: readonly number[];
}

/**
 * Splits 1-based piece ids by position: the four (or fewer) corners, the
 * remaining border pieces, and the interior.
 */
export function classifyPieces(width: number, height: number): PieceClasses {
  const corners: number[] = [];
  const edges: number[] = [];
  const normal: number[] = [];

  for (let cell = 0; cell < width * height; cell += 1) {
    const x = cell % width;
    const y = Math.floor(cell / width);
    const onVerticalBorder = x === 0 || x === width - 1;
    const onHorizontalBorder = y === 0 || y === height - 1;
    if (onVerticalBorder && onHorizontalBorder) {
      corners.push(cell + 1);
    } else if (onVerticalBorder || onHorizontalBorder) {
      edges.push(cell + 1);
    } else {
      normal.push(cell + 1);
    }
  }

  return { corners, edges, normal };
}

function moveFraction(from: number[], to: number[], fraction: number): void {
  const count = Math.floor(from.length * fraction);
  for (let moved = 0; moved < count && from.length > 0; moved += 1) {
    const piece = from.shift();
    if (piece !== undefined) {
      to.push(piece);
    }
  }
}

/**
 * Shuffled piece groups in hand-out order. With a strictness below 100 a
 * share of each later group is pulled forward into the group before it.
 */
export function buildPieceGroups(
  options: Pick<
    PieceOrderPlanOptions,
    'width' | 'height' | 'pieceTypeOrder' | 'strictnessPieceTypeOrder' | 'random'
  >,
): number[][] {
  const { width, height, random } = options;
  let groups: number[][];

  if (options.pieceTypeOrder === 'random_order') {
    groups = [random.shuffle(Array.from({ length: width * height }, (_, index) => index + 1))];
  } else {
    const classes = classifyPieces(width, height);
    const byName: Record<keyof PieceClasses, number[]> = {
      corners: random.shuffle([...classes.corners]),
      edges: random.shuffle([...classes.edges]),
      normal: random.shuffle([...classes.normal]),
    };
    groups = options.pieceTypeOrder
      .split('_')
      .map((name) => {
        if (name !== 'corners' && name !== 'edges' && name !== 'normal') {
          throw new ConfigurationInfeasibleError(`Unknown piece type "${name}".`);
        }
        return byName[name];
      });

    const fraction = (100 - options.strictnessPieceTypeOrder) / 100;
    moveFraction(groups[2], groups[1], fraction);
    moveFraction(groups[1], groups[0], fraction);
  }

  for (const group of groups) {
    random.shuffle(group);
  }
  return groups;
}

function removeAt(pieces: number[], index: number): number {
  const [piece] = pieces.splice(index, 1);
  return piece;
}

/**
 * Decides the order pieces become available and which of them start in the
 * player's inventory.
 *
 * A piece goes to the item pool only while the merges already possible exceed
 * the pieces queued so far plus the out-of-logic slack; otherwise there is no
 * check left to gate it behind and it is precollected.
 */
export function planPieceOrder(options: PieceOrderPlanOptions): PieceOrderPlan {
  const { random, pieceOrder, checksOutOfLogic } = options;
  const groups = buildPieceGroups(options);
  const board = new PuzzleBoard(options.width, options.height);
  const honourChance = options.strictnessPieceOrder / 100;

  const precollected: number[] = [];
  const itempool: number[] = [];
  let firstPiece = true;

  for (const pieces of groups) {
    let bestResultEver = 0;

    while (pieces.length > 0) {
      let picked: number | undefined;

      if (pieceOrder === 'random_order' || honourChance < random.next()) {
        picked = pieces.shift();
      } else if (pieceOrder === 'every_piece_fits') {
        const index = pieces.findIndex(
          (piece) => firstPiece || board.getMergesFromAddingPiece(pieceToCell(piece)) > 0,
        );
        picked = index >= 0 ? removeAt(pieces, index) : pieces.shift();
        random.shuffle(pieces);
      } else {
        let bestIndex = -1;
        // A piece can join at most four clusters.
        let bestResult = 5;
        for (let index = 0; index < pieces.length; index += 1) {
          const merges = board.getMergesFromAddingPiece(pieceToCell(pieces[index]));
          if (firstPiece || merges <= bestResultEver) {
            bestIndex = index;
            bestResult = 0;
            break;
          }
          if (merges < bestResult) {
            bestIndex = index;
            bestResult = merges;
          }
        }
        bestResultEver = bestResult;
        picked = bestIndex >= 0 ? removeAt(pieces, bestIndex) : undefined;
        random.shuffle(pieces);
      }

      if (picked === undefined) {
        throw new ConfigurationInfeasibleError('No piece could be selected.', {
          remaining: pieces.length,
        });
      }

      if (board.mergesCount > itempool.length + checksOutOfLogic) {
        itempool.push(picked);
      } else {
        precollected.push(picked);
      }

      board.addPiece(pieceToCell(picked));
      firstPiece = false;
    }
  }

  telemetry.recordProgress('PieceOrderPlanned', {
    pieces: options.width * options.height,
    precollected: precollected.length,
    itempool: itempool.length,
    pieceOrder,
    pieceTypeOrder: options.pieceTypeOrder,
  });

  return { precollected, itempool };
}
