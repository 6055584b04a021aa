import { PieceContractError } from './errors.js';
import { buildAdjacencyTable, type AdjacencyTable } from './grid.js';

const EMPTY = -1;

/**
 * Incremental cluster tracker for pieces placed on a `width × height` grid.
 *
 * Every placed cell stores the id of the cluster it belongs to. Cluster ids
 * come from a fixed pool sized for the worst case (a checkerboard of isolated
 * pieces) and are recycled whenever a cluster is absorbed or torn down.
 *
 * `mergesCount` always equals `placedCount - clusterCount`:
 *
 * - a piece touching no cluster opens a new one (no merge);
 * - a piece touching one cluster joins it (+1);
 * - a piece touching `k` distinct clusters joins them all (+k). The largest
 *   cluster keeps its id; members of the others are relabelled, so a piece is
 *   only ever moved into a cluster at least as large as its own.
 */
export class PuzzleBoard {
  readonly width: number;
  readonly height: number;
  readonly adjacency: AdjacencyTable;
  readonly capacity: number;

  private readonly board: Int32Array;
  private readonly clusters: (number[] | undefined)[];
  private readonly unusedIds: number[];
  private merges = 0;
  private placed = 0;

  constructor(width: number, height: number) {
    this.adjacency = buildAdjacencyTable(width, height);
    this.width = width;
    this.height = height;

    const size = width * height;
    this.capacity = Math.ceil(size / 2);
    this.board = new Int32Array(size).fill(EMPTY);
    this.clusters = new Array<number[] | undefined>(this.capacity).fill(undefined);
    this.unusedIds = Array.from({ length: this.capacity }, (_, id) => id);
  }

  get mergesCount(): number {
    return this.merges;
  }

  get placedCount(): number {
    return this.placed;
  }

  get clusterCount(): number {
    return this.capacity - this.unusedIds.length;
  }

  get freeIdCount(): number {
    return this.unusedIds.length;
  }

  get size(): number {
    return this.board.length;
  }

  hasPiece(cell: number): boolean {
    this.assertInBounds(cell);
    return this.board[cell] !== EMPTY;
  }

  clusterOf(cell: number): number | undefined {
    this.assertInBounds(cell);
    const id = this.board[cell];
    return id === EMPTY ? undefined : id;
  }

  piecesInCluster(id: number): readonly number[] {
    return this.clusters[id] ?? [];
  }

  /**
   * Places a piece and returns the number of merges it produced.
   */
  addPiece(cell: number): number {
    this.assertEmpty(cell, 'add');
    const board = this.board;
    const found = this.adjacentClusters(cell);

    if (found.length === 0) {
      const id = this.unusedIds.pop();
      if (id === undefined) {
        throw new PieceContractError(
          `No free cluster id left while placing cell ${cell}.`,
          cell,
        );
      }
      board[cell] = id;
      this.clusters[id] = [cell];
      this.placed += 1;
      return 0;
    }

    if (found.length === 1) {
      const id = found[0];
      board[cell] = id;
      this.requireCluster(id).push(cell);
      this.placed += 1;
      this.merges += 1;
      return 1;
    }

    let largestId = found[0];
    let largest = this.requireCluster(largestId);
    for (let index = 1; index < found.length; index += 1) {
      const candidate = this.requireCluster(found[index]);
      if (candidate.length > largest.length) {
        largestId = found[index];
        largest = candidate;
      }
    }

    board[cell] = largestId;
    largest.push(cell);

    for (const id of found) {
      if (id === largestId) {
        continue;
      }
      const absorbed = this.requireCluster(id);
      for (const member of absorbed) {
        board[member] = largestId;
        largest.push(member);
      }
      this.clusters[id] = undefined;
      this.unusedIds.push(id);
    }

    this.placed += 1;
    this.merges += found.length;
    return found.length;
  }

  /**
   * Merges `addPiece(cell)` would produce, without touching the board.
   */
  getMergesFromAddingPiece(cell: number): number {
    this.assertEmpty(cell, 'query');
    return this.adjacentClusters(cell).length;
  }

  /**
   * Removes a piece by tearing down its whole cluster and re-adding the other
   * members, so the cost grows with the size of that cluster. Returns the
   * change in `mergesCount` (zero or negative).
   */
  removePiece(cell: number): number {
    this.assertInBounds(cell);
    const id = this.board[cell];
    if (id === EMPTY) {
      throw new PieceContractError(`Cannot remove cell ${cell}: no piece is placed there.`, cell);
    }

    const before = this.merges;
    const members = this.requireCluster(id);
    this.clusters[id] = undefined;
    this.unusedIds.push(id);

    for (const member of members) {
      this.board[member] = EMPTY;
    }
    this.placed -= members.length;

    const remaining = members.filter((member) => member !== cell);
    this.merges -= remaining.length;

    for (const member of remaining) {
      this.addPiece(member);
    }

    return this.merges - before;
  }

  /**
   * Like {@link removePiece}, but an absent piece is a no-op returning 0.
   */
  tryRemovePiece(cell: number): number {
    if (!this.hasPiece(cell)) {
      return 0;
    }
    return this.removePiece(cell);
  }

  private adjacentClusters(cell: number): number[] {
    const found: number[] = [];
    for (const neighbour of this.adjacency[cell]) {
      const id = this.board[neighbour];
      if (id !== EMPTY && !found.includes(id)) {
        found.push(id);
      }
    }
    return found;
  }

  private requireCluster(id: number): number[] {
    const cluster = this.clusters[id];
    if (cluster === undefined) {
      throw new Error(`Cluster ${id} is referenced by the board but not allocated.`);
    }
    return cluster;
  }

  private assertInBounds(cell: number): void {
    if (!Number.isInteger(cell) || cell < 0 || cell >= this.board.length) {
      throw new PieceContractError(
        `Cell ${cell} is outside the ${this.width}×${this.height} board.`,
        cell,
      );
    }
  }

  private assertEmpty(cell: number, operation: 'add' | 'query'): void {
    this.assertInBounds(cell);
    if (this.board[cell] !== EMPTY) {
      throw new PieceContractError(
        operation === 'add'
          ? `Cannot add cell ${cell}: a piece is already placed there.`
          : `Cannot query merges for cell ${cell}: a piece is already placed there.`,
        cell,
      );
    }
  }
}
