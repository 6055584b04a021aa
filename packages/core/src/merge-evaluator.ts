import { assertGridDimensions } from './grid.js';
import { countMerges } from './reachability.js';
import { telemetry } from './telemetry.js';

export type HeldPiecesProvider = () => Iterable<number>;

export interface MergeEvaluatorStats {
  readonly hits: number;
  readonly misses: number;
}

/**
 * Read-through cache of one player's merge count. Collect/remove hooks call
 * {@link invalidate}; the next {@link evaluate} recounts the held pieces.
 */
export class CachedMergeEvaluator {
  private stale = true;
  private cachedValue = 0;
  private hits = 0;
  private misses = 0;

  constructor(
    readonly width: number,
    readonly height: number,
    private readonly heldPieces: HeldPiecesProvider,
  ) {
    assertGridDimensions(width, height);
  }

  get isStale(): boolean {
    return this.stale;
  }

  invalidate(): void {
    this.stale = true;
  }

  evaluate(): number {
    if (!this.stale) {
      this.hits += 1;
      return this.cachedValue;
    }
    this.misses += 1;
    this.cachedValue = countMerges(this.heldPieces(), this.width, this.height);
    this.stale = false;
    return this.cachedValue;
  }

  /**
   * Returns lookups since the previous call and resets the tallies.
   */
  drainStats(): MergeEvaluatorStats {
    const stats = { hits: this.hits, misses: this.misses };
    this.hits = 0;
    this.misses = 0;
    return stats;
  }
}

/**
 * Per-player evaluators owned by one collection state. Players never share an
 * evaluator, and nothing outlives {@link clear}.
 */
export class MergeEvaluatorRegistry {
  private readonly evaluators = new Map<number, CachedMergeEvaluator>();

  get size(): number {
    return this.evaluators.size;
  }

  register(
    player: number,
    width: number,
    height: number,
    heldPieces: HeldPiecesProvider,
  ): CachedMergeEvaluator {
    const evaluator = new CachedMergeEvaluator(width, height, heldPieces);
    this.evaluators.set(player, evaluator);
    return evaluator;
  }

  get(player: number): CachedMergeEvaluator | undefined {
    return this.evaluators.get(player);
  }

  has(player: number): boolean {
    return this.evaluators.has(player);
  }

  invalidate(player: number): void {
    this.evaluators.get(player)?.invalidate();
  }

  /**
   * Merge count for `player`, or 0 when no evaluator is registered.
   */
  evaluate(player: number): number {
    return this.evaluators.get(player)?.evaluate() ?? 0;
  }

  unregister(player: number): void {
    this.flushTelemetry(player);
    this.evaluators.delete(player);
  }

  flushTelemetry(player?: number): void {
    let hits = 0;
    let misses = 0;
    for (const [id, evaluator] of this.evaluators) {
      if (player !== undefined && id !== player) {
        continue;
      }
      const stats = evaluator.drainStats();
      hits += stats.hits;
      misses += stats.misses;
    }
    if (hits > 0 || misses > 0) {
      telemetry.recordCounters('merge_evaluator', { hits, misses });
    }
  }

  clear(): void {
    this.flushTelemetry();
    this.evaluators.clear();
  }
}
