import { afterEach, describe, expect, it, vi } from 'vitest';

import { CachedMergeEvaluator, MergeEvaluatorRegistry } from './merge-evaluator.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from './telemetry.js';

describe('CachedMergeEvaluator', () => {
  it('starts stale and computes on first use', () => {
    const provider = vi.fn(() => [1, 2]);
    const evaluator = new CachedMergeEvaluator(3, 3, provider);

    expect(evaluator.isStale).toBe(true);
    expect(evaluator.evaluate()).toBe(1);
    expect(evaluator.isStale).toBe(false);
    expect(provider).toHaveBeenCalledTimes(1);
  });

  it('serves the cached value until invalidated', () => {
    const held = [1, 2];
    const provider = vi.fn(() => held);
    const evaluator = new CachedMergeEvaluator(3, 3, provider);

    evaluator.evaluate();
    held.push(3);
    expect(evaluator.evaluate()).toBe(1);
    expect(provider).toHaveBeenCalledTimes(1);

    evaluator.invalidate();
    expect(evaluator.evaluate()).toBe(2);
    expect(provider).toHaveBeenCalledTimes(2);
  });

  it('reports hits and misses since the last drain', () => {
    const evaluator = new CachedMergeEvaluator(2, 2, () => [1]);

    evaluator.evaluate();
    evaluator.evaluate();
    evaluator.evaluate();

    expect(evaluator.drainStats()).toEqual({ hits: 2, misses: 1 });
    expect(evaluator.drainStats()).toEqual({ hits: 0, misses: 0 });
  });
});

describe('MergeEvaluatorRegistry', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('keeps one independent evaluator per player', () => {
    const registry = new MergeEvaluatorRegistry();
    const first = [1, 2, 3];
    const second = [1];
    registry.register(1, 3, 1, () => first);
    registry.register(2, 3, 1, () => second);

    expect(registry.evaluate(1)).toBe(2);
    expect(registry.evaluate(2)).toBe(0);

    second.push(2);
    registry.invalidate(2);

    expect(registry.get(1)?.isStale).toBe(false);
    expect(registry.evaluate(2)).toBe(1);
  });

  it('evaluates unknown players to 0', () => {
    const registry = new MergeEvaluatorRegistry();

    expect(registry.evaluate(7)).toBe(0);
    expect(() => registry.invalidate(7)).not.toThrow();
  });

  it('flushes lookup counters to telemetry on clear', () => {
    const recordCounters = vi.fn();
    setTelemetry({ ...silentTelemetry, recordCounters });
    const registry = new MergeEvaluatorRegistry();
    registry.register(1, 2, 2, () => [1, 2]);
    registry.evaluate(1);
    registry.evaluate(1);

    registry.clear();

    expect(recordCounters).toHaveBeenCalledWith('merge_evaluator', { hits: 1, misses: 1 });
    expect(registry.size).toBe(0);
  });

  it('drops a single player on unregister', () => {
    const registry = new MergeEvaluatorRegistry();
    registry.register(1, 2, 2, () => []);
    registry.register(2, 2, 2, () => []);

    registry.unregister(1);

    expect(registry.has(1)).toBe(false);
    expect(registry.has(2)).toBe(true);
  });
});
