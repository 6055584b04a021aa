import { MergeEvaluatorRegistry } from '@jigsaw-world/core';

import type {
  CollectionListener,
  HostItem,
  ObservableCollectionState,
} from './host.js';

/**
 * Item counts per player, plus the merge evaluators that depend on them.
 * Progression items are counted; filler is ignored.
 */
export class InMemoryCollectionState implements ObservableCollectionState {
  readonly mergeEvaluators = new MergeEvaluatorRegistry();

  private readonly progItems = new Map<number, Map<string, number>>();
  private readonly listeners = new Map<number, CollectionListener[]>();

  addListener(listener: CollectionListener): () => void {
    const registered = this.listeners.get(listener.player) ?? [];
    registered.push(listener);
    this.listeners.set(listener.player, registered);
    return () => {
      const current = this.listeners.get(listener.player) ?? [];
      this.listeners.set(
        listener.player,
        current.filter((entry) => entry !== listener),
      );
    };
  }

  has(name: string, player: number, count = 1): boolean {
    return this.count(name, player) >= count;
  }

  count(name: string, player: number): number {
    return this.progItems.get(player)?.get(name) ?? 0;
  }

  adjust(name: string, player: number, delta: number): void {
    let items = this.progItems.get(player);
    if (!items) {
      items = new Map();
      this.progItems.set(player, items);
    }
    const next = (items.get(name) ?? 0) + delta;
    if (next <= 0) {
      items.delete(name);
    } else {
      items.set(name, next);
    }
  }

  collect(item: HostItem): boolean {
    const changed = item.classification === 'progression';
    if (changed) {
      this.adjust(item.name, item.player, 1);
    }
    for (const listener of this.listeners.get(item.player) ?? []) {
      listener.onItemCollected(this, item, changed);
    }
    return changed;
  }

  remove(item: HostItem): boolean {
    const changed = this.count(item.name, item.player) > 0;
    if (changed) {
      this.adjust(item.name, item.player, -1);
    }
    for (const listener of this.listeners.get(item.player) ?? []) {
      listener.onItemRemoved(this, item, changed);
    }
    return changed;
  }

  dispose(): void {
    this.mergeEvaluators.clear();
    this.listeners.clear();
  }
}
