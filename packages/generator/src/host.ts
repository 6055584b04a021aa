import type { MergeEvaluatorRegistry, RandomSource } from '@jigsaw-world/core';

import type { ItemClassification } from './items.js';

export interface HostItem {
  readonly name: string;
  readonly classification: ItemClassification;
  /** `null` for events such as the victory marker. */
  readonly code: number | null;
  readonly player: number;
}

/**
 * Read side of a player's collected items, as seen by access rules.
 */
export interface CollectionStateView {
  has(name: string, player: number, count?: number): boolean;
  count(name: string, player: number): number;
  /** Cached merge evaluators owned by this state, one per player. */
  readonly mergeEvaluators: MergeEvaluatorRegistry;
}

export interface MutableCollectionState extends CollectionStateView {
  adjust(name: string, player: number, delta: number): void;
}

export type AccessPredicate = (state: CollectionStateView) => boolean;

export interface HostLocation {
  readonly name: string;
  /** `null` once the location has been turned into an event. */
  address: number | null;
  /** Merges required to reach this location. */
  readonly milestone: number;
  readonly player: number;
  accessRule: AccessPredicate;
  lockedItem?: HostItem;
}

/**
 * Notified after the state counted (or declined to count) an item.
 */
export interface CollectionListener {
  readonly player: number;
  onItemCollected(state: MutableCollectionState, item: HostItem, changed: boolean): void;
  onItemRemoved(state: MutableCollectionState, item: HostItem, changed: boolean): void;
}

export interface ObservableCollectionState extends MutableCollectionState {
  /** Returns a function that removes the listener again. */
  addListener(listener: CollectionListener): () => void;
}

/**
 * What a world needs from the surrounding multiworld during generation.
 */
export interface GenerationHost {
  readonly seedName: string;
  readonly random: RandomSource;
  pushPrecollected(item: HostItem): void;
  setCompletionCondition(player: number, condition: AccessPredicate): void;
}
