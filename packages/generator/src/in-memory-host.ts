import { createRandomSource, seedFromString, type RandomSource } from '@jigsaw-world/core';

import type { AccessPredicate, GenerationHost, HostItem } from './host.js';

/**
 * Stand-alone host used by the CLI and by tests: records the start inventory
 * and completion conditions instead of handing them to a multiworld.
 */
export class InMemoryGenerationHost implements GenerationHost {
  readonly random: RandomSource;
  readonly precollected: HostItem[] = [];
  readonly completionConditions = new Map<number, AccessPredicate>();

  constructor(
    readonly seedName: string,
    random?: RandomSource,
  ) {
    this.random = random ?? createRandomSource(seedFromString(seedName));
  }

  pushPrecollected(item: HostItem): void {
    this.precollected.push(item);
  }

  setCompletionCondition(player: number, condition: AccessPredicate): void {
    this.completionConditions.set(player, condition);
  }
}
