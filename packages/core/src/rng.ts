const STATE_INCREMENT = 0x6d2b79f5;

/**
 * Seeded, reproducible random source. Each world owns its own instance so
 * that generation for one player never perturbs another's sequence.
 */
export interface RandomSource {
  readonly seed: number;
  /** Uniform float in `[0, 1)`. */
  next(): number;
  /** Uniform integer in `[0, bound)`. */
  nextInt(bound: number): number;
  /** Fisher–Yates shuffle, in place. Returns the same array. */
  shuffle<T>(items: T[]): T[];
  choice<T>(items: readonly T[]): T;
  /** `count` independent draws with replacement. */
  choices<T>(items: readonly T[], count: number): T[];
  getState(): number;
  setState(state: number): void;
}

export function normalizeSeed(seed: number): number {
  return seed >>> 0;
}

/**
 * Derives a 32-bit seed from an arbitrary string (FNV-1a), so seed names such
 * as `"W12345"` can drive the generator.
 */
export function seedFromString(value: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function createRandomSource(seed: number): RandomSource {
  const normalized = normalizeSeed(seed);
  let state = normalized || 0x1;

  const next = (): number => {
    state = (state + STATE_INCREMENT) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const nextInt = (bound: number): number => {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`Random bound must be a positive integer (received ${bound}).`);
    }
    return Math.floor(next() * bound);
  };

  const choice = <T>(items: readonly T[]): T => {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty sequence.');
    }
    return items[nextInt(items.length)];
  };

  return {
    seed: normalized,
    next,
    nextInt,
    shuffle<T>(items: T[]): T[] {
      for (let index = items.length - 1; index > 0; index -= 1) {
        const swapWith = nextInt(index + 1);
        const held = items[index];
        items[index] = items[swapWith];
        items[swapWith] = held;
      }
      return items;
    },
    choice,
    choices<T>(items: readonly T[], count: number): T[] {
      const picked: T[] = [];
      for (let index = 0; index < count; index += 1) {
        picked.push(choice(items));
      }
      return picked;
    },
    getState() {
      return state;
    },
    setState(value: number) {
      if (!Number.isFinite(value)) {
        throw new Error('RNG state must be a finite number.');
      }
      state = value | 0;
    },
  };
}
