import { describe, expect, it } from 'vitest';

import { calculateOptimalGrid, resolveOrientation, roundHalfEven } from './grid-sizing.js';

describe('roundHalfEven', () => {
  it('rounds ties to the even neighbour', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
  });
});

describe('resolveOrientation', () => {
  it('maps named orientations to fixed ratios', () => {
    const image = { widthOfImage: 300, heightOfImage: 200 };
    expect(resolveOrientation({ ...image, orientationOfImage: 'square' })).toBe(1);
    expect(resolveOrientation({ ...image, orientationOfImage: 'landscape' })).toBe(1.5);
    expect(resolveOrientation({ ...image, orientationOfImage: 'portrait' })).toBe(0.8);
  });

  it('uses the image dimensions for custom', () => {
    expect(
      resolveOrientation({ orientationOfImage: 'custom', widthOfImage: 300, heightOfImage: 200 }),
    ).toBe(1.5);
  });
});

describe('calculateOptimalGrid', () => {
  it('keeps a square puzzle square', () => {
    expect(calculateOptimalGrid(25, 1)).toEqual({ nx: 5, ny: 5 });
    expect(calculateOptimalGrid(100, 1)).toEqual({ nx: 10, ny: 10 });
  });

  it('widens landscape puzzles', () => {
    expect(calculateOptimalGrid(25, 1.5)).toEqual({ nx: 6, ny: 4 });
  });

  it('heightens portrait puzzles', () => {
    expect(calculateOptimalGrid(100, 0.8)).toEqual({ nx: 9, ny: 11 });
  });
});
