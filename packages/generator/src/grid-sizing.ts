import type { JigsawOptions } from '@jigsaw-world/options-schema';

export interface GridSize {
  readonly nx: number;
  readonly ny: number;
}

const ORIENTATION_RATIOS = {
  square: 1,
  landscape: 1.5,
  portrait: 0.8,
} as const;

/**
 * Width/height ratio of the puzzle image. `custom` uses the image's own pixel
 * dimensions.
 */
export function resolveOrientation(
  options: Pick<JigsawOptions, 'orientationOfImage' | 'widthOfImage' | 'heightOfImage'>,
): number {
  if (options.orientationOfImage === 'custom') {
    return options.widthOfImage / options.heightOfImage;
  }
  return ORIENTATION_RATIOS[options.orientationOfImage];
}

/**
 * Round half to even, so grid sizes match the host's rounding of `x.5`.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Picks the `nx × ny` grid closest to `numberOfPieces` whose pieces are as
 * square as possible for an image of the given orientation. Candidates within
 * two rows/columns of the direct estimate are scored on aspect distortion plus
 * relative piece-count error; the first lowest score wins.
 */
export function calculateOptimalGrid(numberOfPieces: number, orientation: number): GridSize {
  const height = 1;
  const width = orientation;

  const horizontal = roundHalfEven(Math.sqrt((numberOfPieces * width) / height));
  const vertical = roundHalfEven(numberOfPieces / horizontal);

  let bestError = Number.POSITIVE_INFINITY;
  let best: GridSize = { nx: horizontal, ny: vertical };

  for (let dy = 0; dy < 5; dy += 1) {
    const rows = vertical + dy - 2;
    for (let dx = 0; dx < 5; dx += 1) {
      const columns = horizontal + dx - 2;
      if (rows < 1 || columns < 1) {
        continue;
      }
      const ratio = (columns * height) / rows / width;
      let error = ratio + 1 / ratio - 2;
      error += Math.abs(1 - (columns * rows) / numberOfPieces);

      if (error < bestError) {
        bestError = error;
        best = { nx: columns, ny: rows };
      }
    }
  }

  return best;
}
