export class JigsawError extends Error {
  constructor(message = 'Jigsaw generation failed') {
    super(message);
    this.name = 'JigsawError';
  }
}

export class InvalidGridError extends JigsawError {
  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    super(
      `Grid dimensions must be positive integers (received ${width}×${height}).`,
    );
    this.name = 'InvalidGridError';
  }
}

/**
 * Raised when a board operation is called on a cell in the wrong state, e.g.
 * adding a piece that is already placed or removing one that is absent.
 */
export class PieceContractError extends JigsawError {
  constructor(
    message: string,
    readonly cell: number,
  ) {
    super(message);
    this.name = 'PieceContractError';
  }
}

/**
 * The requested options cannot produce a valid progression. Generation for
 * the affected player is aborted; callers re-run with different options or a
 * different seed.
 */
export class ConfigurationInfeasibleError extends JigsawError {
  constructor(
    message: string,
    readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = 'ConfigurationInfeasibleError';
  }
}
