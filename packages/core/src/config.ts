/**
 * Largest piece bundle that has an item id. Both piece limits are capped here
 * so every bundle generation can produce has an entry in the id tables.
 */
export const MAX_PIECES_PER_BUNDLE = 500;

export interface GeneratorConfig {
  readonly limits: {
    /**
     * Largest number of pieces a single check may hand out before the
     * options are rejected as infeasible.
     *
     * @defaultValue `500`
     */
    readonly maxPiecesPerLocation: number;
    /**
     * Largest bundle used when pushing precollected pieces into the start
     * inventory.
     *
     * @defaultValue `500`
     */
    readonly maxPiecesPerBundle: number;
    /**
     * Upper bound on full rescans of the milestone repair loop.
     *
     * @defaultValue `10000`
     */
    readonly maxRepairPasses: number;
  };
  readonly progression: {
    /**
     * The out-of-logic slack is not applied once fewer than this many pieces
     * remain to be collected.
     *
     * @defaultValue `10`
     */
    readonly tailWindow: number;
  };
}

export type GeneratorConfigOverrides = Readonly<{
  readonly limits?: Partial<GeneratorConfig['limits']>;
  readonly progression?: Partial<GeneratorConfig['progression']>;
}>;

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = Object.freeze({
  limits: Object.freeze({
    maxPiecesPerLocation: MAX_PIECES_PER_BUNDLE,
    maxPiecesPerBundle: MAX_PIECES_PER_BUNDLE,
    maxRepairPasses: 10_000,
  }),
  progression: Object.freeze({
    tailWindow: 10,
  }),
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function toBundleLimit(value: unknown, fallback: number): number {
  return Math.min(toPositiveInt(value) ?? fallback, MAX_PIECES_PER_BUNDLE);
}

function resolveLimitsConfig(
  overrides: GeneratorConfigOverrides['limits'] | undefined,
): GeneratorConfig['limits'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_GENERATOR_CONFIG.limits;

  return {
    maxPiecesPerLocation: toBundleLimit(
      source.maxPiecesPerLocation,
      defaults.maxPiecesPerLocation,
    ),
    maxPiecesPerBundle: toBundleLimit(source.maxPiecesPerBundle, defaults.maxPiecesPerBundle),
    maxRepairPasses:
      toPositiveInt(source.maxRepairPasses) ?? defaults.maxRepairPasses,
  };
}

function resolveProgressionConfig(
  overrides: GeneratorConfigOverrides['progression'] | undefined,
): GeneratorConfig['progression'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_GENERATOR_CONFIG.progression;

  return {
    tailWindow: toPositiveInt(source.tailWindow) ?? defaults.tailWindow,
  };
}

export function resolveGeneratorConfig(
  overrides?: GeneratorConfigOverrides,
): GeneratorConfig {
  return Object.freeze({
    limits: Object.freeze(resolveLimitsConfig(overrides?.limits)),
    progression: Object.freeze(resolveProgressionConfig(overrides?.progression)),
  });
}
