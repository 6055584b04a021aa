export {
  ConfigurationInfeasibleError,
  InvalidGridError,
  JigsawError,
  PieceContractError,
} from './errors.js';
export {
  assertGridDimensions,
  assertPieceId,
  buildAdjacencyTable,
  cellToPiece,
  pieceToCell,
  type AdjacencyTable,
  type GridDimensions,
} from './grid.js';
export { PuzzleBoard } from './puzzle-board.js';
export { countMerges, findPieceGroups } from './reachability.js';
export {
  CachedMergeEvaluator,
  MergeEvaluatorRegistry,
  type HeldPiecesProvider,
  type MergeEvaluatorStats,
} from './merge-evaluator.js';
export {
  createRandomSource,
  normalizeSeed,
  seedFromString,
  type RandomSource,
} from './rng.js';
export {
  DEFAULT_GENERATOR_CONFIG,
  MAX_PIECES_PER_BUNDLE,
  resolveGeneratorConfig,
  type GeneratorConfig,
  type GeneratorConfigOverrides,
} from './config.js';
export {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type CounterGroup,
  type CounterGroups,
  type ErrorEvent,
  type ErrorEvents,
  type ProgressEvent,
  type ProgressEvents,
  type TelemetryFacade,
  type WarningEvent,
  type WarningEvents,
} from './telemetry.js';
