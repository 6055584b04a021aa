export {
  ENCOURAGEMENTS,
  FILLER_ITEM_ID,
  FILLER_ITEM_NAME,
  GAME_NAME,
  ITEM_ID_BASE,
  LOCATION_ID_BASE,
  PIECE_COUNTER,
  PIECE_ITEM_GROUP,
  VICTORY_ITEM_NAME,
  buildItemNameGroups,
  buildItemNameToId,
  buildItemTable,
  buildLocationNameToId,
  milestoneLocationId,
  milestoneLocationName,
  pieceBundleName,
  piecesInItem,
  type ItemClassification,
  type ItemDefinition,
} from './items.js';
export {
  calculateOptimalGrid,
  resolveOrientation,
  roundHalfEven,
  type GridSize,
} from './grid-sizing.js';
export {
  buildPieceGroups,
  classifyPieces,
  planPieceOrder,
  type PieceClasses,
  type PieceOrderPlan,
  type PieceOrderPlanOptions,
} from './piece-order-planner.js';
export {
  buildProgressionTable,
  computePiecesNeededPerMerge,
  type ProgressionTable,
  type ProgressionTableOptions,
} from './progression-table.js';
export {
  computeLocationBudget,
  distributeMilestones,
  repairMilestones,
  type LocationBudget,
  type LocationBudgetOptions,
  type MilestoneLayout,
  type MilestoneRepairOptions,
  type MilestoneRepairResult,
} from './location-layout.js';
export {
  MAX_PUZZLE_PIECES,
  generatePieceProgression,
  splitIntoBundles,
  type PieceProgression,
} from './generation.js';
export type {
  AccessPredicate,
  CollectionListener,
  CollectionStateView,
  GenerationHost,
  HostItem,
  HostLocation,
  MutableCollectionState,
  ObservableCollectionState,
} from './host.js';
export { InMemoryCollectionState } from './collection-state.js';
export { InMemoryGenerationHost } from './in-memory-host.js';
export { formatSpoiler, type SpoilerInfo } from './spoiler.js';
export { JigsawWorld, WORLD_VERSION, type JigsawWorldInit } from './world.js';
