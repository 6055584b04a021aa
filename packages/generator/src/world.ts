import {
  JigsawError,
  MAX_PIECES_PER_BUNDLE,
  resolveGeneratorConfig,
  telemetry,
  type ErrorEvents,
  type GeneratorConfig,
  type GeneratorConfigOverrides,
} from '@jigsaw-world/core';
import {
  parseJigsawOptions,
  parseSlotData,
  type JigsawOptions,
  type SlotData,
} from '@jigsaw-world/options-schema';

import {
  MAX_PUZZLE_PIECES,
  generatePieceProgression,
  type PieceProgression,
} from './generation.js';
import type {
  AccessPredicate,
  CollectionListener,
  CollectionStateView,
  GenerationHost,
  HostItem,
  HostLocation,
  MutableCollectionState,
  ObservableCollectionState,
} from './host.js';
import {
  ENCOURAGEMENTS,
  FILLER_ITEM_NAME,
  GAME_NAME,
  PIECE_COUNTER,
  VICTORY_ITEM_NAME,
  buildItemNameGroups,
  buildItemNameToId,
  buildItemTable,
  buildLocationNameToId,
  milestoneLocationId,
  milestoneLocationName,
  pieceBundleName,
  piecesInItem,
  type ItemDefinition,
} from './items.js';
import {
  distributeMilestones,
  repairMilestones,
  type MilestoneRepairResult,
} from './location-layout.js';
import { computePiecesNeededPerMerge } from './progression-table.js';
import { formatSpoiler } from './spoiler.js';

export const WORLD_VERSION = '0.4.0';

export interface JigsawWorldInit {
  readonly player: number;
  readonly host: GenerationHost;
  /** Raw player options; validated with the options schema. */
  readonly options?: unknown;
  readonly config?: GeneratorConfigOverrides;
}

/**
 * Tables a world needs to answer access rules. Produced by generation, or
 * rebuilt from slot data on the client side.
 */
interface AccessTables {
  readonly nx: number;
  readonly ny: number;
  readonly pieceOrder: readonly number[];
  readonly possibleMerges: readonly number[];
  readonly actualPossibleMerges: readonly number[];
  readonly piecesNeededPerMerge: readonly number[];
}

export class JigsawWorld implements CollectionListener {
  static readonly game = GAME_NAME;
  static readonly worldVersion = WORLD_VERSION;
  static readonly itemNameToId = buildItemNameToId(MAX_PIECES_PER_BUNDLE);
  static readonly itemNameGroups = buildItemNameGroups(MAX_PIECES_PER_BUNDLE);
  static readonly locationNameToId = buildLocationNameToId(MAX_PUZZLE_PIECES);

  readonly player: number;
  readonly options: JigsawOptions;
  readonly config: GeneratorConfig;
  locations: HostLocation[] = [];

  private readonly host: GenerationHost;
  private readonly itemTable: ReadonlyMap<string, ItemDefinition>;
  private readonly detachers = new Map<ObservableCollectionState, () => void>();
  private progression?: PieceProgression;
  private layout?: MilestoneRepairResult;
  private tables?: AccessTables;

  constructor(init: JigsawWorldInit) {
    this.player = init.player;
    this.host = init.host;
    this.options = parseJigsawOptions(init.options ?? {});
    this.config = resolveGeneratorConfig(init.config);
    this.itemTable = buildItemTable(MAX_PIECES_PER_BUNDLE);
  }

  get nx(): number {
    return this.requireTables().nx;
  }

  get ny(): number {
    return this.requireTables().ny;
  }

  get npieces(): number {
    const tables = this.requireTables();
    return tables.nx * tables.ny;
  }

  get precollectedPieces(): readonly number[] {
    return this.requireProgression().precollectedPieces;
  }

  get itempoolPieces(): readonly number[] {
    return this.requireProgression().itempoolPieces;
  }

  get possibleMerges(): readonly number[] {
    return this.requireTables().possibleMerges;
  }

  get piecesNeededPerMerge(): readonly number[] {
    return this.requireTables().piecesNeededPerMerge;
  }

  get numberOfLocations(): number {
    return this.requireProgression().budget.numberOfLocations;
  }

  get minPiecesPerLocation(): number {
    return this.requireProgression().budget.minPiecesPerLocation;
  }

  get poolPieces(): readonly string[] {
    return this.requireProgression().poolItemNames;
  }

  get milestoneLayout(): MilestoneRepairResult | undefined {
    return this.layout;
  }

  /**
   * Plans the piece order and merge table and pushes the start inventory.
   */
  generateEarly(): void {
    let progression: PieceProgression;
    try {
      progression = generatePieceProgression(this.options, this.host.random, this.config);
    } catch (error) {
      this.reportFailure('generateEarly', error);
      throw error;
    }

    this.progression = progression;
    this.tables = {
      nx: progression.nx,
      ny: progression.ny,
      pieceOrder: [...progression.precollectedPieces, ...progression.itempoolPieces],
      possibleMerges: progression.table.possibleMerges,
      actualPossibleMerges: progression.table.actualPossibleMerges,
      piecesNeededPerMerge: progression.table.piecesNeededPerMerge,
    };

    for (const size of progression.precollectedBundles) {
      this.host.pushPrecollected(this.createItem(pieceBundleName(size)));
    }
  }

  createItems(): HostItem[] {
    return this.requireProgression().poolItemNames.map((name) => this.createItem(name));
  }

  /**
   * Builds one location per milestone, locks encouragements onto filler
   * milestones and the victory marker onto the last one, and installs the
   * access rules.
   */
  createLocations(): HostLocation[] {
    const progression = this.requireProgression();
    const { npieces, budget } = progression;

    let layout: MilestoneRepairResult;
    try {
      layout = repairMilestones({
        ...distributeMilestones(npieces, budget.numberOfLocations),
        npieces,
        precollectedCount: progression.precollectedPieces.length,
        minPiecesPerLocation: budget.minPiecesPerLocation,
        possibleMerges: progression.table.possibleMerges,
        random: this.host.random,
        maxRepairPasses: this.config.limits.maxRepairPasses,
      });
    } catch (error) {
      this.reportFailure('createLocations', error);
      throw error;
    }
    this.layout = layout;

    const locations: HostLocation[] = [];
    for (let milestone = 1; milestone < npieces; milestone += 1) {
      locations.push({
        name: milestoneLocationName(milestone),
        address: milestoneLocationId(milestone),
        milestone,
        player: this.player,
        accessRule: this.createAccessRule(milestone),
      });
    }

    const byMilestone = new Map(locations.map((location) => [location.milestone, location]));
    const encouragements = this.host.random.choices(
      ENCOURAGEMENTS,
      layout.fillerLocations.length,
    );
    layout.fillerLocations.forEach((milestone, index) => {
      const location = byMilestone.get(milestone);
      if (location) {
        location.lockedItem = this.createItem(encouragements[index]);
      }
    });

    const victory = byMilestone.get(npieces - 1);
    if (victory) {
      victory.address = null;
      victory.lockedItem = {
        name: VICTORY_ITEM_NAME,
        classification: 'progression',
        code: null,
        player: this.player,
      };
    }

    const player = this.player;
    this.host.setCompletionCondition(player, (state) => state.has(VICTORY_ITEM_NAME, player));

    this.locations = locations;
    telemetry.recordProgress('GenerationCompleted', {
      player,
      npieces,
      itemLocations: layout.itemLocations.length,
      fillerLocations: layout.fillerLocations.length,
      repairSwaps: layout.swaps,
    });
    return locations;
  }

  createItem(name: string): HostItem {
    const definition = this.itemTable.get(name);
    if (!definition) {
      throw new JigsawError(`Unknown ${GAME_NAME} item "${name}".`);
    }
    return {
      name: definition.name,
      classification: definition.classification,
      code: definition.code,
      player: this.player,
    };
  }

  getFillerItemName(): string {
    return FILLER_ITEM_NAME;
  }

  /**
   * Starts tracking `state`: piece counts follow collect/remove events and a
   * merge evaluator for this player is registered on the state.
   */
  attach(state: ObservableCollectionState): () => void {
    this.detachers.get(state)?.();

    const removeListener = state.addListener(this);
    state.mergeEvaluators.register(this.player, this.nx, this.ny, () =>
      this.heldPieces(state),
    );
    const detach = (): void => {
      removeListener();
      state.mergeEvaluators.unregister(this.player);
      this.detachers.delete(state);
    };
    this.detachers.set(state, detach);
    return detach;
  }

  teardown(): void {
    for (const detach of [...this.detachers.values()]) {
      detach();
    }
  }

  onItemCollected(state: MutableCollectionState, item: HostItem, changed: boolean): void {
    const pieces = piecesInItem(item.name);
    if (changed && pieces !== undefined) {
      state.adjust(PIECE_COUNTER, item.player, pieces);
    }
    state.mergeEvaluators.invalidate(item.player);
  }

  onItemRemoved(state: MutableCollectionState, item: HostItem, changed: boolean): void {
    const pieces = piecesInItem(item.name);
    if (changed && pieces !== undefined) {
      state.adjust(PIECE_COUNTER, item.player, -pieces);
    }
    state.mergeEvaluators.invalidate(item.player);
  }

  /**
   * Pieces are handed out in the planned order, so holding `n` pieces means
   * holding the first `n` pieces of that order.
   */
  heldPieces(state: CollectionStateView): readonly number[] {
    const { pieceOrder } = this.requireTables();
    const held = Math.min(state.count(PIECE_COUNTER, this.player), pieceOrder.length);
    return pieceOrder.slice(0, held);
  }

  fillSlotData(): SlotData {
    const tables = this.requireTables();
    return parseSlotData({
      seedName: this.host.seedName,
      whichImage: this.options.whichImage,
      orientation: this.requireProgression().orientation,
      nx: tables.nx,
      ny: tables.ny,
      pieceOrder: [...tables.pieceOrder],
      possibleMerges: [...tables.possibleMerges],
      actualPossibleMerges: [...tables.actualPossibleMerges],
      worldVersion: WORLD_VERSION,
    });
  }

  /**
   * Rebuilds the access tables from slot data without re-running generation.
   */
  interpretSlotData(input: unknown): void {
    const slotData = parseSlotData(input);
    const npieces = slotData.nx * slotData.ny;
    this.tables = {
      nx: slotData.nx,
      ny: slotData.ny,
      pieceOrder: slotData.pieceOrder,
      possibleMerges: slotData.possibleMerges,
      actualPossibleMerges: slotData.actualPossibleMerges,
      piecesNeededPerMerge: computePiecesNeededPerMerge(slotData.possibleMerges, npieces),
    };
  }

  writeSpoiler(): string {
    const progression = this.requireProgression();
    return formatSpoiler({
      player: this.player,
      nx: progression.nx,
      ny: progression.ny,
      precollectedPieces: progression.precollectedPieces,
      itemLocations: this.layout?.itemLocations ?? [],
      fillerLocations: this.layout?.fillerLocations ?? [],
      repairSwaps: this.layout?.swaps ?? 0,
    });
  }

  private createAccessRule(milestone: number): AccessPredicate {
    const player = this.player;
    if (this.options.accessRuleMode === 'merges') {
      return (state) => state.mergeEvaluators.evaluate(player) >= milestone;
    }
    return (state) =>
      state.has(PIECE_COUNTER, player, this.requireTables().piecesNeededPerMerge[milestone]);
  }

  private reportFailure(stage: ErrorEvents['GenerationFailed']['stage'], error: unknown): void {
    telemetry.recordError('GenerationFailed', {
      player: this.player,
      stage,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  private requireProgression(): PieceProgression {
    if (!this.progression) {
      throw new JigsawError('generateEarly() must run before this step.');
    }
    return this.progression;
  }

  private requireTables(): AccessTables {
    if (!this.tables) {
      throw new JigsawError(
        'Access tables are unavailable; run generateEarly() or interpretSlotData() first.',
      );
    }
    return this.tables;
  }
}
