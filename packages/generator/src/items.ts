export const GAME_NAME = 'Jigsaw';

export const ITEM_ID_BASE = 234_782_000;
export const LOCATION_ID_BASE = 234_782_000;

export const FILLER_ITEM_NAME = 'Squawks';
export const FILLER_ITEM_ID = ITEM_ID_BASE - 1;
export const VICTORY_ITEM_NAME = 'Victory';

/**
 * Hidden per-player counter holding the total number of pieces collected.
 */
export const PIECE_COUNTER = 'pcs';

export const PIECE_ITEM_GROUP = 'Puzzle Pieces';

/**
 * Locked onto filler milestones. Ids count down from just below the filler
 * item.
 */
export const ENCOURAGEMENTS: readonly string[] = Object.freeze([
  'Nice Merge!',
  'Keep Going!',
  'Piece by Piece',
  'Looking Good!',
  'Almost There!',
  'You Got This!',
  'What a Fit!',
  'Snap!',
]);

export type ItemClassification = 'progression' | 'filler';

export interface ItemDefinition {
  readonly name: string;
  readonly code: number;
  readonly classification: ItemClassification;
}

export function pieceBundleName(count: number): string {
  return `${count} Puzzle Piece${count > 1 ? 's' : ''}`;
}

/**
 * Pieces granted by an item name: the leading number of a bundle, 1 for any
 * other piece item, `undefined` for items that are not pieces.
 */
export function piecesInItem(name: string): number | undefined {
  if (!name.includes('Piece')) {
    return undefined;
  }
  const [first] = name.split(' ');
  return /^\d+$/.test(first) ? Number(first) : 1;
}

export function milestoneLocationName(merges: number): string {
  return `Merge ${merges} times`;
}

export function milestoneLocationId(merges: number): number {
  return LOCATION_ID_BASE + merges;
}

export function buildItemTable(maxPiecesPerBundle: number): ReadonlyMap<string, ItemDefinition> {
  const table = new Map<string, ItemDefinition>();
  for (let count = 1; count <= maxPiecesPerBundle; count += 1) {
    const name = pieceBundleName(count);
    table.set(name, { name, code: ITEM_ID_BASE + count, classification: 'progression' });
  }
  table.set(FILLER_ITEM_NAME, {
    name: FILLER_ITEM_NAME,
    code: FILLER_ITEM_ID,
    classification: 'filler',
  });
  ENCOURAGEMENTS.forEach((name, index) => {
    table.set(name, { name, code: FILLER_ITEM_ID - 1 - index, classification: 'filler' });
  });
  return table;
}

export function buildItemNameToId(maxPiecesPerBundle: number): Record<string, number> {
  const ids: Record<string, number> = {};
  for (const [name, item] of buildItemTable(maxPiecesPerBundle)) {
    ids[name] = item.code;
  }
  return ids;
}

export function buildItemNameGroups(maxPiecesPerBundle: number): Record<string, string[]> {
  return {
    [PIECE_ITEM_GROUP]: Array.from({ length: maxPiecesPerBundle }, (_, index) =>
      pieceBundleName(index + 1),
    ),
  };
}

/**
 * Location ids for every milestone a puzzle of up to `maxPieces` pieces can
 * have. The final milestone of each puzzle is turned into an event at
 * generation time.
 */
export function buildLocationNameToId(maxPieces: number): Record<string, number> {
  const ids: Record<string, number> = {};
  for (let merges = 1; merges < maxPieces; merges += 1) {
    ids[milestoneLocationName(merges)] = milestoneLocationId(merges);
  }
  return ids;
}
