import { findPieceGroups } from '@jigsaw-world/core';

import { GAME_NAME } from './items.js';

export interface SpoilerInfo {
  readonly player: number;
  readonly nx: number;
  readonly ny: number;
  readonly precollectedPieces: readonly number[];
  readonly itemLocations: readonly number[];
  readonly fillerLocations: readonly number[];
  readonly repairSwaps: number;
}

export function formatSpoiler(info: SpoilerInfo): string {
  const startingGroups = findPieceGroups(info.precollectedPieces, info.nx, info.ny).length;
  return [
    '',
    `Spoiler and info for [${GAME_NAME}] player ${info.player}`,
    `Puzzle dimension: ${info.nx}×${info.ny}`,
    `Precollected pieces: ${info.precollectedPieces.length}`,
    `Precollected groups: ${startingGroups}`,
    `Item milestones: ${info.itemLocations.length}`,
    `Filler milestones: ${info.fillerLocations.length}`,
    `Milestone repair swaps: ${info.repairSwaps}`,
  ].join('\n');
}
