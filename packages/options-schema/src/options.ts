import { z } from 'zod';

import { OptionsSchemaError, toSchemaIssues } from './errors.js';
import { boundedIntegerSchema } from './numbers.js';

export const ORIENTATIONS = ['square', 'landscape', 'portrait', 'custom'] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

/**
 * Order in which corner, edge and interior pieces are handed out.
 */
export const PIECE_TYPE_ORDERS = [
  'random_order',
  'corners_edges_normal',
  'normal_edges_corners',
  'edges_normal_corners',
  'corners_normal_edges',
  'normal_corners_edges',
  'edges_corners_normal',
] as const;
export type PieceTypeOrder = (typeof PIECE_TYPE_ORDERS)[number];

/**
 * Strategy for picking the next piece inside a piece-type group.
 */
export const PIECE_ORDERS = [
  'random_order',
  'every_piece_fits',
  'least_merges_possible',
] as const;
export type PieceOrder = (typeof PIECE_ORDERS)[number];

/**
 * `pieces` gates each milestone on the number of pieces held; `merges`
 * recounts the merges the held pieces can actually make.
 */
export const ACCESS_RULE_MODES = ['pieces', 'merges'] as const;
export type AccessRuleMode = (typeof ACCESS_RULE_MODES)[number];

export const jigsawOptionsObjectSchema = z
  .object({
    numberOfPieces: boundedIntegerSchema(25, 1000).default(25),
    orientationOfImage: z.enum(ORIENTATIONS).default('square'),
    widthOfImage: boundedIntegerSchema(1, 100_000).default(2034),
    heightOfImage: boundedIntegerSchema(1, 100_000).default(2112),
    whichImage: boundedIntegerSchema(1, 100).default(1),
    pieceTypeOrder: z.enum(PIECE_TYPE_ORDERS).default('corners_edges_normal'),
    strictnessPieceTypeOrder: boundedIntegerSchema(0, 100).default(80),
    pieceOrder: z.enum(PIECE_ORDERS).default('every_piece_fits'),
    strictnessPieceOrder: boundedIntegerSchema(0, 100).default(100),
    numberOfChecksOutOfLogic: boundedIntegerSchema(0, 15).default(0),
    percentageOfExtraPieces: boundedIntegerSchema(0, 100).default(10),
    percentageOfMergesThatAreChecks: boundedIntegerSchema(1, 100).default(100),
    maximumNumberOfChecks: boundedIntegerSchema(1, 1000).default(1000),
    accessRuleMode: z.enum(ACCESS_RULE_MODES).default('pieces'),
  })
  .strict();

const SNAKE_CASE_KEY = /_([a-z])/g;

/**
 * Player option files use snake_case keys; both spellings are accepted.
 */
export function normalizeOptionKeys(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    normalized[key.replace(SNAKE_CASE_KEY, (_, letter: string) => letter.toUpperCase())] =
      value;
  }
  return normalized;
}

export const jigsawOptionsSchema = z.preprocess(
  normalizeOptionKeys,
  jigsawOptionsObjectSchema,
);

export type JigsawOptions = z.output<typeof jigsawOptionsObjectSchema>;
export type JigsawOptionsInput = z.input<typeof jigsawOptionsObjectSchema>;

export function parseJigsawOptions(input: unknown = {}): JigsawOptions {
  const result = jigsawOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new OptionsSchemaError(toSchemaIssues(result.error));
  }
  return result.data;
}

export const DEFAULT_JIGSAW_OPTIONS: JigsawOptions = Object.freeze(
  parseJigsawOptions({}),
);
