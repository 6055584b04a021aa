import canonicalize from 'canonicalize';
import { z } from 'zod';

import { SlotDataSchemaError, toSchemaIssues } from './errors.js';
import { integerSchema, positiveIntSchema } from './numbers.js';

export const slotDataObjectSchema = z
  .object({
    seedName: z.string(),
    whichImage: positiveIntSchema,
    orientation: z.number().positive().finite(),
    nx: positiveIntSchema,
    ny: positiveIntSchema,
    pieceOrder: z.array(positiveIntSchema),
    possibleMerges: z.array(integerSchema),
    actualPossibleMerges: z.array(integerSchema.nonnegative()),
    worldVersion: z.string().min(1),
  })
  .strict();

/**
 * Everything a client needs to rebuild the access-rule table without
 * re-running generation.
 */
export const slotDataSchema = slotDataObjectSchema.superRefine((data, ctx) => {
  const total = data.nx * data.ny;

  if (data.pieceOrder.length !== total) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['pieceOrder'],
      message: `Piece order must list all ${total} pieces (received ${data.pieceOrder.length}).`,
    });
  } else {
    const seen = new Set<number>();
    data.pieceOrder.forEach((piece, index) => {
      if (piece > total || seen.has(piece)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pieceOrder', index],
          message: `Piece ${piece} is out of range or repeated.`,
        });
      }
      seen.add(piece);
    });
  }

  for (const key of ['possibleMerges', 'actualPossibleMerges'] as const) {
    const table = data[key];
    if (table.length !== total + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `Expected ${total + 1} entries (received ${table.length}).`,
      });
      continue;
    }
    for (let index = 1; index < table.length; index += 1) {
      if (table[index] < table[index - 1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key, index],
          message: 'Merge tables must be non-decreasing.',
        });
        break;
      }
    }
    if (table[total] < total - 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key, total],
        message: `Collecting every piece must allow all ${total - 1} merges.`,
      });
    }
  }
});

export type SlotData = z.output<typeof slotDataObjectSchema>;

export function parseSlotData(input: unknown): SlotData {
  const result = slotDataSchema.safeParse(input);
  if (!result.success) {
    throw new SlotDataSchemaError(toSchemaIssues(result.error));
  }
  return result.data;
}

/**
 * Canonical JSON (RFC 8785 key order) so the same generation always yields
 * byte-identical slot data.
 */
export function encodeSlotData(data: SlotData): string {
  const encoded = canonicalize(parseSlotData(data));
  if (typeof encoded !== 'string') {
    throw new SlotDataSchemaError([
      { path: [], message: 'Failed to canonicalize slot data.' },
    ]);
  }
  return encoded;
}

export function decodeSlotData(json: string): SlotData {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new SlotDataSchemaError([
      {
        path: [],
        message: error instanceof Error ? error.message : 'Slot data is not valid JSON.',
      },
    ]);
  }
  return parseSlotData(raw);
}
