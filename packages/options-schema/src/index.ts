export {
  OptionsSchemaError,
  SchemaValidationError,
  SlotDataSchemaError,
  toSchemaIssues,
  type SchemaIssue,
} from './errors.js';
export { boundedIntegerSchema, integerSchema, positiveIntSchema } from './numbers.js';
export {
  ACCESS_RULE_MODES,
  DEFAULT_JIGSAW_OPTIONS,
  ORIENTATIONS,
  PIECE_ORDERS,
  PIECE_TYPE_ORDERS,
  jigsawOptionsObjectSchema,
  jigsawOptionsSchema,
  normalizeOptionKeys,
  parseJigsawOptions,
  type AccessRuleMode,
  type JigsawOptions,
  type JigsawOptionsInput,
  type Orientation,
  type PieceOrder,
  type PieceTypeOrder,
} from './options.js';
export {
  decodeSlotData,
  encodeSlotData,
  parseSlotData,
  slotDataObjectSchema,
  slotDataSchema,
  type SlotData,
} from './slot-data.js';
