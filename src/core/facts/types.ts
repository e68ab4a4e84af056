import type { z } from 'zod/v4';
import type {
  CARDINALITY_HINTS,
  ROW_COUNT_ESTIMATES,
  fragmentationFactSchema,
  mergeDecisionFactSchema,
  queryShapeFactSchema,
} from './schema.js';

export type CardinalityHint = (typeof CARDINALITY_HINTS)[number];
export type RowCountEstimate = (typeof ROW_COUNT_ESTIMATES)[number];

/** A validated query shape. */
export type QueryShapeFact = Readonly<z.infer<typeof queryShapeFactSchema>>;
/** A validated fragmentation reading. */
export type FragmentationFact = Readonly<z.infer<typeof fragmentationFactSchema>>;
/** A validated upsert shape. */
export type MergeDecisionFact = Readonly<z.infer<typeof mergeDecisionFactSchema>>;

/** What callers pass in; defaulted fields may be omitted. */
export type QueryShapeInput = z.input<typeof queryShapeFactSchema>;
export type FragmentationInput = z.input<typeof fragmentationFactSchema>;
export type MergeDecisionInput = z.input<typeof mergeDecisionFactSchema>;

/** A scalar value a fact field can hold. */
export type FactValue = boolean | number | string;

/** Any validated fact, viewed as a flat record of named fields. */
export type FactRecord = Readonly<Record<string, FactValue>>;
