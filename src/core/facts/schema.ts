import { z } from 'zod/v4';

/** Result cardinality a subquery or function call is expected to produce. */
export const CARDINALITY_HINTS = ['SCALAR', 'SET'] as const;

/** Coarse size of the row set an upsert touches. */
export const ROW_COUNT_ESTIMATES = ['SMALL', 'LARGE'] as const;

/**
 * Zod schema for a declared query shape.
 * Flags default to false and `reuseCount` to 0, so callers only state what holds.
 */
export const queryShapeFactSchema = z.strictObject({
  needsRecursion: z.boolean().default(false),
  isCorrelated: z.boolean().default(false),
  invokesTableValuedFunction: z.boolean().default(false),
  reuseCount: z.number().int().min(0).default(0),
  resultCardinalityHint: z.enum(CARDINALITY_HINTS),
  /** The applied relation may be absent for an outer row (LEFT-join semantics). */
  relationIsOptional: z.boolean().default(false),
});

/** Zod schema for an index fragmentation reading. */
export const fragmentationFactSchema = z.strictObject({
  fragmentationPercent: z.number().min(0).max(100),
});

/** Zod schema for an upsert being written as MERGE or UPDATE + INSERT. */
export const mergeDecisionFactSchema = z.strictObject({
  conditionalBranchCount: z.number().int().min(0),
  needsRowLevelAudit: z.boolean().default(false),
  estimatedRowCount: z.enum(ROW_COUNT_ESTIMATES).default('SMALL'),
});
