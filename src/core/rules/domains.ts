import type { z } from 'zod/v4';
import {
  CARDINALITY_HINTS,
  ROW_COUNT_ESTIMATES,
  fragmentationFactSchema,
  mergeDecisionFactSchema,
  queryShapeFactSchema,
} from '../facts/schema.js';
import type { FactRecord, FragmentationFact, MergeDecisionFact, QueryShapeFact } from '../facts/types.js';

/** Query constructs the construct-selection rules may recommend. */
export const CONSTRUCTS = [
  'CTE',
  'SUBQUERY_INLINE',
  'SUBQUERY_CORRELATED',
  'CROSS_APPLY',
  'OUTER_APPLY',
] as const;

/** Index maintenance actions. */
export const FRAGMENTATION_ACTIONS = ['NO_ACTION', 'REORGANIZE', 'REBUILD'] as const;

/** Upsert statement strategies. */
export const MERGE_STRATEGIES = ['MERGE', 'UPDATE_THEN_INSERT'] as const;

export type Construct = (typeof CONSTRUCTS)[number];
export type FragmentationAction = (typeof FRAGMENTATION_ACTIONS)[number];
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const RULE_SET_IDS = ['construct-selection', 'fragmentation-action', 'merge-vs-split'] as const;

/** Identifier of an advisory domain. */
export type RuleSetId = (typeof RULE_SET_IDS)[number];

/** Type of a fact field, used to check rule conditions at load time. */
export type FieldKind =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'number' }
  | { readonly kind: 'enum'; readonly values: readonly string[] };

/** An advisory domain: the fact it reasons over. */
export interface RuleDomain {
  readonly id: RuleSetId;
  readonly title: string;
  readonly factSchema: z.ZodType<FactRecord>;
  readonly fields: Readonly<Record<string, FieldKind>>;
}

const BOOLEAN: FieldKind = { kind: 'boolean' };
const NUMBER: FieldKind = { kind: 'number' };

const DOMAINS: readonly RuleDomain[] = [
  {
    id: 'construct-selection',
    title: 'Construct Selection',
    factSchema: queryShapeFactSchema,
    fields: {
      needsRecursion: BOOLEAN,
      isCorrelated: BOOLEAN,
      invokesTableValuedFunction: BOOLEAN,
      reuseCount: NUMBER,
      resultCardinalityHint: { kind: 'enum', values: CARDINALITY_HINTS },
      relationIsOptional: BOOLEAN,
    } satisfies Record<keyof QueryShapeFact, FieldKind>,
  },
  {
    id: 'fragmentation-action',
    title: 'Fragmentation Action',
    factSchema: fragmentationFactSchema,
    fields: {
      fragmentationPercent: NUMBER,
    } satisfies Record<keyof FragmentationFact, FieldKind>,
  },
  {
    id: 'merge-vs-split',
    title: 'MERGE vs UPDATE + INSERT',
    factSchema: mergeDecisionFactSchema,
    fields: {
      conditionalBranchCount: NUMBER,
      needsRowLevelAudit: BOOLEAN,
      estimatedRowCount: { kind: 'enum', values: ROW_COUNT_ESTIMATES },
    } satisfies Record<keyof MergeDecisionFact, FieldKind>,
  },
];

const DOMAIN_BY_ID = new Map<string, RuleDomain>(DOMAINS.map((d) => [d.id, d]));

/** Look up an advisory domain by rule set id. */
export function getRuleDomain(id: string): RuleDomain | undefined {
  return DOMAIN_BY_ID.get(id);
}

/** Type guard: `value` is one of `values`. */
export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value);
}
