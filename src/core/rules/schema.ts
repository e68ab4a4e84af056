import { z } from 'zod/v4';

export const CONDITION_OPERATORS = ['eq', 'ne', 'lt', 'lte', 'gt', 'gte'] as const;

/**
 * Zod schema for one condition of a rule predicate.
 * A condition compares a single fact field against a literal.
 */
const conditionSchema = z.strictObject({
  fact: z.string().min(1),
  op: z.enum(CONDITION_OPERATORS),
  value: z.union([z.boolean(), z.number(), z.string()]),
});

/**
 * Zod schema for one rule row.
 * `predicate` is the human-readable form of `when`; every condition in
 * `when` must hold for the rule to match, and an empty `when` always matches.
 */
const ruleRowSchema = z.strictObject({
  ruleSet: z.string().min(1),
  order: z.number().int().min(1),
  id: z.string().regex(/^[a-z][a-z0-9-]*$/),
  predicate: z.string().min(1),
  when: z.array(conditionSchema),
  outcome: z.string().min(1),
  rationale: z.array(z.string().min(1)).min(1),
});

/** Zod schema for the full rule source file. */
export const ruleSourceSchema = z.strictObject({
  rules: z.array(ruleRowSchema),
});

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

/** Parsed type for a rule condition. */
export type RuleCondition = z.infer<typeof conditionSchema>;

/** Parsed type for a rule row. */
export type RuleRow = z.infer<typeof ruleRowSchema>;

/** Parsed type for the full rule source. */
export type RuleSource = z.infer<typeof ruleSourceSchema>;
