import type { z } from 'zod/v4';
import { AdvisorError, formatIssues } from '../errors.js';
import type { FactRecord } from '../facts/types.js';
import type { RuleRepository, RuleSet } from '../rules/parse.js';
import type { Recommendation } from '../report/reportTypes.js';

/**
 * Evaluate a fact against a registered rule set.
 *
 * Rules are tried in their declared order and the first whose predicate
 * holds is returned; later rules are never consulted.
 */
export function evaluate(repository: RuleRepository, ruleSetId: string, input: unknown): Recommendation {
  const ruleSet = getRuleSet(repository, ruleSetId, input);
  const fact = parseFact(ruleSet.domain.factSchema, input, ruleSetId);
  return selectRule(ruleSet, fact);
}

/**
 * Look up a rule set, failing with UNKNOWN_RULE_SET when it is not registered.
 * `fact` is carried into the error context when given.
 */
export function getRuleSet(repository: RuleRepository, ruleSetId: string, fact?: unknown): RuleSet {
  const ruleSet = repository.ruleSets.get(ruleSetId);
  if (ruleSet === undefined) {
    throw unknownRuleSet(repository, ruleSetId, fact);
  }
  return ruleSet;
}

export function unknownRuleSet(repository: RuleRepository, ruleSetId: string, fact?: unknown): AdvisorError {
  const known = [...repository.ruleSets.keys()].sort();
  return new AdvisorError(
    'UNKNOWN_RULE_SET',
    `Rule set "${ruleSetId}" is not registered. Known rule sets: ${known.length > 0 ? known.join(', ') : '(none)'}.`,
    fact !== undefined ? { ruleSetId, known, fact } : { ruleSetId, known },
  );
}

/** Validate and freeze a fact, failing with INVALID_FACT on out-of-domain input. */
export function parseFact<T extends object>(schema: z.ZodType<T>, input: unknown, ruleSetId: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new AdvisorError('INVALID_FACT', `Invalid fact for "${ruleSetId}": ${issues.join('; ')}`, {
      ruleSetId,
      fact: input,
      issues,
    });
  }
  const fact = parsed.data;
  Object.freeze(fact);
  return fact;
}

/** Return the first rule of the set whose predicate holds for `fact`. */
export function selectRule<TOutcome extends string>(ruleSet: RuleSet<TOutcome>, fact: FactRecord): Recommendation<TOutcome> {
  for (const rule of ruleSet.rules) {
    if (rule.test(fact)) {
      return {
        ruleSetId: rule.ruleSetId,
        ruleId: rule.id,
        order: rule.order,
        predicate: rule.predicate,
        outcome: rule.outcome,
        rationale: rule.rationale,
      };
    }
  }

  throw new AdvisorError(
    'NO_RULE_MATCHED',
    `No rule in "${ruleSet.domain.id}" matched ${JSON.stringify(fact)}.`,
    { ruleSetId: ruleSet.domain.id, fact },
  );
}
