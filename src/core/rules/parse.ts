import { AdvisorError, formatIssues } from '../errors.js';
import { readJsonFile } from '../readJsonFile.js';
import { CONSTRUCTS, FRAGMENTATION_ACTIONS, MERGE_STRATEGIES, RULE_SET_IDS, getRuleDomain, isOneOf } from './domains.js';
import type { Construct, FragmentationAction, MergeStrategy, RuleDomain, RuleSetId } from './domains.js';
import { checkCondition, compilePredicate } from './predicates.js';
import type { Predicate } from './predicates.js';
import { ruleSourceSchema } from './schema.js';
import type { RuleCondition, RuleRow } from './schema.js';
import { sortBy } from '../../util/index.js';

/** A validated rule, ready to evaluate. */
export interface CompiledRule<TOutcome extends string = string> {
  readonly ruleSetId: RuleSetId;
  readonly order: number;
  readonly id: string;
  readonly predicate: string;
  readonly conditions: readonly RuleCondition[];
  readonly outcome: TOutcome;
  readonly rationale: readonly string[];
  readonly test: Predicate;
}

/** The rules of one advisory domain, in evaluation order. */
export interface RuleSet<TOutcome extends string = string> {
  readonly domain: RuleDomain;
  readonly rules: readonly CompiledRule<TOutcome>[];
}

/** Outcome type of each advisory domain. */
export interface DomainOutcomes {
  readonly 'construct-selection': Construct;
  readonly 'fragmentation-action': FragmentationAction;
  readonly 'merge-vs-split': MergeStrategy;
}

/** Loaded rule sets with their outcomes typed per domain. */
export type TypedRuleSets = {
  readonly [K in RuleSetId]?: RuleSet<DomainOutcomes[K]> | undefined;
};

/** Every loaded rule set, keyed by rule set id. */
export interface RuleRepository {
  readonly ruleSets: ReadonlyMap<string, RuleSet>;
  readonly byDomain: TypedRuleSets;
  readonly sourcePath: string | null;
}

interface RuleGroup {
  readonly domain: RuleDomain;
  readonly rows: RuleRow[];
}

/**
 * Read and validate a rule source JSON file.
 * Throws an AdvisorError on any malformed or conflicting row; nothing is loaded partially.
 */
export function loadRuleRepository(filePath: string): RuleRepository {
  return parseRuleSource(readJsonFile(filePath), filePath);
}

/**
 * Validate an already-parsed rule source and compile it into rule sets.
 *
 * Rows are grouped by rule set and sorted by `order`. A rule set with no rows
 * is not registered at all.
 */
export function parseRuleSource(raw: unknown, sourcePath: string | null = null): RuleRepository {
  const parsed = ruleSourceSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new AdvisorError('MALFORMED_SOURCE', `Rule source is malformed: ${issues.join('; ')}`, {
      sourcePath,
      issues,
    });
  }

  const grouped = new Map<RuleSetId, RuleGroup>();

  for (const row of parsed.data.rules) {
    const domain = getRuleDomain(row.ruleSet);
    if (domain === undefined) {
      throw malformedRow(row, `unknown rule set "${row.ruleSet}"`, sourcePath);
    }

    const group: RuleGroup = grouped.get(domain.id) ?? { domain, rows: [] };
    const existing = group.rows;
    const sameOrder = existing.find((r) => r.order === row.order);
    if (sameOrder !== undefined) {
      throw new AdvisorError(
        'DUPLICATE_RULE_ORDER',
        `Rule set "${domain.id}" declares order ${String(row.order)} twice ("${sameOrder.id}" and "${row.id}").`,
        { sourcePath, ruleSetId: domain.id, order: row.order, ruleIds: [sameOrder.id, row.id] },
      );
    }
    if (existing.some((r) => r.id === row.id)) {
      throw malformedRow(row, `duplicate rule id "${row.id}"`, sourcePath);
    }

    existing.push(row);
    grouped.set(domain.id, group);
  }

  const byDomain: TypedRuleSets = Object.freeze({
    'construct-selection': compileGroup(grouped.get('construct-selection'), CONSTRUCTS, sourcePath),
    'fragmentation-action': compileGroup(grouped.get('fragmentation-action'), FRAGMENTATION_ACTIONS, sourcePath),
    'merge-vs-split': compileGroup(grouped.get('merge-vs-split'), MERGE_STRATEGIES, sourcePath),
  });

  const ruleSets = new Map<string, RuleSet>();
  for (const id of RULE_SET_IDS) {
    const ruleSet = byDomain[id];
    if (ruleSet !== undefined) {
      ruleSets.set(id, ruleSet);
    }
  }

  return Object.freeze({ ruleSets, byDomain, sourcePath });
}

function compileGroup<TOutcome extends string>(
  group: RuleGroup | undefined,
  outcomes: readonly TOutcome[],
  sourcePath: string | null,
): RuleSet<TOutcome> | undefined {
  if (group === undefined) {
    return undefined;
  }
  const { domain, rows } = group;
  const rules = rows.map((row) => compileRow(domain, outcomes, row, sourcePath));
  return Object.freeze({ domain, rules: Object.freeze(sortBy(rules, (rule) => rule.order)) });
}

function compileRow<TOutcome extends string>(
  domain: RuleDomain,
  outcomes: readonly TOutcome[],
  row: RuleRow,
  sourcePath: string | null,
): CompiledRule<TOutcome> {
  const { outcome } = row;
  if (!isOneOf(outcomes, outcome)) {
    throw malformedRow(row, `outcome "${outcome}" is not one of ${outcomes.join(', ')}`, sourcePath);
  }

  for (const condition of row.when) {
    const problem = checkCondition(domain, condition);
    if (problem !== null) {
      throw malformedRow(row, problem, sourcePath);
    }
  }

  return Object.freeze({
    ruleSetId: domain.id,
    order: row.order,
    id: row.id,
    predicate: row.predicate,
    conditions: Object.freeze(row.when.map((c) => Object.freeze({ ...c }))),
    outcome,
    rationale: Object.freeze([...row.rationale]),
    test: compilePredicate(row.when),
  });
}

function malformedRow(row: RuleRow, problem: string, sourcePath: string | null): AdvisorError {
  return new AdvisorError(
    'MALFORMED_SOURCE',
    `Rule "${row.id}" (${row.ruleSet} #${String(row.order)}): ${problem}.`,
    { sourcePath, ruleSetId: row.ruleSet, ruleId: row.id, order: row.order },
  );
}
