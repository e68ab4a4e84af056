import type { FactRecord, FactValue } from '../facts/types.js';
import type { RuleDomain } from './domains.js';
import type { ConditionOperator, RuleCondition } from './schema.js';

/** A compiled rule predicate. */
export type Predicate = (fact: FactRecord) => boolean;

const ORDERING_OPERATORS: ReadonlySet<ConditionOperator> = new Set<ConditionOperator>(['lt', 'lte', 'gt', 'gte']);

/**
 * Check a condition against the fields of its domain.
 * Returns a description of the problem, or null when the condition is well-typed.
 */
export function checkCondition(domain: RuleDomain, condition: RuleCondition): string | null {
  const field = domain.fields[condition.fact];
  if (field === undefined) {
    return `unknown fact field "${condition.fact}" for rule set "${domain.id}"`;
  }

  if (ORDERING_OPERATORS.has(condition.op) && field.kind !== 'number') {
    return `operator "${condition.op}" needs a numeric field, but "${condition.fact}" is ${field.kind}`;
  }

  switch (field.kind) {
    case 'boolean':
      return typeof condition.value === 'boolean'
        ? null
        : `field "${condition.fact}" is boolean, got ${JSON.stringify(condition.value)}`;
    case 'number':
      return typeof condition.value === 'number' && Number.isFinite(condition.value)
        ? null
        : `field "${condition.fact}" is numeric, got ${JSON.stringify(condition.value)}`;
    case 'enum':
      return typeof condition.value === 'string' && field.values.includes(condition.value)
        ? null
        : `field "${condition.fact}" must be one of ${field.values.join(', ')}, got ${JSON.stringify(condition.value)}`;
  }
}

/** Compile the conditions of a rule into a single predicate; all must hold. */
export function compilePredicate(conditions: readonly RuleCondition[]): Predicate {
  const tests = conditions.map(compileCondition);
  return (fact) => tests.every((test) => test(fact));
}

function compileCondition(condition: RuleCondition): Predicate {
  const { fact: field, value } = condition;
  switch (condition.op) {
    case 'eq':
      return (fact) => fact[field] === value;
    case 'ne':
      return (fact) => fact[field] !== value;
    case 'lt':
      return (fact) => compareNumbers(fact[field], value, (a, b) => a < b);
    case 'lte':
      return (fact) => compareNumbers(fact[field], value, (a, b) => a <= b);
    case 'gt':
      return (fact) => compareNumbers(fact[field], value, (a, b) => a > b);
    case 'gte':
      return (fact) => compareNumbers(fact[field], value, (a, b) => a >= b);
  }
}

function compareNumbers(
  actual: FactValue | undefined,
  expected: FactValue,
  cmp: (a: number, b: number) => boolean,
): boolean {
  return typeof actual === 'number' && typeof expected === 'number' && cmp(actual, expected);
}
