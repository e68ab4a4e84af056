import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { SqlServerAdvisor, loadSnapshot } from '../../src/core/advisor.js';
import { isAdvisorError } from '../../src/core/errors.js';

const RULES_DIR = resolve(import.meta.dirname, '../fixtures/rules');
const CAPABILITIES_DIR = resolve(import.meta.dirname, '../fixtures/capabilities');

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected an error');
}

describe('SqlServerAdvisor', () => {
  it('resolves capabilities from user-typed environment names', () => {
    const advisor = SqlServerAdvisor.load();

    const status = advisor.resolveCapability('Query Store', 'managed-instance');
    expect(status.status).toBe('FULL');
    expect(status.constraintNote).toBe('always enabled');
    expect(advisor.resolveCapability('OS Access', 'MANAGED_INSTANCE').status).toBe('NOT_AVAILABLE');
  });

  it('reports an environment outside the matrix as UNKNOWN_ENVIRONMENT for a known capability', () => {
    const advisor = SqlServerAdvisor.load();
    const error = captureError(() => advisor.resolveCapability('Query Store', 'AWS_RDS'));

    expect(isAdvisorError(error, 'UNKNOWN_ENVIRONMENT')).toBe(true);
    expect(error).toMatchObject({
      message: 'Capability "Query Store" has no entry for AWS_RDS (declared: ON_PREM, AZURE_IAAS, MANAGED_INSTANCE).',
      context: { name: 'Query Store', environment: 'AWS_RDS' },
    });
  });

  it('reports an unknown capability before looking at the environment', () => {
    const advisor = SqlServerAdvisor.load();
    const error = captureError(() => advisor.resolveCapability('Stretch Database', 'AWS_RDS'));

    expect(isAdvisorError(error, 'UNKNOWN_CAPABILITY')).toBe(true);
    expect(error).toMatchObject({ context: { name: 'Stretch Database', environment: 'AWS_RDS' } });
  });

  it('carries the fact when a typed method finds no rule set', () => {
    const advisor = new SqlServerAdvisor(loadSnapshot({ rulesPath: resolve(RULES_DIR, 'fragmentation-only.json') }));
    const error = captureError(() => advisor.recommendMergeStrategy({ conditionalBranchCount: 2 }));

    expect(isAdvisorError(error, 'UNKNOWN_RULE_SET')).toBe(true);
    expect(error).toMatchObject({
      context: { ruleSetId: 'merge-vs-split', known: ['fragmentation-action'], fact: { conditionalBranchCount: 2 } },
    });
  });

  it('evaluates a rule set by id with an unvalidated fact', () => {
    const advisor = SqlServerAdvisor.load();
    const recommendation = advisor.evaluate('merge-vs-split', { conditionalBranchCount: 5 });

    expect(recommendation.outcome).toBe('UPDATE_THEN_INSERT');
    expect(recommendation.ruleId).toBe('many-branches-split');
  });

  it('lists rule sets in id order with their rules in evaluation order', () => {
    const advisor = SqlServerAdvisor.load();

    expect(advisor.ruleSetIds()).toEqual(['construct-selection', 'fragmentation-action', 'merge-vs-split']);

    const [merge] = advisor.listRules('merge-vs-split');
    expect(merge?.title).toBe('MERGE vs UPDATE + INSERT');
    expect(merge?.rules.map((r) => `${String(r.order)}:${r.outcome}`)).toEqual([
      '1:MERGE',
      '2:UPDATE_THEN_INSERT',
      '3:UPDATE_THEN_INSERT',
      '4:MERGE',
    ]);
    expect(advisor.listRules().map((l) => l.ruleSetId)).toEqual([
      'construct-selection',
      'fragmentation-action',
      'merge-vs-split',
    ]);
  });

  it('fails with UNKNOWN_RULE_SET when listing an unregistered rule set', () => {
    const advisor = SqlServerAdvisor.load();
    const error = captureError(() => advisor.listRules('index-advisor'));
    expect(isAdvisorError(error, 'UNKNOWN_RULE_SET')).toBe(true);
  });

  it('swaps the whole snapshot at once', () => {
    const advisor = SqlServerAdvisor.load();
    const original = advisor.current;
    const next = loadSnapshot({
      rulesPath: resolve(RULES_DIR, 'fragmentation-only.json'),
      capabilitiesPath: resolve(CAPABILITIES_DIR, 'partial.json'),
    });

    const previous = advisor.swap(next);

    expect(previous).toBe(original);
    expect(advisor.current).toBe(next);
    expect(advisor.recommendFragmentationAction({ fragmentationPercent: 12 }).recommendation.ruleId).toBe(
      'rebuild-everything-else',
    );
    expect(isAdvisorError(captureError(() => advisor.recommendConstruct({ resultCardinalityHint: 'SCALAR' })), 'UNKNOWN_RULE_SET')).toBe(true);
    expect(isAdvisorError(captureError(() => advisor.resolveCapability('OS Access', 'ON_PREM')), 'UNKNOWN_CAPABILITY')).toBe(true);
  });

  it('reports a gap in a swapped rule set as NO_RULE_MATCHED', () => {
    const advisor = new SqlServerAdvisor(loadSnapshot({ rulesPath: resolve(RULES_DIR, 'fragmentation-only.json') }));
    const error = captureError(() => advisor.recommendFragmentationAction({ fragmentationPercent: 5 }));

    expect(isAdvisorError(error, 'NO_RULE_MATCHED')).toBe(true);
    expect(error).toMatchObject({ context: { fact: { fragmentationPercent: 5 } } });
  });

  it('keeps the current snapshot when a reload fails', () => {
    const advisor = SqlServerAdvisor.load();
    const original = advisor.current;

    const error = captureError(() => advisor.reload({ rulesPath: resolve(RULES_DIR, 'duplicate-order.json') }));

    expect(isAdvisorError(error, 'DUPLICATE_RULE_ORDER')).toBe(true);
    expect(advisor.current).toBe(original);
    expect(advisor.recommendConstruct({ needsRecursion: true, resultCardinalityHint: 'SET' }).recommendation.outcome).toBe(
      'CTE',
    );
  });

  it('refuses to load a capability source with duplicates', () => {
    const error = captureError(() =>
      SqlServerAdvisor.load({ capabilitiesPath: resolve(CAPABILITIES_DIR, 'duplicate.json') }),
    );
    expect(isAdvisorError(error, 'DUPLICATE_CAPABILITY_ENTRY')).toBe(true);
  });
});
