import { describe, it, expect } from 'vitest';
import { SqlServerAdvisor } from '../../src/core/advisor.js';
import { isAdvisorError } from '../../src/core/errors.js';
import type { MergeDecisionInput } from '../../src/core/facts/types.js';

const advisor = SqlServerAdvisor.load();

function strategy(input: MergeDecisionInput): string {
  return advisor.recommendMergeStrategy(input).recommendation.outcome;
}

describe('recommendMergeStrategy', () => {
  it('recommends MERGE for row-level audit regardless of branch count or size', () => {
    for (const conditionalBranchCount of [0, 1, 3, 4, 12]) {
      for (const estimatedRowCount of ['SMALL', 'LARGE'] as const) {
        const { recommendation } = advisor.recommendMergeStrategy({
          conditionalBranchCount,
          estimatedRowCount,
          needsRowLevelAudit: true,
        });
        expect(recommendation.outcome).toBe('MERGE');
        expect(recommendation.ruleId).toBe('audit-needs-merge');
      }
    }
  });

  it('splits once there are more than three branches', () => {
    expect(strategy({ conditionalBranchCount: 3 })).toBe('MERGE');
    expect(strategy({ conditionalBranchCount: 4 })).toBe('UPDATE_THEN_INSERT');
  });

  it('splits a large upsert with at most one branch', () => {
    expect(strategy({ conditionalBranchCount: 0, estimatedRowCount: 'LARGE' })).toBe('UPDATE_THEN_INSERT');
    expect(strategy({ conditionalBranchCount: 1, estimatedRowCount: 'LARGE' })).toBe('UPDATE_THEN_INSERT');
    expect(strategy({ conditionalBranchCount: 2, estimatedRowCount: 'LARGE' })).toBe('MERGE');
  });

  it('defaults to MERGE for a small upsert', () => {
    const { recommendation, fact } = advisor.recommendMergeStrategy({ conditionalBranchCount: 1 });
    expect(recommendation.outcome).toBe('MERGE');
    expect(recommendation.ruleId).toBe('default-merge');
    expect(recommendation.predicate).toBe('otherwise');
    expect(fact).toEqual({ conditionalBranchCount: 1, needsRowLevelAudit: false, estimatedRowCount: 'SMALL' });
  });

  it('rejects a negative branch count with INVALID_FACT', () => {
    let caught: unknown;
    try {
      advisor.recommendMergeStrategy({ conditionalBranchCount: -1 });
    } catch (error: unknown) {
      caught = error;
    }
    expect(isAdvisorError(caught, 'INVALID_FACT')).toBe(true);
  });
});
