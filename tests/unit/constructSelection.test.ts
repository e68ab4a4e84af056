import { describe, it, expect } from 'vitest';
import { SqlServerAdvisor } from '../../src/core/advisor.js';
import { CONSTRUCTS } from '../../src/core/rules/domains.js';
import { isAdvisorError } from '../../src/core/errors.js';
import type { QueryShapeInput } from '../../src/core/facts/types.js';

const advisor = SqlServerAdvisor.load();

function recommend(input: QueryShapeInput): string {
  return advisor.recommendConstruct(input).recommendation.outcome;
}

describe('recommendConstruct', () => {
  it('recommends a correlated subquery for a correlated scalar', () => {
    const { recommendation } = advisor.recommendConstruct({ isCorrelated: true, resultCardinalityHint: 'SCALAR' });

    expect(recommendation.outcome).toBe('SUBQUERY_CORRELATED');
    expect(recommendation.ruleId).toBe('correlated-scalar-subquery');
    expect(recommendation.order).toBe(4);
    expect(recommendation.predicate).toBe('isCorrelated is true AND resultCardinalityHint is SCALAR');
  });

  it('returns the defaulted fact alongside the recommendation', () => {
    const { fact } = advisor.recommendConstruct({ resultCardinalityHint: 'SET' });

    expect(fact).toEqual({
      needsRecursion: false,
      isCorrelated: false,
      invokesTableValuedFunction: false,
      reuseCount: 0,
      resultCardinalityHint: 'SET',
      relationIsOptional: false,
    });
    expect(Object.isFrozen(fact)).toBe(true);
  });

  it('recommends a CTE for recursion regardless of every other field', () => {
    for (const isCorrelated of [false, true]) {
      for (const invokesTableValuedFunction of [false, true]) {
        for (const resultCardinalityHint of ['SCALAR', 'SET'] as const) {
          for (const reuseCount of [0, 1, 5]) {
            const { recommendation } = advisor.recommendConstruct({
              needsRecursion: true,
              isCorrelated,
              invokesTableValuedFunction,
              resultCardinalityHint,
              reuseCount,
              relationIsOptional: true,
            });
            expect(recommendation.outcome).toBe('CTE');
            expect(recommendation.ruleId).toBe('recursion-needs-cte');
          }
        }
      }
    }
  });

  it('recommends OUTER APPLY for an optional set-valued function call', () => {
    expect(
      recommend({ invokesTableValuedFunction: true, resultCardinalityHint: 'SET', relationIsOptional: true }),
    ).toBe('OUTER_APPLY');
  });

  it('defaults to CROSS APPLY when optionality is not declared', () => {
    expect(recommend({ invokesTableValuedFunction: true, resultCardinalityHint: 'SET' })).toBe('CROSS_APPLY');
  });

  it('prefers APPLY over a correlated subquery for a set-valued function', () => {
    expect(
      recommend({ invokesTableValuedFunction: true, isCorrelated: true, resultCardinalityHint: 'SET' }),
    ).toBe('CROSS_APPLY');
  });

  it('ignores optionality when no table-valued function is involved', () => {
    expect(recommend({ resultCardinalityHint: 'SCALAR', relationIsOptional: true })).toBe('SUBQUERY_INLINE');
  });

  it('prefers a correlated subquery over a reusable CTE', () => {
    expect(recommend({ isCorrelated: true, resultCardinalityHint: 'SCALAR', reuseCount: 3 })).toBe(
      'SUBQUERY_CORRELATED',
    );
  });

  it('recommends a CTE once the expression is referenced twice', () => {
    expect(recommend({ resultCardinalityHint: 'SCALAR', reuseCount: 1 })).toBe('SUBQUERY_INLINE');
    expect(recommend({ resultCardinalityHint: 'SCALAR', reuseCount: 2 })).toBe('CTE');
    expect(recommend({ resultCardinalityHint: 'SET', reuseCount: 2 })).toBe('CTE');
  });

  it('recommends an inline subquery for an uncorrelated scalar', () => {
    const { recommendation } = advisor.recommendConstruct({ resultCardinalityHint: 'SCALAR' });
    expect(recommendation.outcome).toBe('SUBQUERY_INLINE');
    expect(recommendation.ruleId).toBe('uncorrelated-scalar-inline');
  });

  it('recommends an inline subquery for a set used once', () => {
    const { recommendation } = advisor.recommendConstruct({ isCorrelated: true, resultCardinalityHint: 'SET' });
    expect(recommendation.outcome).toBe('SUBQUERY_INLINE');
    expect(recommendation.ruleId).toBe('set-valued-inline');
  });

  it('returns exactly one construct with a non-empty rationale for every valid shape', () => {
    for (const needsRecursion of [false, true]) {
      for (const isCorrelated of [false, true]) {
        for (const invokesTableValuedFunction of [false, true]) {
          for (const relationIsOptional of [false, true]) {
            for (const resultCardinalityHint of ['SCALAR', 'SET'] as const) {
              for (const reuseCount of [0, 1, 2, 10]) {
                const { recommendation } = advisor.recommendConstruct({
                  needsRecursion,
                  isCorrelated,
                  invokesTableValuedFunction,
                  relationIsOptional,
                  resultCardinalityHint,
                  reuseCount,
                });
                expect(CONSTRUCTS).toContain(recommendation.outcome);
                expect(recommendation.rationale.length).toBeGreaterThan(0);
              }
            }
          }
        }
      }
    }
  });

  it('rejects a negative or fractional reuse count with INVALID_FACT', () => {
    for (const reuseCount of [-1, 1.5, Number.NaN]) {
      let caught: unknown;
      try {
        advisor.recommendConstruct({ resultCardinalityHint: 'SCALAR', reuseCount });
      } catch (error: unknown) {
        caught = error;
      }
      expect(isAdvisorError(caught, 'INVALID_FACT')).toBe(true);
    }
  });
});
