import type { z } from 'zod/v4';
import { compareCapability, listCapabilities, loadCapabilityMatrix, resolveCapability } from './capabilities/matrix.js';
import type { CapabilityFilter, CapabilityMatrix } from './capabilities/matrix.js';
import { DEFAULT_CAPABILITIES_PATH, DEFAULT_RULES_PATH } from './defaults.js';
import { evaluate, getRuleSet, parseFact, selectRule, unknownRuleSet } from './engine/evaluate.js';
import { fragmentationFactSchema, mergeDecisionFactSchema, queryShapeFactSchema } from './facts/schema.js';
import type {
  FactRecord,
  FragmentationFact,
  FragmentationInput,
  MergeDecisionFact,
  MergeDecisionInput,
  QueryShapeFact,
  QueryShapeInput,
} from './facts/types.js';
import type { Construct, FragmentationAction, MergeStrategy, RuleSetId } from './rules/domains.js';
import { loadRuleRepository } from './rules/parse.js';
import type { RuleRepository, RuleSet, TypedRuleSets } from './rules/parse.js';
import type { Advice, CapabilityStatus, Recommendation, RuleSetListing } from './report/reportTypes.js';

/** Everything the advisor reasons over, loaded once and never mutated. */
export interface AdvisorSnapshot {
  readonly rules: RuleRepository;
  readonly capabilities: CapabilityMatrix;
}

/** Where to load rule and capability data from; defaults to the bundled files. */
export interface LoadOptions {
  readonly rulesPath?: string | undefined;
  readonly capabilitiesPath?: string | undefined;
}

/**
 * Load and validate both sources.
 * Any load error is thrown before a snapshot exists, so a partial snapshot is never served.
 */
export function loadSnapshot(options: LoadOptions = {}): AdvisorSnapshot {
  const rules = loadRuleRepository(options.rulesPath ?? DEFAULT_RULES_PATH);
  const capabilities = loadCapabilityMatrix(options.capabilitiesPath ?? DEFAULT_CAPABILITIES_PATH);
  return Object.freeze({ rules, capabilities });
}

/**
 * Entry point for callers: construct selection, fragmentation action,
 * MERGE strategy and capability lookup over one read-only snapshot.
 *
 * Every operation reads the current snapshot once, so `swap` and `reload`
 * never expose a half-updated state to a call in progress.
 */
export class SqlServerAdvisor {
  private snapshot: AdvisorSnapshot;

  constructor(snapshot: AdvisorSnapshot) {
    this.snapshot = snapshot;
  }

  /** Load the sources and build an advisor. */
  static load(options: LoadOptions = {}): SqlServerAdvisor {
    return new SqlServerAdvisor(loadSnapshot(options));
  }

  /** The snapshot new calls will use. */
  get current(): AdvisorSnapshot {
    return this.snapshot;
  }

  /** Replace the whole snapshot. Returns the previous one. */
  swap(next: AdvisorSnapshot): AdvisorSnapshot {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }

  /** Load fresh sources and swap them in; on a load error the current snapshot stays. */
  reload(options: LoadOptions = {}): AdvisorSnapshot {
    return this.swap(loadSnapshot(options));
  }

  /** Evaluate any registered rule set against an unvalidated fact. */
  evaluate(ruleSetId: string, fact: unknown): Recommendation {
    return evaluate(this.snapshot.rules, ruleSetId, fact);
  }

  /** Choose between CTE, inline or correlated subquery, CROSS APPLY and OUTER APPLY. */
  recommendConstruct(input: QueryShapeInput): Advice<Construct, QueryShapeFact> {
    return this.advise<QueryShapeFact, Construct>(
      'construct-selection',
      (sets) => sets['construct-selection'],
      queryShapeFactSchema,
      input,
    );
  }

  /** Map an index fragmentation percentage to a maintenance action. */
  recommendFragmentationAction(input: FragmentationInput): Advice<FragmentationAction, FragmentationFact> {
    return this.advise<FragmentationFact, FragmentationAction>(
      'fragmentation-action',
      (sets) => sets['fragmentation-action'],
      fragmentationFactSchema,
      input,
    );
  }

  /** Choose between a single MERGE and separate UPDATE + INSERT statements. */
  recommendMergeStrategy(input: MergeDecisionInput): Advice<MergeStrategy, MergeDecisionFact> {
    return this.advise<MergeDecisionFact, MergeStrategy>(
      'merge-vs-split',
      (sets) => sets['merge-vs-split'],
      mergeDecisionFactSchema,
      input,
    );
  }

  /**
   * Availability of a capability in one environment. The environment is
   * matched like `parseEnvironment`, but only after the name is found.
   */
  resolveCapability(name: string, environment: string): CapabilityStatus {
    return resolveCapability(this.snapshot.capabilities, name, environment);
  }

  /** Availability of a capability in every environment it declares. */
  compareCapability(name: string): readonly CapabilityStatus[] {
    return compareCapability(this.snapshot.capabilities, name);
  }

  listCapabilities(filter: CapabilityFilter = {}): readonly CapabilityStatus[] {
    return listCapabilities(this.snapshot.capabilities, filter);
  }

  /** Registered rule set ids, sorted. */
  ruleSetIds(): readonly string[] {
    return [...this.snapshot.rules.ruleSets.keys()].sort();
  }

  /** The rules of one rule set, or of every registered set when no id is given. */
  listRules(ruleSetId?: string): readonly RuleSetListing[] {
    const { rules } = this.snapshot;
    const ids = ruleSetId !== undefined ? [ruleSetId] : this.ruleSetIds();
    return ids.map((id) => {
      const ruleSet = getRuleSet(rules, id);
      return {
        ruleSetId: ruleSet.domain.id,
        title: ruleSet.domain.title,
        rules: ruleSet.rules.map((rule) => ({
          order: rule.order,
          id: rule.id,
          predicate: rule.predicate,
          outcome: rule.outcome,
          rationale: rule.rationale,
        })),
      };
    });
  }

  private advise<TFact extends FactRecord, TOutcome extends string>(
    ruleSetId: RuleSetId,
    pick: (ruleSets: TypedRuleSets) => RuleSet<TOutcome> | undefined,
    schema: z.ZodType<TFact>,
    input: unknown,
  ): Advice<TOutcome, TFact> {
    const { rules } = this.snapshot;
    const ruleSet = pick(rules.byDomain);
    if (ruleSet === undefined) {
      throw unknownRuleSet(rules, ruleSetId, input);
    }
    const fact = parseFact(schema, input, ruleSetId);
    return { fact, recommendation: selectRule(ruleSet, fact) };
  }
}
