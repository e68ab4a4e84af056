import type { RuleSetId } from '../rules/domains.js';
import type { FactRecord } from '../facts/types.js';
import type { AVAILABILITIES, CAPABILITY_CATEGORIES, ENVIRONMENTS } from '../capabilities/schema.js';

/** Deployment environments the capability matrix covers. */
export type Environment = (typeof ENVIRONMENTS)[number];

/** Availability of a capability in one environment. */
export type Availability = (typeof AVAILABILITIES)[number];

/** Capability grouping. */
export type CapabilityCategory = (typeof CAPABILITY_CATEGORIES)[number];

/** The rule that answered an advisory request. */
export interface Recommendation<TOutcome extends string = string> {
  readonly ruleSetId: RuleSetId;
  readonly ruleId: string;
  readonly order: number;
  readonly predicate: string;
  readonly outcome: TOutcome;
  /** Literal justification of the matched rule; never empty. */
  readonly rationale: readonly string[];
}

/** A recommendation together with the validated fact it was derived from. */
export interface Advice<TOutcome extends string = string, TFact extends FactRecord = FactRecord> {
  readonly fact: TFact;
  readonly recommendation: Recommendation<TOutcome>;
}

/** Resolved availability of a capability in one environment. */
export interface CapabilityStatus {
  readonly name: string;
  readonly category: CapabilityCategory;
  readonly environment: Environment;
  readonly status: Availability;
  readonly constraintNote: string | null;
}

/** Summary of one rule, for listing a rule set. */
export interface RuleSummary {
  readonly order: number;
  readonly id: string;
  readonly predicate: string;
  readonly outcome: string;
  readonly rationale: readonly string[];
}

/** Everything the advisor can render, discriminated on `kind`. */
export type AdvisorReport =
  | { readonly kind: 'recommendation'; readonly title: string; readonly advice: Advice }
  | { readonly kind: 'capability'; readonly status: CapabilityStatus }
  | { readonly kind: 'capability-comparison'; readonly name: string; readonly statuses: readonly CapabilityStatus[] }
  | { readonly kind: 'capability-list'; readonly statuses: readonly CapabilityStatus[] }
  | { readonly kind: 'rule-list'; readonly ruleSets: readonly RuleSetListing[] };

/** The rules of one rule set, in evaluation order. */
export interface RuleSetListing {
  readonly ruleSetId: RuleSetId;
  readonly title: string;
  readonly rules: readonly RuleSummary[];
}

/** Output format options. */
export type OutputFormat = 'json' | 'text';
