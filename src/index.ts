export type {
  Advice,
  AdvisorReport,
  Availability,
  CapabilityCategory,
  CapabilityStatus,
  Environment,
  OutputFormat,
  Recommendation,
  RuleSetListing,
  RuleSummary,
} from './core/report/reportTypes.js';

export type {
  CardinalityHint,
  FactRecord,
  FactValue,
  FragmentationFact,
  FragmentationInput,
  MergeDecisionFact,
  MergeDecisionInput,
  QueryShapeFact,
  QueryShapeInput,
  RowCountEstimate,
} from './core/facts/types.js';

export type { Construct, FragmentationAction, MergeStrategy, RuleDomain, RuleSetId } from './core/rules/domains.js';
export type { CompiledRule, RuleRepository, RuleSet } from './core/rules/parse.js';
export type { RuleCondition, RuleRow, RuleSource } from './core/rules/schema.js';
export type { CapabilityFilter, CapabilityMatrix } from './core/capabilities/matrix.js';
export type { AdvisorErrorCode } from './core/errors.js';
export type { AdvisorSnapshot, LoadOptions } from './core/advisor.js';

export { SqlServerAdvisor, loadSnapshot } from './core/advisor.js';
export { AdvisorError, isAdvisorError, isLoadError } from './core/errors.js';
export { evaluate } from './core/engine/evaluate.js';
export { loadRuleRepository, parseRuleSource } from './core/rules/parse.js';
export {
  compareCapability,
  listCapabilities,
  loadCapabilityMatrix,
  parseCapabilitySource,
  resolveCapability,
} from './core/capabilities/matrix.js';
export { matchEnvironment, parseEnvironment } from './core/capabilities/environment.js';
export { CONSTRUCTS, FRAGMENTATION_ACTIONS, MERGE_STRATEGIES, RULE_SET_IDS } from './core/rules/domains.js';
export { ENVIRONMENTS, AVAILABILITIES, CAPABILITY_CATEGORIES } from './core/capabilities/schema.js';
export { toJson } from './core/report/toJson.js';
export { toText } from './core/report/toText.js';
