import type { AdvisorReport, CapabilityStatus, Recommendation, RuleSetListing } from './reportTypes.js';

/**
 * Format a report as human-readable text.
 */
export function toText(report: AdvisorReport): string {
  const lines: string[] = [];

  switch (report.kind) {
    case 'recommendation':
      lines.push(`=== ${report.title} ===`);
      lines.push('');
      pushRecommendation(lines, report.advice.recommendation);
      break;
    case 'capability':
      lines.push(`=== ${report.status.name} ===`);
      lines.push('');
      pushStatus(lines, report.status);
      break;
    case 'capability-comparison':
      lines.push(`=== ${report.name} ===`);
      lines.push('');
      for (const status of report.statuses) {
        pushStatus(lines, status);
      }
      break;
    case 'capability-list':
      lines.push('=== Capabilities ===');
      lines.push('');
      if (report.statuses.length === 0) {
        lines.push('No matching capabilities.');
      }
      for (const status of report.statuses) {
        lines.push(`  ${status.name} [${status.category}]`);
        pushStatus(lines, status);
      }
      break;
    case 'rule-list':
      for (const ruleSet of report.ruleSets) {
        pushRuleSet(lines, ruleSet);
      }
      break;
  }

  lines.push('');
  return lines.join('\n');
}

function pushRecommendation(lines: string[], recommendation: Recommendation): void {
  lines.push(`Outcome:   ${recommendation.outcome}`);
  lines.push(`Rule:      #${String(recommendation.order)} ${recommendation.ruleId}`);
  lines.push(`Matched:   ${recommendation.predicate}`);
  lines.push('Rationale:');
  for (const reason of recommendation.rationale) {
    lines.push(`  - ${reason}`);
  }
}

function pushStatus(lines: string[], status: CapabilityStatus): void {
  const note = status.constraintNote !== null ? ` (${status.constraintNote})` : '';
  lines.push(`  ${status.environment.padEnd(16)} ${status.status}${note}`);
}

function pushRuleSet(lines: string[], ruleSet: RuleSetListing): void {
  lines.push(`=== ${ruleSet.title} (${ruleSet.ruleSetId}) ===`);
  for (const rule of ruleSet.rules) {
    lines.push(`  #${String(rule.order)} ${rule.id}: ${rule.predicate} -> ${rule.outcome}`);
  }
  lines.push('');
}
