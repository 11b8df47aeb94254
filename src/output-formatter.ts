/**
 * OutputFormatter - Console rendering for validation decisions, rule listings and cost reports
 *
 * Admitted queries go to stdout with ✅ (or ⚠️ when warnings were raised);
 * rejected queries go to stderr with 🚫.
 */

import { Severity, ValidationResult, ValidationRule } from './types';
import { ComplexityScore, PerformanceTier, ResourceEstimate } from './cost-model';

interface RuleOutcome {
  isValid: boolean;
  message: string;
}

function isRuleOutcome(value: unknown): value is RuleOutcome {
  return typeof value === 'object'
    && value !== null
    && 'isValid' in value
    && typeof value.isValid === 'boolean'
    && 'message' in value
    && typeof value.message === 'string';
}

/**
 * Per-rule outcomes recorded by the validator, in evaluation order
 */
export function ruleOutcomes(result: ValidationResult): Array<[string, RuleOutcome]> {
  const recorded = result.details.rule_results;
  if (typeof recorded !== 'object' || recorded === null) {
    return [];
  }
  const outcomes: Array<[string, RuleOutcome]> = [];
  for (const [name, outcome] of Object.entries(recorded)) {
    if (isRuleOutcome(outcome)) {
      outcomes.push([name, outcome]);
    }
  }
  return outcomes;
}

export class OutputFormatter {
  /**
   * Render the aggregate decision. `showRules` appends one line per evaluated rule.
   */
  displayResult(result: ValidationResult, showRules: boolean = false): void {
    const lines = [this.verdictLine(result), `Severity: ${result.severity}`];

    this.section(lines, 'Errors', result.errors);
    this.section(lines, 'Warnings', result.warnings);
    this.section(lines, 'Recommendations', result.recommendations);

    if (showRules) {
      const outcomes = ruleOutcomes(result);
      if (outcomes.length > 0) {
        lines.push('Rules:');
        for (const [name, outcome] of outcomes) {
          lines.push(`  ${outcome.isValid ? '✓' : '✗'} ${name}: ${outcome.message}`);
        }
      }
    }

    if (result.isValid) {
      console.log(lines.join('\n'));
    } else {
      console.error(lines.join('\n'));
    }
  }

  displayJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  displayRules(rules: readonly ValidationRule[]): void {
    const lines = [`${rules.length} rules configured:`];
    for (const rule of rules) {
      const state = rule.enabled() ? 'enabled' : 'disabled';
      lines.push(`  ${rule.name()} [${rule.severity()}, ${state}]`);
      lines.push(`    ${rule.description()}`);
    }
    console.log(lines.join('\n'));
  }

  displayCost(score: ComplexityScore, estimate: ResourceEstimate, tier: PerformanceTier): void {
    const lines = [`Complexity score: ${score.total} (${tier})`];
    for (const [part, value] of Object.entries(score.breakdown)) {
      lines.push(`  ${part}: ${value}`);
    }
    lines.push(`Estimated memory: ${estimate.memoryMb} MB`);
    lines.push(`Estimated CPU: ${estimate.cpuPercent}%`);
    lines.push(`Estimated execution time: ${estimate.executionSeconds}s`);
    console.log(lines.join('\n'));
  }

  displayError(message: string): void {
    console.error(`Error: ${message}`);
  }

  private verdictLine(result: ValidationResult): string {
    if (!result.isValid) {
      return `🚫 REJECTED: ${result.message}`;
    }
    if (result.severity === Severity.WARNING) {
      return `⚠️  ADMITTED WITH WARNINGS: ${result.message}`;
    }
    return `✅ ADMITTED: ${result.message}`;
  }

  private section(lines: string[], title: string, items: readonly string[]): void {
    if (items.length === 0) {
      return;
    }
    lines.push(`${title}:`);
    for (const item of items) {
      lines.push(`  - ${item}`);
    }
  }
}
