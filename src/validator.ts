/**
 * Validator - Main validation orchestrator
 */

import { CandidateQuery, ValidationResult, ValidationRule } from './types';
import { deriveSeverity } from './validation-result';
import { ValidatorConfig, createRules } from './rules';
import { defaultValidatorConfig } from './config-loader';
import { Logger } from './logger';

export const AGGREGATE_RULE_NAME = 'query_validation';

export class Validator {
  private readonly rules: readonly ValidationRule[];

  /**
   * @param rules - evaluated in order; defaults to the standard rule set
   */
  constructor(rules?: readonly ValidationRule[], private readonly logger?: Logger) {
    this.rules = Object.freeze([...(rules ?? createRules(defaultValidatorConfig()))]);
  }

  /**
   * @throws ConfigError when a rule rejects its configuration
   */
  static fromConfig(config: ValidatorConfig, logger?: Logger): Validator {
    return new Validator(createRules(config), logger);
  }

  getRules(): readonly ValidationRule[] {
    return this.rules;
  }

  /**
   * Run every enabled rule and fold the results into one decision.
   * No rule short-circuits another.
   */
  validate(query: CandidateQuery | null | undefined): ValidationResult {
    if (query === null || query === undefined) {
      this.logger?.info('Rejected missing query');
      return freezeResult({
        isValid: false,
        ruleName: AGGREGATE_RULE_NAME,
        severity: deriveSeverity(1, 0),
        message: 'Validation failed: query is required',
        errors: ['query is required'],
        warnings: [],
        recommendations: [],
        details: {},
        timestamp: new Date().toISOString(),
        querySnapshot: null
      });
    }

    const ruleResults: Record<string, ValidationResult> = {};
    const rulesApplied: string[] = [];
    const rulesFailed: string[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];
    const recommendations: string[] = [];

    for (const rule of this.rules) {
      if (!rule.enabled()) {
        continue;
      }

      const result = rule.validate(query);
      ruleResults[rule.name()] = result;
      rulesApplied.push(rule.name());
      errors.push(...result.errors);
      warnings.push(...result.warnings);
      recommendations.push(...result.recommendations);

      if (!result.isValid) {
        rulesFailed.push(rule.name());
        this.logger?.info('Rule rejected query', { rule: rule.name(), errors: result.errors });
      }
    }

    const isValid = rulesFailed.length === 0;
    const severity = deriveSeverity(errors.length, warnings.length);

    let message = 'All rules passed validation';
    if (!isValid) {
      message = `Validation failed: ${rulesFailed.length} of ${rulesApplied.length} rules failed`;
    } else if (warnings.length > 0) {
      message = `Validation passed with ${warnings.length} warnings`;
    }

    this.logger?.debug('Query validated', {
      valid: isValid,
      severity,
      rules_applied: rulesApplied.length,
      rules_failed: rulesFailed
    });

    return freezeResult({
      isValid,
      ruleName: AGGREGATE_RULE_NAME,
      severity,
      message,
      errors,
      warnings,
      // Guidance is only surfaced when the query is rejected
      recommendations: isValid ? [] : recommendations,
      details: {
        rule_results: ruleResults,
        rules_applied: rulesApplied,
        rules_failed: rulesFailed
      },
      timestamp: new Date().toISOString(),
      querySnapshot: query
    });
  }
}

function freezeResult(result: ValidationResult): ValidationResult {
  return Object.freeze({
    ...result,
    errors: Object.freeze([...result.errors]),
    warnings: Object.freeze([...result.warnings]),
    recommendations: Object.freeze([...result.recommendations]),
    details: Object.freeze({ ...result.details })
  });
}
