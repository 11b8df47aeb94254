/**
 * Rule set assembly
 */

import { ValidationRule } from '../types';
import { WhitelistConfig, WhitelistRule } from './whitelist-rule';
import { ForbiddenPatternsConfig, ForbiddenPatternsRule } from './forbidden-patterns-rule';
import { RequiredFieldsConfig, RequiredFieldsRule } from './required-fields-rule';
import { FieldValuesConfig, FieldValuesRule } from './field-values-rule';
import { SanitizationConfig, SanitizationRule } from './sanitization-rule';
import { TimeframeConfig, TimeframeRule } from './timeframe-rule';
import { PerformanceConfig, PerformanceRule } from './performance-rule';
import { AdvancedAnalysisConfig, AdvancedAnalysisRule } from './advanced-analysis-rule';
import { MultiSourceRuleConfig, MultiSourceRule } from './multi-source-rule';
import { BehavioralAnalyticsConfig, BehavioralAnalyticsRule } from './behavioral-analytics-rule';
import { ComplianceConfig, ComplianceRule } from './compliance-rule';
import { InputValidationConfig, InputValidationRule } from './input-validation-rule';

export { WhitelistRule } from './whitelist-rule';
export { ForbiddenPatternsRule } from './forbidden-patterns-rule';
export { RequiredFieldsRule } from './required-fields-rule';
export { FieldValuesRule } from './field-values-rule';
export { SanitizationRule } from './sanitization-rule';
export { TimeframeRule } from './timeframe-rule';
export { PerformanceRule } from './performance-rule';
export { AdvancedAnalysisRule } from './advanced-analysis-rule';
export { MultiSourceRule } from './multi-source-rule';
export { BehavioralAnalyticsRule } from './behavioral-analytics-rule';
export { ComplianceRule } from './compliance-rule';
export { InputValidationRule } from './input-validation-rule';

/**
 * Per-rule overrides; anything left out keeps the rule's own default
 */
export interface ValidatorConfig {
  whitelist: Partial<WhitelistConfig>;
  forbiddenPatterns: Partial<ForbiddenPatternsConfig>;
  requiredFields: Partial<RequiredFieldsConfig>;
  fieldValues: Partial<FieldValuesConfig>;
  sanitization: Partial<SanitizationConfig>;
  timeframe: Partial<TimeframeConfig>;
  performance: Partial<PerformanceConfig>;
  advancedAnalysis: Partial<AdvancedAnalysisConfig>;
  multiSource: Partial<MultiSourceRuleConfig>;
  behavioralAnalytics: Partial<BehavioralAnalyticsConfig>;
  compliance: Partial<ComplianceConfig>;
  inputValidation: Partial<InputValidationConfig>;
}

/**
 * Build the rule list in evaluation order.
 * @throws ConfigError when a rule rejects its configuration
 */
export function createRules(config: ValidatorConfig): ValidationRule[] {
  return [
    new WhitelistRule(config.whitelist),
    new ForbiddenPatternsRule(config.forbiddenPatterns),
    new RequiredFieldsRule(config.requiredFields),
    new FieldValuesRule(config.fieldValues),
    new SanitizationRule(config.sanitization),
    new TimeframeRule(config.timeframe),
    new PerformanceRule(config.performance),
    new AdvancedAnalysisRule(config.advancedAnalysis),
    new MultiSourceRule(config.multiSource),
    new BehavioralAnalyticsRule(config.behavioralAnalytics),
    new ComplianceRule(config.compliance),
    new InputValidationRule(config.inputValidation)
  ];
}
