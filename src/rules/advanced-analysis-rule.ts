/**
 * Advanced Analysis Rule - Checks the analysis block: type, kill-chain phase, statistics, windows and sorting
 */

import { AnalysisConfig, CandidateQuery, RuleToggle, Severity, StatisticalAnalysisConfig, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertOrdered, assertPositiveInt } from '../errors';
import catalog from '../data/analysis-catalog.json';

export interface AdvancedAnalysisConfig extends RuleToggle {
  allowedAnalysisTypes: readonly string[];
  allowedTimeWindows: readonly string[];
  allowedSortFields: readonly string[];
  allowedSortOrders: readonly string[];
  minThreshold: number;
  maxThreshold: number;
  maxGroupByFields: number;
}

/** Allow-lists are empty until configured */
export const DEFAULT_ADVANCED_ANALYSIS_CONFIG: AdvancedAnalysisConfig = {
  enabled: true,
  allowedAnalysisTypes: [],
  allowedTimeWindows: [],
  allowedSortFields: [],
  allowedSortOrders: [],
  minThreshold: 1,
  maxThreshold: 10,
  maxGroupByFields: 5
};

/** Allow-lists used by the standard rule set */
export const STANDARD_ANALYSIS_LISTS = catalog.standard;

export const APT_ANALYSIS_TYPES: readonly string[] = catalog.aptTypes;
export const STATISTICAL_ANALYSIS_TYPES: readonly string[] = catalog.statisticalTypes;
export const KILL_CHAIN_PHASES: readonly string[] = catalog.killChainPhases;
export const STATISTICAL_BASELINE_WINDOWS: readonly string[] = catalog.statisticalBaselineWindows;

export class AdvancedAnalysisRule implements ValidationRule {
  private readonly config: Readonly<AdvancedAnalysisConfig>;

  /**
   * @throws ConfigError on inverted threshold bounds or a non-positive group-by limit
   */
  constructor(config: Partial<AdvancedAnalysisConfig> = {}) {
    this.config = withDefaults(DEFAULT_ADVANCED_ANALYSIS_CONFIG, config);
    assertOrdered(this.config.minThreshold, this.config.maxThreshold, 'advanced_analysis.threshold');
    assertPositiveInt(this.config.maxGroupByFields, 'advanced_analysis.max_group_by_fields');
  }

  name(): string {
    return 'advanced_analysis_validation';
  }

  description(): string {
    return 'Validates advanced analysis configuration including APT detection and statistical analysis';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Advanced analysis', query);
    const analysis = query.analysis;
    if (!analysis) {
      return result.build();
    }

    this.checkType(analysis, result);

    if (analysis.killChainPhase && !KILL_CHAIN_PHASES.includes(analysis.killChainPhase)) {
      result.error(
        `Invalid kill chain phase '${analysis.killChainPhase}'. Allowed phases: ${KILL_CHAIN_PHASES.join(', ')}`
      );
    }

    if (analysis.statisticalAnalysis) {
      this.checkStatistics(analysis.statisticalAnalysis, result);
    }

    const { minThreshold, maxThreshold } = this.config;
    const threshold = analysis.threshold ?? 0;
    if (threshold !== 0 && (threshold < minThreshold || threshold > maxThreshold)) {
      result.error(`Threshold must be between ${minThreshold} and ${maxThreshold}, got ${threshold}`);
    }

    this.checkAllowed(analysis.timeWindow, this.config.allowedTimeWindows, 'time window', 'windows', result);
    this.checkAllowed(analysis.sortBy, this.config.allowedSortFields, 'sort field', 'fields', result);
    this.checkAllowed(analysis.sortOrder, this.config.allowedSortOrders, 'sort order', 'orders', result);

    // Only the list form is counted
    const groupBy = analysis.groupBy;
    if (groupBy?.isList() && groupBy.values().length > this.config.maxGroupByFields) {
      result.error(
        `Too many group by fields. Maximum allowed: ${this.config.maxGroupByFields}, got: ${groupBy.values().length}`
      );
    }

    result.adviseOnFailure(
      'Review advanced analysis configuration',
      'Ensure all required fields are present for the analysis type',
      'Verify statistical analysis parameters are within valid ranges',
      'Check kill chain phase requirements for APT analysis types'
    );

    return result.build();
  }

  private checkType(analysis: AnalysisConfig, result: ResultBuilder): void {
    const type = analysis.type;
    if (!type) {
      result.error('Analysis type is required');
      return;
    }

    const allowed = this.config.allowedAnalysisTypes;
    if (!allowed.includes(type)) {
      result.error(`Invalid analysis type '${type}'. Allowed types: ${allowed.join(', ')}`);
      return;
    }

    if (APT_ANALYSIS_TYPES.includes(type) && !analysis.killChainPhase) {
      result.error(`Kill chain phase is required for APT analysis type '${type}'`);
    }

    if (STATISTICAL_ANALYSIS_TYPES.includes(type) && !analysis.statisticalAnalysis) {
      result.warn(`Statistical analysis parameters recommended for analysis type '${type}'`);
    }
  }

  /**
   * Zero leaves a parameter unset
   */
  private checkStatistics(stats: StatisticalAnalysisConfig, result: ResultBuilder): void {
    const deviation = stats.patternDeviationThreshold ?? 0;
    if (deviation !== 0 && (deviation < 0.1 || deviation > 10.0)) {
      result.error(`Pattern deviation threshold must be between 0.1 and 10.0, got ${deviation.toFixed(2)}`);
    }

    const confidence = stats.confidenceInterval ?? 0;
    if (confidence !== 0 && (confidence < 0.5 || confidence > 0.99)) {
      result.error(`Confidence interval must be between 0.5 and 0.99, got ${confidence.toFixed(2)}`);
    }

    const sampleSize = stats.sampleSizeMinimum ?? 0;
    if (sampleSize !== 0 && sampleSize < 10) {
      result.error(`Sample size minimum must be at least 10, got ${sampleSize}`);
    }

    if (stats.baselineWindow && !STATISTICAL_BASELINE_WINDOWS.includes(stats.baselineWindow)) {
      result.error(
        `Invalid baseline window '${stats.baselineWindow}'. Allowed windows: ${STATISTICAL_BASELINE_WINDOWS.join(', ')}`
      );
    }
  }

  private checkAllowed(
    value: string | undefined,
    allowed: readonly string[],
    label: string,
    plural: string,
    result: ResultBuilder
  ): void {
    if (value && !allowed.includes(value)) {
      result.error(`Invalid ${label} '${value}'. Allowed ${plural}: ${allowed.join(', ')}`);
    }
  }
}
