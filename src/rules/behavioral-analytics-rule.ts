/**
 * Behavioral Analytics Rule - Checks profiling, baselines, risk scoring and anomaly detection settings
 */

import { BehavioralAnalysisConfig, CandidateQuery, RiskScoringConfig, AnomalyDetectionConfig, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertOrdered, assertPositiveInt } from '../errors';
import { ConstraintChecker } from '../constraint-checker';

export interface BehavioralAnalyticsConfig extends RuleToggle {
  allowedRiskFactors: readonly string[];
  maxRiskFactors: number;
  minBaselineDays: number;
  maxBaselineDays: number;
  minAnomalyThreshold: number;
  maxAnomalyThreshold: number;
  maxPerformanceScore: number;
}

export const RISK_FACTORS: readonly string[] = [
  'privilege_level', 'resource_sensitivity', 'timing_anomaly', 'access_pattern',
  'frequency_deviation', 'location_anomaly', 'user_agent_change', 'authentication_method',
  'session_duration', 'data_volume', 'network_pattern', 'command_pattern'
];

export const DEFAULT_BEHAVIORAL_ANALYTICS_CONFIG: BehavioralAnalyticsConfig = {
  enabled: true,
  allowedRiskFactors: RISK_FACTORS,
  maxRiskFactors: 10,
  minBaselineDays: 7,
  maxBaselineDays: 90,
  minAnomalyThreshold: 0.1,
  maxAnomalyThreshold: 10.0,
  maxPerformanceScore: 100
};

const BASELINE_WINDOW_DAYS: ReadonlyMap<string, number> = new Map([
  ['7_days', 7],
  ['14_days', 14],
  ['30_days', 30],
  ['60_days', 60],
  ['90_days', 90]
]);
const BASELINE_WINDOWS: readonly string[] = [...BASELINE_WINDOW_DAYS.keys()];
const LEARNING_PERIODS: readonly string[] = ['1_day', '3_days', '7_days', '14_days', '30_days'];
const RISK_ALGORITHMS: readonly string[] = ['weighted_sum', 'composite', 'ml_based'];
const ANOMALY_ALGORITHMS: readonly string[] = ['isolation_forest', 'z_score', 'statistical', 'threshold_based'];

/** Accepted distance of the summed weights from 1.0 */
const WEIGHT_SUM_TOLERANCE = 0.05;

/**
 * Relative runtime cost of the enabled behavioural features
 */
export function behavioralPerformanceScore(behavioral: BehavioralAnalysisConfig): number {
  let score = 10;
  if (behavioral.userProfiling) {
    score += 15;
  }
  if (behavioral.baselineComparison) {
    score += 10;
  }

  const risk = behavioral.riskScoring;
  if (risk?.enabled) {
    score += 20;
    if (risk.algorithm === 'ml_based') {
      score += 15;
    }
    score += (risk.riskFactors?.length ?? 0) * 2;
  }

  const anomaly = behavioral.anomalyDetection;
  if (anomaly) {
    score += 25;
    if (anomaly.algorithm === 'isolation_forest') {
      score += 10;
    } else if (anomaly.algorithm === 'ml_based') {
      score += 20;
    }
  }

  return score;
}

export class BehavioralAnalyticsRule implements ValidationRule {
  private readonly config: Readonly<BehavioralAnalyticsConfig>;
  private readonly constraints = new ConstraintChecker();

  constructor(config: Partial<BehavioralAnalyticsConfig> = {}) {
    this.config = withDefaults(DEFAULT_BEHAVIORAL_ANALYTICS_CONFIG, config);
    assertPositiveInt(this.config.maxRiskFactors, 'behavioral_analytics.max_risk_factors');
    assertPositiveInt(this.config.maxPerformanceScore, 'behavioral_analytics.max_performance_score');
    assertOrdered(this.config.minBaselineDays, this.config.maxBaselineDays, 'behavioral_analytics.baseline_days');
    assertOrdered(this.config.minAnomalyThreshold, this.config.maxAnomalyThreshold, 'behavioral_analytics.anomaly_threshold');
  }

  name(): string {
    return 'behavioral_analytics_validation';
  }

  description(): string {
    return 'Validates behavioral analytics configuration including user profiling, risk scoring, and anomaly detection parameters';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Behavioral analytics', query);
    const behavioral = query.behavioralAnalysis;
    if (!behavioral) {
      return result.build();
    }

    this.checkProfiling(behavioral, result);
    this.checkBaseline(behavioral, result);
    if (behavioral.riskScoring) {
      this.checkRiskScoring(behavioral.riskScoring, result);
    }
    if (behavioral.anomalyDetection) {
      this.checkAnomalyDetection(behavioral.anomalyDetection, result);
    }

    const findings = this.constraints.check(behavioral);
    findings.errors.forEach(message => result.error(message));
    findings.warnings.forEach(message => result.warn(message));

    this.checkPerformanceImpact(behavioral, result);

    result.adviseOnFailure(
      'Review behavioral analytics configuration',
      'Ensure user profiling is enabled when using risk scoring',
      'Verify baseline window is specified for anomaly detection',
      'Check risk scoring parameters are within valid ranges',
      'Validate anomaly detection algorithm parameters'
    );

    return result.build();
  }

  private checkProfiling(behavioral: BehavioralAnalysisConfig, result: ResultBuilder): void {
    if (!behavioral.userProfiling) {
      result.warn('User profiling is disabled. Consider enabling for better behavioral insights');
      return;
    }
    if (!behavioral.baselineWindow) {
      result.warn('Baseline window not specified. Default baseline period will be used');
    }
    if (!behavioral.learningPeriod) {
      result.warn('Learning period not specified. Default learning period will be used');
    }
  }

  private checkBaseline(behavioral: BehavioralAnalysisConfig, result: ResultBuilder): void {
    const window = behavioral.baselineWindow;
    if (window) {
      const days = BASELINE_WINDOW_DAYS.get(window);
      if (days === undefined) {
        result.error(`Invalid baseline window '${window}'. Allowed windows: ${BASELINE_WINDOWS.join(', ')}`);
      } else if (days < this.config.minBaselineDays) {
        result.error(`baseline window too short. Minimum: ${this.config.minBaselineDays} days`);
      } else if (days > this.config.maxBaselineDays) {
        result.error(`baseline window too long. Maximum: ${this.config.maxBaselineDays} days`);
      }
    }

    const period = behavioral.learningPeriod;
    if (period && !LEARNING_PERIODS.includes(period)) {
      result.error(`Invalid learning period '${period}'. Allowed periods: ${LEARNING_PERIODS.join(', ')}`);
    }
  }

  private checkRiskScoring(risk: RiskScoringConfig, result: ResultBuilder): void {
    if (risk.algorithm && !RISK_ALGORITHMS.includes(risk.algorithm)) {
      result.error(`Invalid risk scoring algorithm '${risk.algorithm}'. Allowed algorithms: ${RISK_ALGORITHMS.join(', ')}`);
    }

    const factors = risk.riskFactors ?? [];
    if (factors.length > this.config.maxRiskFactors) {
      result.error(`Too many risk factors. Maximum allowed: ${this.config.maxRiskFactors}, got: ${factors.length}`);
    }
    const allowed = this.config.allowedRiskFactors;
    factors.forEach((factor, index) => {
      if (!allowed.includes(factor)) {
        result.error(`Invalid risk factor '${factor}' at index ${index}. Allowed factors: ${allowed.join(', ')}`);
      }
    });

    if (risk.weightingScheme) {
      const problem = checkWeightingScheme(risk.weightingScheme);
      if (problem) {
        result.error(problem);
      }
    }
  }

  /**
   * A zero parameter is treated as unset
   */
  private checkAnomalyDetection(anomaly: AnomalyDetectionConfig, result: ResultBuilder): void {
    if (anomaly.algorithm && !ANOMALY_ALGORITHMS.includes(anomaly.algorithm)) {
      result.error(
        `Invalid anomaly detection algorithm '${anomaly.algorithm}'. Allowed algorithms: ${ANOMALY_ALGORITHMS.join(', ')}`
      );
    }

    const contamination = anomaly.contamination ?? 0;
    if (contamination !== 0 && (contamination < 0 || contamination > 1)) {
      result.error(`Contamination must be between 0.0 and 1.0, got ${contamination.toFixed(3)}`);
    }

    const sensitivity = anomaly.sensitivity ?? 0;
    if (sensitivity !== 0 && (sensitivity < 0 || sensitivity > 1)) {
      result.error(`Sensitivity must be between 0.0 and 1.0, got ${sensitivity.toFixed(3)}`);
    }

    const { minAnomalyThreshold: min, maxAnomalyThreshold: max } = this.config;
    const threshold = anomaly.threshold ?? 0;
    if (threshold !== 0 && (threshold < min || threshold > max)) {
      result.error(
        `Anomaly threshold must be between ${min.toFixed(1)} and ${max.toFixed(1)}, got ${threshold.toFixed(3)}`
      );
    }
  }

  private checkPerformanceImpact(behavioral: BehavioralAnalysisConfig, result: ResultBuilder): void {
    const score = behavioralPerformanceScore(behavioral);
    const max = this.config.maxPerformanceScore;
    if (score > max) {
      result.warn(`High performance impact score ${score}. Consider simplifying behavioral analysis configuration`);
    }
    result.detail('behavioral_performance_score', score).detail('max_performance_score', max);

    if (behavioral.userProfiling && behavioral.baselineComparison && behavioral.riskScoring && behavioral.anomalyDetection) {
      result.warn('All behavioral analysis features enabled may impact query performance');
    }
  }
}

/**
 * First problem with a weighting scheme, or null when every weight is in range and they sum to about 1
 */
function checkWeightingScheme(scheme: Readonly<Record<string, number>>): string | null {
  const entries = Object.entries(scheme);
  if (entries.length === 0) {
    return 'weighting scheme cannot be empty';
  }

  let total = 0;
  for (const [factor, weight] of entries) {
    if (weight < 0 || weight > 1) {
      return `weight for factor '${factor}' must be between 0.0 and 1.0, got ${weight.toFixed(3)}`;
    }
    total += weight;
  }

  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    return `total weight must sum to approximately 1.0, got ${total.toFixed(3)}`;
  }
  return null;
}
