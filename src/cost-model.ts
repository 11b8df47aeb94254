/**
 * Cost Model - Turns a query's shape into a complexity score and resource estimates
 */

import { AnalysisConfig, BehavioralAnalysisConfig, CandidateQuery, ComplianceFrameworkConfig, MultiSourceConfig } from './types';
import { hasValues } from './string-or-list';
import { LIST_FIELDS, PATTERN_FIELDS, listField, scalarField } from './query-fields';

// ============================================================================
// Weight Tables
// ============================================================================

export const BASE_COMPLEXITY = 10;

export const SOURCE_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['kube-apiserver', 15],
  ['openshift-apiserver', 12],
  ['oauth-server', 8],
  ['oauth-apiserver', 10],
  ['node-auditd', 20]
]);
export const DEFAULT_SOURCE_WEIGHT = 10;

export const TIMEFRAME_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['today', 2],
  ['yesterday', 4],
  ['1_hour_ago', 1],
  ['6_hours_ago', 3],
  ['12_hours_ago', 5],
  ['24_hours_ago', 8],
  ['7_days_ago', 15],
  ['14_days_ago', 25],
  ['30_days_ago', 40],
  ['60_days_ago', 60],
  ['90_days_ago', 80],
  ['last_week', 15],
  ['last_month', 40]
]);
export const UNLISTED_TIMEFRAME_WEIGHT = 5;
export const CUSTOM_TIME_RANGE_WEIGHT = 20;

export const ANALYSIS_TYPE_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['anomaly_detection', 30],
  ['correlation', 25],
  ['apt_reconnaissance_detection', 40],
  ['lateral_movement_detection', 35],
  ['behavioral_analysis', 45],
  ['user_behavior_anomaly_detection', 50],
  ['cross_source_correlation', 60],
  ['timeline_reconstruction', 40],
  ['rbac_violation_privilege_escalation_analysis', 35],
  ['oauth_token_manipulation_investigation', 30]
]);
export const DEFAULT_ANALYSIS_TYPE_WEIGHT = 20;

export const CORRELATION_WINDOW_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['1_minute', 2],
  ['5_minutes', 5],
  ['15_minutes', 10],
  ['30_minutes', 15],
  ['1_hour', 20],
  ['6_hours', 40],
  ['24_hours', 80]
]);
export const DEFAULT_CORRELATION_WINDOW_WEIGHT = 15;

export const JOIN_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['inner', 5],
  ['left', 10],
  ['right', 15],
  ['full', 25]
]);

/** Result limit assumed when the query does not set one */
export const DEFAULT_RESULT_LIMIT = 20;

// ============================================================================
// Types
// ============================================================================

export interface ComplexityBreakdown {
  base: number;
  source: number;
  fields: number;
  timeRange: number;
  patterns: number;
  analysis: number;
  multiSource: number;
  behavioral: number;
  compliance: number;
}

export interface ComplexityScore {
  total: number;
  breakdown: ComplexityBreakdown;
}

export interface ResourceEstimate {
  memoryMb: number;
  cpuPercent: number;
  executionSeconds: number;
}

export type PerformanceTier = 'low' | 'medium' | 'high';

export enum Admission {
  CLEAN = 'clean',
  WARN = 'warn',
  REJECT = 'reject'
}

/**
 * Admission for one metric: over the maximum rejects, over three quarters of it warns
 */
export function admit(value: number, max: number): Admission {
  if (value > max) {
    return Admission.REJECT;
  }
  if (value > Math.floor((max * 3) / 4)) {
    return Admission.WARN;
  }
  return Admission.CLEAN;
}

export function performanceTier(score: number, maxScore: number): PerformanceTier {
  if (score > Math.floor((maxScore * 2) / 3)) {
    return 'high';
  }
  if (score > Math.floor(maxScore / 3)) {
    return 'medium';
  }
  return 'low';
}

/**
 * Aggregating queries are capped by the aggregated-results limit instead of the raw one
 */
export function usesAggregation(query: CandidateQuery): boolean {
  return hasValues(query.groupBy) || query.analysis !== undefined;
}

export function effectiveLimit(query: CandidateQuery): number {
  return query.limit !== undefined && query.limit !== 0 ? query.limit : DEFAULT_RESULT_LIMIT;
}

export function secondarySourceCount(query: CandidateQuery): number {
  return query.multiSource?.secondarySources?.length ?? 0;
}

// ============================================================================
// Cost Model
// ============================================================================

export class CostModel {
  score(query: CandidateQuery): ComplexityScore {
    const breakdown: ComplexityBreakdown = {
      base: BASE_COMPLEXITY,
      source: this.sourceCost(query.logSource),
      fields: this.fieldCost(query),
      timeRange: this.timeRangeCost(query),
      patterns: this.patternCost(query),
      analysis: query.analysis ? this.analysisCost(query.analysis) : 0,
      multiSource: query.multiSource ? this.multiSourceCost(query.multiSource) : 0,
      behavioral: query.behavioralAnalysis ? this.behavioralCost(query.behavioralAnalysis) : 0,
      compliance: query.complianceFramework ? this.complianceCost(query.complianceFramework) : 0
    };

    const total = Object.values(breakdown).reduce((sum, part) => sum + part, 0);
    return { total, breakdown };
  }

  estimate(query: CandidateQuery, score: number): ResourceEstimate {
    const secondaries = secondarySourceCount(query);

    let memoryMb = 50 + score * 2;
    if (query.analysis) {
      memoryMb += 100;
    }
    if (query.multiSource) {
      memoryMb += secondaries * 50;
    }
    if (query.behavioralAnalysis) {
      memoryMb += 150;
    }

    let cpuPercent = 10 + Math.floor(score / 3);
    if (query.analysis) {
      cpuPercent += 25;
    }
    if (query.multiSource) {
      cpuPercent += 20;
    }
    cpuPercent = Math.min(100, cpuPercent);

    let executionSeconds = 5 + Math.floor(score / 10);
    if (query.analysis?.statisticalAnalysis) {
      executionSeconds += 60;
    }
    if (query.multiSource) {
      executionSeconds += secondaries * 15;
    }

    return { memoryMb, cpuPercent, executionSeconds };
  }

  sourceCost(logSource: string | undefined): number {
    return SOURCE_WEIGHTS.get(logSource ?? '') ?? DEFAULT_SOURCE_WEIGHT;
  }

  fieldCost(query: CandidateQuery): number {
    let cost = 0;

    for (const name of LIST_FIELDS) {
      const field = listField(query, name);
      if (!hasValues(field)) {
        continue;
      }
      cost += field.isList() ? field.values().length * 2 : 3;
    }

    cost += (query.excludeUsers?.length ?? 0) * 2;
    cost += (query.excludeResources?.length ?? 0) * 2;

    // Free-text patterns are matched per record
    for (const name of PATTERN_FIELDS) {
      if (scalarField(query, name) !== '') {
        cost += 8;
      }
    }

    if (query.sortBy) {
      cost += 5;
    }

    return cost;
  }

  timeRangeCost(query: CandidateQuery): number {
    const named = TIMEFRAME_WEIGHTS.get(query.timeframe ?? '');
    if (named !== undefined) {
      return named;
    }
    if (query.timeRange) {
      return CUSTOM_TIME_RANGE_WEIGHT;
    }
    return query.timeframe ? UNLISTED_TIMEFRAME_WEIGHT : 0;
  }

  patternCost(query: CandidateQuery): number {
    let cost = 0;
    if (query.includeChanges) {
      cost += 25;
    }
    if (query.requestObjectFilter) {
      cost += 15;
    }
    return cost;
  }

  analysisCost(analysis: AnalysisConfig): number {
    let cost = 20;
    cost += ANALYSIS_TYPE_WEIGHTS.get(analysis.type ?? '') ?? DEFAULT_ANALYSIS_TYPE_WEIGHT;

    if (analysis.statisticalAnalysis) {
      cost += 25;
    }
    if (analysis.multiStageCorrelation) {
      cost += 20;
    }
    if (hasValues(analysis.groupBy)) {
      cost += analysis.groupBy.values().length * 5;
    }

    return cost;
  }

  /**
   * Grows super-linearly with the number of joined sources
   */
  multiSourceCost(multiSource: MultiSourceConfig): number {
    const sourceCount = 1 + (multiSource.secondarySources?.length ?? 0);

    let cost = 30;
    cost += Math.round(Math.pow(sourceCount, 1.5) * 10);
    cost += (multiSource.correlationFields?.length ?? 0) * 8;
    cost += CORRELATION_WINDOW_WEIGHTS.get(multiSource.correlationWindow ?? '') ?? DEFAULT_CORRELATION_WINDOW_WEIGHT;
    cost += JOIN_WEIGHTS.get(multiSource.joinType ?? '') ?? 0;

    return cost;
  }

  behavioralCost(behavioral: BehavioralAnalysisConfig): number {
    let cost = 20;

    if (behavioral.userProfiling) {
      cost += 15;
    }
    if (behavioral.baselineComparison) {
      cost += 25;
    }

    const risk = behavioral.riskScoring;
    if (risk?.enabled) {
      cost += 35;
      cost += (risk.riskFactors?.length ?? 0) * 5;
      if (risk.algorithm === 'ml_based') {
        cost += 40;
      }
    }

    if (behavioral.anomalyDetection) {
      cost += 45;
      if (behavioral.anomalyDetection.algorithm === 'isolation_forest') {
        cost += 25;
      }
    }

    return cost;
  }

  complianceCost(compliance: ComplianceFrameworkConfig): number {
    let cost = 10;
    cost += (compliance.standards?.length ?? 0) * 8;
    cost += (compliance.controls?.length ?? 0) * 5;
    if (compliance.reporting?.includeEvidence || compliance.evidenceCollection) {
      cost += 20;
    }
    return cost;
  }
}
