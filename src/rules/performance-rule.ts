/**
 * Performance Rule - Admits a query only when its estimated cost fits the configured budget
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertPositiveInt } from '../errors';
import {
  Admission,
  CostModel,
  PerformanceTier,
  admit,
  effectiveLimit,
  performanceTier,
  secondarySourceCount,
  usesAggregation
} from '../cost-model';

export interface PerformanceConfig extends RuleToggle {
  maxComplexityScore: number;
  maxMemoryMb: number;
  maxCpuPercent: number;
  maxExecutionSeconds: number;
  maxRawResults: number;
  maxAggregatedResults: number;
  maxConcurrentSources: number;
}

export const DEFAULT_PERFORMANCE_CONFIG: PerformanceConfig = {
  enabled: true,
  maxComplexityScore: 100,
  maxMemoryMb: 1024,
  maxCpuPercent: 50,
  maxExecutionSeconds: 300,
  maxRawResults: 10000,
  maxAggregatedResults: 1000,
  maxConcurrentSources: 5
};

const TIER_RECOMMENDATIONS: Readonly<Record<PerformanceTier, readonly string[]>> = {
  high: [
    'Consider breaking down complex queries into simpler parts',
    'Use more specific time ranges to reduce data volume',
    'Limit result set size for initial analysis',
    'Consider running during off-peak hours'
  ],
  medium: [
    'Monitor query execution time',
    'Consider caching results for repeated queries'
  ],
  low: [
    'Query should execute efficiently'
  ]
};

export class PerformanceRule implements ValidationRule {
  private readonly config: Readonly<PerformanceConfig>;
  private readonly costModel = new CostModel();

  /**
   * @throws ConfigError when any budget is not a positive integer
   */
  constructor(config: Partial<PerformanceConfig> = {}) {
    this.config = withDefaults(DEFAULT_PERFORMANCE_CONFIG, config);
    assertPositiveInt(this.config.maxComplexityScore, 'performance.max_complexity_score');
    assertPositiveInt(this.config.maxMemoryMb, 'performance.max_memory_mb');
    assertPositiveInt(this.config.maxCpuPercent, 'performance.max_cpu_percent');
    assertPositiveInt(this.config.maxExecutionSeconds, 'performance.max_execution_seconds');
    assertPositiveInt(this.config.maxRawResults, 'performance.max_raw_results');
    assertPositiveInt(this.config.maxAggregatedResults, 'performance.max_aggregated_results');
    assertPositiveInt(this.config.maxConcurrentSources, 'performance.max_concurrent_sources');
  }

  name(): string {
    return 'performance_validation';
  }

  description(): string {
    return 'Validates query performance characteristics and resource usage limits';
  }

  severity(): Severity {
    return Severity.WARNING;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const cfg = this.config;
    const result = new ResultBuilder(this.name(), 'Performance', query);

    const { total: score, breakdown } = this.costModel.score(query);
    const estimate = this.costModel.estimate(query, score);

    switch (admit(score, cfg.maxComplexityScore)) {
      case Admission.REJECT:
        result.error(`Query complexity score ${score} exceeds maximum allowed ${cfg.maxComplexityScore}`);
        break;
      case Admission.WARN:
        result.warn(`High query complexity score ${score} may impact performance`);
        break;
    }

    switch (admit(estimate.memoryMb, cfg.maxMemoryMb)) {
      case Admission.REJECT:
        result.error(`Estimated memory usage ${estimate.memoryMb} MB exceeds limit ${cfg.maxMemoryMb} MB`);
        break;
      case Admission.WARN:
        result.warn(`High estimated memory usage ${estimate.memoryMb} MB`);
        break;
    }

    switch (admit(estimate.cpuPercent, cfg.maxCpuPercent)) {
      case Admission.REJECT:
        result.error(`Estimated CPU usage ${estimate.cpuPercent}% exceeds limit ${cfg.maxCpuPercent}%`);
        break;
      case Admission.WARN:
        result.warn(`High estimated CPU usage ${estimate.cpuPercent}%`);
        break;
    }

    switch (admit(estimate.executionSeconds, cfg.maxExecutionSeconds)) {
      case Admission.REJECT:
        result.error(`Estimated execution time ${estimate.executionSeconds} seconds exceeds limit ${cfg.maxExecutionSeconds} seconds`);
        break;
      case Admission.WARN:
        result.warn(`Long estimated execution time ${estimate.executionSeconds} seconds`);
        break;
    }

    // The query keeps its own limit; the default only feeds the check
    const limit = effectiveLimit(query);
    const aggregated = usesAggregation(query);
    const resultCap = aggregated ? cfg.maxAggregatedResults : cfg.maxRawResults;
    switch (admit(limit, resultCap)) {
      case Admission.REJECT:
        result.error(`${aggregated ? 'Aggregated' : 'Raw'} result limit ${limit} exceeds maximum ${resultCap}`);
        break;
      case Admission.WARN:
        result.warn(`High result limit ${limit} approaching maximum ${resultCap}`);
        break;
    }

    const concurrentSources = 1 + secondarySourceCount(query);
    switch (admit(concurrentSources, cfg.maxConcurrentSources)) {
      case Admission.REJECT:
        result.error(`Concurrent sources ${concurrentSources} exceeds limit ${cfg.maxConcurrentSources}`);
        break;
      case Admission.WARN:
        result.warn(`High concurrent source count ${concurrentSources} approaching limit ${cfg.maxConcurrentSources}`);
        break;
    }

    const tier = performanceTier(score, cfg.maxComplexityScore);
    result.recommend(...TIER_RECOMMENDATIONS[tier]);
    this.recommendForShape(query, result);

    result.adviseOnFailure(
      'Reduce query complexity to improve performance',
      'Consider limiting result set size',
      'Optimize time range and filtering criteria',
      'Use more specific log sources and patterns'
    );

    result
      .detail('query_complexity_score', score)
      .detail('max_complexity_allowed', cfg.maxComplexityScore)
      .detail('performance_tier', tier)
      .detail('complexity_breakdown', breakdown)
      .detail('estimated_memory_mb', estimate.memoryMb)
      .detail('estimated_cpu_percent', estimate.cpuPercent)
      .detail('estimated_execution_seconds', estimate.executionSeconds)
      .detail('uses_aggregation', aggregated)
      .detail('effective_limit', limit)
      .detail('concurrent_sources', concurrentSources);

    return result.build();
  }

  private recommendForShape(query: CandidateQuery, result: ResultBuilder): void {
    if (secondarySourceCount(query) > 2) {
      result.recommend('Consider reducing number of correlated sources for better performance');
    }
    if (query.analysis?.statisticalAnalysis) {
      result.recommend('Statistical analysis may benefit from larger baseline periods');
    }
    const behavioral = query.behavioralAnalysis;
    if (behavioral?.userProfiling && behavioral.anomalyDetection) {
      result.recommend('Combined behavioral analysis features may impact performance');
    }
  }
}
