/**
 * Unit tests for PerformanceRule
 */

import { describe, it, expect } from 'vitest';
import { PerformanceRule } from '../../../src/rules/performance-rule';
import { StringOrList } from '../../../src/string-or-list';
import { ConfigError } from '../../../src/errors';

const FAILURE_ADVICE = [
  'Reduce query complexity to improve performance',
  'Consider limiting result set size',
  'Optimize time range and filtering criteria',
  'Use more specific log sources and patterns'
];

describe('PerformanceRule', () => {
  const rule = new PerformanceRule();

  it('should admit a simple query and record its cost', () => {
    const result = rule.validate({ logSource: 'kube-apiserver' });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.recommendations).toEqual(['Query should execute efficiently']);
    expect(result.details.query_complexity_score).toBe(25);
    expect(result.details.performance_tier).toBe('low');
    expect(result.details.estimated_memory_mb).toBe(100);
    expect(result.details.estimated_cpu_percent).toBe(18);
    expect(result.details.estimated_execution_seconds).toBe(7);
    expect(result.details.effective_limit).toBe(20);
    expect(result.details.uses_aggregation).toBe(false);
    expect(result.details.concurrent_sources).toBe(1);
  });

  it('should name the raw cap when an ungrouped query asks for too much', () => {
    const result = rule.validate({ logSource: 'kube-apiserver', limit: 20000 });

    expect(result.errors).toEqual(['Raw result limit 20000 exceeds maximum 10000']);
    expect(result.recommendations).toEqual(['Query should execute efficiently', ...FAILURE_ADVICE]);
  });

  it('should apply the aggregated cap to grouped queries', () => {
    const result = rule.validate({
      logSource: 'kube-apiserver',
      groupBy: StringOrList.scalar('user'),
      limit: 5000
    });

    expect(result.errors).toEqual(['Aggregated result limit 5000 exceeds maximum 1000']);
    expect(result.details.uses_aggregation).toBe(true);
  });

  it('should report every exceeded budget', () => {
    const result = rule.validate({
      multiSource: {
        primarySource: 'kube-apiserver',
        secondarySources: ['oauth-server', 'oauth-apiserver', 'node-auditd', 'openshift-apiserver', 'audit-webhook']
      }
    });

    expect(result.errors).toEqual([
      'Query complexity score 212 exceeds maximum allowed 100',
      'Estimated CPU usage 100% exceeds limit 50%',
      'Concurrent sources 6 exceeds limit 5'
    ]);
    expect(result.recommendations).toContain('Consider reducing number of correlated sources for better performance');
  });

  it('should warn in the band above three quarters of a budget', () => {
    const tight = new PerformanceRule({ maxComplexityScore: 32 });
    const result = tight.validate({ logSource: 'kube-apiserver' });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(['High query complexity score 25 may impact performance']);
    expect(result.message).toBe('Performance validation passed with warnings');
    expect(result.details.performance_tier).toBe('high');
  });

  it('should warn on CPU close to its limit', () => {
    const tight = new PerformanceRule({ maxCpuPercent: 20 });
    const result = tight.validate({ logSource: 'kube-apiserver' });

    expect(result.warnings).toEqual(['High estimated CPU usage 18%']);
  });

  it('should warn when the result limit nears the raw cap', () => {
    expect(rule.validate({ logSource: 'kube-apiserver', limit: 7500 }).warnings).toEqual([]);

    const near = rule.validate({ logSource: 'kube-apiserver', limit: 7501 });
    expect(near.isValid).toBe(true);
    expect(near.warnings).toEqual(['High result limit 7501 approaching maximum 10000']);

    const over = rule.validate({ logSource: 'kube-apiserver', limit: 10001 });
    expect(over.errors).toEqual(['Raw result limit 10001 exceeds maximum 10000']);
    expect(over.warnings).toEqual([]);
  });

  it('should warn when the result limit nears the aggregated cap', () => {
    const result = rule.validate({ logSource: 'kube-apiserver', groupBy: StringOrList.scalar('user'), limit: 800 });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(['High result limit 800 approaching maximum 1000']);
  });

  it('should warn when the concurrent source count nears its limit', () => {
    const roomy = new PerformanceRule({
      maxComplexityScore: 1000,
      maxMemoryMb: 10000,
      maxCpuPercent: 1000,
      maxExecutionSeconds: 10000
    });
    const threeSources = roomy.validate({
      multiSource: { primarySource: 'kube-apiserver', secondarySources: ['oauth-server', 'oauth-apiserver'] }
    });
    const fourSources = roomy.validate({
      multiSource: { primarySource: 'kube-apiserver', secondarySources: ['oauth-server', 'oauth-apiserver', 'node-auditd'] }
    });

    expect(threeSources.warnings).toEqual([]);
    expect(fourSources.isValid).toBe(true);
    expect(fourSources.warnings).toEqual(['High concurrent source count 4 approaching limit 5']);
  });

  it('should refuse a zero budget', () => {
    expect(() => new PerformanceRule({ maxRawResults: 0 })).toThrow(ConfigError);
  });
});
