/**
 * Unit tests for AdvancedAnalysisRule
 */

import { describe, it, expect } from 'vitest';
import { AdvancedAnalysisRule, KILL_CHAIN_PHASES, STANDARD_ANALYSIS_LISTS } from '../../../src/rules/advanced-analysis-rule';
import { StringOrList } from '../../../src/string-or-list';
import { ConfigError } from '../../../src/errors';

describe('AdvancedAnalysisRule', () => {
  const rule = new AdvancedAnalysisRule({
    allowedAnalysisTypes: ['anomaly_detection', 'apt_reconnaissance_detection', 'correlation'],
    allowedTimeWindows: ['1_hour', '24_hours'],
    allowedSortFields: ['timestamp', 'user'],
    allowedSortOrders: ['asc', 'desc']
  });

  it('should pass queries without an analysis block', () => {
    const result = rule.validate({ logSource: 'kube-apiserver' });

    expect(result.isValid).toBe(true);
    expect(result.message).toBe('Advanced analysis validation passed');
  });

  it('should require an analysis type', () => {
    expect(rule.validate({ analysis: {} }).errors).toEqual(['Analysis type is required']);
  });

  it('should reject an unlisted analysis type', () => {
    expect(rule.validate({ analysis: { type: 'bogus' } }).errors).toEqual([
      "Invalid analysis type 'bogus'. Allowed types: anomaly_detection, apt_reconnaissance_detection, correlation"
    ]);
  });

  it('should demand a kill-chain phase for APT types exactly once', () => {
    const result = rule.validate({ analysis: { type: 'apt_reconnaissance_detection' } });

    expect(result.errors).toEqual([
      "Kill chain phase is required for APT analysis type 'apt_reconnaissance_detection'"
    ]);
    expect(result.recommendations).toEqual([
      'Review advanced analysis configuration',
      'Ensure all required fields are present for the analysis type',
      'Verify statistical analysis parameters are within valid ranges',
      'Check kill chain phase requirements for APT analysis types'
    ]);
  });

  it('should accept an APT type with a known phase', () => {
    const result = rule.validate({
      analysis: { type: 'apt_reconnaissance_detection', killChainPhase: 'reconnaissance' }
    });

    expect(result.isValid).toBe(true);
  });

  it('should reject an unknown kill-chain phase', () => {
    const result = rule.validate({ analysis: { type: 'correlation', killChainPhase: 'recon' } });

    expect(result.errors).toEqual([
      `Invalid kill chain phase 'recon'. Allowed phases: ${KILL_CHAIN_PHASES.join(', ')}`
    ]);
  });

  it('should suggest statistical parameters for statistical types', () => {
    const result = rule.validate({ analysis: { type: 'anomaly_detection' } });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      "Statistical analysis parameters recommended for analysis type 'anomaly_detection'"
    ]);
  });

  it('should check every statistical parameter', () => {
    const result = rule.validate({
      analysis: {
        type: 'anomaly_detection',
        statisticalAnalysis: {
          patternDeviationThreshold: 12,
          confidenceInterval: 0.3,
          sampleSizeMinimum: 5,
          baselineWindow: '3_days'
        }
      }
    });

    expect(result.errors).toEqual([
      'Pattern deviation threshold must be between 0.1 and 10.0, got 12.00',
      'Confidence interval must be between 0.5 and 0.99, got 0.30',
      'Sample size minimum must be at least 10, got 5',
      "Invalid baseline window '3_days'. Allowed windows: 7_days, 14_days, 30_days, 60_days, 90_days"
    ]);
  });

  it('should bound the threshold and ignore zero', () => {
    expect(rule.validate({ analysis: { type: 'correlation', threshold: 11 } }).errors).toEqual([
      'Threshold must be between 1 and 10, got 11'
    ]);
    expect(rule.validate({ analysis: { type: 'correlation', threshold: 0 } }).isValid).toBe(true);
  });

  it('should check window and sorting against their allow-lists', () => {
    const result = rule.validate({
      analysis: { type: 'correlation', timeWindow: '2_hours', sortBy: 'verb', sortOrder: 'up' }
    });

    expect(result.errors).toEqual([
      "Invalid time window '2_hours'. Allowed windows: 1_hour, 24_hours",
      "Invalid sort field 'verb'. Allowed fields: timestamp, user",
      "Invalid sort order 'up'. Allowed orders: asc, desc"
    ]);
  });

  it('should count only the list form of group-by', () => {
    const tooMany = StringOrList.list(['user', 'verb', 'resource', 'namespace', 'response_status', 'source_ip']);

    expect(rule.validate({ analysis: { type: 'correlation', groupBy: tooMany } }).errors).toEqual([
      'Too many group by fields. Maximum allowed: 5, got: 6'
    ]);
    expect(rule.validate({ analysis: { type: 'correlation', groupBy: StringOrList.scalar('user') } }).isValid).toBe(true);
  });

  it('should reject every type when no allow-list is configured', () => {
    const bare = new AdvancedAnalysisRule();

    expect(bare.validate({ analysis: { type: 'correlation' } }).errors).toEqual([
      "Invalid analysis type 'correlation'. Allowed types: "
    ]);
  });

  it('should accept the standard lists', () => {
    const standard = new AdvancedAnalysisRule({
      allowedAnalysisTypes: STANDARD_ANALYSIS_LISTS.analysisTypes,
      allowedTimeWindows: STANDARD_ANALYSIS_LISTS.timeWindows,
      allowedSortFields: STANDARD_ANALYSIS_LISTS.sortFields,
      allowedSortOrders: STANDARD_ANALYSIS_LISTS.sortOrders
    });
    const result = standard.validate({
      analysis: { type: 'cross_source_correlation', timeWindow: '4_hours', sortBy: 'count', sortOrder: 'desc' }
    });

    expect(result.isValid).toBe(true);
  });

  it('should refuse inverted threshold bounds', () => {
    expect(() => new AdvancedAnalysisRule({ minThreshold: 5, maxThreshold: 2 })).toThrow(ConfigError);
  });
});
