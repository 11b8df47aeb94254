/**
 * Unit tests for ConstraintChecker
 */

import { describe, it, expect } from 'vitest';
import { ConstraintChecker } from '../../src/constraint-checker';

describe('ConstraintChecker', () => {
  const checker = new ConstraintChecker();

  it('should report nothing for a consistent block', () => {
    expect(checker.check({
      userProfiling: true,
      baselineComparison: true,
      baselineWindow: '30_days',
      riskScoring: { enabled: true, algorithm: 'weighted_sum' }
    })).toEqual({ errors: [], warnings: [] });
  });

  it('should require user profiling for risk scoring', () => {
    expect(checker.check({ riskScoring: { enabled: true } }).errors).toEqual([
      'Risk scoring requires user profiling to be enabled'
    ]);
  });

  it('should ignore disabled risk scoring', () => {
    expect(checker.check({ riskScoring: { enabled: false } }).errors).toEqual([]);
  });

  it('should require a baseline window for baseline comparison', () => {
    expect(checker.check({ baselineComparison: true }).errors).toEqual([
      'Baseline comparison requires baseline_window to be specified'
    ]);
  });

  it('should warn about parameters before dependencies', () => {
    const findings = checker.check({ anomalyDetection: { algorithm: 'z_score', threshold: 5 } });

    expect(findings.errors).toEqual([]);
    expect(findings.warnings).toEqual([
      'Z-score threshold typically works best between 2.0 and 4.0',
      'Anomaly detection works best with baseline comparison or user profiling enabled'
    ]);
  });

  it('should accept z-score thresholds inside the typical range', () => {
    expect(checker.check({ userProfiling: true, anomalyDetection: { algorithm: 'z_score', threshold: 3 } }).warnings)
      .toEqual([]);
  });

  it('should flag high isolation forest contamination and the costly combination', () => {
    const findings = checker.check({
      userProfiling: true,
      riskScoring: { enabled: true, algorithm: 'ml_based' },
      anomalyDetection: { algorithm: 'isolation_forest', contamination: 0.4 }
    });

    expect(findings.warnings).toEqual([
      'High contamination value for isolation forest may reduce detection accuracy',
      'ML-based risk scoring with isolation forest may be computationally intensive'
    ]);
  });

  it('should ask for sensitivity on statistical detection', () => {
    expect(checker.check({ userProfiling: true, anomalyDetection: { algorithm: 'statistical' } }).warnings).toEqual([
      'Statistical anomaly detection typically requires sensitivity to be specified'
    ]);
  });
});
