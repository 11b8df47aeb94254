/**
 * Constraint Checker - Cross-field implications over the behavioral analysis block
 */

import { AnomalyDetectionConfig, BehavioralAnalysisConfig } from './types';

export interface ConstraintFindings {
  errors: string[];
  warnings: string[];
}

/**
 * Typical operating range for z-score thresholds
 */
export const Z_SCORE_RANGE = { min: 2.0, max: 4.0 } as const;

export const MAX_ISOLATION_FOREST_CONTAMINATION = 0.3;

export class ConstraintChecker {
  /**
   * Evaluate every implication independently; violations of hard
   * implications are errors, advisory combinations are warnings
   */
  check(behavioral: BehavioralAnalysisConfig): ConstraintFindings {
    const findings: ConstraintFindings = { errors: [], warnings: [] };

    if (behavioral.anomalyDetection) {
      this.checkAlgorithmParameters(behavioral.anomalyDetection, findings);
    }
    this.checkDependencies(behavioral, findings);

    return findings;
  }

  private checkDependencies(behavioral: BehavioralAnalysisConfig, findings: ConstraintFindings): void {
    const risk = behavioral.riskScoring;
    const anomaly = behavioral.anomalyDetection;

    if (risk?.enabled && !behavioral.userProfiling) {
      findings.errors.push('Risk scoring requires user profiling to be enabled');
    }

    if (anomaly && !behavioral.baselineComparison && !behavioral.userProfiling) {
      findings.warnings.push('Anomaly detection works best with baseline comparison or user profiling enabled');
    }

    if (behavioral.baselineComparison && !behavioral.baselineWindow) {
      findings.errors.push('Baseline comparison requires baseline_window to be specified');
    }

    if (risk?.algorithm === 'ml_based' && anomaly?.algorithm === 'isolation_forest') {
      findings.warnings.push('ML-based risk scoring with isolation forest may be computationally intensive');
    }
  }

  /**
   * Soft checks on algorithm tunables; never errors
   */
  private checkAlgorithmParameters(anomaly: AnomalyDetectionConfig, findings: ConstraintFindings): void {
    const threshold = anomaly.threshold ?? 0;

    switch (anomaly.algorithm) {
      case 'isolation_forest':
        if ((anomaly.contamination ?? 0) > MAX_ISOLATION_FOREST_CONTAMINATION) {
          findings.warnings.push('High contamination value for isolation forest may reduce detection accuracy');
        }
        break;
      case 'z_score':
        if (threshold !== 0 && (threshold < Z_SCORE_RANGE.min || threshold > Z_SCORE_RANGE.max)) {
          findings.warnings.push('Z-score threshold typically works best between 2.0 and 4.0');
        }
        break;
      case 'statistical':
        if (!anomaly.sensitivity) {
          findings.warnings.push('Statistical anomaly detection typically requires sensitivity to be specified');
        }
        break;
    }
  }
}
