/**
 * Core type definitions for the audit query guard
 */

import type { StringOrList } from './string-or-list';

// ============================================================================
// Result Types
// ============================================================================

export enum Severity {
  INFO = 'info',
  WARNING = 'warning',
  CRITICAL = 'critical'
}

export interface ValidationResult {
  readonly isValid: boolean;
  readonly ruleName: string;
  readonly severity: Severity;
  readonly message: string;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly recommendations: readonly string[];
  readonly details: Readonly<Record<string, unknown>>;
  readonly timestamp: string;  // ISO 8601
  readonly querySnapshot: CandidateQuery | null;
}

// ============================================================================
// Query Types
// ============================================================================

export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

export interface BusinessHours {
  readonly startHour: number;
  readonly endHour: number;
  readonly outsideOnly?: boolean;
  readonly timezone?: string;
}

export interface StatisticalAnalysisConfig {
  readonly patternDeviationThreshold?: number;
  readonly confidenceInterval?: number;
  readonly sampleSizeMinimum?: number;
  readonly baselineWindow?: string;
}

export interface AnalysisConfig {
  readonly type?: string;
  readonly killChainPhase?: string;
  readonly multiStageCorrelation?: boolean;
  readonly statisticalAnalysis?: StatisticalAnalysisConfig;
  readonly threshold?: number;
  readonly timeWindow?: string;
  readonly groupBy?: StringOrList;
  readonly sortBy?: string;
  readonly sortOrder?: string;
}

export interface MultiSourceConfig {
  readonly primarySource?: string;
  readonly secondarySources?: readonly string[];
  readonly correlationWindow?: string;
  readonly correlationFields?: readonly string[];
  readonly joinType?: string;
}

export interface RiskScoringConfig {
  readonly enabled?: boolean;
  readonly algorithm?: string;
  readonly riskFactors?: readonly string[];
  readonly weightingScheme?: Readonly<Record<string, number>>;
}

export interface AnomalyDetectionConfig {
  readonly algorithm?: string;
  /** 0 means unset */
  readonly contamination?: number;
  /** 0 means unset */
  readonly sensitivity?: number;
  readonly threshold?: number;
}

export interface BehavioralAnalysisConfig {
  readonly userProfiling?: boolean;
  readonly baselineComparison?: boolean;
  readonly riskScoring?: RiskScoringConfig;
  readonly anomalyDetection?: AnomalyDetectionConfig;
  readonly baselineWindow?: string;
  readonly learningPeriod?: string;
}

export interface ComplianceReportingConfig {
  readonly format?: string;
  readonly includeEvidence?: boolean;
  readonly retentionPeriod?: string;
  readonly digitalSignature?: boolean;
}

export interface ComplianceFrameworkConfig {
  readonly standards?: readonly string[];
  readonly controls?: readonly string[];
  readonly reporting?: ComplianceReportingConfig;
  readonly auditTrail?: boolean;
  readonly violationThreshold?: number;
  readonly evidenceCollection?: boolean;
}

/**
 * A structured audit-log query produced upstream and checked before execution.
 * Every field is optional; an absent field means "not specified".
 */
export interface CandidateQuery {
  readonly logSource?: string;
  readonly verb?: StringOrList;
  readonly resource?: StringOrList;
  readonly namespace?: StringOrList;
  readonly user?: StringOrList;
  readonly timeframe?: string;
  readonly limit?: number;
  readonly responseStatus?: StringOrList;
  readonly excludeUsers?: readonly string[];
  readonly resourceNamePattern?: string;
  readonly userPattern?: string;
  readonly namespacePattern?: string;
  readonly requestUriPattern?: string;
  readonly authDecision?: string;
  readonly sourceIp?: StringOrList;
  readonly groupBy?: StringOrList;
  readonly sortBy?: string;
  readonly sortOrder?: string;
  readonly subresource?: string;
  readonly includeChanges?: boolean;
  readonly timeRange?: TimeRange;
  readonly businessHours?: BusinessHours;
  readonly requestObjectFilter?: string;
  readonly excludeResources?: readonly string[];
  readonly authorizationReasonPattern?: string;
  readonly responseMessagePattern?: string;
  readonly missingAnnotation?: string;
  readonly multiSource?: MultiSourceConfig;
  readonly analysis?: AnalysisConfig;
  readonly behavioralAnalysis?: BehavioralAnalysisConfig;
  readonly complianceFramework?: ComplianceFrameworkConfig;
}

// ============================================================================
// Rule Types
// ============================================================================

/**
 * A pure, total check over a candidate query.
 * Configuration is bound at construction and never changes afterwards.
 */
export interface ValidationRule {
  name(): string;
  description(): string;
  severity(): Severity;
  enabled(): boolean;
  validate(query: CandidateQuery): ValidationResult;
}

/** Options shared by every rule's configuration */
export interface RuleToggle {
  enabled: boolean;
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  queryPath?: string;
  configPath?: string;
  json: boolean;
  verbose: boolean;
  showRules: boolean;
}
