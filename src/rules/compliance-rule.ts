/**
 * Compliance Rule - Checks the compliance framework block against the standards catalogue
 */

import { CandidateQuery, ComplianceFrameworkConfig, ComplianceReportingConfig, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertNonNegativeInt, assertPositiveInt } from '../errors';
import catalog from '../data/compliance-catalog.json';

export interface StandardProfile {
  label: string;
  retentionDays: number;
  comprehensiveLogging: boolean;
  requiredControls: readonly string[];
  /** Emitted when the query reaches back further than the retention period */
  retentionWarning?: string;
  recommendation?: string;
}

export interface ComplianceConfig extends RuleToggle {
  allowedStandards: readonly string[];
  allowedControls: readonly string[];
  maxStandards: number;
  maxControls: number;
  minRetentionDays: number;
  /** 0 disables the audit-gap reminder */
  maxAuditGapHours: number;
  requiredEvidenceFields: readonly string[];
}

export const DEFAULT_COMPLIANCE_CONFIG: ComplianceConfig = {
  enabled: true,
  allowedStandards: catalog.standards,
  allowedControls: catalog.controls,
  maxStandards: 5,
  maxControls: 10,
  minRetentionDays: 365,
  maxAuditGapHours: 24,
  requiredEvidenceFields: catalog.requiredEvidenceFields
};

const PROFILES: ReadonlyMap<string, StandardProfile> = new Map<string, StandardProfile>(Object.entries(catalog.profiles));
const CONTROL_STANDARDS: ReadonlyMap<string, readonly string[]> = new Map(Object.entries(catalog.controlStandards));
const TIMEFRAME_DAYS: ReadonlyMap<string, number> = new Map(Object.entries(catalog.timeframeDays));

/**
 * Days a query covers for retention purposes; unknown timeframes count as a month
 */
export function queryTimeframeDays(query: CandidateQuery): number {
  return TIMEFRAME_DAYS.get(query.timeframe ?? '') ?? catalog.defaultTimeframeDays;
}

export class ComplianceRule implements ValidationRule {
  private readonly config: Readonly<ComplianceConfig>;

  constructor(config: Partial<ComplianceConfig> = {}) {
    this.config = withDefaults(DEFAULT_COMPLIANCE_CONFIG, config);
    assertPositiveInt(this.config.maxStandards, 'compliance.max_standards');
    assertPositiveInt(this.config.maxControls, 'compliance.max_controls');
    assertNonNegativeInt(this.config.minRetentionDays, 'compliance.min_retention_days');
    assertNonNegativeInt(this.config.maxAuditGapHours, 'compliance.max_audit_gap_hours');
  }

  name(): string {
    return 'compliance_validation';
  }

  description(): string {
    return 'Validates compliance framework requirements including standards, controls, retention, and evidence collection';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Compliance', query);
    const framework = query.complianceFramework;
    if (!framework) {
      return result.build();
    }

    const standards = framework.standards ?? [];
    const days = queryTimeframeDays(query);

    this.checkStandards(standards, result);
    this.checkControls(framework, result);
    this.checkRetention(standards, days, result);
    this.checkEvidence(framework, result);
    this.checkAuditTrail(standards, result);
    this.checkReporting(framework, result);
    this.checkStandardRequirements(framework, days, result);

    result.adviseOnFailure(
      'Review compliance framework configuration',
      'Ensure all required standards are supported',
      'Verify evidence fields meet compliance requirements',
      'Check retention periods comply with regulations',
      'Validate audit trail completeness'
    );

    return result.build();
  }

  private checkStandards(standards: readonly string[], result: ResultBuilder): void {
    if (standards.length === 0) {
      result.error('At least one compliance standard must be specified');
      return;
    }

    const max = this.config.maxStandards;
    if (standards.length > max) {
      result.error(`Too many compliance standards. Maximum allowed: ${max}, got: ${standards.length}`);
    }

    const allowed = this.config.allowedStandards;
    const seen = new Set<string>();
    standards.forEach((standard, index) => {
      if (!allowed.includes(standard)) {
        result.error(`Invalid compliance standard '${standard}' at index ${index}. Allowed standards: ${allowed.join(', ')}`);
        return;
      }
      if (seen.has(standard)) {
        result.error(`Duplicate compliance standard '${standard}' at index ${index}`);
        return;
      }
      seen.add(standard);
    });
  }

  private checkControls(framework: ComplianceFrameworkConfig, result: ResultBuilder): void {
    const controls = framework.controls ?? [];
    if (controls.length === 0) {
      result.warn('No compliance controls specified');
      return;
    }

    const max = this.config.maxControls;
    if (controls.length > max) {
      result.error(`Too many compliance controls. Maximum allowed: ${max}, got: ${controls.length}`);
    }

    const allowed = this.config.allowedControls;
    const seen = new Set<string>();
    controls.forEach((control, index) => {
      if (!allowed.includes(control)) {
        result.error(`Invalid compliance control '${control}' at index ${index}. Allowed controls: ${allowed.join(', ')}`);
        return;
      }
      if (seen.has(control)) {
        result.error(`Duplicate compliance control '${control}' at index ${index}`);
        return;
      }
      seen.add(control);
    });

    // Applicability is advisory
    const standards = framework.standards ?? [];
    for (const control of controls) {
      const applicable = CONTROL_STANDARDS.get(control);
      if (applicable && !standards.some(standard => applicable.includes(standard))) {
        result.warn(`Control '${control}' may not be directly applicable to standards: ${standards.join(', ')}`);
      }
    }
  }

  private checkRetention(standards: readonly string[], days: number, result: ResultBuilder): void {
    if (days > this.config.minRetentionDays) {
      result.warn(`Query timeframe ${days} days exceeds minimum retention requirement ${this.config.minRetentionDays} days`);
    }
    for (const standard of standards) {
      const retention = PROFILES.get(standard)?.retentionDays ?? catalog.defaultRetentionDays;
      if (days > retention) {
        result.warn(`Query timeframe ${days} days may not meet ${standard} retention requirement ${retention} days`);
      }
    }
  }

  private checkEvidence(framework: ComplianceFrameworkConfig, result: ResultBuilder): void {
    if (!framework.reporting) {
      result.warn('No reporting configuration specified. Evidence collection recommended for compliance');
    } else if (!framework.reporting.includeEvidence) {
      result.warn('Evidence collection is disabled but may be required for compliance');
    }
    result.detail('required_evidence_fields', this.config.requiredEvidenceFields);
  }

  private checkAuditTrail(standards: readonly string[], result: ResultBuilder): void {
    const maxGap = this.config.maxAuditGapHours;
    if (maxGap > 0) {
      result.detail('max_audit_gap_hours', maxGap);
      result.warn(`Ensure audit trail has no gaps exceeding ${maxGap} hours`);
    }
    result.detail('required_audit_fields', catalog.requiredAuditFields);

    for (const standard of standards) {
      if (PROFILES.get(standard)?.comprehensiveLogging) {
        result.recommend(`Standard ${standard} requires comprehensive audit logging`);
      }
    }
  }

  private checkReporting(framework: ComplianceFrameworkConfig, result: ResultBuilder): void {
    const reporting = framework.reporting;
    if (!reporting) {
      result.warn('No reporting configuration specified');
      return;
    }

    const formats = catalog.reportingFormats;
    if (reporting.format && !formats.includes(reporting.format)) {
      result.error(`Invalid reporting format '${reporting.format}'. Allowed formats: ${formats.join(', ')}`);
    }

    if (reporting.includeEvidence) {
      result.recommend('Evidence collection enabled - ensure adequate storage and retention');
    }

    for (const standard of framework.standards ?? []) {
      checkStandardReporting(standard, reporting, result);
    }
  }

  private checkStandardRequirements(framework: ComplianceFrameworkConfig, days: number, result: ResultBuilder): void {
    const controls = framework.controls ?? [];
    for (const standard of framework.standards ?? []) {
      const profile = PROFILES.get(standard);
      if (!profile) {
        continue;
      }
      for (const control of profile.requiredControls) {
        if (!controls.includes(control)) {
          result.warn(`${profile.label} compliance typically requires '${control}' control`);
        }
      }
      if (profile.retentionWarning && days > profile.retentionDays) {
        result.warn(profile.retentionWarning);
      }
      if (profile.recommendation) {
        result.recommend(profile.recommendation);
      }
    }
  }
}

function checkStandardReporting(standard: string, reporting: ComplianceReportingConfig, result: ResultBuilder): void {
  switch (standard) {
    case 'SOX':
      if (reporting.format !== 'detailed') {
        result.warn('SOX compliance typically requires detailed reporting format');
      }
      break;
    case 'PCI-DSS':
      if (!reporting.includeEvidence) {
        result.warn('PCI-DSS compliance typically requires evidence collection');
      }
      break;
    case 'GDPR':
      result.recommend('GDPR requires data subject rights - ensure reports support data subject requests');
      break;
    case 'HIPAA':
      if (!reporting.includeEvidence) {
        result.warn('HIPAA compliance typically requires comprehensive evidence collection');
      }
      break;
  }
}
