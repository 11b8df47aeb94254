/**
 * Config Loader - Reads the rule configuration file and builds the standard defaults
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { withDefaults } from './rule-config';
import { ValidatorConfig } from './rules';
import { DEFAULT_FORBIDDEN_PATTERNS, DEFAULT_DANGEROUS_PATTERNS } from './rules/forbidden-patterns-rule';
import { STANDARD_ANALYSIS_LISTS } from './rules/advanced-analysis-rule';

// ============================================================================
// Standard Rule Set
// ============================================================================

export const STANDARD_LOG_SOURCES: readonly string[] = [
  'kube-apiserver',
  'openshift-apiserver',
  'oauth-server',
  'oauth-apiserver',
  'node-auditd'
];

export const STANDARD_VERBS: readonly string[] = ['get', 'list', 'create', 'update', 'patch', 'delete', 'watch'];

export const STANDARD_RESOURCES: readonly string[] = ['pods', 'services', 'deployments', 'configmaps', 'secrets', 'namespaces'];

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * The rule set used when no configuration file is given.
 * The consolidated input check is off because the specialised rules cover it.
 */
export function defaultValidatorConfig(): ValidatorConfig {
  return deepFreeze({
    whitelist: {
      allowedLogSources: [...STANDARD_LOG_SOURCES],
      allowedVerbs: [...STANDARD_VERBS],
      allowedResources: [...STANDARD_RESOURCES]
    },
    forbiddenPatterns: { forbiddenPatterns: [...DEFAULT_FORBIDDEN_PATTERNS] },
    requiredFields: { requiredFields: ['log_source'] },
    fieldValues: {},
    sanitization: {},
    timeframe: {},
    performance: {},
    advancedAnalysis: {
      allowedAnalysisTypes: [...STANDARD_ANALYSIS_LISTS.analysisTypes],
      allowedTimeWindows: [...STANDARD_ANALYSIS_LISTS.timeWindows],
      allowedSortFields: [...STANDARD_ANALYSIS_LISTS.sortFields],
      allowedSortOrders: [...STANDARD_ANALYSIS_LISTS.sortOrders]
    },
    multiSource: {},
    behavioralAnalytics: {},
    compliance: {},
    inputValidation: { enabled: false }
  });
}

// ============================================================================
// File Schema
// ============================================================================

const stringList = z.array(z.string());
const count = z.number().int();

const whitelistSchema = z.object({
  enabled: z.boolean().optional(),
  allowed_log_sources: stringList.optional(),
  allowed_verbs: stringList.optional(),
  allowed_resources: stringList.optional()
}).strict();

const forbiddenPatternsSchema = z.object({
  enabled: z.boolean().optional(),
  forbidden_patterns: stringList.optional(),
  dangerous_patterns: z.object({
    request_uri: stringList.optional(),
    namespace: stringList.optional(),
    user: stringList.optional(),
    resource_name: stringList.optional()
  }).strict().optional()
}).strict();

const requiredFieldsSchema = z.object({
  enabled: z.boolean().optional(),
  required_fields: stringList.optional()
}).strict();

const fieldValuesSchema = z.object({
  enabled: z.boolean().optional(),
  allowed_auth_decisions: stringList.optional(),
  allowed_response_status: stringList.optional()
}).strict();

const sanitizationSchema = z.object({
  enabled: z.boolean().optional(),
  forbidden_chars: stringList.optional(),
  max_pattern_length: count.optional(),
  valid_regex_pattern: z.string().optional(),
  valid_ip_pattern: z.string().optional(),
  valid_namespace_pattern: z.string().optional(),
  valid_resource_pattern: z.string().optional()
}).strict();

const timeframeSchema = z.object({
  enabled: z.boolean().optional(),
  max_days_back: count.optional(),
  min_limit: count.optional(),
  max_limit: count.optional(),
  allowed_timeframes: stringList.optional()
}).strict();

const performanceSchema = z.object({
  enabled: z.boolean().optional(),
  max_complexity_score: count.optional(),
  max_memory_mb: count.optional(),
  max_cpu_percent: count.optional(),
  max_execution_seconds: count.optional(),
  max_raw_results: count.optional(),
  max_aggregated_results: count.optional(),
  max_concurrent_sources: count.optional()
}).strict();

const advancedAnalysisSchema = z.object({
  enabled: z.boolean().optional(),
  allowed_analysis_types: stringList.optional(),
  allowed_time_windows: stringList.optional(),
  allowed_sort_fields: stringList.optional(),
  allowed_sort_orders: stringList.optional(),
  min_threshold: count.optional(),
  max_threshold: count.optional(),
  max_group_by_fields: count.optional()
}).strict();

const multiSourceSchema = z.object({
  enabled: z.boolean().optional(),
  valid_sources: stringList.optional(),
  max_sources: count.optional(),
  allowed_correlation_windows: stringList.optional(),
  allowed_correlation_fields: stringList.optional(),
  max_correlation_fields: count.optional(),
  max_correlation_complexity: count.optional()
}).strict();

const behavioralAnalyticsSchema = z.object({
  enabled: z.boolean().optional(),
  allowed_risk_factors: stringList.optional(),
  max_risk_factors: count.optional(),
  min_baseline_days: count.optional(),
  max_baseline_days: count.optional(),
  min_anomaly_threshold: z.number().optional(),
  max_anomaly_threshold: z.number().optional(),
  max_performance_score: count.optional()
}).strict();

const complianceSchema = z.object({
  enabled: z.boolean().optional(),
  allowed_standards: stringList.optional(),
  allowed_controls: stringList.optional(),
  max_standards: count.optional(),
  max_controls: count.optional(),
  min_retention_days: count.optional(),
  max_audit_gap_hours: count.optional(),
  required_evidence_fields: stringList.optional()
}).strict();

const inputValidationSchema = z.object({
  enabled: z.boolean().optional(),
  mandatory_fields: stringList.optional(),
  max_pattern_length: count.optional(),
  forbidden_chars: stringList.optional(),
  valid_regex_pattern: z.string().optional(),
  valid_ip_pattern: z.string().optional(),
  forbidden_patterns: stringList.optional(),
  allowed_log_sources: stringList.optional(),
  allowed_verbs: stringList.optional(),
  allowed_resources: stringList.optional(),
  allowed_auth_decisions: stringList.optional(),
  allowed_response_status: stringList.optional(),
  max_result_limit: count.optional(),
  max_array_elements: count.optional(),
  allowed_timeframes: stringList.optional()
}).strict();

export const configFileSchema = z.object({
  whitelist: whitelistSchema.optional(),
  forbidden_patterns: forbiddenPatternsSchema.optional(),
  required_fields: requiredFieldsSchema.optional(),
  field_values: fieldValuesSchema.optional(),
  sanitization: sanitizationSchema.optional(),
  timeframe: timeframeSchema.optional(),
  performance: performanceSchema.optional(),
  advanced_analysis: advancedAnalysisSchema.optional(),
  multi_source: multiSourceSchema.optional(),
  behavioral_analytics: behavioralAnalyticsSchema.optional(),
  compliance: complianceSchema.optional(),
  input_validation: inputValidationSchema.optional()
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Loading
// ============================================================================

function toValidatorConfig(file: ConfigFile): ValidatorConfig {
  const base = defaultValidatorConfig();
  const dangerous = file.forbidden_patterns?.dangerous_patterns;

  return {
    whitelist: withDefaults(base.whitelist, {
      enabled: file.whitelist?.enabled,
      allowedLogSources: file.whitelist?.allowed_log_sources,
      allowedVerbs: file.whitelist?.allowed_verbs,
      allowedResources: file.whitelist?.allowed_resources
    }),
    forbiddenPatterns: withDefaults(base.forbiddenPatterns, {
      enabled: file.forbidden_patterns?.enabled,
      forbiddenPatterns: file.forbidden_patterns?.forbidden_patterns,
      dangerousPatterns: dangerous && withDefaults(DEFAULT_DANGEROUS_PATTERNS, {
        requestUri: dangerous.request_uri,
        namespace: dangerous.namespace,
        user: dangerous.user,
        resourceName: dangerous.resource_name
      })
    }),
    requiredFields: withDefaults(base.requiredFields, {
      enabled: file.required_fields?.enabled,
      requiredFields: file.required_fields?.required_fields
    }),
    fieldValues: withDefaults(base.fieldValues, {
      enabled: file.field_values?.enabled,
      allowedAuthDecisions: file.field_values?.allowed_auth_decisions,
      allowedResponseStatus: file.field_values?.allowed_response_status
    }),
    sanitization: withDefaults(base.sanitization, {
      enabled: file.sanitization?.enabled,
      forbiddenChars: file.sanitization?.forbidden_chars,
      maxPatternLength: file.sanitization?.max_pattern_length,
      validRegexPattern: file.sanitization?.valid_regex_pattern,
      validIpPattern: file.sanitization?.valid_ip_pattern,
      validNamespacePattern: file.sanitization?.valid_namespace_pattern,
      validResourcePattern: file.sanitization?.valid_resource_pattern
    }),
    timeframe: withDefaults(base.timeframe, {
      enabled: file.timeframe?.enabled,
      maxDaysBack: file.timeframe?.max_days_back,
      minLimit: file.timeframe?.min_limit,
      maxLimit: file.timeframe?.max_limit,
      allowedTimeframes: file.timeframe?.allowed_timeframes
    }),
    performance: withDefaults(base.performance, {
      enabled: file.performance?.enabled,
      maxComplexityScore: file.performance?.max_complexity_score,
      maxMemoryMb: file.performance?.max_memory_mb,
      maxCpuPercent: file.performance?.max_cpu_percent,
      maxExecutionSeconds: file.performance?.max_execution_seconds,
      maxRawResults: file.performance?.max_raw_results,
      maxAggregatedResults: file.performance?.max_aggregated_results,
      maxConcurrentSources: file.performance?.max_concurrent_sources
    }),
    advancedAnalysis: withDefaults(base.advancedAnalysis, {
      enabled: file.advanced_analysis?.enabled,
      allowedAnalysisTypes: file.advanced_analysis?.allowed_analysis_types,
      allowedTimeWindows: file.advanced_analysis?.allowed_time_windows,
      allowedSortFields: file.advanced_analysis?.allowed_sort_fields,
      allowedSortOrders: file.advanced_analysis?.allowed_sort_orders,
      minThreshold: file.advanced_analysis?.min_threshold,
      maxThreshold: file.advanced_analysis?.max_threshold,
      maxGroupByFields: file.advanced_analysis?.max_group_by_fields
    }),
    multiSource: withDefaults(base.multiSource, {
      enabled: file.multi_source?.enabled,
      validSources: file.multi_source?.valid_sources,
      maxSources: file.multi_source?.max_sources,
      allowedCorrelationWindows: file.multi_source?.allowed_correlation_windows,
      allowedCorrelationFields: file.multi_source?.allowed_correlation_fields,
      maxCorrelationFields: file.multi_source?.max_correlation_fields,
      maxCorrelationComplexity: file.multi_source?.max_correlation_complexity
    }),
    behavioralAnalytics: withDefaults(base.behavioralAnalytics, {
      enabled: file.behavioral_analytics?.enabled,
      allowedRiskFactors: file.behavioral_analytics?.allowed_risk_factors,
      maxRiskFactors: file.behavioral_analytics?.max_risk_factors,
      minBaselineDays: file.behavioral_analytics?.min_baseline_days,
      maxBaselineDays: file.behavioral_analytics?.max_baseline_days,
      minAnomalyThreshold: file.behavioral_analytics?.min_anomaly_threshold,
      maxAnomalyThreshold: file.behavioral_analytics?.max_anomaly_threshold,
      maxPerformanceScore: file.behavioral_analytics?.max_performance_score
    }),
    compliance: withDefaults(base.compliance, {
      enabled: file.compliance?.enabled,
      allowedStandards: file.compliance?.allowed_standards,
      allowedControls: file.compliance?.allowed_controls,
      maxStandards: file.compliance?.max_standards,
      maxControls: file.compliance?.max_controls,
      minRetentionDays: file.compliance?.min_retention_days,
      maxAuditGapHours: file.compliance?.max_audit_gap_hours,
      requiredEvidenceFields: file.compliance?.required_evidence_fields
    }),
    inputValidation: withDefaults(base.inputValidation, {
      enabled: file.input_validation?.enabled,
      mandatoryFields: file.input_validation?.mandatory_fields,
      maxPatternLength: file.input_validation?.max_pattern_length,
      forbiddenChars: file.input_validation?.forbidden_chars,
      validRegexPattern: file.input_validation?.valid_regex_pattern,
      validIpPattern: file.input_validation?.valid_ip_pattern,
      forbiddenPatterns: file.input_validation?.forbidden_patterns,
      allowedLogSources: file.input_validation?.allowed_log_sources,
      allowedVerbs: file.input_validation?.allowed_verbs,
      allowedResources: file.input_validation?.allowed_resources,
      allowedAuthDecisions: file.input_validation?.allowed_auth_decisions,
      allowedResponseStatus: file.input_validation?.allowed_response_status,
      maxResultLimit: file.input_validation?.max_result_limit,
      maxArrayElements: file.input_validation?.max_array_elements,
      allowedTimeframes: file.input_validation?.allowed_timeframes
    })
  };
}

/**
 * Validate a parsed configuration document and overlay it on the standard rule set.
 * @throws ConfigError naming every offending path
 */
export function parseConfig(raw: unknown, source = 'config'): ValidatorConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`);
  }
  return deepFreeze(toValidatorConfig(parsed.data));
}

/**
 * @throws ConfigError when the file is unreadable, not JSON, or fails the schema
 */
export function loadConfig(filePath: string): ValidatorConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read config at "${filePath}": ${describeError(error)}`);
  }
  return parseConfig(raw, `config at "${filePath}"`);
}
