/**
 * Query Parser - Converts the snake_case JSON wire form into a CandidateQuery
 */

import * as fs from 'fs';
import { z } from 'zod';
import { CandidateQuery } from './types';
import { StringOrList } from './string-or-list';
import { QueryParseError, describeError } from './errors';

const stringOrList = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (typeof value === 'string' ? StringOrList.scalar(value) : StringOrList.list(value)));

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform(value => new Date(value));

const stringList = z.array(z.string());

const analysisSchema = z.object({
  type: z.string().optional(),
  kill_chain_phase: z.string().optional(),
  multi_stage_correlation: z.boolean().optional(),
  statistical_analysis: z.object({
    pattern_deviation_threshold: z.number().optional(),
    confidence_interval: z.number().optional(),
    sample_size_minimum: z.number().int().optional(),
    baseline_window: z.string().optional()
  }).optional(),
  threshold: z.number().int().optional(),
  time_window: z.string().optional(),
  group_by: stringOrList.optional(),
  sort_by: z.string().optional(),
  sort_order: z.string().optional()
});

const multiSourceSchema = z.object({
  primary_source: z.string().optional(),
  secondary_sources: stringList.optional(),
  correlation_window: z.string().optional(),
  correlation_fields: stringList.optional(),
  join_type: z.string().optional()
});

const behavioralSchema = z.object({
  user_profiling: z.boolean().optional(),
  baseline_comparison: z.boolean().optional(),
  risk_scoring: z.object({
    enabled: z.boolean().optional(),
    algorithm: z.string().optional(),
    risk_factors: stringList.optional(),
    weighting_scheme: z.record(z.number()).optional()
  }).optional(),
  anomaly_detection: z.object({
    algorithm: z.string().optional(),
    contamination: z.number().optional(),
    sensitivity: z.number().optional(),
    threshold: z.number().optional()
  }).optional(),
  baseline_window: z.string().optional(),
  learning_period: z.string().optional()
});

const complianceSchema = z.object({
  standards: stringList.optional(),
  controls: stringList.optional(),
  reporting: z.object({
    format: z.string().optional(),
    include_evidence: z.boolean().optional(),
    retention_period: z.string().optional(),
    digital_signature: z.boolean().optional()
  }).optional(),
  audit_trail: z.boolean().optional(),
  violation_threshold: z.number().int().optional(),
  evidence_collection: z.boolean().optional()
});

// Unknown keys are dropped, matching how upstream producers add fields over time
export const queryWireSchema = z.object({
  log_source: z.string().optional(),
  verb: stringOrList.optional(),
  resource: stringOrList.optional(),
  namespace: stringOrList.optional(),
  user: stringOrList.optional(),
  timeframe: z.string().optional(),
  limit: z.number().int().optional(),
  response_status: stringOrList.optional(),
  exclude_users: stringList.optional(),
  resource_name_pattern: z.string().optional(),
  user_pattern: z.string().optional(),
  namespace_pattern: z.string().optional(),
  request_uri_pattern: z.string().optional(),
  auth_decision: z.string().optional(),
  source_ip: stringOrList.optional(),
  group_by: stringOrList.optional(),
  sort_by: z.string().optional(),
  sort_order: z.string().optional(),
  subresource: z.string().optional(),
  include_changes: z.boolean().optional(),
  time_range: z.object({ start: timestamp, end: timestamp }).optional(),
  business_hours: z.object({
    start_hour: z.number().int(),
    end_hour: z.number().int(),
    outside_only: z.boolean().optional(),
    timezone: z.string().optional()
  }).optional(),
  request_object_filter: z.string().optional(),
  exclude_resources: stringList.optional(),
  authorization_reason_pattern: z.string().optional(),
  response_message_pattern: z.string().optional(),
  missing_annotation: z.string().optional(),
  multi_source: multiSourceSchema.optional(),
  analysis: analysisSchema.optional(),
  behavioral_analysis: behavioralSchema.optional(),
  compliance_framework: complianceSchema.optional()
});

export type QueryWire = z.infer<typeof queryWireSchema>;

function toCandidateQuery(wire: QueryWire): CandidateQuery {
  const { analysis, multi_source: multi, behavioral_analysis: behavioral, compliance_framework: compliance } = wire;
  const stats = analysis?.statistical_analysis;
  const risk = behavioral?.risk_scoring;
  const anomaly = behavioral?.anomaly_detection;
  const reporting = compliance?.reporting;

  return {
    logSource: wire.log_source,
    verb: wire.verb,
    resource: wire.resource,
    namespace: wire.namespace,
    user: wire.user,
    timeframe: wire.timeframe,
    limit: wire.limit,
    responseStatus: wire.response_status,
    excludeUsers: wire.exclude_users,
    resourceNamePattern: wire.resource_name_pattern,
    userPattern: wire.user_pattern,
    namespacePattern: wire.namespace_pattern,
    requestUriPattern: wire.request_uri_pattern,
    authDecision: wire.auth_decision,
    sourceIp: wire.source_ip,
    groupBy: wire.group_by,
    sortBy: wire.sort_by,
    sortOrder: wire.sort_order,
    subresource: wire.subresource,
    includeChanges: wire.include_changes,
    timeRange: wire.time_range,
    businessHours: wire.business_hours && {
      startHour: wire.business_hours.start_hour,
      endHour: wire.business_hours.end_hour,
      outsideOnly: wire.business_hours.outside_only,
      timezone: wire.business_hours.timezone
    },
    requestObjectFilter: wire.request_object_filter,
    excludeResources: wire.exclude_resources,
    authorizationReasonPattern: wire.authorization_reason_pattern,
    responseMessagePattern: wire.response_message_pattern,
    missingAnnotation: wire.missing_annotation,
    multiSource: multi && {
      primarySource: multi.primary_source,
      secondarySources: multi.secondary_sources,
      correlationWindow: multi.correlation_window,
      correlationFields: multi.correlation_fields,
      joinType: multi.join_type
    },
    analysis: analysis && {
      type: analysis.type,
      killChainPhase: analysis.kill_chain_phase,
      multiStageCorrelation: analysis.multi_stage_correlation,
      statisticalAnalysis: stats && {
        patternDeviationThreshold: stats.pattern_deviation_threshold,
        confidenceInterval: stats.confidence_interval,
        sampleSizeMinimum: stats.sample_size_minimum,
        baselineWindow: stats.baseline_window
      },
      threshold: analysis.threshold,
      timeWindow: analysis.time_window,
      groupBy: analysis.group_by,
      sortBy: analysis.sort_by,
      sortOrder: analysis.sort_order
    },
    behavioralAnalysis: behavioral && {
      userProfiling: behavioral.user_profiling,
      baselineComparison: behavioral.baseline_comparison,
      riskScoring: risk && {
        enabled: risk.enabled,
        algorithm: risk.algorithm,
        riskFactors: risk.risk_factors,
        weightingScheme: risk.weighting_scheme
      },
      anomalyDetection: anomaly && {
        algorithm: anomaly.algorithm,
        contamination: anomaly.contamination,
        sensitivity: anomaly.sensitivity,
        threshold: anomaly.threshold
      },
      baselineWindow: behavioral.baseline_window,
      learningPeriod: behavioral.learning_period
    },
    complianceFramework: compliance && {
      standards: compliance.standards,
      controls: compliance.controls,
      reporting: reporting && {
        format: reporting.format,
        includeEvidence: reporting.include_evidence,
        retentionPeriod: reporting.retention_period,
        digitalSignature: reporting.digital_signature
      },
      auditTrail: compliance.audit_trail,
      violationThreshold: compliance.violation_threshold,
      evidenceCollection: compliance.evidence_collection
    }
  };
}

/**
 * Validate an already-decoded value against the wire schema.
 * @throws QueryParseError listing every offending path
 */
export function toQuery(raw: unknown): CandidateQuery {
  const parsed = queryWireSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new QueryParseError('Invalid query', issues);
  }
  return toCandidateQuery(parsed.data);
}

export function parseQuery(json: string): CandidateQuery {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new QueryParseError(`Query is not valid JSON: ${describeError(error)}`);
  }
  return toQuery(raw);
}

/**
 * Read a query document from disk; "-" reads standard input.
 */
export function readQueryFile(filePath: string): CandidateQuery {
  let text: string;
  try {
    text = fs.readFileSync(filePath === '-' ? 0 : filePath, 'utf-8');
  } catch (error) {
    throw new QueryParseError(`Failed to read query at "${filePath}": ${describeError(error)}`);
  }
  return parseQuery(text);
}
