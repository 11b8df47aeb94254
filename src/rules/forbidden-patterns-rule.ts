/**
 * Forbidden Patterns Rule - Screens every field for forbidden and field-specific dangerous patterns
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { PatternMatcher } from '../pattern-matcher';
import { withDefaults } from '../rule-config';
import { LIST_FIELDS, SCALAR_FIELDS, listValues, scalarField } from '../query-fields';
import dangerousPatterns from '../data/dangerous-patterns.json';

export interface DangerousPatternTables {
  requestUri: readonly string[];
  namespace: readonly string[];
  user: readonly string[];
  resourceName: readonly string[];
}

export interface ForbiddenPatternsConfig extends RuleToggle {
  forbiddenPatterns: readonly string[];
  dangerousPatterns: DangerousPatternTables;
}

export const DEFAULT_FORBIDDEN_PATTERNS: readonly string[] = [
  'rm -rf',
  'delete --all',
  'system:admin',
  'cluster-admin'
];

export const DEFAULT_DANGEROUS_PATTERNS: DangerousPatternTables = dangerousPatterns;

export const DEFAULT_FORBIDDEN_PATTERNS_CONFIG: ForbiddenPatternsConfig = {
  enabled: true,
  forbiddenPatterns: DEFAULT_FORBIDDEN_PATTERNS,
  dangerousPatterns: DEFAULT_DANGEROUS_PATTERNS
};

export class ForbiddenPatternsRule implements ValidationRule {
  private readonly config: Readonly<ForbiddenPatternsConfig>;
  private readonly matcher = new PatternMatcher();

  constructor(config: Partial<ForbiddenPatternsConfig> = {}) {
    this.config = withDefaults(DEFAULT_FORBIDDEN_PATTERNS_CONFIG, config);
  }

  name(): string {
    return 'forbidden_patterns_validation';
  }

  description(): string {
    return 'Validates that query does not contain forbidden patterns or dangerous commands';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Forbidden patterns', query);

    this.checkScalarFields(query, result);
    this.checkListFields(query, result);
    this.checkDangerousPatterns(query, result);

    result.adviseOnFailure(
      'Remove forbidden patterns from query parameters',
      'Avoid dangerous command patterns and system access',
      'Use safe, non-privileged patterns only',
      'Review query for potential security risks'
    );

    return result.build();
  }

  private checkScalarFields(query: CandidateQuery, result: ResultBuilder): void {
    for (const field of SCALAR_FIELDS) {
      const value = scalarField(query, field);
      if (value === '') {
        continue;
      }
      for (const pattern of this.matcher.findMatches(value, this.config.forbiddenPatterns)) {
        result.error(`Field '${field}' contains forbidden pattern '${pattern}': ${value}`);
      }
    }
  }

  /**
   * Element-wise: every offending element is reported on its own
   */
  private checkListFields(query: CandidateQuery, result: ResultBuilder): void {
    for (const field of LIST_FIELDS) {
      for (const value of listValues(query, field)) {
        for (const pattern of this.matcher.findMatches(value, this.config.forbiddenPatterns)) {
          result.error(`Field '${field}' contains forbidden pattern '${pattern}': ${value}`);
        }
      }
    }

    for (const user of query.excludeUsers ?? []) {
      for (const pattern of this.matcher.findMatches(user, this.config.forbiddenPatterns)) {
        result.error(`Exclude user contains forbidden pattern '${pattern}': ${user}`);
      }
    }

    for (const resource of query.excludeResources ?? []) {
      for (const pattern of this.matcher.findMatches(resource, this.config.forbiddenPatterns)) {
        result.error(`Exclude resource contains forbidden pattern '${pattern}': ${resource}`);
      }
    }
  }

  /**
   * Field-specific tables. A value caught here may already have been
   * reported by the general pass; both findings are kept.
   */
  private checkDangerousPatterns(query: CandidateQuery, result: ResultBuilder): void {
    const tables = this.config.dangerousPatterns;
    const checks: Array<[string, string | undefined, readonly string[]]> = [
      ['Request URI pattern', query.requestUriPattern, tables.requestUri],
      ['Namespace pattern', query.namespacePattern, tables.namespace],
      ['User pattern', query.userPattern, tables.user],
      ['Resource name pattern', query.resourceNamePattern, tables.resourceName]
    ];

    for (const [label, value, patterns] of checks) {
      if (!value) {
        continue;
      }
      for (const pattern of this.matcher.findMatches(value, patterns)) {
        result.error(`${label} contains dangerous pattern '${pattern}': ${value}`);
      }
    }
  }
}
