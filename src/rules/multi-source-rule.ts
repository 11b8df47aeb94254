/**
 * Multi-Source Rule - Checks cross-source correlation: sources, window, fields, join and cost
 */

import { CandidateQuery, MultiSourceConfig, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertPositiveInt } from '../errors';
import { Admission, admit } from '../cost-model';
import catalog from '../data/correlation-catalog.json';

export interface MultiSourceRuleConfig extends RuleToggle {
  validSources: readonly string[];
  maxSources: number;
  allowedCorrelationWindows: readonly string[];
  allowedCorrelationFields: readonly string[];
  maxCorrelationFields: number;
  maxCorrelationComplexity: number;
}

export const DEFAULT_MULTI_SOURCE_CONFIG: MultiSourceRuleConfig = {
  enabled: true,
  validSources: catalog.logSources,
  maxSources: 5,
  allowedCorrelationWindows: catalog.correlationWindows,
  allowedCorrelationFields: catalog.correlationFields,
  maxCorrelationFields: 10,
  maxCorrelationComplexity: 100
};

export const JOIN_TYPES: readonly string[] = ['inner', 'left', 'right', 'full'];
const EXPENSIVE_JOIN_TYPES: readonly string[] = ['full', 'right'];

const SOURCE_FIELDS: ReadonlyMap<string, readonly string[]> = new Map(Object.entries(catalog.sourceFields));
const WINDOW_COMPLEXITY: ReadonlyMap<string, number> = new Map(Object.entries(catalog.windowComplexity));
const JOIN_COMPLEXITY: ReadonlyMap<string, number> = new Map(Object.entries(catalog.joinComplexity));
const DEFAULT_WINDOW_COMPLEXITY = 5;
const DEFAULT_JOIN_COMPLEXITY = 2;

/**
 * 10 per secondary source, 5 per correlation field, plus window and join weights
 */
export function correlationComplexity(multiSource: MultiSourceConfig): number {
  let complexity = (multiSource.secondarySources?.length ?? 0) * 10;
  complexity += (multiSource.correlationFields?.length ?? 0) * 5;
  complexity += WINDOW_COMPLEXITY.get(multiSource.correlationWindow ?? '') ?? DEFAULT_WINDOW_COMPLEXITY;
  complexity += JOIN_COMPLEXITY.get(multiSource.joinType ?? '') ?? DEFAULT_JOIN_COMPLEXITY;
  return complexity;
}

export class MultiSourceRule implements ValidationRule {
  private readonly config: Readonly<MultiSourceRuleConfig>;

  /**
   * @throws ConfigError when a limit is not a positive integer
   */
  constructor(config: Partial<MultiSourceRuleConfig> = {}) {
    this.config = withDefaults(DEFAULT_MULTI_SOURCE_CONFIG, config);
    assertPositiveInt(this.config.maxSources, 'multi_source.max_sources');
    assertPositiveInt(this.config.maxCorrelationFields, 'multi_source.max_correlation_fields');
    assertPositiveInt(this.config.maxCorrelationComplexity, 'multi_source.max_correlation_complexity');
  }

  name(): string {
    return 'multi_source_validation';
  }

  description(): string {
    return 'Validates multi-source correlation configuration and cross-source compatibility';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Multi-source', query);
    const multiSource = query.multiSource;
    if (!multiSource) {
      return result.build();
    }

    this.checkPrimarySource(multiSource, result);
    this.checkSecondarySources(multiSource, result);
    this.checkHeavyCombinations(multiSource, result);
    this.checkCorrelationWindow(multiSource, result);
    this.checkCorrelationFields(multiSource, result);
    this.checkJoinType(multiSource, result);

    const max = this.config.maxCorrelationComplexity;
    const complexity = correlationComplexity(multiSource);
    switch (admit(complexity, max)) {
      case Admission.REJECT:
        result.error(`Correlation complexity score ${complexity} exceeds maximum allowed ${max}`);
        break;
      case Admission.WARN:
        result.warn(`High correlation complexity score ${complexity} may impact performance`);
        break;
    }
    result.detail('correlation_complexity_score', complexity).detail('max_complexity_allowed', max);

    result.adviseOnFailure(
      'Review multi-source correlation configuration',
      'Ensure all log sources are valid and compatible',
      'Verify correlation fields are supported across all sources',
      'Check correlation window is within allowed limits',
      'Consider reducing query complexity for better performance'
    );

    return result.build();
  }

  private checkPrimarySource(multiSource: MultiSourceConfig, result: ResultBuilder): void {
    const primary = multiSource.primarySource;
    if (!primary) {
      result.error('Primary source is required for multi-source correlation');
      return;
    }
    const valid = this.config.validSources;
    if (!valid.includes(primary)) {
      result.error(`Invalid primary source '${primary}'. Valid sources: ${valid.join(', ')}`);
    }
  }

  private checkSecondarySources(multiSource: MultiSourceConfig, result: ResultBuilder): void {
    const secondaries = multiSource.secondarySources ?? [];
    if (secondaries.length === 0) {
      result.error('At least one secondary source is required for multi-source correlation');
      return;
    }

    const totalSources = 1 + secondaries.length;
    if (totalSources > this.config.maxSources) {
      result.error(`Too many sources for correlation. Maximum allowed: ${this.config.maxSources}, got: ${totalSources}`);
    }

    const valid = this.config.validSources;
    // The primary counts as already used
    const seen = new Set<string>([multiSource.primarySource ?? '']);
    secondaries.forEach((source, index) => {
      if (!valid.includes(source)) {
        result.error(`Invalid secondary source '${source}' at index ${index}. Valid sources: ${valid.join(', ')}`);
        return;
      }
      if (seen.has(source)) {
        result.error(`Duplicate source '${source}' at index ${index}. Each source can only be used once`);
        return;
      }
      seen.add(source);
    });
  }

  private checkHeavyCombinations(multiSource: MultiSourceConfig, result: ResultBuilder): void {
    const sources = new Set([multiSource.primarySource ?? '', ...(multiSource.secondarySources ?? [])]);
    for (const combination of catalog.heavySourceCombinations) {
      if (combination.every(source => sources.has(source))) {
        result.warn(`Source combination [${combination.join(', ')}] may impact query performance`);
      }
    }
  }

  private checkCorrelationWindow(multiSource: MultiSourceConfig, result: ResultBuilder): void {
    const window = multiSource.correlationWindow;
    if (!window) {
      result.warn('No correlation window specified, using default');
      return;
    }

    const allowed = this.config.allowedCorrelationWindows;
    if (!allowed.includes(window)) {
      result.error(`Invalid correlation window '${window}'. Allowed windows: ${allowed.join(', ')}`);
    }
    if (catalog.largeCorrelationWindows.includes(window)) {
      result.warn(`Large correlation window '${window}' may impact query performance`);
    }
  }

  private checkCorrelationFields(multiSource: MultiSourceConfig, result: ResultBuilder): void {
    const fields = multiSource.correlationFields ?? [];
    if (fields.length === 0) {
      result.warn('No correlation fields specified, using default correlation');
      return;
    }

    const max = this.config.maxCorrelationFields;
    if (fields.length > max) {
      result.error(`Too many correlation fields. Maximum allowed: ${max}, got: ${fields.length}`);
    }

    const valid = this.config.allowedCorrelationFields;
    const seen = new Set<string>();
    fields.forEach((field, index) => {
      if (!valid.includes(field)) {
        result.error(`Invalid correlation field '${field}' at index ${index}. Valid fields: ${valid.join(', ')}`);
        return;
      }
      if (seen.has(field)) {
        result.error(`Duplicate correlation field '${field}' at index ${index}`);
        return;
      }
      seen.add(field);
    });

    this.checkFieldAvailability(multiSource, fields, result);
  }

  /**
   * Sources missing from the field map are not judged
   */
  private checkFieldAvailability(multiSource: MultiSourceConfig, fields: readonly string[], result: ResultBuilder): void {
    const sources = [multiSource.primarySource ?? '', ...(multiSource.secondarySources ?? [])];
    for (const field of fields) {
      const lacking = sources.filter(source => {
        const available = SOURCE_FIELDS.get(source);
        return available !== undefined && !available.includes(field);
      });
      if (lacking.length > 0) {
        result.warn(`Correlation field '${field}' may not be available in sources: ${lacking.join(', ')}`);
      }
    }
  }

  private checkJoinType(multiSource: MultiSourceConfig, result: ResultBuilder): void {
    const joinType = multiSource.joinType;
    if (!joinType) {
      return;
    }
    if (!JOIN_TYPES.includes(joinType)) {
      result.error(`Invalid join type '${joinType}'. Allowed types: ${JOIN_TYPES.join(', ')}`);
    }
    if (EXPENSIVE_JOIN_TYPES.includes(joinType)) {
      result.warn(`Join type '${joinType}' may impact query performance`);
    }
  }
}
