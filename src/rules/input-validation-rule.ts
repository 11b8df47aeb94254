/**
 * Input Validation Rule - One consolidated pass over required fields, characters, security patterns, values and limits
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertPositiveInt, compileFormat } from '../errors';
import { LIST_FIELDS, ListFieldName, SCALAR_FIELDS, isFieldPresent, listValues, scalarField } from '../query-fields';
import defaults from '../data/input-validation-defaults.json';

export interface InputValidationConfig extends RuleToggle {
  mandatoryFields: readonly string[];
  maxPatternLength: number;
  forbiddenChars: readonly string[];
  /** An empty format disables that warning */
  validRegexPattern: string;
  validIpPattern: string;
  forbiddenPatterns: readonly string[];
  allowedLogSources: readonly string[];
  allowedVerbs: readonly string[];
  allowedResources: readonly string[];
  allowedAuthDecisions: readonly string[];
  allowedResponseStatus: readonly string[];
  maxResultLimit: number;
  maxArrayElements: number;
  allowedTimeframes: readonly string[];
}

export const DEFAULT_INPUT_VALIDATION_CONFIG: InputValidationConfig = {
  enabled: true,
  ...defaults
};

export class InputValidationRule implements ValidationRule {
  private readonly config: Readonly<InputValidationConfig>;
  private readonly regexFormat: RegExp | null;
  private readonly ipFormat: RegExp | null;

  constructor(config: Partial<InputValidationConfig> = {}) {
    this.config = withDefaults(DEFAULT_INPUT_VALIDATION_CONFIG, config);
    assertPositiveInt(this.config.maxPatternLength, 'input_validation.max_pattern_length');
    assertPositiveInt(this.config.maxResultLimit, 'input_validation.max_result_limit');
    assertPositiveInt(this.config.maxArrayElements, 'input_validation.max_array_elements');
    this.regexFormat = this.config.validRegexPattern
      ? compileFormat(this.config.validRegexPattern, 'input_validation.valid_regex_pattern')
      : null;
    this.ipFormat = this.config.validIpPattern
      ? compileFormat(this.config.validIpPattern, 'input_validation.valid_ip_pattern')
      : null;
  }

  name(): string {
    return 'comprehensive_input_validation';
  }

  description(): string {
    return 'Comprehensive input validation covering required fields, character safety, security patterns, field values, and performance limits';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const cfg = this.config;
    const result = new ResultBuilder(this.name(), 'Input', query);

    for (const field of cfg.mandatoryFields) {
      if (!isFieldPresent(query, field)) {
        result.error(`Required field '${field}' is missing or empty`);
      }
    }

    this.checkCharacters(query, result);
    this.checkSecurityPatterns(query, result);
    this.checkFieldValues(query, result);
    this.checkLimits(query, result);

    result.adviseOnFailure(
      'Fix all validation errors before proceeding',
      'Review query parameters for compliance with security policies'
    );

    result.detail('validation_sections', {
      required_fields_checked: cfg.mandatoryFields.length,
      character_validation_applied: true,
      security_patterns_checked: cfg.forbiddenPatterns.length,
      field_values_validated: true,
      performance_limits_applied: true
    });

    return result.build();
  }

  private checkCharacters(query: CandidateQuery, result: ResultBuilder): void {
    const { maxPatternLength, forbiddenChars } = this.config;

    for (const field of SCALAR_FIELDS) {
      const value = scalarField(query, field);
      if (value === '') {
        continue;
      }
      if (value.length > maxPatternLength) {
        result.error(`Field '${field}' exceeds maximum length of ${maxPatternLength} characters`);
      }
      for (const char of forbiddenChars) {
        if (value.includes(char)) {
          result.error(`Field '${field}' contains forbidden character '${char}'`);
        }
      }
      if (field.endsWith('_pattern') && this.regexFormat && !this.regexFormat.test(value)) {
        result.warn(`Field '${field}' does not match recommended pattern format`);
      }
    }

    const ipFormat = this.ipFormat;
    if (ipFormat) {
      for (const ip of listValues(query, 'source_ip')) {
        if (!ipFormat.test(ip)) {
          result.warn(`Field 'source_ip' does not appear to be a valid IP address`);
        }
      }
    }
  }

  /**
   * Case-insensitive substring scan; list fields are scanned as one space-joined value
   */
  private checkSecurityPatterns(query: CandidateQuery, result: ResultBuilder): void {
    const fields: Array<[string, string]> = SCALAR_FIELDS.map(field => [field, scalarField(query, field)]);
    for (const field of LIST_FIELDS) {
      fields.push([field, listValues(query, field).join(' ')]);
    }
    fields.push(['exclude_users', (query.excludeUsers ?? []).join(' ')]);
    fields.push(['exclude_resources', (query.excludeResources ?? []).join(' ')]);

    for (const [field, value] of fields) {
      if (value === '') {
        continue;
      }
      const lower = value.toLowerCase();
      for (const pattern of this.config.forbiddenPatterns) {
        if (lower.includes(pattern.toLowerCase())) {
          result.error(`Field '${field}' contains forbidden security pattern: ${pattern}`);
        }
      }
    }
  }

  private checkFieldValues(query: CandidateQuery, result: ResultBuilder): void {
    const cfg = this.config;
    if (query.logSource && !cfg.allowedLogSources.includes(query.logSource)) {
      result.error(`Log source '${query.logSource}' is not in allowed list`);
    }

    this.checkListAllowed(query, 'verb', cfg.allowedVerbs, result);
    this.checkListAllowed(query, 'resource', cfg.allowedResources, result);

    if (query.authDecision && !cfg.allowedAuthDecisions.includes(query.authDecision)) {
      result.error(`Auth decision '${query.authDecision}' is not in allowed list`);
    }

    this.checkListAllowed(query, 'response_status', cfg.allowedResponseStatus, result);
  }

  private checkListAllowed(query: CandidateQuery, field: ListFieldName, allowed: readonly string[], result: ResultBuilder): void {
    for (const value of listValues(query, field)) {
      if (!allowed.includes(value)) {
        result.error(`Value '${value}' in field '${field}' is not in allowed list`);
      }
    }
  }

  private checkLimits(query: CandidateQuery, result: ResultBuilder): void {
    const { maxResultLimit, maxArrayElements, allowedTimeframes } = this.config;
    const limit = query.limit ?? 0;
    if (limit > maxResultLimit) {
      result.error(`Result limit ${limit} exceeds maximum allowed limit of ${maxResultLimit}`);
    }

    const arrays: Array<[string, number]> = [
      ['exclude_users', query.excludeUsers?.length ?? 0],
      ['exclude_resources', query.excludeResources?.length ?? 0]
    ];
    for (const [field, size] of arrays) {
      if (size > maxArrayElements) {
        result.error(`Array field '${field}' has ${size} elements, exceeds maximum of ${maxArrayElements}`);
      }
    }

    if (query.timeframe && !allowedTimeframes.includes(query.timeframe)) {
      result.error(`Timeframe '${query.timeframe}' is not in allowed list`);
    }
  }
}
