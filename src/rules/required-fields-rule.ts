/**
 * Required Fields Rule - Configured fields must be present and non-empty
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { isFieldPresent } from '../query-fields';

export interface RequiredFieldsConfig extends RuleToggle {
  requiredFields: readonly string[];
}

export const DEFAULT_REQUIRED_FIELDS_CONFIG: RequiredFieldsConfig = {
  enabled: true,
  requiredFields: ['log_source']
};

export class RequiredFieldsRule implements ValidationRule {
  private readonly config: Readonly<RequiredFieldsConfig>;

  constructor(config: Partial<RequiredFieldsConfig> = {}) {
    this.config = withDefaults(DEFAULT_REQUIRED_FIELDS_CONFIG, config);
  }

  name(): string {
    return 'required_fields_validation';
  }

  description(): string {
    return 'Validates that all required fields are present and non-empty';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Required fields', query);

    for (const field of this.config.requiredFields) {
      if (!isFieldPresent(query, field)) {
        result.error(`Required field '${field}' is missing or empty`);
      }
    }

    result.adviseOnFailure(
      'Provide all required fields for the query',
      'Check the configuration for the list of required fields'
    );

    return result.build();
  }
}
