/**
 * Field Values Rule - Enum-like fields must hold one of the configured values
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';

export interface FieldValuesConfig extends RuleToggle {
  allowedAuthDecisions: readonly string[];
  allowedResponseStatus: readonly string[];
}

export const DEFAULT_FIELD_VALUES_CONFIG: FieldValuesConfig = {
  enabled: true,
  allowedAuthDecisions: ['allow', 'error', 'forbid'],
  allowedResponseStatus: ['200', '201', '204', '400', '401', '403', '404', '409', '422', '500', '502', '503', '504']
};

export class FieldValuesRule implements ValidationRule {
  private readonly config: Readonly<FieldValuesConfig>;

  constructor(config: Partial<FieldValuesConfig> = {}) {
    this.config = withDefaults(DEFAULT_FIELD_VALUES_CONFIG, config);
  }

  name(): string {
    return 'field_values_validation';
  }

  description(): string {
    return 'Validates specific field values against allowed lists from configuration';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Field values', query);

    const decisions = this.config.allowedAuthDecisions;
    if (query.authDecision && !decisions.includes(query.authDecision)) {
      result.error(`Invalid auth_decision '${query.authDecision}'. Allowed decisions: ${decisions.join(', ')}`);
    }

    const statuses = this.config.allowedResponseStatus;
    const responseStatus = query.responseStatus;
    if (responseStatus) {
      const where = responseStatus.isList() ? ' in array' : '';
      for (const status of responseStatus.values()) {
        if (!statuses.includes(status)) {
          result.error(`Invalid response_status '${status}'${where}. Allowed status codes: ${statuses.join(', ')}`);
        }
      }
    }

    result.adviseOnFailure(
      'Use only allowed values for enum fields',
      'Check auth_decision values against allowed list',
      'Verify business hours presets are supported',
      'Ensure response status codes are valid'
    );

    return result.build();
  }
}
