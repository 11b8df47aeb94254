/**
 * Whitelist Rule - Log source, verbs and resources must come from the allow-lists
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { includesIgnoreCase, withDefaults } from '../rule-config';

export interface WhitelistConfig extends RuleToggle {
  allowedLogSources: readonly string[];
  allowedVerbs: readonly string[];
  allowedResources: readonly string[];
}

/** Nothing is allowed until the allow-lists are configured */
export const DEFAULT_WHITELIST_CONFIG: WhitelistConfig = {
  enabled: true,
  allowedLogSources: [],
  allowedVerbs: [],
  allowedResources: []
};

export class WhitelistRule implements ValidationRule {
  private readonly config: Readonly<WhitelistConfig>;

  constructor(config: Partial<WhitelistConfig> = {}) {
    this.config = withDefaults(DEFAULT_WHITELIST_CONFIG, config);
  }

  name(): string {
    return 'whitelist_validation';
  }

  description(): string {
    return 'Validates that log sources, verbs, and resources are in the allowed whitelist';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Whitelist', query);

    if (query.logSource && !includesIgnoreCase(this.config.allowedLogSources, query.logSource)) {
      result.error(`Log source '${query.logSource}' is not in allowed whitelist`);
    }

    // One error per disallowed element
    for (const verb of query.verb?.values() ?? []) {
      if (!includesIgnoreCase(this.config.allowedVerbs, verb)) {
        result.error(`Verb '${verb}' is not in allowed whitelist`);
      }
    }

    for (const resource of query.resource?.values() ?? []) {
      if (!includesIgnoreCase(this.config.allowedResources, resource)) {
        result.error(`Resource '${resource}' is not in allowed whitelist`);
      }
    }

    result.adviseOnFailure(
      'Use only allowed log sources, verbs, and resources from the whitelist',
      'Check the configuration for the complete list of allowed values'
    );

    return result.build();
  }
}
