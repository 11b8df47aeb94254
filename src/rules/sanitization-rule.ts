/**
 * Sanitization Rule - Rejects injection characters and malformed patterns, IPs and names
 */

import { CandidateQuery, RuleToggle, Severity, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { withDefaults } from '../rule-config';
import { assertPositiveInt, compileFormat } from '../errors';

export interface SanitizationConfig extends RuleToggle {
  forbiddenChars: readonly string[];
  maxPatternLength: number;
  /** An empty format disables that check */
  validRegexPattern: string;
  validIpPattern: string;
  validNamespacePattern: string;
  validResourcePattern: string;
}

export const DEFAULT_FORBIDDEN_CHARS: readonly string[] = [
  '<', '>', '&', '"', "'", '`', '|', ';', '$', '(', ')', '{', '}',
  '[', ']', '\\', '/', '!', '@', '#', '%', '^', '*', '+', '=', '~'
];

export const DEFAULT_SANITIZATION_CONFIG: SanitizationConfig = {
  enabled: true,
  forbiddenChars: DEFAULT_FORBIDDEN_CHARS,
  maxPatternLength: 500,
  validRegexPattern: '^[a-zA-Z0-9\\-_\\*\\.\\?\\+\\[\\]\\{\\}\\(\\)\\|\\\\/\\s]+$',
  validIpPattern: '^((25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\\.){3}(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$',
  validNamespacePattern: '^[a-z0-9]([a-z0-9\\-]*[a-z0-9])?$',
  validResourcePattern: '^[a-z]([a-z0-9\\-]*[a-z0-9])?$'
};

function compileOptional(source: string, field: string): RegExp | null {
  return source === '' ? null : compileFormat(source, field);
}

export class SanitizationRule implements ValidationRule {
  private readonly config: Readonly<SanitizationConfig>;
  private readonly regexFormat: RegExp | null;
  private readonly ipFormat: RegExp | null;
  private readonly namespaceFormat: RegExp | null;
  private readonly resourceFormat: RegExp | null;

  /**
   * @throws ConfigError when a format does not compile or the length limit is not positive
   */
  constructor(config: Partial<SanitizationConfig> = {}) {
    this.config = withDefaults(DEFAULT_SANITIZATION_CONFIG, config);
    assertPositiveInt(this.config.maxPatternLength, 'sanitization.max_pattern_length');
    this.regexFormat = compileOptional(this.config.validRegexPattern, 'sanitization.valid_regex_pattern');
    this.ipFormat = compileOptional(this.config.validIpPattern, 'sanitization.valid_ip_pattern');
    this.namespaceFormat = compileOptional(this.config.validNamespacePattern, 'sanitization.valid_namespace_pattern');
    this.resourceFormat = compileOptional(this.config.validResourcePattern, 'sanitization.valid_resource_pattern');
  }

  name(): string {
    return 'sanitization_validation';
  }

  description(): string {
    return 'Validates input sanitization to prevent injection attacks';
  }

  severity(): Severity {
    return Severity.CRITICAL;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const result = new ResultBuilder(this.name(), 'Input sanitization', query);

    this.checkForbiddenChars(query, result);
    this.checkPatternLengths(query, result);
    this.checkFormats(query, result);

    result.adviseOnFailure(
      'Remove forbidden characters from patterns',
      'Use only alphanumeric characters, hyphens, and underscores',
      'Keep patterns within length limits',
      'Use valid regex patterns only'
    );

    return result.build();
  }

  private forbiddenIn(value: string): string[] {
    return this.config.forbiddenChars.filter(char => value.includes(char));
  }

  private checkForbiddenChars(query: CandidateQuery, result: ResultBuilder): void {
    const patterns = [
      query.resourceNamePattern,
      query.userPattern,
      query.namespacePattern,
      query.requestUriPattern,
      query.authorizationReasonPattern,
      query.responseMessagePattern,
      query.missingAnnotation,
      query.requestObjectFilter
    ];

    for (const pattern of patterns) {
      if (!pattern) {
        continue;
      }
      for (const char of this.forbiddenIn(pattern)) {
        result.error(`Pattern contains forbidden character '${char}': ${pattern}`);
      }
    }

    for (const user of query.excludeUsers ?? []) {
      for (const char of this.forbiddenIn(user)) {
        result.error(`Exclude user contains forbidden character '${char}': ${user}`);
      }
    }

    for (const resource of query.excludeResources ?? []) {
      for (const char of this.forbiddenIn(resource)) {
        result.error(`Exclude resource contains forbidden character '${char}': ${resource}`);
      }
    }
  }

  private checkPatternLengths(query: CandidateQuery, result: ResultBuilder): void {
    const max = this.config.maxPatternLength;
    const patterns: Array<[string, string | undefined]> = [
      ['resource_name_pattern', query.resourceNamePattern],
      ['user_pattern', query.userPattern],
      ['namespace_pattern', query.namespacePattern],
      ['request_uri_pattern', query.requestUriPattern]
    ];

    for (const [name, pattern] of patterns) {
      if (pattern && pattern.length > max) {
        result.error(`Pattern '${name}' exceeds maximum length of ${max} characters`);
      }
    }
  }

  private checkFormats(query: CandidateQuery, result: ResultBuilder): void {
    const regexFormat = this.regexFormat;
    if (regexFormat) {
      const patterns = [
        query.resourceNamePattern,
        query.userPattern,
        query.namespacePattern,
        query.requestUriPattern,
        query.authorizationReasonPattern,
        query.responseMessagePattern
      ];
      for (const pattern of patterns) {
        if (pattern && !regexFormat.test(pattern)) {
          result.error(`Invalid regex pattern: ${pattern}`);
        }
      }
    }

    const ipFormat = this.ipFormat;
    if (ipFormat) {
      for (const ip of query.sourceIp?.values() ?? []) {
        if (!ipFormat.test(ip)) {
          result.error(`Invalid IP address: ${ip}`);
        }
      }
    }

    if (query.namespacePattern && this.namespaceFormat && !this.namespaceFormat.test(query.namespacePattern)) {
      result.error(`Invalid namespace pattern: ${query.namespacePattern}`);
    }

    if (query.resourceNamePattern && this.resourceFormat && !this.resourceFormat.test(query.resourceNamePattern)) {
      result.error(`Invalid resource pattern: ${query.resourceNamePattern}`);
    }
  }
}
