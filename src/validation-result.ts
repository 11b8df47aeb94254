/**
 * Validation Result - Builds per-rule results that keep the validity/severity invariant
 */

import { CandidateQuery, Severity, ValidationResult } from './types';

/**
 * Severity implied by the collected findings:
 * critical with errors, warning with warnings only, info otherwise
 */
export function deriveSeverity(errorCount: number, warningCount: number): Severity {
  if (errorCount > 0) {
    return Severity.CRITICAL;
  }
  if (warningCount > 0) {
    return Severity.WARNING;
  }
  return Severity.INFO;
}

export class ResultBuilder {
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];
  private readonly recommendations: string[] = [];
  private readonly failureAdvice: string[] = [];
  private readonly details: Record<string, unknown> = {};

  /**
   * @param subject - human label used in the summary message, e.g. "Whitelist"
   */
  constructor(
    private readonly ruleName: string,
    private readonly subject: string,
    private readonly query: CandidateQuery | null
  ) {}

  error(message: string): this {
    this.errors.push(message);
    return this;
  }

  warn(message: string): this {
    this.warnings.push(message);
    return this;
  }

  recommend(...messages: string[]): this {
    this.recommendations.push(...messages);
    return this;
  }

  /**
   * Advice appended after the other recommendations, only when the rule fails
   */
  adviseOnFailure(...messages: string[]): this {
    this.failureAdvice.push(...messages);
    return this;
  }

  detail(key: string, value: unknown): this {
    this.details[key] = value;
    return this;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  build(): ValidationResult {
    const isValid = this.errors.length === 0;
    const severity = deriveSeverity(this.errors.length, this.warnings.length);

    let message = `${this.subject} validation passed`;
    if (!isValid) {
      message = `${this.subject} validation failed`;
    } else if (this.warnings.length > 0) {
      message = `${this.subject} validation passed with warnings`;
    }

    const recommendations = isValid
      ? [...this.recommendations]
      : [...this.recommendations, ...this.failureAdvice];

    return Object.freeze({
      isValid,
      ruleName: this.ruleName,
      severity,
      message,
      errors: Object.freeze([...this.errors]),
      warnings: Object.freeze([...this.warnings]),
      recommendations: Object.freeze(recommendations),
      details: Object.freeze({ ...this.details }),
      timestamp: new Date().toISOString(),
      querySnapshot: this.query
    });
  }
}
