/**
 * Pattern Matcher - Matches query values against forbidden and dangerous patterns
 */

export enum MatchMode {
  EXACT = 'exact',
  REGEX = 'regex',
  SUBSTRING = 'substring'
}

export class PatternMatcher {
  /**
   * True when the value matches the pattern in any mode
   */
  matches(value: string, pattern: string): boolean {
    return this.matchMode(value, pattern) !== null;
  }

  /**
   * Evaluate the three modes in order, first success wins:
   * 1. case-insensitive equality
   * 2. regular expression, only for patterns carrying `.*` or an escape
   * 3. case-insensitive substring
   */
  matchMode(value: string, pattern: string): MatchMode | null {
    const lowerValue = value.toLowerCase();
    const lowerPattern = pattern.toLowerCase();

    if (lowerValue === lowerPattern) {
      return MatchMode.EXACT;
    }

    if (this.looksLikeRegex(pattern) && this.regexMatches(value, pattern)) {
      return MatchMode.REGEX;
    }

    if (lowerValue.includes(lowerPattern)) {
      return MatchMode.SUBSTRING;
    }

    return null;
  }

  /**
   * Patterns from the list that match the value, in list order
   */
  findMatches(value: string, patterns: readonly string[]): string[] {
    return patterns.filter(pattern => this.matches(value, pattern));
  }

  private looksLikeRegex(pattern: string): boolean {
    return pattern.includes('.*') || pattern.includes('\\');
  }

  private regexMatches(value: string, pattern: string): boolean {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern, 'i');
    } catch {
      // Uncompilable patterns never match in regex mode
      return false;
    }
    return regex.test(value);
  }
}
