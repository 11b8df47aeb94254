/**
 * Error types raised outside the rule boundary, plus config assertion helpers
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class QueryParseError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'QueryParseError';
    this.issues = issues;
  }
}

export function assertNonNegativeInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`Config field "${field}" must be a non-negative integer, got ${value}`);
  }
}

export function assertPositiveInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Config field "${field}" must be a positive integer, got ${value}`);
  }
}

export function assertRange(value: number, min: number, max: number, field: string): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigError(`Config field "${field}" must be between ${min} and ${max}, got ${value}`);
  }
}

export function assertOrdered(min: number, max: number, field: string): void {
  if (min > max) {
    throw new ConfigError(`Config field "${field}" has minimum ${min} above maximum ${max}`);
  }
}

/**
 * Compile a format expression supplied through configuration.
 */
export function compileFormat(source: string, field: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigError(
      `Config field "${field}" is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
