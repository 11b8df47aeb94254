#!/usr/bin/env node
/**
 * audit-query-guard - Main entry point
 */

import { CLI } from './cli';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(2);
    });
}

export * from './types';
export { StringOrList, hasValues } from './string-or-list';
export { PatternMatcher } from './pattern-matcher';
export { CostModel, Admission, admit, performanceTier } from './cost-model';
export type { ComplexityBreakdown, ComplexityScore, ResourceEstimate, PerformanceTier } from './cost-model';
export { ConstraintChecker } from './constraint-checker';
export { ResultBuilder, deriveSeverity } from './validation-result';
export { ConfigError, QueryParseError } from './errors';
export { Validator, AGGREGATE_RULE_NAME } from './validator';
export * from './rules';
export { defaultValidatorConfig, parseConfig, loadConfig } from './config-loader';
export { parseQuery, readQueryFile, toQuery } from './query-parser';
export { Logger, LogLevel } from './logger';
export { CLI, ExitCode, VERSION } from './cli';
export { OutputFormatter } from './output-formatter';
