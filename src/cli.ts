/**
 * CLI Interface - Main command-line interface
 */

import { CLIOptions } from './types';
import { Validator } from './validator';
import { OutputFormatter } from './output-formatter';
import { Logger, LogLevel } from './logger';
import { ConfigError, describeError } from './errors';
import { defaultValidatorConfig, loadConfig } from './config-loader';
import { readQueryFile } from './query-parser';
import { CostModel, performanceTier } from './cost-model';
import { DEFAULT_PERFORMANCE_CONFIG } from './rules/performance-rule';
import { ValidatorConfig } from './rules';

export const VERSION = '0.1.0';

export enum ExitCode {
  ADMITTED = 0,
  REJECTED = 1,
  ERROR = 2
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class CLI {
  private readonly formatter = new OutputFormatter();

  /**
   * Main entry point for CLI
   *
   * Routes to a subcommand:
   * - check: Validate a query and report the decision
   * - rules: List the configured rule set
   * - cost: Print the complexity breakdown and resource estimate
   */
  async run(args: string[]): Promise<number> {
    let logger = new Logger(LogLevel.WARN);

    try {
      if (args.length === 0) {
        this.displayUsage();
        return ExitCode.ERROR;
      }

      if (args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return ExitCode.ADMITTED;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`audit-query-guard v${VERSION}`);
        return ExitCode.ADMITTED;
      }

      const subcommand = args[0];
      const options = this.parseArgs(args.slice(1));
      logger = new Logger(options.verbose ? LogLevel.DEBUG : LogLevel.WARN);

      switch (subcommand) {
        case 'check':
          return this.handleCheck(options, logger);
        case 'rules':
          return this.handleRules(options, logger);
        case 'cost':
          return this.handleCost(options, logger);
        default:
          throw new UsageError(`Unknown command: ${subcommand}`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.warn('Configuration rejected', { error: error.message });
      }
      if (error instanceof UsageError) {
        this.formatter.displayError(error.message);
        console.error('Run "audit-query-guard --help" for usage');
        return ExitCode.ERROR;
      }
      this.formatter.displayError(describeError(error));
      return ExitCode.ERROR;
    }
  }

  /**
   * Parse flags shared by every subcommand
   *
   * Supports:
   * - --config <path>: Rule configuration file
   * - --json: Print machine-readable output
   * - --verbose: Debug logging on stderr
   * - --rules: Show the per-rule outcome
   */
  private parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      json: false,
      verbose: false,
      showRules: false
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--json') {
        options.json = true;
      } else if (arg === '--verbose') {
        options.verbose = true;
      } else if (arg === '--rules') {
        options.showRules = true;
      } else if (arg === '--config') {
        if (i + 1 >= args.length) {
          throw new UsageError('--config requires a path argument');
        }
        options.configPath = args[++i];
      } else if (arg.startsWith('--')) {
        throw new UsageError(`Unknown flag: ${arg}`);
      } else if (options.queryPath === undefined) {
        options.queryPath = arg;
      } else {
        throw new UsageError(`Unexpected argument: ${arg}`);
      }
    }

    return options;
  }

  private displayUsage(): void {
    console.log(`
audit-query-guard - Pre-execution guardrail for audit-log queries

Usage:
  audit-query-guard check <query.json | ->   Validate a query
  audit-query-guard rules                    List the configured rules
  audit-query-guard cost <query.json | ->    Show complexity and resource estimates

Flags:
  --config <path>                            Rule configuration file (JSON)
  --json                                     Print JSON instead of text
  --rules                                    Show the outcome of each rule (check)
  --verbose                                  Enable debug logging on stderr
  --help, -h                                 Show this message
  --version, -v                              Show the version

Exit codes:
  0  query admitted
  1  query rejected
  2  usage, query or configuration error

Examples:
  audit-query-guard check query.json
  cat query.json | audit-query-guard check - --json
  audit-query-guard check query.json --config guard.json --rules
    `.trim());
  }

  private loadValidatorConfig(options: CLIOptions, logger: Logger): ValidatorConfig {
    if (options.configPath === undefined) {
      return defaultValidatorConfig();
    }
    const config = loadConfig(options.configPath);
    logger.debug('Loaded configuration', { path: options.configPath });
    return config;
  }

  private requireQueryPath(options: CLIOptions, command: string): string {
    if (options.queryPath === undefined) {
      throw new UsageError(`${command} command requires a query file argument (use "-" for stdin)`);
    }
    return options.queryPath;
  }

  /**
   * Handle check command - Validate one query without executing it
   */
  private handleCheck(options: CLIOptions, logger: Logger): number {
    const queryPath = this.requireQueryPath(options, 'check');
    const validator = Validator.fromConfig(this.loadValidatorConfig(options, logger), logger);
    const query = readQueryFile(queryPath);
    const result = validator.validate(query);

    if (options.json) {
      this.formatter.displayJson(result);
    } else {
      this.formatter.displayResult(result, options.showRules);
    }

    return result.isValid ? ExitCode.ADMITTED : ExitCode.REJECTED;
  }

  /**
   * Handle rules command - List rules in evaluation order
   */
  private handleRules(options: CLIOptions, logger: Logger): number {
    const validator = Validator.fromConfig(this.loadValidatorConfig(options, logger), logger);
    const rules = validator.getRules();

    if (options.json) {
      this.formatter.displayJson(rules.map(rule => ({
        name: rule.name(),
        severity: rule.severity(),
        enabled: rule.enabled(),
        description: rule.description()
      })));
    } else {
      this.formatter.displayRules(rules);
    }
    return ExitCode.ADMITTED;
  }

  /**
   * Handle cost command - Report the cost model's view of a query
   */
  private handleCost(options: CLIOptions, logger: Logger): number {
    const queryPath = this.requireQueryPath(options, 'cost');
    const config = this.loadValidatorConfig(options, logger);
    const maxScore = config.performance.maxComplexityScore ?? DEFAULT_PERFORMANCE_CONFIG.maxComplexityScore;
    const query = readQueryFile(queryPath);

    const model = new CostModel();
    const score = model.score(query);
    const estimate = model.estimate(query, score.total);
    const tier = performanceTier(score.total, maxScore);

    if (options.json) {
      this.formatter.displayJson({ score, estimate, tier });
    } else {
      this.formatter.displayCost(score, estimate, tier);
    }
    return ExitCode.ADMITTED;
  }
}
