/**
 * Timeframe Rule - Bounds how far back, how wide and how large a query may reach
 */

import { BusinessHours, CandidateQuery, RuleToggle, Severity, TimeRange, ValidationResult, ValidationRule } from '../types';
import { ResultBuilder } from '../validation-result';
import { includesIgnoreCase, withDefaults } from '../rule-config';
import { assertOrdered, assertPositiveInt } from '../errors';

export type Clock = () => Date;

export interface TimeframeConfig extends RuleToggle {
  maxDaysBack: number;
  minLimit: number;
  maxLimit: number;
  allowedTimeframes: readonly string[];
  now: Clock;
}

export const DEFAULT_TIMEFRAME_CONFIG: TimeframeConfig = {
  enabled: true,
  maxDaysBack: 90,
  minLimit: 1,
  maxLimit: 1000,
  allowedTimeframes: [
    'today', 'yesterday', '1_hour_ago', '2_hours_ago', '3_hours_ago',
    '6_hours_ago', '12_hours_ago', '1_day_ago', '2_days_ago', '3_days_ago',
    '7_days_ago', '14_days_ago', '30_days_ago', '60_days_ago', '90_days_ago'
  ],
  now: () => new Date()
};

const DAY_MS = 24 * 60 * 60 * 1000;

const UNIT_PATTERNS: ReadonlyArray<[RegExp, number]> = [
  [/(\d+)_days?_ago/, 1],
  [/(\d+)_weeks?_ago/, 7],
  [/(\d+)_months?_ago/, 30]
];

const SUB_DAY_TIMEFRAMES: readonly string[] = [
  'today', 'yesterday', '1_hour_ago', '2_hours_ago', '3_hours_ago', '6_hours_ago', '12_hours_ago'
];

/**
 * Days reached back by a named timeframe; 0 when it cannot be told
 */
export function timeframeDays(timeframe: string): number {
  for (const [pattern, multiplier] of UNIT_PATTERNS) {
    const match = pattern.exec(timeframe);
    if (match) {
      return Number.parseInt(match[1], 10) * multiplier;
    }
  }
  return SUB_DAY_TIMEFRAMES.includes(timeframe.toLowerCase()) ? 1 : 0;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class TimeframeRule implements ValidationRule {
  private readonly config: Readonly<TimeframeConfig>;

  /**
   * @throws ConfigError on a non-positive day limit or inverted limit bounds
   */
  constructor(config: Partial<TimeframeConfig> = {}) {
    this.config = withDefaults(DEFAULT_TIMEFRAME_CONFIG, config);
    assertPositiveInt(this.config.maxDaysBack, 'timeframe.max_days_back');
    assertOrdered(this.config.minLimit, this.config.maxLimit, 'timeframe.limit');
  }

  name(): string {
    return 'timeframe_validation';
  }

  description(): string {
    return 'Validates timeframe limits and constraints for audit queries';
  }

  severity(): Severity {
    return Severity.WARNING;
  }

  enabled(): boolean {
    return this.config.enabled;
  }

  validate(query: CandidateQuery): ValidationResult {
    const { maxDaysBack, minLimit, maxLimit } = this.config;
    const result = new ResultBuilder(this.name(), 'Timeframe', query);

    if (query.timeframe) {
      if (!includesIgnoreCase(this.config.allowedTimeframes, query.timeframe)) {
        result.error(`Timeframe '${query.timeframe}' is not in allowed list`);
      }
      if (timeframeDays(query.timeframe) > maxDaysBack) {
        result.error(`Timeframe '${query.timeframe}' exceeds maximum allowed days back (${maxDaysBack})`);
      }
    }

    if (query.timeRange) {
      const problem = this.checkTimeRange(query.timeRange);
      if (problem) {
        result.error(problem);
      }
    }

    // 0 means the limit was not set
    const limit = query.limit ?? 0;
    if (limit !== 0) {
      if (limit > maxLimit) {
        result.error(`Limit ${limit} exceeds maximum allowed limit of ${maxLimit}`);
      }
      if (limit < minLimit) {
        result.error(`Limit ${limit} is below minimum allowed limit of ${minLimit}`);
      }
    }

    if (query.businessHours) {
      const problem = checkBusinessHours(query.businessHours);
      if (problem) {
        result.error(problem);
      }
    }

    result.adviseOnFailure(
      'Use allowed timeframe values from the configuration',
      `Keep timeframes within ${maxDaysBack} days back`,
      `Use limits between ${minLimit} and ${maxLimit}`,
      'Ensure time ranges are valid and within allowed bounds'
    );

    return result.build();
  }

  /**
   * First problem with a custom range, or null when it is acceptable
   */
  private checkTimeRange(range: TimeRange): string | null {
    const { start, end } = range;
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
      return 'invalid time range: start and end must be valid timestamps';
    }
    if (start.getTime() > end.getTime()) {
      return `time range start (${formatTimestamp(start)}) is after end (${formatTimestamp(end)})`;
    }

    const now = this.config.now();
    const maxWindowMs = this.config.maxDaysBack * DAY_MS;
    if (start.getTime() < now.getTime() - maxWindowMs) {
      return `time range start (${formatTimestamp(start)}) is more than ${this.config.maxDaysBack} days in the past`;
    }

    if (start.getTime() > now.getTime() || end.getTime() > now.getTime()) {
      return 'time range cannot be in the future';
    }

    const durationMs = end.getTime() - start.getTime();
    if (durationMs > maxWindowMs) {
      const hours = (ms: number): string => `${Math.floor(ms / (60 * 60 * 1000))}h`;
      return `time range duration (${hours(durationMs)}) exceeds maximum allowed duration (${hours(maxWindowMs)})`;
    }

    return null;
  }
}

function checkBusinessHours(hours: BusinessHours): string | null {
  if (hours.startHour < 0 || hours.startHour > 23) {
    return `business hours start hour (${hours.startHour}) must be between 0 and 23`;
  }
  if (hours.endHour < 0 || hours.endHour > 23) {
    return `business hours end hour (${hours.endHour}) must be between 0 and 23`;
  }
  // Overnight windows (start after end) are allowed
  if (hours.startHour === hours.endHour) {
    return 'business hours start and end hours cannot be the same';
  }
  return null;
}
