/**
 * Unit tests for RequiredFieldsRule
 */

import { describe, it, expect } from 'vitest';
import { RequiredFieldsRule } from '../../../src/rules/required-fields-rule';
import { StringOrList } from '../../../src/string-or-list';

describe('RequiredFieldsRule', () => {
  it('should require log_source by default', () => {
    const rule = new RequiredFieldsRule();
    const result = rule.validate({});

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(["Required field 'log_source' is missing or empty"]);
    expect(result.recommendations).toEqual([
      'Provide all required fields for the query',
      'Check the configuration for the list of required fields'
    ]);
  });

  it('should treat a whitespace-only log source as missing', () => {
    const rule = new RequiredFieldsRule();

    expect(rule.validate({ logSource: '   ' }).isValid).toBe(false);
    expect(rule.validate({ logSource: 'kube-apiserver' }).isValid).toBe(true);
  });

  it('should check each configured field', () => {
    const rule = new RequiredFieldsRule({ requiredFields: ['log_source', 'verb', 'limit', 'timeframe'] });
    const result = rule.validate({
      logSource: 'kube-apiserver',
      verb: StringOrList.list([]),
      limit: 0
    });

    expect(result.errors).toEqual([
      "Required field 'verb' is missing or empty",
      "Required field 'limit' is missing or empty",
      "Required field 'timeframe' is missing or empty"
    ]);
  });

  it('should never find a field it does not know', () => {
    const rule = new RequiredFieldsRule({ requiredFields: ['cluster_name'] });

    expect(rule.validate({ logSource: 'kube-apiserver' }).errors).toEqual([
      "Required field 'cluster_name' is missing or empty"
    ]);
  });

  it('should pass when nothing is required', () => {
    const rule = new RequiredFieldsRule({ requiredFields: [] });

    expect(rule.validate({}).isValid).toBe(true);
  });
});
