/**
 * Unit tests for FieldValuesRule
 */

import { describe, it, expect } from 'vitest';
import { FieldValuesRule } from '../../../src/rules/field-values-rule';
import { StringOrList } from '../../../src/string-or-list';

describe('FieldValuesRule', () => {
  const rule = new FieldValuesRule({
    allowedAuthDecisions: ['allow', 'forbid'],
    allowedResponseStatus: ['200', '403']
  });

  it('should accept configured values', () => {
    const result = rule.validate({
      authDecision: 'forbid',
      responseStatus: StringOrList.list(['200', '403'])
    });

    expect(result.isValid).toBe(true);
    expect(result.message).toBe('Field values validation passed');
  });

  it('should reject an unknown auth decision and list the allowed ones', () => {
    const result = rule.validate({ authDecision: 'deny' });

    expect(result.errors).toEqual(["Invalid auth_decision 'deny'. Allowed decisions: allow, forbid"]);
  });

  it('should mark list elements as coming from an array', () => {
    const result = rule.validate({ responseStatus: StringOrList.list(['200', '418', '500']) });

    expect(result.errors).toEqual([
      "Invalid response_status '418' in array. Allowed status codes: 200, 403",
      "Invalid response_status '500' in array. Allowed status codes: 200, 403"
    ]);
  });

  it('should report a scalar status without the array marker', () => {
    const result = rule.validate({ responseStatus: StringOrList.scalar('418') });

    expect(result.errors).toEqual(["Invalid response_status '418'. Allowed status codes: 200, 403"]);
    expect(result.recommendations).toEqual([
      'Use only allowed values for enum fields',
      'Check auth_decision values against allowed list',
      'Verify business hours presets are supported',
      'Ensure response status codes are valid'
    ]);
  });

  it('should accept the standard status codes by default', () => {
    const result = new FieldValuesRule().validate({
      authDecision: 'error',
      responseStatus: StringOrList.scalar('504')
    });

    expect(result.isValid).toBe(true);
  });
});
