/**
 * Unit tests for MultiSourceRule
 */

import { describe, it, expect } from 'vitest';
import { MultiSourceRule, correlationComplexity } from '../../../src/rules/multi-source-rule';
import { MultiSourceConfig } from '../../../src/types';
import { ConfigError } from '../../../src/errors';

const SIMPLE: MultiSourceConfig = {
  primarySource: 'kube-apiserver',
  secondarySources: ['oauth-server'],
  correlationWindow: '5_minutes',
  correlationFields: ['user', 'source_ip'],
  joinType: 'inner'
};

describe('correlationComplexity', () => {
  it('should weigh sources, fields, window and join', () => {
    expect(correlationComplexity({
      secondarySources: ['oauth-server', 'node-auditd'],
      correlationFields: ['user'],
      correlationWindow: '1_hour',
      joinType: 'left'
    })).toBe(32);
  });

  it('should fall back to default window and join weights', () => {
    expect(correlationComplexity({})).toBe(7);
  });
});

describe('MultiSourceRule', () => {
  const rule = new MultiSourceRule();

  it('should pass queries without a multi-source block', () => {
    expect(rule.validate({ logSource: 'kube-apiserver' }).isValid).toBe(true);
  });

  it('should admit a small, well-formed correlation', () => {
    const result = rule.validate({ multiSource: SIMPLE });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.details.correlation_complexity_score).toBe(23);
    expect(result.details.max_complexity_allowed).toBe(100);
  });

  it('should report a primary reused as secondary once', () => {
    const result = rule.validate({
      multiSource: { primarySource: 'kube-apiserver', secondarySources: ['kube-apiserver'] }
    });

    expect(result.errors).toEqual([
      "Duplicate source 'kube-apiserver' at index 0. Each source can only be used once"
    ]);
    expect(result.warnings).toEqual([
      'No correlation window specified, using default',
      'No correlation fields specified, using default correlation'
    ]);
  });

  it('should require a primary source', () => {
    const result = rule.validate({ multiSource: { secondarySources: ['oauth-server'] } });

    expect(result.errors).toEqual(['Primary source is required for multi-source correlation']);
  });

  it('should require at least one secondary source', () => {
    const result = rule.validate({ multiSource: { primarySource: 'kube-apiserver' } });

    expect(result.errors).toEqual(['At least one secondary source is required for multi-source correlation']);
  });

  it('should reject an unknown secondary source with its index', () => {
    const result = rule.validate({
      multiSource: { primarySource: 'kube-apiserver', secondarySources: ['oauth-server', 'syslog'] }
    });

    expect(result.errors).toEqual([
      "Invalid secondary source 'syslog' at index 1. Valid sources: kube-apiserver, openshift-apiserver, oauth-server, oauth-apiserver, node-auditd"
    ]);
  });

  it('should warn about heavy combinations, wide windows, missing fields and expensive joins', () => {
    const result = rule.validate({
      multiSource: {
        primarySource: 'node-auditd',
        secondarySources: ['kube-apiserver', 'oauth-server'],
        correlationWindow: '24_hours',
        correlationFields: ['user', 'verb'],
        joinType: 'full'
      }
    });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      'Source combination [node-auditd, kube-apiserver, oauth-server] may impact query performance',
      "Large correlation window '24_hours' may impact query performance",
      "Correlation field 'verb' may not be available in sources: node-auditd, oauth-server",
      "Join type 'full' may impact query performance"
    ]);
    expect(result.details.correlation_complexity_score).toBe(55);
  });

  it('should reject duplicate and unknown correlation fields', () => {
    const result = rule.validate({
      multiSource: { ...SIMPLE, correlationFields: ['user', 'user', 'hostname'] }
    });

    expect(result.errors).toEqual([
      "Duplicate correlation field 'user' at index 1",
      "Invalid correlation field 'hostname' at index 2. Valid fields: user, source_ip, user_agent, session_id, request_id, timestamp, namespace, resource, verb, response_status"
    ]);
  });

  it('should reject an unknown join type', () => {
    const result = rule.validate({ multiSource: { ...SIMPLE, joinType: 'cross' } });

    expect(result.errors).toEqual(["Invalid join type 'cross'. Allowed types: inner, left, right, full"]);
  });

  it('should reject and warn on correlation complexity against its budget', () => {
    const tight = new MultiSourceRule({ maxCorrelationComplexity: 20 });
    expect(tight.validate({ multiSource: SIMPLE }).errors).toEqual([
      'Correlation complexity score 23 exceeds maximum allowed 20'
    ]);

    const close = new MultiSourceRule({ maxCorrelationComplexity: 30 });
    expect(close.validate({ multiSource: SIMPLE }).warnings).toEqual([
      'High correlation complexity score 23 may impact performance'
    ]);
  });

  it('should cap the number of sources', () => {
    const capped = new MultiSourceRule({ maxSources: 2 });
    const result = capped.validate({
      multiSource: { ...SIMPLE, secondarySources: ['oauth-server', 'oauth-apiserver'] }
    });

    expect(result.errors).toEqual(['Too many sources for correlation. Maximum allowed: 2, got: 3']);
  });

  it('should refuse a zero source limit', () => {
    expect(() => new MultiSourceRule({ maxSources: 0 })).toThrow(ConfigError);
  });
});
