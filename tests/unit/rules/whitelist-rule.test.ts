/**
 * Unit tests for WhitelistRule
 */

import { describe, it, expect } from 'vitest';
import { WhitelistRule } from '../../../src/rules/whitelist-rule';
import { StringOrList } from '../../../src/string-or-list';
import { Severity } from '../../../src/types';

describe('WhitelistRule', () => {
  const rule = new WhitelistRule({
    allowedLogSources: ['kube-apiserver', 'oauth-server'],
    allowedVerbs: ['get', 'list', 'delete'],
    allowedResources: ['pods', 'secrets']
  });

  it('should describe itself', () => {
    expect(rule.name()).toBe('whitelist_validation');
    expect(rule.severity()).toBe(Severity.CRITICAL);
    expect(rule.enabled()).toBe(true);
  });

  it('should pass a query built from allowed values', () => {
    const result = rule.validate({
      logSource: 'kube-apiserver',
      verb: StringOrList.scalar('delete'),
      resource: StringOrList.scalar('pods')
    });

    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.severity).toBe(Severity.INFO);
    expect(result.message).toBe('Whitelist validation passed');
    expect(result.recommendations).toEqual([]);
  });

  it('should compare allow-list entries without regard to case', () => {
    const result = rule.validate({
      logSource: 'KUBE-APISERVER',
      verb: StringOrList.list(['Get', 'LIST'])
    });

    expect(result.isValid).toBe(true);
  });

  it('should report each disallowed list element separately', () => {
    const result = rule.validate({
      verb: StringOrList.list(['get', 'patch', 'watch'])
    });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      "Verb 'patch' is not in allowed whitelist",
      "Verb 'watch' is not in allowed whitelist"
    ]);
    expect(result.severity).toBe(Severity.CRITICAL);
    expect(result.message).toBe('Whitelist validation failed');
  });

  it('should add guidance only when the query is rejected', () => {
    const result = rule.validate({ logSource: 'node-auditd', resource: StringOrList.scalar('nodes') });

    expect(result.errors).toEqual([
      "Log source 'node-auditd' is not in allowed whitelist",
      "Resource 'nodes' is not in allowed whitelist"
    ]);
    expect(result.recommendations).toEqual([
      'Use only allowed log sources, verbs, and resources from the whitelist',
      'Check the configuration for the complete list of allowed values'
    ]);
  });

  it('should skip unset fields', () => {
    const result = rule.validate({ verb: StringOrList.scalar('') });

    expect(result.isValid).toBe(true);
  });

  it('should reject every value when the allow-lists are empty', () => {
    const strict = new WhitelistRule();
    const result = strict.validate({ logSource: 'kube-apiserver' });

    expect(result.errors).toEqual(["Log source 'kube-apiserver' is not in allowed whitelist"]);
  });

  it('should report itself disabled when configured so', () => {
    expect(new WhitelistRule({ enabled: false }).enabled()).toBe(false);
  });
});
