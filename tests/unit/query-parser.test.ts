/**
 * Unit tests for the query wire-format parser
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { parseQuery, readQueryFile, toQuery } from '../../src/query-parser';
import { QueryParseError } from '../../src/errors';

describe('toQuery', () => {
  it('should map snake_case keys to the query model', () => {
    const query = toQuery({
      log_source: 'kube-apiserver',
      user_pattern: 'alice',
      exclude_users: ['system:serviceaccount:ci'],
      include_changes: true,
      limit: 50
    });

    expect(query.logSource).toBe('kube-apiserver');
    expect(query.userPattern).toBe('alice');
    expect(query.excludeUsers).toEqual(['system:serviceaccount:ci']);
    expect(query.includeChanges).toBe(true);
    expect(query.limit).toBe(50);
  });

  it('should keep scalar and list forms apart', () => {
    const query = toQuery({ verb: 'get', resource: ['pods', 'secrets'] });

    expect(query.verb?.isList()).toBe(false);
    expect(query.verb?.values()).toEqual(['get']);
    expect(query.resource?.isList()).toBe(true);
    expect(query.resource?.values()).toEqual(['pods', 'secrets']);
  });

  it('should parse time range bounds into dates', () => {
    const query = toQuery({
      time_range: { start: '2026-03-01T00:00:00Z', end: '2026-03-02T06:30:00+02:00' }
    });

    expect(query.timeRange?.start.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(query.timeRange?.end.toISOString()).toBe('2026-03-02T04:30:00.000Z');
  });

  it('should map nested analysis blocks', () => {
    const query = toQuery({
      analysis: {
        type: 'anomaly_detection',
        group_by: ['user', 'verb'],
        statistical_analysis: { pattern_deviation_threshold: 2.5 }
      },
      multi_source: { primary_source: 'kube-apiserver', secondary_sources: ['oauth-server'], join_type: 'inner' },
      behavioral_analysis: { user_profiling: true, risk_scoring: { enabled: true, risk_factors: ['time_anomaly'] } },
      compliance_framework: { standards: ['SOX'], reporting: { include_evidence: true } },
      business_hours: { start_hour: 9, end_hour: 17, outside_only: true }
    });

    expect(query.analysis?.groupBy?.values()).toEqual(['user', 'verb']);
    expect(query.analysis?.statisticalAnalysis?.patternDeviationThreshold).toBe(2.5);
    expect(query.multiSource).toEqual({
      primarySource: 'kube-apiserver',
      secondarySources: ['oauth-server'],
      correlationWindow: undefined,
      correlationFields: undefined,
      joinType: 'inner'
    });
    expect(query.behavioralAnalysis?.riskScoring?.riskFactors).toEqual(['time_anomaly']);
    expect(query.complianceFramework?.reporting?.includeEvidence).toBe(true);
    expect(query.businessHours?.startHour).toBe(9);
    expect(query.businessHours?.outsideOnly).toBe(true);
  });

  it('should drop unknown keys', () => {
    const query = toQuery({ log_source: 'oauth-server', trace_id: 'abc' });
    expect(Object.values(query).filter(value => value !== undefined)).toEqual(['oauth-server']);
  });

  it('should list every offending path', () => {
    try {
      toQuery({ limit: 'ten', verb: 7 });
      expect.unreachable('toQuery should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(QueryParseError);
      if (error instanceof QueryParseError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toBe('verb: Invalid input');
        expect(error.issues[1]).toBe('limit: Expected number, received string');
      }
    }
  });

  it('should reject a timestamp without a zone designator', () => {
    expect(() => toQuery({ time_range: { start: '2026-03-01', end: '2026-03-02T00:00:00Z' } }))
      .toThrow('Invalid query: time_range.start: Invalid datetime');
  });

  it('should reject a document that is not an object', () => {
    expect(() => toQuery('kube-apiserver')).toThrow('Invalid query: (root): Expected object, received string');
  });
});

describe('parseQuery', () => {
  it('should decode JSON text', () => {
    expect(parseQuery('{"log_source":"node-auditd"}').logSource).toBe('node-auditd');
  });

  it('should report text that is not JSON', () => {
    expect(() => parseQuery('{log_source:')).toThrow(/^Query is not valid JSON: /);
  });
});

describe('readQueryFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'guard-query-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read a query from disk', () => {
    const file = path.join(tempDir, 'query.json');
    fs.writeFileSync(file, JSON.stringify({ log_source: 'kube-apiserver', verb: ['get', 'list'] }));

    expect(readQueryFile(file).verb?.values()).toEqual(['get', 'list']);
  });

  it('should report an unreadable file', () => {
    const file = path.join(tempDir, 'nope.json');
    expect(() => readQueryFile(file)).toThrow(`Failed to read query at "${file}": `);
  });
});
