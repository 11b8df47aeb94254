/**
 * Unit tests for ResultBuilder and severity derivation
 */

import { describe, it, expect } from 'vitest';
import { ResultBuilder, deriveSeverity } from '../../src/validation-result';
import { Severity } from '../../src/types';

describe('deriveSeverity', () => {
  it('should rank errors above warnings', () => {
    expect(deriveSeverity(1, 3)).toBe(Severity.CRITICAL);
    expect(deriveSeverity(0, 1)).toBe(Severity.WARNING);
    expect(deriveSeverity(0, 0)).toBe(Severity.INFO);
  });
});

describe('ResultBuilder', () => {
  const query = { logSource: 'kube-apiserver' };

  it('should build a clean result', () => {
    const result = new ResultBuilder('whitelist', 'Whitelist', query).build();

    expect(result.isValid).toBe(true);
    expect(result.ruleName).toBe('whitelist');
    expect(result.severity).toBe(Severity.INFO);
    expect(result.message).toBe('Whitelist validation passed');
    expect(result.querySnapshot).toBe(query);
  });

  it('should mention warnings when there are no errors', () => {
    const result = new ResultBuilder('timeframe', 'Timeframe', query).warn('wide range').build();

    expect(result.isValid).toBe(true);
    expect(result.severity).toBe(Severity.WARNING);
    expect(result.message).toBe('Timeframe validation passed with warnings');
    expect(result.warnings).toEqual(['wide range']);
  });

  it('should fail on any error', () => {
    const result = new ResultBuilder('timeframe', 'Timeframe', query).error('bad').warn('wide').build();

    expect(result.isValid).toBe(false);
    expect(result.severity).toBe(Severity.CRITICAL);
    expect(result.message).toBe('Timeframe validation failed');
  });

  it('should append failure advice only when the rule fails', () => {
    const passing = new ResultBuilder('r', 'R', query).recommend('always').adviseOnFailure('on failure').build();
    const failing = new ResultBuilder('r', 'R', query)
      .adviseOnFailure('on failure')
      .recommend('always')
      .error('bad')
      .build();

    expect(passing.recommendations).toEqual(['always']);
    expect(failing.recommendations).toEqual(['always', 'on failure']);
  });

  it('should record details and freeze the result', () => {
    const builder = new ResultBuilder('r', 'R', null).detail('score', 42);
    const result = builder.build();

    expect(result.details).toEqual({ score: 42 });
    expect(result.querySnapshot).toBeNull();
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.errors)).toBe(true);

    builder.error('late');
    expect(result.errors).toEqual([]);
    expect(builder.hasErrors()).toBe(true);
  });

  it('should stamp an ISO 8601 timestamp', () => {
    const result = new ResultBuilder('r', 'R', query).build();
    expect(new Date(result.timestamp).toISOString()).toBe(result.timestamp);
  });
});
