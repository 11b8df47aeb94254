/**
 * Property-Based Tests for PatternMatcher
 */

import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { MatchMode, PatternMatcher } from '../../src/pattern-matcher';

const matcher = new PatternMatcher();

// Letters, digits and separators: never regex-like, no case-folding surprises
const plainText = fc.stringOf(fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCDEFGHIJ0123456789-_:'), {
  minLength: 1,
  maxLength: 30
});

describe('Pattern matching properties', () => {
  test('matching ignores case on both sides', () => {
    fc.assert(
      fc.property(plainText, plainText, (value, pattern) => {
        const expected = matcher.matches(value, pattern);
        expect(matcher.matches(value.toUpperCase(), pattern.toLowerCase())).toBe(expected);
        expect(matcher.matches(value.toLowerCase(), pattern.toUpperCase())).toBe(expected);
      }),
      { numRuns: 200 }
    );
  });

  test('a value always matches itself exactly', () => {
    fc.assert(
      fc.property(plainText, value => {
        expect(matcher.matchMode(value, value)).toBe(MatchMode.EXACT);
      })
    );
  });

  test('any value containing a plain pattern matches it', () => {
    fc.assert(
      fc.property(plainText, plainText, plainText, (prefix, pattern, suffix) => {
        expect(matcher.matches(`${prefix}${pattern}${suffix}`, pattern)).toBe(true);
      })
    );
  });

  test('findMatches keeps list order and only matching patterns', () => {
    fc.assert(
      fc.property(plainText, fc.array(plainText, { maxLength: 8 }), (value, patterns) => {
        const found = matcher.findMatches(value, patterns);
        expect(found).toEqual(patterns.filter(pattern => matcher.matches(value, pattern)));
      })
    );
  });
});
