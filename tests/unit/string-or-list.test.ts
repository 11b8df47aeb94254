/**
 * Unit tests for StringOrList
 */

import { describe, it, expect } from 'vitest';
import { StringOrList, hasValues } from '../../src/string-or-list';

describe('StringOrList', () => {
  it('should normalize a scalar to a one-element list', () => {
    const field = StringOrList.scalar('get');

    expect(field.values()).toEqual(['get']);
    expect(field.isList()).toBe(false);
    expect(field.isEmpty()).toBe(false);
  });

  it('should treat an empty scalar as unset', () => {
    const field = StringOrList.scalar('');

    expect(field.values()).toEqual([]);
    expect(field.isEmpty()).toBe(true);
    expect(hasValues(field)).toBe(false);
  });

  it('should keep list order and copy its input', () => {
    const input = ['get', 'list'];
    const field = StringOrList.list(input);
    input.push('watch');

    expect(field.values()).toEqual(['get', 'list']);
    expect(field.isList()).toBe(true);
  });

  it('should drop empty list elements', () => {
    expect(StringOrList.list(['', 'get', '']).values()).toEqual(['get']);
    expect(hasValues(StringOrList.list(['']))).toBe(false);
  });

  it('should serialize back to its wire shape', () => {
    expect(JSON.stringify({ verb: StringOrList.scalar('get') })).toBe('{"verb":"get"}');
    expect(JSON.stringify({ verb: StringOrList.list(['get', 'list']) })).toBe('{"verb":["get","list"]}');
  });

  it('should report undefined fields as having no values', () => {
    expect(hasValues(undefined)).toBe(false);
    expect(hasValues(StringOrList.list(['pods']))).toBe(true);
  });
});
