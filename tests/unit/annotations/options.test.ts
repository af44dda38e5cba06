import { describe, it, expect } from 'vitest';
import { Options } from '../../../src/annotations/options.js';

describe('Options', () => {
  const options = new Options({
    name: 'users',
    empty: '',
    yes: 'true',
    one: '1',
    short: 'T',
    no: 'false',
    other: 'maybe',
  });

  describe('get', () => {
    it('should return the value of a set key', () => {
      expect(options.get('name', 'fallback')).toBe('users');
    });

    it('should return the default for empty values', () => {
      expect(options.get('empty', 'fallback')).toBe('fallback');
    });

    it('should return the default for missing keys', () => {
      expect(options.get('missing', 'fallback')).toBe('fallback');
    });
  });

  describe('exist', () => {
    it('should treat an empty value as set', () => {
      expect(options.exist('empty')).toBe(true);
    });

    it.each(['yes', 'one', 'short'])('should treat %s as true', key => {
      expect(options.exist(key)).toBe(true);
    });

    it('should treat false and non-boolean values as unset', () => {
      expect(options.exist('no')).toBe(false);
      expect(options.exist('other')).toBe(false);
      expect(options.exist('name')).toBe(false);
    });

    it('should return false for missing keys', () => {
      expect(options.exist('missing')).toBe(false);
    });
  });

  it('should keep insertion order in entries', () => {
    const ordered = new Options(new Map([['b', '2'], ['a', '1']]));

    expect(ordered.keys()).toEqual(['b', 'a']);
    expect(ordered.entries()).toEqual([['b', '2'], ['a', '1']]);
    expect(ordered.has('a')).toBe(true);
  });
});
