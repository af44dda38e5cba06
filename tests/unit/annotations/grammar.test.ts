import { describe, it, expect } from 'vitest';
import {
  escapeAnnotation,
  parseAnnotation,
  splitKV,
  splitKVList,
  unescapeAnnotation,
} from '../../../src/annotations/grammar.js';

describe('Annotation grammar', () => {
  describe('parseAnnotation', () => {
    it('should split args and options and merge extension options', () => {
      const parsed = parseAnnotation('test:arg0:arg1:arg2:k1=v1:k1=v2:k2=\\:v2', 'test', 2, { k2: 'v4', k3: 'v3' });

      expect(parsed).not.toBeNull();
      expect(parsed?.args).toEqual(['arg0', 'arg1']);
      expect(parsed?.options.size).toBe(4);
      expect(parsed?.options.toJSON()).toEqual({ arg2: '', k1: 'v1,v2', k2: ':v2', k3: 'v3' });
    });

    it('should parse name, args and a single option', () => {
      const parsed = parseAnnotation('name:a1:a2:k=v', 'name', 2);

      expect(parsed?.args).toEqual(['a1', 'a2']);
      expect(parsed?.options.toJSON()).toEqual({ k: 'v' });
    });

    it('should not match another plugin name', () => {
      expect(parseAnnotation('name:a1:a2:k=v', 'other', 2)).toBeNull();
    });

    it('should not match a name that only shares a prefix', () => {
      expect(parseAnnotation('names:a1', 'name', 0)).toBeNull();
    });

    it('should not match when there are fewer segments than args', () => {
      expect(parseAnnotation('name:a1', 'name', 2)).toBeNull();
    });

    it('should accept exactly argsCount segments with no options', () => {
      const parsed = parseAnnotation('name:a1:a2', 'name', 2);

      expect(parsed?.args).toEqual(['a1', 'a2']);
      expect(parsed?.options.size).toBe(0);
    });

    it('should keep escaped colons in option values', () => {
      const parsed = parseAnnotation('name:url=http\\://localhost', 'name', 0);

      expect(parsed?.options.get('url', '')).toBe('http://localhost');
    });

    it('should never let extension options override parsed keys', () => {
      const parsed = parseAnnotation('name:k=explicit:flag', 'name', 0, { k: 'ext', flag: 'ext', other: 'ext' });

      expect(parsed?.options.toJSON()).toEqual({ k: 'explicit', flag: '', other: 'ext' });
    });

    it('should skip empty option segments', () => {
      const parsed = parseAnnotation('name::k=v:', 'name', 0);

      expect(parsed?.options.toJSON()).toEqual({ k: 'v' });
    });
  });

  describe('splitKV', () => {
    it('should split at the first separator only', () => {
      expect(splitKV('k=v=3', '=')).toEqual(['k', 'v=3']);
    });

    it('should give an empty value without separator', () => {
      expect(splitKV('flag', '=')).toEqual(['flag', '']);
    });

    it('should allow an empty key', () => {
      expect(splitKV('=v', '=')).toEqual(['', 'v']);
    });
  });

  describe('splitKVList', () => {
    it('should join repeated keys in encounter order', () => {
      const map = splitKVList(['k1=v1', '', 'k1=v2', 'k2'], '=', new Map());

      expect(Array.from(map.entries())).toEqual([
        ['k1', 'v1,v2'],
        ['k2', ''],
      ]);
    });

    it('should add to existing entries of the target map', () => {
      const map = splitKVList(['a=2'], '=', new Map([['a', '1']]));

      expect(map.get('a')).toBe('1,2');
    });
  });

  describe('escaping', () => {
    it('should replace escaped separators with a placeholder and back', () => {
      const escaped = escapeAnnotation('a\\:b:c');

      expect(escaped.split(':')).toHaveLength(2);
      expect(unescapeAnnotation(escaped)).toBe('a:b:c');
    });
  });
});
